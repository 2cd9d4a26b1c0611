/**
 * Risk Breakers - global kill conditions
 *
 * Evaluated every iteration before the IDLE -> PING gate:
 *
 * - LP_DRAIN     liquidity drained over the last 2 observation blocks
 *                >= ldDrainExitPct -> trading OFF, open position force-exited
 * - DAILY_GAS    gas spend in the trailing 24h >= dailyGasBudgetUsd
 *                -> probes and entries OFF (open position still managed)
 * - DAILY_LOSS   realized PnL in the trailing 24h <= -dailyLossCapUsd
 *                -> trading OFF
 * - KILL_SWITCH  manual trip from an operator
 *
 * A tripped breaker stays latched until resume(), even if the underlying
 * condition clears. resume() also restarts the daily accounting window.
 */

import type { RiskConfig } from "../config/schema";
import type { PnLLedger } from "./pnl-ledger";

export type BreakerReason = "LP_DRAIN" | "DAILY_GAS" | "DAILY_LOSS" | "KILL_SWITCH";

export type BreakerConfig = Pick<
  RiskConfig,
  "ldDrainExitPct" | "dailyGasBudgetUsd" | "dailyLossCapUsd"
>;

export interface BreakerStatus {
  /** False when LP_DRAIN, DAILY_LOSS or KILL_SWITCH is latched */
  tradingEnabled: boolean;
  /** False when trading is off or DAILY_GAS is latched */
  probesEnabled: boolean;
  entriesEnabled: boolean;
  tripped: BreakerReason[];
  lpDrainPct: number;
  dailyGasUsd: number;
  dailyPnlUsd: number;
  note?: string;
}

export type BreakerTripListener = (
  reason: BreakerReason,
  status: BreakerStatus,
) => void;

interface GasSpend {
  timestamp: number;
  usd: number;
}

const DAY_S = 86_400;
const DAY_MS = DAY_S * 1000;

/** Liquidity observations kept: current block plus the two before it */
const DRAIN_WINDOW = 3;

const TRADING_OFF: readonly BreakerReason[] = ["LP_DRAIN", "DAILY_LOSS", "KILL_SWITCH"];

export class RiskBreakers {
  private readonly latched = new Set<BreakerReason>();
  private readonly listeners: BreakerTripListener[] = [];
  private liquidity: number[] = [];
  private gasSpends: GasSpend[] = [];
  private accountingStart = -Infinity;
  private note?: string;

  constructor(
    private readonly config: BreakerConfig,
    private readonly pnl: PnLLedger,
    private readonly now: () => number = Date.now,
  ) {}

  onTrip(listener: BreakerTripListener): void {
    this.listeners.push(listener);
  }

  /**
   * Record pool liquidity for the latest block
   */
  observeLiquidity(liquidity: number): void {
    this.liquidity.push(liquidity);
    if (this.liquidity.length > DRAIN_WINDOW) {
      this.liquidity = this.liquidity.slice(-DRAIN_WINDOW);
    }
  }

  recordGasSpend(usd: number, timestamp: number = this.now()): void {
    this.gasSpends.push({ timestamp, usd });
    const cutoff = this.now() - DAY_MS;
    this.gasSpends = this.gasSpends.filter((g) => g.timestamp > cutoff);
  }

  /**
   * Percentage drained between the oldest and newest observation in the window
   */
  lpDrainPct(): number {
    if (this.liquidity.length < 2) return 0;
    const oldest = this.liquidity[0] ?? 0;
    const newest = this.liquidity[this.liquidity.length - 1] ?? 0;
    if (oldest <= 0) return 0;
    return Math.max(0, ((oldest - newest) / oldest) * 100);
  }

  dailyGasUsd(): number {
    const from = Math.max(this.now() - DAY_MS, this.accountingStart);
    return this.gasSpends
      .filter((g) => g.timestamp > from)
      .reduce((sum, g) => sum + g.usd, 0);
  }

  dailyPnlUsd(): number {
    const notBefore = Number.isFinite(this.accountingStart)
      ? this.accountingStart
      : undefined;
    return this.pnl.sumSince(DAY_S, notBefore).realizedPnlUsd;
  }

  /**
   * Latch any newly tripped breaker and return the resulting status
   */
  evaluate(): BreakerStatus {
    if (this.lpDrainPct() >= this.config.ldDrainExitPct) {
      this.latch("LP_DRAIN");
    }
    if (this.dailyGasUsd() >= this.config.dailyGasBudgetUsd) {
      this.latch("DAILY_GAS");
    }
    if (this.dailyPnlUsd() <= -this.config.dailyLossCapUsd) {
      this.latch("DAILY_LOSS");
    }
    return this.status();
  }

  /**
   * Manual trip (kill switch)
   */
  trip(reason: BreakerReason, note?: string): BreakerStatus {
    if (note !== undefined) this.note = note;
    this.latch(reason);
    return this.status();
  }

  /**
   * Clear every latch. The drain window is emptied and daily gas / PnL
   * accounting restarts from now.
   */
  resume(): BreakerStatus {
    this.latched.clear();
    this.liquidity = [];
    this.accountingStart = this.now();
    this.note = undefined;
    return this.status();
  }

  isTripped(reason: BreakerReason): boolean {
    return this.latched.has(reason);
  }

  status(): BreakerStatus {
    const tripped = [...this.latched];
    const tradingEnabled = !tripped.some((r) => TRADING_OFF.includes(r));
    const probesEnabled = tradingEnabled && !this.latched.has("DAILY_GAS");
    return {
      tradingEnabled,
      probesEnabled,
      entriesEnabled: probesEnabled,
      tripped,
      lpDrainPct: this.lpDrainPct(),
      dailyGasUsd: this.dailyGasUsd(),
      dailyPnlUsd: this.dailyPnlUsd(),
      note: this.note,
    };
  }

  private latch(reason: BreakerReason): void {
    if (this.latched.has(reason)) return;
    this.latched.add(reason);
    const status = this.status();
    for (const listener of this.listeners) {
      listener(reason, status);
    }
  }
}
