/**
 * Microstructure Bot - Trading Decision State Machine
 *
 * One iteration:
 *
 *   breakers   LP_DRAIN with open position -> EXIT, then IDLE
 *              trading OFF                 -> IDLE(reason)
 *              DAILY_GAS, no position      -> IDLE(DAILY_GAS)
 *   IDLE   -> PING    ready() AND gasOk() AND NOT quietMarket() AND probeAllowed()
 *   PING   -> SCORE   always, snapshot carried forward
 *   SCORE  -> MANAGE  position already open
 *   SCORE  -> ENTER   strongReaction() AND entries enabled
 *   SCORE  -> IDLE    otherwise (carrying the snapshot)
 *   ENTER  -> MANAGE  always
 *   MANAGE -> EXIT    exitReason() on the same snapshot
 *
 * Every transition appends exactly one outcome, in order. Collaborator
 * exceptions abort the whole run() call; the position ledger is only
 * touched at ENTER and EXIT so an abort leaves it consistent.
 *
 * All mutable state (ledger, PnL, breakers) is owned by the instance and
 * guarded by one mutex: run(), kill() and resume() never interleave.
 */

import type { RiskConfig } from "../config/schema";
import type { Logger } from "../utils/logger.util";
import { Mutex } from "../utils/mutex.util";
import { WeakSignalTracker } from "./cadence";
import { ALWAYS_HEALTHY, type HealthChecks } from "./health";
import { PnLLedger, type PnlWindow, DEFAULT_PNL_WINDOWS_S } from "./pnl-ledger";
import { PositionLedger, type PositionSnapshot } from "./position-ledger";
import { RiskBreakers, type BreakerReason, type BreakerStatus } from "./breakers";
import { exitReason, markoutBps, sizeFrom, strongReaction, type ExitReason } from "./rules";
import type { PriceFeed, SignalProvider, SignalSnapshot } from "./signals";

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type BotState = "IDLE" | "PING" | "SCORE" | "ENTER" | "MANAGE" | "EXIT";

/**
 * Why an iteration ended in IDLE without a trade decision
 */
export type IdleReason =
  | BreakerReason
  | "NOT_READY"
  | "GAS_HIGH"
  | "QUIET_MARKET"
  | "SAME_BLOCK"
  | "WEAK_SIGNAL"
  | "ENTRIES_DISABLED";

export type OutcomeReason = IdleReason | ExitReason;

/**
 * One transition of the state machine
 */
export interface BotOutcome {
  state: BotState;
  signal?: SignalSnapshot;
  position?: PositionSnapshot;
  exited: boolean;
  reason?: OutcomeReason;

  /** EXIT only: price the position was closed at */
  exitPrice?: number;

  /** EXIT only: realized PnL recorded in the ledger */
  realizedPnlUsd?: number;
}

export interface BotStatus {
  state: BotState;
  position: PositionSnapshot | null;
  breakers: BreakerStatus;
  iterations: number;
}

export interface RunOptions {
  /**
   * Called after each iteration with that iteration's outcomes, inside the
   * lock. A rejection aborts the run.
   */
  onIteration?: (
    outcomes: readonly BotOutcome[],
    iteration: number,
  ) => void | Promise<void>;
}

export interface MicrostructureBotDeps {
  config: Readonly<RiskConfig>;
  signals: SignalProvider;
  prices: PriceFeed;
  health?: HealthChecks;
  pnl?: PnLLedger;
  breakers?: RiskBreakers;
  logger?: Logger;
  now?: () => number;
}

// ═══════════════════════════════════════════════════════════════════════════
// BOT
// ═══════════════════════════════════════════════════════════════════════════

export class MicrostructureBot {
  readonly pnl: PnLLedger;
  readonly breakers: RiskBreakers;

  private readonly config: Readonly<RiskConfig>;
  private readonly signals: SignalProvider;
  private readonly prices: PriceFeed;
  private readonly health: HealthChecks;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly ledger = new PositionLedger();
  private readonly lock = new Mutex();
  private readonly weakSignals = new WeakSignalTracker();
  private state: BotState = "IDLE";
  private iterations = 0;

  constructor(deps: MicrostructureBotDeps) {
    this.config = deps.config;
    this.signals = deps.signals;
    this.prices = deps.prices;
    this.health = deps.health ?? ALWAYS_HEALTHY;
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
    this.pnl = deps.pnl ?? new PnLLedger(this.now);
    this.breakers = deps.breakers ?? new RiskBreakers(this.config, this.pnl, this.now);
  }

  /**
   * Run `loops` iterations under the instance lock
   */
  run(loops: number, options: RunOptions = {}): Promise<BotOutcome[]> {
    if (!Number.isInteger(loops) || loops < 0) {
      return Promise.reject(new Error(`loops must be a non-negative integer (got ${loops})`));
    }
    return this.lock.runExclusive(async () => {
      const outcomes: BotOutcome[] = [];
      for (let i = 0; i < loops; i++) {
        const step = await this.iterate();
        this.iterations++;
        outcomes.push(...step);
        if (options.onIteration) {
          await options.onIteration(step, this.iterations);
        }
      }
      return outcomes;
    });
  }

  /**
   * Manual kill switch. Takes effect at the next iteration.
   */
  kill(note?: string): Promise<BreakerStatus> {
    return this.lock.runExclusive(() => {
      this.logger?.warn(`[Bot] Kill switch engaged${note ? `: ${note}` : ""}`);
      return this.breakers.trip("KILL_SWITCH", note);
    });
  }

  resume(): Promise<BreakerStatus> {
    return this.lock.runExclusive(() => {
      this.logger?.info("[Bot] Breakers cleared, trading resumed");
      return this.breakers.resume();
    });
  }

  status(): BotStatus {
    return {
      state: this.state,
      position: this.ledger.current(),
      breakers: this.breakers.status(),
      iterations: this.iterations,
    };
  }

  pnlWindows(windowsS: readonly number[] = DEFAULT_PNL_WINDOWS_S): PnlWindow[] {
    return this.pnl.windows(windowsS);
  }

  /**
   * Share of recent scored snapshots that failed the entry gate
   */
  weakSignalsRatio(): number {
    return this.weakSignals.ratio();
  }

  get isBusy(): boolean {
    return this.lock.isLocked;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // ITERATION
  // ═══════════════════════════════════════════════════════════════════════════

  private async iterate(): Promise<BotOutcome[]> {
    const out: BotOutcome[] = [];
    const breakers = this.breakers.evaluate();

    if (!breakers.tradingEnabled) {
      const reason = this.tradingOffReason(breakers);
      if (reason === "LP_DRAIN" && this.ledger.isOpen) {
        const price = await this.prices.currentPrice();
        out.push(this.exit(undefined, price, "LP_DRAIN"));
      }
      out.push(this.emit({ state: "IDLE", exited: false, reason }));
      return out;
    }

    if (!breakers.probesEnabled && !this.ledger.isOpen) {
      out.push(this.emit({ state: "IDLE", exited: false, reason: "DAILY_GAS" }));
      return out;
    }

    const gate = await this.healthGate();
    if (gate) {
      out.push(this.emit({ state: "IDLE", exited: false, reason: gate }));
      return out;
    }

    const signal = await this.signals.probe();
    out.push(this.emit({ state: "PING", signal, exited: false }));
    out.push(this.emit({ state: "SCORE", signal, exited: false }));

    if (!this.ledger.isOpen) {
      const strong = strongReaction(signal, this.config);
      this.weakSignals.record(!strong);
      if (!strong || !breakers.entriesEnabled) {
        const reason: IdleReason = strong ? "ENTRIES_DISABLED" : "WEAK_SIGNAL";
        out.push(this.emit({ state: "IDLE", signal, exited: false, reason }));
        return out;
      }

      const entryPrice = await this.prices.currentPrice();
      const position = this.ledger.open({
        size: sizeFrom(signal),
        entryPrice,
        openedAt: this.now(),
      });
      this.logger?.info(
        `[Bot] ENTER size=${position.size.toFixed(2)} @ ${entryPrice.toFixed(4)}`,
      );
      out.push(this.emit({ state: "ENTER", signal, position, exited: false }));
    }

    out.push(...(await this.manage(signal)));
    return out;
  }

  private async manage(signal: SignalSnapshot): Promise<BotOutcome[]> {
    const position = this.ledger.current();
    if (!position) return [];

    const price = await this.prices.currentPrice();
    const reason = exitReason(
      signal,
      {
        markoutBps: markoutBps(position.entryPrice, price),
        elapsedSeconds: (this.now() - position.openedAt) / 1000,
      },
      this.config,
    );

    const managed = this.emit({ state: "MANAGE", signal, position, exited: false });
    if (!reason) return [managed];
    return [managed, this.exit(signal, price, reason)];
  }

  /**
   * Close the open position at `price` and book the realized PnL
   */
  private exit(
    signal: SignalSnapshot | undefined,
    price: number,
    reason: ExitReason,
  ): BotOutcome {
    const closed = this.ledger.close();
    const realizedPnlUsd =
      closed.size *
      this.config.maxPositionUsd *
      ((price - closed.entryPrice) / closed.entryPrice);
    this.pnl.record(realizedPnlUsd);
    this.logger?.info(
      `[Bot] EXIT ${reason} @ ${price.toFixed(4)} pnl=$${realizedPnlUsd.toFixed(2)}`,
    );
    return this.emit({
      state: "EXIT",
      signal,
      position: closed,
      exited: true,
      reason,
      exitPrice: price,
      realizedPnlUsd,
    });
  }

  private async healthGate(): Promise<IdleReason | null> {
    if (!(await this.health.ready())) return "NOT_READY";
    if (!(await this.health.gasOk())) return "GAS_HIGH";
    if (await this.health.quietMarket()) return "QUIET_MARKET";
    if (this.health.probeAllowed && !(await this.health.probeAllowed())) return "SAME_BLOCK";
    return null;
  }

  private tradingOffReason(status: BreakerStatus): BreakerReason {
    const order: readonly BreakerReason[] = ["LP_DRAIN", "DAILY_LOSS", "KILL_SWITCH"];
    return order.find((r) => status.tripped.includes(r)) ?? "KILL_SWITCH";
  }

  private emit(outcome: BotOutcome): BotOutcome {
    this.state = outcome.state;
    this.logger?.debug(
      `[Bot] ${outcome.state}${outcome.reason ? ` (${outcome.reason})` : ""}`,
    );
    return Object.freeze(outcome);
  }
}
