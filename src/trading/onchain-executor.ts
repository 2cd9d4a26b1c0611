/**
 * On-Chain Trading Engine
 *
 * Turns an ENTER / EXIT decision into a swap on a constant-product pair.
 * Guards run in order and the first failing one rejects the trade:
 *
 * 0. Entry route      route_policy            (BUY only: private relay, or public with slippage <= 10 bps)
 * 1. Rate limit        rate_limited            (now - lastTradeTs < minTradeInterval)
 * 2. Gas assurance     insufficient_gas_balance (one-shot top-up, then re-check)
 * 3. Reserves          reserves_unavailable
 * 4. Slippage bound    slippage_cap            (never submitted)
 * 5. Approval          submission_failed       (allowance short and approve failed)
 * 6. Submission        submission_failed
 *
 * Every rejection is a typed result; collaborator faults are caught and mapped
 * so a failed trade never crashes the decision loop. lastTradeTs moves only on
 * a successful submission.
 *
 * Gas of every submitted transaction (swap, approval, top-up) is reported to
 * onGasSpent listeners, valued at the configured gas and native prices.
 *
 * Pair token ordering: the pair's token0 must be the configured token0.
 * BUY spends token0 for token1, SELL spends token1 for token0.
 */

import { MaxUint256 } from "ethers";
import type { ExecutionConfig, TxRoute } from "../config/schema";
import { MalformedResponseError, toError } from "../errors/app.errors";
import { gasCostUsd, parseGwei } from "../utils/gas";
import type { Logger } from "../utils/logger.util";
import { sleep as defaultSleep, type SleepFn } from "../utils/timing.util";
import { calcAmountOut, minOutput, priceImpactBps, spotAmountOut } from "./amm";
import { asBigInt, type ChainClient, type GasParams } from "./chain-client";
import { SIG } from "./exchange-abi";

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type TradeDirection = "BUY" | "SELL";

export type TradeError =
  | "invalid_amount"
  | "route_policy"
  | "rate_limited"
  | "insufficient_gas_balance"
  | "reserves_unavailable"
  | "slippage_cap"
  | "submission_failed"
  | "malformed_response";

export type TradeResult =
  | {
      ok: true;
      txHash: string;
      direction: TradeDirection;
      amountIn: bigint;
      expectedOut: bigint;
      minOut: bigint;
      estimatedGasUsd: number;
    }
  | { ok: false; error: TradeError; detail?: string };

export type EngineConfig = Pick<
  ExecutionConfig,
  | "token0Address"
  | "token1Address"
  | "pairAddress"
  | "routerAddress"
  | "poolFeeBps"
  | "slippageBps"
  | "txRoute"
  | "minTradeIntervalS"
  | "gasPriceGwei"
  | "gasLimit"
  | "legacyTx"
  | "minNativeBalanceWei"
  | "topupAmountWei"
  | "confirmTimeoutS"
  | "confirmPollMs"
  | "swapDeadlineS"
  | "gasPerSwap"
  | "nativePriceUsd"
>;

export interface ConfirmationOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

export interface Reserves {
  reserve0: bigint;
  reserve1: bigint;
}

export interface TradingEngineDeps {
  config: Readonly<EngineConfig>;
  client: ChainClient;
  /** Funding account for gas top-ups (optional) */
  funding?: ChainClient;
  logger?: Logger;
  now?: () => number;
  sleep?: SleepFn;
  /** Aborts confirmation waits (process shutdown) */
  signal?: AbortSignal;
}

export type GasSpendKind = "swap" | "approve" | "topup";

export type GasSpendListener = (usd: number, kind: GasSpendKind) => void;

/** Widest slippage cap an entry may use over the public mempool */
export const PUBLIC_ROUTE_MAX_SLIPPAGE_BPS = 10;

export const APPROVE_GAS_UNITS = 50_000;
export const TRANSFER_GAS_UNITS = 21_000;

/**
 * Entries go through a private relay, or over the public route only with a
 * tight slippage cap
 */
export function entryRouteAllowed(route: TxRoute, slippageBps: number): boolean {
  return route === "private_relay" || slippageBps <= PUBLIC_ROUTE_MAX_SLIPPAGE_BPS;
}

type Rejection = { ok: false; error: TradeError; detail?: string };

const reject = (error: TradeError, detail?: string): Rejection =>
  detail === undefined ? { ok: false, error } : { ok: false, error, detail };

// ═══════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════

export class TradingEngine {
  private readonly config: Readonly<EngineConfig>;
  private readonly client: ChainClient;
  private readonly funding?: ChainClient;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly sleep: SleepFn;
  private readonly signal?: AbortSignal;
  private lastTrade: number | null = null;
  private readonly gasListeners: GasSpendListener[] = [];

  constructor(deps: TradingEngineDeps) {
    this.config = deps.config;
    this.client = deps.client;
    this.funding = deps.funding;
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
    this.signal = deps.signal;
  }

  /** Epoch ms of the last successful submission */
  get lastTradeTs(): number | null {
    return this.lastTrade;
  }

  onGasSpent(listener: GasSpendListener): void {
    this.gasListeners.push(listener);
  }

  buyToken1(amountIn: bigint): Promise<TradeResult> {
    return this.trade("BUY", amountIn);
  }

  sellToken1(amountIn: bigint): Promise<TradeResult> {
    return this.trade("SELL", amountIn);
  }

  /**
   * Token balance of the trading account
   */
  async tokenBalance(token: string): Promise<bigint> {
    const [raw] = await this.client.readContractValue(token, SIG.BALANCE_OF, [
      this.client.address,
    ]);
    const balance = asBigInt(raw);
    if (balance === null) {
      throw new MalformedResponseError("balanceOf returned a non-integer", token);
    }
    return balance;
  }

  /**
   * Pair reserves, in pair token order
   * @throws NetworkError when the call fails, MalformedResponseError on a bad shape
   */
  async getReserves(): Promise<Reserves> {
    const values = await this.client.readContractValue(
      this.config.pairAddress,
      SIG.GET_RESERVES,
    );
    const reserve0 = asBigInt(values[0]);
    const reserve1 = asBigInt(values[1]);
    if (reserve0 === null || reserve1 === null) {
      throw new MalformedResponseError(
        "getReserves returned non-integer reserves",
        this.config.pairAddress,
      );
    }
    return { reserve0, reserve1 };
  }

  /**
   * Poll for a receipt until it shows up, the timeout passes, or the signal
   * aborts. Returns false for a reverted or unconfirmed transaction; never
   * throws.
   */
  async waitForConfirmation(
    txHash: string,
    options: ConfirmationOptions = {},
  ): Promise<boolean> {
    const timeoutMs = options.timeoutMs ?? this.config.confirmTimeoutS * 1000;
    const pollMs = Math.max(1, options.pollIntervalMs ?? this.config.confirmPollMs);
    const signal = options.signal ?? this.signal;
    const deadline = this.now() + timeoutMs;

    for (;;) {
      if (signal?.aborted) return false;
      try {
        const status = await this.client.getReceipt(txHash);
        if (status === "success") return true;
        if (status === "reverted") {
          this.logger?.warn(`[Engine] ${txHash} reverted`);
          return false;
        }
      } catch (err) {
        this.logger?.debug(`[Engine] Receipt poll for ${txHash} failed: ${toError(err).message}`);
      }
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        this.logger?.warn(`[Engine] ${txHash} unconfirmed after ${timeoutMs}ms`);
        return false;
      }
      await this.sleep(Math.min(pollMs, remaining), signal);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // GUARDS
  // ═══════════════════════════════════════════════════════════════════════════

  private async trade(direction: TradeDirection, amountIn: bigint): Promise<TradeResult> {
    if (amountIn <= 0n) {
      return reject("invalid_amount", `amountIn must be > 0 (got ${amountIn})`);
    }

    if (direction === "BUY" && !entryRouteAllowed(this.config.txRoute, this.config.slippageBps)) {
      this.logger?.warn(
        `[Engine] BUY refused: public route needs slippage <= ${PUBLIC_ROUTE_MAX_SLIPPAGE_BPS}bps (got ${this.config.slippageBps})`,
      );
      return reject(
        "route_policy",
        `public route allows entries up to ${PUBLIC_ROUTE_MAX_SLIPPAGE_BPS}bps slippage`,
      );
    }

    const now = this.now();
    const intervalMs = this.config.minTradeIntervalS * 1000;
    if (this.lastTrade !== null && now - this.lastTrade < intervalMs) {
      const waitS = ((intervalMs - (now - this.lastTrade)) / 1000).toFixed(1);
      this.logger?.warn(`[Engine] ${direction} rate limited, next trade in ${waitS}s`);
      return reject("rate_limited", `next trade allowed in ${waitS}s`);
    }

    try {
      const gasOk = await this.ensureGasBalance();
      if (!gasOk) {
        return reject("insufficient_gas_balance");
      }

      let reserves: Reserves;
      try {
        reserves = await this.getReserves();
      } catch (err) {
        if (err instanceof MalformedResponseError) throw err;
        return reject("reserves_unavailable", toError(err).message);
      }
      if (reserves.reserve0 <= 0n || reserves.reserve1 <= 0n) {
        return reject("reserves_unavailable", "empty reserves");
      }

      const buy = direction === "BUY";
      const tokenIn = buy ? this.config.token0Address : this.config.token1Address;
      const tokenOut = buy ? this.config.token1Address : this.config.token0Address;
      const reserveIn = buy ? reserves.reserve0 : reserves.reserve1;
      const reserveOut = buy ? reserves.reserve1 : reserves.reserve0;

      const fee = this.config.poolFeeBps;
      const expectedOut = calcAmountOut(amountIn, reserveIn, reserveOut, fee);
      const minOut = minOutput(expectedOut, this.config.slippageBps);
      const impact = priceImpactBps(expectedOut, spotAmountOut(amountIn, reserveIn, reserveOut, fee));
      if (minOut === 0n || impact > this.config.slippageBps) {
        this.logger?.warn(
          `[Engine] ${direction} rejected: impact ${impact}bps > cap ${this.config.slippageBps}bps (minOut=${minOut})`,
        );
        return reject("slippage_cap", `impact ${impact}bps, minOut ${minOut}`);
      }

      const approval = await this.ensureAllowance(tokenIn, amountIn);
      if (approval) return approval;

      const deadline = BigInt(Math.floor(this.now() / 1000) + this.config.swapDeadlineS);
      const sent = await this.client.sendTransaction(
        this.config.routerAddress,
        SIG.SWAP_EXACT_TOKENS,
        [amountIn, minOut, [tokenIn, tokenOut], this.client.address, deadline],
        this.gasParams(),
      );
      if (!sent.ok) {
        this.logger?.error(`[Engine] ${direction} submission failed: ${sent.error}`);
        return reject("submission_failed", sent.error);
      }

      this.lastTrade = this.now();
      const estimatedGasUsd = this.spendGas(this.config.gasPerSwap, "swap");
      this.logger?.info(
        `[Engine] ${direction} submitted ${sent.txHash} in=${amountIn} minOut=${minOut}`,
      );
      return {
        ok: true,
        txHash: sent.txHash,
        direction,
        amountIn,
        expectedOut,
        minOut,
        estimatedGasUsd,
      };
    } catch (err) {
      const error = toError(err);
      this.logger?.error(`[Engine] ${direction} aborted: ${error.message}`, error);
      return reject("malformed_response", error.message);
    }
  }

  /**
   * Native balance >= minimum, topping up once from the funding account
   * when configured
   */
  private async ensureGasBalance(): Promise<boolean> {
    const min = this.config.minNativeBalanceWei;
    const balance = await this.nativeBalance();
    if (balance === null) return false;
    if (balance >= min) return true;

    if (!this.funding || this.config.topupAmountWei <= 0n) {
      this.logger?.warn(`[Engine] Native balance ${balance} below minimum ${min}, no top-up configured`);
      return false;
    }

    this.logger?.info(`[Engine] Native balance ${balance} below ${min}, topping up ${this.config.topupAmountWei}`);
    const sent = await this.funding.sendValue(
      this.client.address,
      this.config.topupAmountWei,
      this.gasParams(),
    );
    if (!sent.ok) {
      this.logger?.error(`[Engine] Gas top-up failed: ${sent.error}`);
      return false;
    }
    this.spendGas(TRANSFER_GAS_UNITS, "topup");
    const confirmed = await this.waitForConfirmation(sent.txHash);
    if (!confirmed) return false;

    const after = await this.nativeBalance();
    return after !== null && after >= min;
  }

  private async nativeBalance(): Promise<bigint | null> {
    try {
      return await this.client.getNativeBalance(this.client.address);
    } catch (err) {
      this.logger?.warn(`[Engine] Native balance unavailable: ${toError(err).message}`);
      return null;
    }
  }

  /**
   * Value `gasUnits` in USD and notify listeners
   */
  private spendGas(gasUnits: number, kind: GasSpendKind): number {
    const usd = gasCostUsd(gasUnits, parseGwei(this.config.gasPriceGwei), this.config.nativePriceUsd);
    for (const listener of this.gasListeners) listener(usd, kind);
    return usd;
  }

  /**
   * Approve the router for `amount` of `token` when the allowance is short.
   * Returns a rejection, or null when the allowance is sufficient.
   */
  private async ensureAllowance(token: string, amount: bigint): Promise<Rejection | null> {
    const [raw] = await this.client.readContractValue(token, SIG.ALLOWANCE, [
      this.client.address,
      this.config.routerAddress,
    ]);
    const allowance = asBigInt(raw);
    if (allowance === null) {
      throw new MalformedResponseError("allowance returned a non-integer", token);
    }
    if (allowance >= amount) return null;

    this.logger?.info(`[Engine] Approving router for ${token} (allowance ${allowance} < ${amount})`);
    const sent = await this.client.sendTransaction(
      token,
      SIG.APPROVE,
      [this.config.routerAddress, MaxUint256],
      this.gasParams(),
    );
    if (!sent.ok) {
      return reject("submission_failed", `approve: ${sent.error}`);
    }
    this.spendGas(APPROVE_GAS_UNITS, "approve");
    if (!(await this.waitForConfirmation(sent.txHash))) {
      return reject("submission_failed", "approve unconfirmed");
    }
    return null;
  }

  private gasParams(): GasParams {
    const params: GasParams = {
      gasPriceWei: parseGwei(this.config.gasPriceGwei),
      legacy: this.config.legacyTx,
    };
    if (this.config.gasLimit !== undefined) {
      params.gasLimit = BigInt(this.config.gasLimit);
    }
    return params;
  }
}
