/**
 * Live Runner
 *
 * Runs bot iterations under the bot's lock and fires a swap for every ENTER
 * (buy token1) and EXIT (sell the whole token1 balance). Without the
 * LIVE_TRADING acknowledgement it only logs what it would do.
 *
 * A rejected or unconfirmed trade is reported, never rolled back into the
 * position ledger. Gas of every transaction the engine submits is charged to
 * the bot's daily gas breaker.
 */

import type { ExecutionConfig } from "../config/schema";
import type { BotOutcome, MicrostructureBot } from "../core/state-machine";
import { toError } from "../errors/app.errors";
import type { Logger } from "../utils/logger.util";
import type { TradeDirection, TradeResult, TradingEngine } from "./onchain-executor";

export interface TradeEvent {
  iteration: number;
  direction: TradeDirection;
  amountIn: bigint;
  dryRun: boolean;
  result?: TradeResult;
  confirmed?: boolean;
}

export interface LiveRunResult {
  outcomes: BotOutcome[];
  trades: TradeEvent[];
}

export type LiveRunnerConfig = Pick<
  ExecutionConfig,
  "tradeAmountInWei" | "token1Address" | "liveTradingEnabled"
>;

export interface LiveRunnerDeps {
  bot: MicrostructureBot;
  engine: TradingEngine;
  config: Readonly<LiveRunnerConfig>;
  /** Current pool liquidity, fed to the LP drain breaker after each iteration */
  liquidity?: () => Promise<number>;
  logger?: Logger;
}

const SIZE_SCALE = 10_000n;

export class LiveRunner {
  private readonly bot: MicrostructureBot;
  private readonly engine: TradingEngine;
  private readonly config: Readonly<LiveRunnerConfig>;
  private readonly liquidity?: () => Promise<number>;
  private readonly logger?: Logger;

  constructor(deps: LiveRunnerDeps) {
    this.bot = deps.bot;
    this.engine = deps.engine;
    this.config = deps.config;
    this.liquidity = deps.liquidity;
    this.logger = deps.logger;
    this.engine.onGasSpent((usd) => this.bot.breakers.recordGasSpend(usd));
  }

  get dryRun(): boolean {
    return !this.config.liveTradingEnabled;
  }

  async run(loops: number): Promise<LiveRunResult> {
    const trades: TradeEvent[] = [];
    const outcomes = await this.bot.run(loops, {
      onIteration: async (step, iteration) => {
        for (const outcome of step) {
          const event = await this.handle(outcome, iteration);
          if (event) trades.push(event);
        }
        if (this.liquidity) await this.observeLiquidity();
      },
    });
    return { outcomes, trades };
  }

  private async observeLiquidity(): Promise<void> {
    if (!this.liquidity) return;
    try {
      this.bot.breakers.observeLiquidity(await this.liquidity());
    } catch (err) {
      const error = toError(err);
      this.logger?.warn(`[Live] Liquidity read failed, drain window not updated: ${error.message}`);
    }
  }

  /**
   * token0 amount for an entry of `size` (fraction of a full position)
   */
  entryAmount(size: number): bigint {
    const scaled = BigInt(Math.round(Math.min(1, Math.max(0, size)) * Number(SIZE_SCALE)));
    return (this.config.tradeAmountInWei * scaled) / SIZE_SCALE;
  }

  private async handle(outcome: BotOutcome, iteration: number): Promise<TradeEvent | null> {
    if (outcome.state === "ENTER" && outcome.position) {
      const amountIn = this.entryAmount(outcome.position.size);
      if (amountIn <= 0n) {
        this.logger?.warn(`[Live] ENTER with size ${outcome.position.size} maps to 0 tokens, skipping`);
        return null;
      }
      return this.execute("BUY", amountIn, iteration);
    }

    if (outcome.state === "EXIT") {
      if (this.dryRun) {
        this.logger?.info(`[Live][DRY RUN] Would SELL full token1 balance (${outcome.reason ?? "exit"})`);
        return { iteration, direction: "SELL", amountIn: 0n, dryRun: true };
      }
      let balance: bigint;
      try {
        balance = await this.engine.tokenBalance(this.config.token1Address);
      } catch (err) {
        const error = toError(err);
        this.logger?.error(`[Live] Could not read token1 balance for EXIT: ${error.message}`, error);
        return {
          iteration,
          direction: "SELL",
          amountIn: 0n,
          dryRun: false,
          result: { ok: false, error: "malformed_response", detail: error.message },
        };
      }
      if (balance <= 0n) {
        this.logger?.warn("[Live] EXIT with no token1 balance, nothing to sell");
        return null;
      }
      return this.execute("SELL", balance, iteration);
    }

    return null;
  }

  private async execute(
    direction: TradeDirection,
    amountIn: bigint,
    iteration: number,
  ): Promise<TradeEvent> {
    if (this.dryRun) {
      this.logger?.info(`[Live][DRY RUN] Would ${direction} with amountIn=${amountIn}`);
      return { iteration, direction, amountIn, dryRun: true };
    }

    const result =
      direction === "BUY"
        ? await this.engine.buyToken1(amountIn)
        : await this.engine.sellToken1(amountIn);

    if (!result.ok) {
      this.logger?.warn(
        `[Live] ${direction} rejected: ${result.error}${result.detail ? ` (${result.detail})` : ""}`,
      );
      return { iteration, direction, amountIn, dryRun: false, result };
    }

    const confirmed = await this.engine.waitForConfirmation(result.txHash);
    if (!confirmed) {
      this.logger?.warn(`[Live] ${direction} ${result.txHash} not confirmed in time`);
    }
    return { iteration, direction, amountIn, dryRun: false, result, confirmed };
  }
}
