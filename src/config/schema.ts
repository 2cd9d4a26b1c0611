/**
 * Configuration Schema
 *
 * Type definitions for the application configuration.
 * This provides a single source of truth for all configuration options.
 */

/**
 * How MANAGE decides to exit.
 * - minimal: order-flow reversal or adverse liquidity only
 * - extended: minimal rules plus take-profit, stop-loss, time-stop and the
 *   normalized OFI threshold
 */
export type ExitPolicy = "minimal" | "extended";

/**
 * Process run mode
 * - paper: run a fixed number of paper iterations and exit
 * - telegram: serve chat commands over a paper bot
 * - live: scheduled decision loop with on-chain execution (dry-run unless
 *   LIVE_TRADING is acknowledged), plus chat commands when configured
 */
export type RunMode = "paper" | "telegram" | "live";

/**
 * Where signed transactions are submitted
 */
export type TxRoute = "public" | "private_relay";

/**
 * Entry/exit thresholds and breaker limits
 */
export interface RiskConfig {
  /** Minimum follow-through ratio for entry */
  ftMin: number;

  /** Minimum impact persistence (bps) for entry */
  ipMinBps: number;

  /** Slippage elasticity band for entry (inclusive) */
  seMin: number;
  seMax: number;

  /** Exit when OFI <= -ofiNormThreshold (extended policy) */
  ofiNormThreshold: number;

  /** LP drain over the last 2 observation blocks that trips the LP_DRAIN breaker (%) */
  ldDrainExitPct: number;

  /** Gas price above which the gas health check fails (gwei) */
  gasCapGwei: number;

  /** Daily gas spend that disables probes and entries (USD) */
  dailyGasBudgetUsd: number;

  /** Daily realized loss that turns trading off (USD, positive number) */
  dailyLossCapUsd: number;

  /** Take-profit / stop-loss markout (bps) */
  tpBps: number;
  slBps: number;

  /** Maximum holding time (seconds) */
  timeStopS: number;

  /** USD value of a full-size (1.0) position, used for realized PnL */
  maxPositionUsd: number;

  exitPolicy: ExitPolicy;
}

/**
 * Signal provider selection
 */
export interface SignalConfig {
  /** Registry key of the provider ("seeded" | "replay") */
  provider: string;

  /** Seed string for the seeded provider (defaults to the environment name) */
  seed: string;

  /** JSON file of snapshots for the replay provider */
  replayFile?: string;
}

/**
 * On-chain execution settings (live mode only)
 */
export interface ExecutionConfig {
  rpcUrl: string;
  chainId: number;
  privateKey: string;

  token0Address: string;
  token1Address: string;
  pairAddress: string;
  routerAddress: string;

  /** AMM pool fee (bps, 25 = 0.25%) */
  poolFeeBps: number;

  /** Max slippage below the expected output (bps) */
  slippageBps: number;

  /**
   * Submission route. Entries over the public mempool are only allowed
   * with slippageBps <= 10.
   */
  txRoute: TxRoute;
  privateRelayUrl?: string;

  /** Minimum spacing between two submitted trades (seconds) */
  minTradeIntervalS: number;

  gasPriceGwei: number;
  gasLimit?: number;
  legacyTx: boolean;

  /** Native balance the trading account must hold before a trade (wei) */
  minNativeBalanceWei: bigint;

  /** One-shot top-up amount (wei, 0 = disabled) */
  topupAmountWei: bigint;

  /** Private key of the funding account used for top-ups */
  topupSourcePk?: string;

  /** token0 amount spent by a full-size (1.0) entry (base units) */
  tradeAmountInWei: bigint;

  /** Receipt wait timeout and poll interval */
  confirmTimeoutS: number;
  confirmPollMs: number;

  /** Swap deadline offset (seconds from submission) */
  swapDeadlineS: number;

  /** Gas accounting for the daily gas breaker */
  gasPerSwap: number;
  /** Native token price used to value gas spend (required, > 0) */
  nativePriceUsd: number;

  /** True only when LIVE_TRADING=I_UNDERSTAND_THE_RISKS */
  liveTradingEnabled: boolean;
}

/**
 * Telegram command front end
 */
export interface TelegramConfig {
  /** Bot token from @BotFather */
  botToken?: string;

  /** Only this user may run stateful commands (optional) */
  adminId?: number;

  /** Sleep after a failed poll (ms) */
  pollIntervalMs: number;

  /** Chat that receives breaker alerts (optional) */
  alertChatId?: string;

  enabled: boolean;
}

/**
 * GitHub issue notifications
 */
export interface GitHubConfig {
  token?: string;
  repo?: string;
  issueNumber?: number;
  enabled: boolean;
}

/**
 * Periodic decision loop
 */
export interface SchedulerConfig {
  /** Base interval between iterations (ms) */
  intervalMs: number;

  /** Fewer swaps than this in 10 minutes counts as a quiet market */
  quietSwapsMin: number;
}

export interface AppConfig {
  environment: string;
  mode: RunMode;
  paperLoops: number;
  risk: RiskConfig;
  signals: SignalConfig;
  execution?: ExecutionConfig;
  telegram: TelegramConfig;
  github: GitHubConfig;
  scheduler: SchedulerConfig;
}
