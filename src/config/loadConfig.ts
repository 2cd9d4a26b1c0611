import { isAddress } from "ethers";
import { ConfigurationError } from "../errors/app.errors";
import { isLiveTradingEnabled } from "../utils/live-trading.util";
import {
  envBigInt,
  envBool,
  envEnum,
  envInt,
  envNum,
  envOptional,
  envStr,
  readEnv,
  type EnvSource,
} from "./env";
import type {
  AppConfig,
  ExecutionConfig,
  GitHubConfig,
  RiskConfig,
  RunMode,
  SchedulerConfig,
  TxRoute,
  SignalConfig,
  TelegramConfig,
} from "./schema";

export const DEFAULT_ENVIRONMENT = "development";

export const DEFAULT_RISK_CONFIG: Readonly<RiskConfig> = {
  ftMin: 1.8,
  ipMinBps: 5.0,
  seMin: 0.1,
  seMax: 2.0,
  ofiNormThreshold: 0.3,
  ldDrainExitPct: 20,
  gasCapGwei: 50,
  dailyGasBudgetUsd: 25,
  dailyLossCapUsd: 100,
  tpBps: 40,
  slBps: 25,
  timeStopS: 300,
  maxPositionUsd: 100,
  exitPolicy: "extended",
};

const RUN_MODES: readonly RunMode[] = ["paper", "telegram", "live"];

const TX_ROUTES: readonly TxRoute[] = ["public", "private_relay"];

// 0.01 native token in 18 decimals
const DEFAULT_MIN_NATIVE_BALANCE_WEI = 10_000_000_000_000_000n;

/**
 * Parse and validate the risk thresholds.
 * @throws ConfigurationError on any invalid value
 */
export function loadRiskConfig(env: EnvSource = process.env): RiskConfig {
  const d = DEFAULT_RISK_CONFIG;
  const risk: RiskConfig = {
    ftMin: envNum(env, "FT_MIN", d.ftMin),
    ipMinBps: envNum(env, "IP_MIN_BPS", d.ipMinBps),
    seMin: envNum(env, "SE_MIN", d.seMin),
    seMax: envNum(env, "SE_MAX", d.seMax),
    ofiNormThreshold: envNum(env, "OFI_NORM_THRESHOLD", d.ofiNormThreshold),
    ldDrainExitPct: envNum(env, "LD_DRAIN_EXIT_PCT", d.ldDrainExitPct),
    gasCapGwei: envNum(env, "GAS_CAP_GWEI", d.gasCapGwei),
    dailyGasBudgetUsd: envNum(env, "DAILY_GAS_BUDGET_USD", d.dailyGasBudgetUsd),
    dailyLossCapUsd: envNum(env, "DAILY_LOSS_CAP_USD", d.dailyLossCapUsd),
    tpBps: envNum(env, "TP_BPS", d.tpBps),
    slBps: envNum(env, "SL_BPS", d.slBps),
    timeStopS: envNum(env, "TIME_STOP_S", d.timeStopS),
    maxPositionUsd: envNum(env, "MAX_POSITION_USD", d.maxPositionUsd),
    exitPolicy: envEnum(env, "EXIT_POLICY", ["minimal", "extended"], d.exitPolicy),
  };
  validateRiskConfig(risk);
  return risk;
}

export function validateRiskConfig(risk: RiskConfig): void {
  const errors: string[] = [];

  if (risk.seMin > risk.seMax) {
    errors.push(`SE_MIN (${risk.seMin}) must be <= SE_MAX (${risk.seMax})`);
  }
  if (risk.ftMin <= 0) errors.push("FT_MIN must be > 0");
  if (risk.ofiNormThreshold < 0) errors.push("OFI_NORM_THRESHOLD must be >= 0");
  if (risk.ldDrainExitPct <= 0 || risk.ldDrainExitPct > 100) {
    errors.push("LD_DRAIN_EXIT_PCT must be in (0, 100]");
  }
  if (risk.gasCapGwei <= 0) errors.push("GAS_CAP_GWEI must be > 0");
  if (risk.dailyGasBudgetUsd <= 0) errors.push("DAILY_GAS_BUDGET_USD must be > 0");
  if (risk.dailyLossCapUsd <= 0) errors.push("DAILY_LOSS_CAP_USD must be > 0");
  if (risk.tpBps <= 0) errors.push("TP_BPS must be > 0");
  if (risk.slBps <= 0) errors.push("SL_BPS must be > 0");
  if (risk.timeStopS <= 0) errors.push("TIME_STOP_S must be > 0");
  if (risk.maxPositionUsd <= 0) errors.push("MAX_POSITION_USD must be > 0");

  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid risk config: ${errors.join("; ")}`);
  }
}

function loadSignalConfig(env: EnvSource, environment: string): SignalConfig {
  return {
    provider: envStr(env, "SIGNAL_PROVIDER", "seeded"),
    seed: envStr(env, "SIGNAL_SEED", environment),
    replayFile: envOptional(env, "SIGNAL_REPLAY_FILE"),
  };
}

function requireAddress(env: EnvSource, key: string): string {
  const value = readEnv(env, key);
  if (value === undefined) {
    throw new ConfigurationError(`${key} is required in live mode`);
  }
  if (!isAddress(value)) {
    throw new ConfigurationError(`${key} is not a valid address: ${value}`);
  }
  return value;
}

/**
 * Account and venue parameters for on-chain execution
 * @throws ConfigurationError when anything required is missing or malformed
 */
export function loadExecutionConfig(env: EnvSource = process.env): ExecutionConfig {
  const rpcUrl = readEnv(env, "RPC_URL");
  if (!rpcUrl) throw new ConfigurationError("RPC_URL is required in live mode");
  const privateKey = readEnv(env, "PRIVATE_KEY");
  if (!privateKey) {
    throw new ConfigurationError("PRIVATE_KEY is required in live mode");
  }

  const execution: ExecutionConfig = {
    rpcUrl,
    chainId: envInt(env, "CHAIN_ID", 1),
    privateKey,
    token0Address: requireAddress(env, "TOKEN0_ADDRESS"),
    token1Address: requireAddress(env, "TOKEN1_ADDRESS"),
    pairAddress: requireAddress(env, "PAIR_ADDRESS"),
    routerAddress: requireAddress(env, "ROUTER_ADDRESS"),
    poolFeeBps: envInt(env, "POOL_FEE_BPS", 25),
    slippageBps: envInt(env, "SLIPPAGE_BPS", 50),
    txRoute: envEnum(env, "TX_ROUTE", TX_ROUTES, "public"),
    privateRelayUrl: envOptional(env, "PRIVATE_RELAY_URL"),
    minTradeIntervalS: envNum(env, "MIN_TRADE_INTERVAL_S", 30),
    gasPriceGwei: envNum(env, "GAS_PRICE_GWEI", 1),
    gasLimit: readEnv(env, "GAS_LIMIT") ? envInt(env, "GAS_LIMIT", 0) : undefined,
    legacyTx: envBool(env, "LEGACY_TX", true),
    minNativeBalanceWei: envBigInt(
      env,
      "MIN_NATIVE_BALANCE_WEI",
      DEFAULT_MIN_NATIVE_BALANCE_WEI,
    ),
    topupAmountWei: envBigInt(env, "GAS_TOPUP_WEI", 0n),
    topupSourcePk: envOptional(env, "TOPUP_SOURCE_PK"),
    tradeAmountInWei: envBigInt(env, "TRADE_AMOUNT_IN_WEI", 0n),
    confirmTimeoutS: envNum(env, "CONFIRM_TIMEOUT_S", 120),
    confirmPollMs: envInt(env, "CONFIRM_POLL_MS", 2000),
    swapDeadlineS: envInt(env, "SWAP_DEADLINE_S", 60),
    gasPerSwap: envInt(env, "GAS_PER_SWAP", 200_000),
    nativePriceUsd: envNum(env, "NATIVE_PRICE_USD", 0),
    liveTradingEnabled: isLiveTradingEnabled(env),
  };

  const errors: string[] = [];
  if (execution.poolFeeBps < 0 || execution.poolFeeBps >= 10_000) {
    errors.push("POOL_FEE_BPS must be in [0, 10000)");
  }
  if (execution.slippageBps < 0 || execution.slippageBps >= 10_000) {
    errors.push("SLIPPAGE_BPS must be in [0, 10000)");
  }
  if (execution.minTradeIntervalS < 0) errors.push("MIN_TRADE_INTERVAL_S must be >= 0");
  if (execution.gasPriceGwei <= 0) errors.push("GAS_PRICE_GWEI must be > 0");
  if (execution.tradeAmountInWei <= 0n) errors.push("TRADE_AMOUNT_IN_WEI must be > 0");
  if (execution.confirmTimeoutS <= 0) errors.push("CONFIRM_TIMEOUT_S must be > 0");
  if (execution.nativePriceUsd <= 0) errors.push("NATIVE_PRICE_USD must be > 0");
  if (execution.txRoute === "private_relay" && !execution.privateRelayUrl) {
    errors.push("TX_ROUTE=private_relay requires PRIVATE_RELAY_URL");
  }
  if (execution.topupAmountWei > 0n && !execution.topupSourcePk) {
    errors.push("GAS_TOPUP_WEI requires TOPUP_SOURCE_PK");
  }
  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid execution config: ${errors.join("; ")}`);
  }
  return execution;
}

function loadTelegramConfig(env: EnvSource): TelegramConfig {
  const botToken = envOptional(env, "TELEGRAM_BOT_TOKEN");
  const adminRaw = envOptional(env, "TELEGRAM_ADMIN_ID");
  let adminId: number | undefined;
  if (adminRaw !== undefined) {
    adminId = Number(adminRaw);
    if (!Number.isInteger(adminId)) {
      throw new ConfigurationError(
        `TELEGRAM_ADMIN_ID must be an integer (got "${adminRaw}")`,
      );
    }
  }
  return {
    botToken,
    adminId,
    pollIntervalMs: envInt(env, "TELEGRAM_POLL_INTERVAL_MS", 1000),
    alertChatId: envOptional(env, "TELEGRAM_ALERT_CHAT_ID"),
    enabled: Boolean(botToken),
  };
}

function loadGitHubConfig(env: EnvSource): GitHubConfig {
  const token = envOptional(env, "GITHUB_TOKEN");
  const repo = envOptional(env, "GITHUB_REPO");
  const issueRaw = envOptional(env, "GITHUB_ISSUE_NUMBER");
  const issueNumber =
    issueRaw !== undefined ? envInt(env, "GITHUB_ISSUE_NUMBER", 0) : undefined;
  if (repo !== undefined && !/^[\w.-]+\/[\w.-]+$/.test(repo)) {
    throw new ConfigurationError(
      `GITHUB_REPO must look like owner/repo (got "${repo}")`,
    );
  }
  return {
    token,
    repo,
    issueNumber,
    enabled: Boolean(token && repo && issueNumber),
  };
}

function loadSchedulerConfig(env: EnvSource): SchedulerConfig {
  const scheduler: SchedulerConfig = {
    intervalMs: envInt(env, "INTERVAL_MS", 5000),
    quietSwapsMin: envNum(env, "QUIET_SWAPS_MIN", 0),
  };
  if (scheduler.intervalMs <= 0) {
    throw new ConfigurationError("INTERVAL_MS must be > 0");
  }
  return scheduler;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child !== null && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Load the full application config once at process start.
 * The returned object is frozen: thresholds never change for the life of a bot.
 */
export function loadConfig(env: EnvSource = process.env): Readonly<AppConfig> {
  const environment = envStr(env, "BOT_ENV", DEFAULT_ENVIRONMENT);
  const mode = envEnum(env, "MODE", RUN_MODES, "paper");
  const paperLoops = envInt(env, "PAPER_LOOPS", 1);
  if (paperLoops < 1) throw new ConfigurationError("PAPER_LOOPS must be >= 1");

  const config: AppConfig = {
    environment,
    mode,
    paperLoops,
    risk: loadRiskConfig(env),
    signals: loadSignalConfig(env, environment),
    execution: mode === "live" ? loadExecutionConfig(env) : undefined,
    telegram: loadTelegramConfig(env),
    github: loadGitHubConfig(env),
    scheduler: loadSchedulerConfig(env),
  };

  if (mode === "telegram" && !config.telegram.enabled) {
    throw new ConfigurationError("TELEGRAM_BOT_TOKEN is required in telegram mode");
  }

  return deepFreeze(config);
}
