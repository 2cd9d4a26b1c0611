/**
 * Configuration Index - Re-exports all configuration utilities and types
 *
 * - env.ts: Environment variable parsing helpers
 * - schema.ts: Configuration type definitions
 * - loadConfig.ts: Validated, frozen config built once at startup
 */

export {
  envNum,
  envInt,
  envBigInt,
  envBool,
  envStr,
  envEnum,
  envOptional,
  type EnvSource,
} from "./env";

export {
  loadConfig,
  loadRiskConfig,
  loadExecutionConfig,
  validateRiskConfig,
  DEFAULT_RISK_CONFIG,
  DEFAULT_ENVIRONMENT,
} from "./loadConfig";

export type {
  AppConfig,
  RiskConfig,
  SignalConfig,
  ExecutionConfig,
  TelegramConfig,
  GitHubConfig,
  SchedulerConfig,
  ExitPolicy,
  RunMode,
  TxRoute,
} from "./schema";
