/**
 * Utility to check if live trading is enabled.
 */

import type { EnvSource } from "../config/env";

export const LIVE_TRADING_ACK = "I_UNDERSTAND_THE_RISKS";

/**
 * Live trading is enabled only if LIVE_TRADING is set to exactly
 * "I_UNDERSTAND_THE_RISKS". Anything else keeps the runner in dry-run mode.
 */
export function isLiveTradingEnabled(env: EnvSource = process.env): boolean {
  const liveTrading = env.LIVE_TRADING ?? env.live_trading;
  return liveTrading === LIVE_TRADING_ACK;
}
