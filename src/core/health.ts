/**
 * Health gates for the IDLE -> PING transition.
 *
 * ready()        collaborators are up (RPC reachable, etc.)
 * gasOk()        current gas price is within the cap
 * quietMarket()  too little activity to be worth probing
 * probeAllowed() optional, at most one probe per block
 *
 * All of them may consult external state and may be async. A failing gate
 * routes the iteration to IDLE; a throwing gate aborts the run call.
 */

import type { Logger } from "../utils/logger.util";
import { isGasWithinCap } from "../utils/gas";

export interface HealthChecks {
  ready(): boolean | Promise<boolean>;
  gasOk(): boolean | Promise<boolean>;
  quietMarket(): boolean | Promise<boolean>;
  /** Checked last; a true answer counts as the probe for this block */
  probeAllowed?(): boolean | Promise<boolean>;
}

/**
 * Paper-mode gates: always ready, gas always fine, market never quiet
 */
export const ALWAYS_HEALTHY: HealthChecks = Object.freeze({
  ready: () => true,
  gasOk: () => true,
  quietMarket: () => false,
});

/**
 * Recent swap count for the traded pool
 */
export interface MarketActivityFeed {
  swapsLast10m(): Promise<number>;
}

export interface ChainHealthParams {
  getGasPrice: () => Promise<bigint | null>;
  gasCapGwei: number;
  ready?: () => Promise<boolean>;
  activity?: MarketActivityFeed;
  /** Fewer swaps than this in 10 minutes counts as quiet (0 disables) */
  quietSwapsMin: number;
  /** Enables the block-gap gate */
  getBlockNumber?: () => Promise<number>;
  logger?: Logger;
}

/**
 * Allows a probe only when at least one block has passed since the last
 * allowed one. The first call is always allowed.
 */
export function createBlockGapGate(
  getBlockNumber: () => Promise<number>,
  logger?: Logger,
): () => Promise<boolean> {
  let lastProbedBlock: number | null = null;
  return async () => {
    const block = await getBlockNumber();
    if (lastProbedBlock !== null && block - lastProbedBlock <= 0) {
      logger?.debug(`[Health] Already probed in block ${lastProbedBlock}, waiting for the next one`);
      return false;
    }
    lastProbedBlock = block;
    return true;
  };
}

/**
 * Gates backed by the chain: gas oracle and an optional activity feed
 */
export function createChainHealthChecks(params: ChainHealthParams): HealthChecks {
  const probeAllowed = params.getBlockNumber
    ? createBlockGapGate(params.getBlockNumber, params.logger)
    : undefined;
  return {
    probeAllowed,
    ready: () => (params.ready ? params.ready() : true),
    gasOk: async () => {
      const gasPrice = await params.getGasPrice();
      if (gasPrice === null) {
        params.logger?.warn("[Health] Gas price unavailable, treating gas as not ok");
        return false;
      }
      return isGasWithinCap(gasPrice, params.gasCapGwei, params.logger);
    },
    quietMarket: async () => {
      if (!params.activity || params.quietSwapsMin <= 0) return false;
      const swaps = await params.activity.swapsLast10m();
      return swaps < params.quietSwapsMin;
    },
  };
}
