/**
 * Live market inputs read from the traded pair
 */

import type { MarketActivityFeed } from "../core/health";
import type { PriceFeed } from "../core/signals";
import { MalformedResponseError } from "../errors/app.errors";
import { PAIR_SWAP_EVENT } from "./exchange-abi";
import type { Reserves } from "./onchain-executor";

/** ~10 minutes of 12s blocks */
export const SWAP_LOOKBACK_BLOCKS = 50;

export interface ReserveSource {
  getReserves(): Promise<Reserves>;
}

export interface LogCounter {
  countLogs(address: string, eventSignature: string, lookbackBlocks: number): Promise<number>;
}

/**
 * Spot price of token1 in token0 units: reserve0 / reserve1
 */
export class PairPriceFeed implements PriceFeed {
  constructor(private readonly source: ReserveSource) {}

  async currentPrice(): Promise<number> {
    const { reserve0, reserve1 } = await this.source.getReserves();
    if (reserve0 <= 0n || reserve1 <= 0n) {
      throw new MalformedResponseError("pair has empty reserves", "getReserves");
    }
    return Number(reserve0) / Number(reserve1);
  }
}

/**
 * Pool liquidity for the LP drain breaker, measured on the token0 side
 */
export function pairLiquidity(source: ReserveSource): () => Promise<number> {
  return async () => {
    const { reserve0 } = await source.getReserves();
    return Number(reserve0);
  };
}

/**
 * Swap count over the last ~10 minutes from the pair's Swap events
 */
export function createSwapActivityFeed(
  logs: LogCounter,
  pairAddress: string,
  lookbackBlocks: number = SWAP_LOOKBACK_BLOCKS,
): MarketActivityFeed {
  return {
    swapsLast10m: () => logs.countLogs(pairAddress, PAIR_SWAP_EVENT, lookbackBlocks),
  };
}
