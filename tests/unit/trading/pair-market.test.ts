import assert from "node:assert";
import { describe, mock, test } from "node:test";
import { MalformedResponseError } from "../../../src/errors/app.errors";
import { PAIR_SWAP_EVENT } from "../../../src/trading/exchange-abi";
import {
  createSwapActivityFeed,
  PairPriceFeed,
  pairLiquidity,
  SWAP_LOOKBACK_BLOCKS,
} from "../../../src/trading/pair-market";

const source = (reserve0: bigint, reserve1: bigint) => ({
  getReserves: async () => ({ reserve0, reserve1 }),
});

describe("PairPriceFeed", () => {
  test("prices token1 in token0 units", async () => {
    assert.strictEqual(await new PairPriceFeed(source(2000n, 1000n)).currentPrice(), 2);
  });

  test("throws on empty reserves", async () => {
    await assert.rejects(new PairPriceFeed(source(0n, 1000n)).currentPrice(), MalformedResponseError);
  });
});

describe("pairLiquidity", () => {
  test("reads the token0 reserve", async () => {
    assert.strictEqual(await pairLiquidity(source(5000n, 1n))(), 5000);
  });
});

describe("createSwapActivityFeed", () => {
  test("counts Swap events over the lookback window", async () => {
    const countLogs = mock.fn(async (_address: string, _event: string, _blocks: number) => 7);
    const feed = createSwapActivityFeed({ countLogs }, "0xpair");
    assert.strictEqual(await feed.swapsLast10m(), 7);
    assert.deepStrictEqual(countLogs.mock.calls[0]?.arguments, [
      "0xpair",
      PAIR_SWAP_EVENT,
      SWAP_LOOKBACK_BLOCKS,
    ]);
  });
});
