import assert from "node:assert";
import { beforeEach, describe, test } from "node:test";
import { DEFAULT_RISK_CONFIG, type RiskConfig } from "../../../src/config";
import {
  createSnapshot,
  ReplaySignalProvider,
  StaticPriceFeed,
  type SignalSnapshot,
} from "../../../src/core/signals";
import { MicrostructureBot } from "../../../src/core/state-machine";
import { LiveRunner } from "../../../src/trading/live-runner";
import { TradingEngine } from "../../../src/trading/onchain-executor";
import { FakeChainClient, PAIR, ROUTER, TOKEN0, TOKEN1 } from "./fake-chain";

const STRONG = createSnapshot({
  followThroughRatio: 2.0,
  impactPersistenceBps: 10,
  slippageElasticity: 1.0,
  orderFlowImbalance: 0.2,
  liquidityDelta: -1.0,
  spotTwapDeviationBps: 3,
  pendingBuyPressure: 1.5,
  pendingSellPressure: 0.5,
});
const REVERSAL = createSnapshot({ ...STRONG, orderFlowImbalance: -0.1 });

describe("LiveRunner", () => {
  let client: FakeChainClient;
  let clock: { now: number };

  const setup = (
    snapshots: SignalSnapshot[],
    options: {
      live?: boolean;
      liquidity?: number[] | (() => Promise<number>);
      risk?: Partial<RiskConfig>;
    } = {},
  ) => {
    const bot = new MicrostructureBot({
      config: { ...DEFAULT_RISK_CONFIG, ...options.risk },
      signals: new ReplaySignalProvider(snapshots),
      prices: new StaticPriceFeed(100),
      now: () => clock.now,
    });
    const engine = new TradingEngine({
      config: {
        token0Address: TOKEN0,
        token1Address: TOKEN1,
        pairAddress: PAIR,
        routerAddress: ROUTER,
        poolFeeBps: 25,
        slippageBps: 50,
        txRoute: "private_relay",
        minTradeIntervalS: 0,
        gasPriceGwei: 2,
        legacyTx: true,
        minNativeBalanceWei: 0n,
        topupAmountWei: 0n,
        confirmTimeoutS: 5,
        confirmPollMs: 1000,
        swapDeadlineS: 60,
        gasPerSwap: 200_000,
        nativePriceUsd: 3000,
      },
      client,
      now: () => clock.now,
      sleep: async (ms) => {
        clock.now += ms;
      },
    });
    const { liquidity } = options;
    const levels = Array.isArray(liquidity) ? [...liquidity] : [];
    const runner = new LiveRunner({
      bot,
      engine,
      config: {
        tradeAmountInWei: 1_000_000n,
        token1Address: TOKEN1,
        liveTradingEnabled: options.live ?? true,
      },
      liquidity:
        typeof liquidity === "function"
          ? liquidity
          : liquidity
            ? async () => levels.shift() ?? 0
            : undefined,
    });
    return { bot, runner };
  };

  beforeEach(() => {
    client = new FakeChainClient();
    clock = { now: 1_700_000_000_000 };
  });

  test("buys on ENTER and sells the token1 balance on EXIT", async () => {
    const { bot, runner } = setup([STRONG, REVERSAL]);

    const entered = await runner.run(1);
    assert.strictEqual(entered.trades.length, 1);
    const buy = entered.trades[0];
    assert.ok(buy?.result?.ok);
    assert.strictEqual(buy.direction, "BUY");
    assert.strictEqual(buy.amountIn, 500_000n);
    assert.strictEqual(buy.iteration, 1);
    assert.strictEqual(buy.confirmed, true);

    client.tokenBalances.set(TOKEN1, 123_456n);
    const exited = await runner.run(1);
    assert.strictEqual(exited.trades.length, 1);
    const sell = exited.trades[0];
    assert.strictEqual(sell?.direction, "SELL");
    assert.strictEqual(sell.amountIn, 123_456n);
    assert.strictEqual(sell.iteration, 2);
    assert.deepStrictEqual(client.sent[1]?.args[2], [TOKEN1, TOKEN0]);

    // two swaps at ~$1.20 each
    assert.ok(Math.abs(bot.breakers.dailyGasUsd() - 2.4) < 1e-9);
  });

  test("dry run records intended trades without sending", async () => {
    const { runner } = setup([STRONG, REVERSAL], { live: false });
    assert.strictEqual(runner.dryRun, true);

    const { trades } = await runner.run(2);
    assert.deepStrictEqual(trades, [
      { iteration: 1, direction: "BUY", amountIn: 500_000n, dryRun: true },
      { iteration: 2, direction: "SELL", amountIn: 0n, dryRun: true },
    ]);
    assert.strictEqual(client.sent.length, 0);
  });

  test("skips an EXIT with nothing to sell", async () => {
    const { runner } = setup([STRONG, REVERSAL]);
    await runner.run(1);
    const { trades, outcomes } = await runner.run(1);
    assert.deepStrictEqual(trades, []);
    assert.strictEqual(outcomes[outcomes.length - 1]?.state, "EXIT");
  });

  test("reports an unreadable balance as a rejected SELL", async () => {
    const { runner } = setup([STRONG, REVERSAL]);
    await runner.run(1);
    client.readContractValue = async () => {
      throw new Error("rpc down");
    };
    const { trades } = await runner.run(1);
    assert.deepStrictEqual(trades, [
      {
        iteration: 2,
        direction: "SELL",
        amountIn: 0n,
        dryRun: false,
        result: { ok: false, error: "malformed_response", detail: "rpc down" },
      },
    ]);
  });

  test("a rejected trade is reported and the position stays open", async () => {
    const { bot, runner } = setup([STRONG]);
    client.sendResults.push({ ok: false, error: "reverted" });
    const { trades } = await runner.run(1);
    assert.deepStrictEqual(trades[0]?.result, {
      ok: false,
      error: "submission_failed",
      detail: "reverted",
    });
    assert.strictEqual(trades[0]?.confirmed, undefined);
    assert.ok(bot.status().position);
    assert.strictEqual(bot.breakers.dailyGasUsd(), 0);
  });

  test("skips an entry whose size maps to zero tokens", async () => {
    const flat = createSnapshot({ ...STRONG, followThroughRatio: 1.0 });
    const { runner } = setup([flat], { risk: { ftMin: 0.5 } });
    const { trades, outcomes } = await runner.run(1);
    assert.deepStrictEqual(trades, []);
    assert.strictEqual(outcomes[2]?.state, "ENTER");
  });

  test("feeds pool liquidity to the drain breaker after each iteration", async () => {
    const { bot, runner } = setup([STRONG], { live: false, liquidity: [1000, 500] });
    await runner.run(2);
    assert.strictEqual(bot.breakers.lpDrainPct(), 50);

    const { outcomes, trades } = await runner.run(1);
    assert.deepStrictEqual(
      outcomes.map((o) => `${o.state}:${o.reason ?? ""}`),
      ["EXIT:LP_DRAIN", "IDLE:LP_DRAIN"],
    );
    assert.deepStrictEqual(trades, [
      { iteration: 3, direction: "SELL", amountIn: 0n, dryRun: true },
    ]);
  });

  test("charges approval gas to the daily gas breaker", async () => {
    client.allowance = 0n;
    const { bot, runner } = setup([STRONG]);
    await runner.run(1);
    // approve $0.30 + swap $1.20
    assert.ok(Math.abs(bot.breakers.dailyGasUsd() - 1.5) < 1e-9);
  });

  test("keeps submitted trades when the liquidity read fails", async () => {
    const { runner } = setup([STRONG], {
      liquidity: async () => {
        throw new Error("rpc down");
      },
    });
    const { trades, outcomes } = await runner.run(1);
    assert.strictEqual(trades.length, 1);
    assert.strictEqual(trades[0]?.direction, "BUY");
    assert.strictEqual(trades[0]?.result?.ok, true);
    assert.strictEqual(outcomes[outcomes.length - 1]?.state, "MANAGE");
  });

  test("scales the entry amount by position size", () => {
    const { runner } = setup([STRONG]);
    assert.strictEqual(runner.entryAmount(0.5), 500_000n);
    assert.strictEqual(runner.entryAmount(0.123456), 123_500n);
    assert.strictEqual(runner.entryAmount(2), 1_000_000n);
    assert.strictEqual(runner.entryAmount(-1), 0n);
  });
});
