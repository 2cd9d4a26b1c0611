import assert from "node:assert";
import { beforeEach, describe, test } from "node:test";
import { MaxUint256 } from "ethers";
import { MalformedResponseError, NetworkError } from "../../../src/errors/app.errors";
import { SIG } from "../../../src/trading/exchange-abi";
import {
  entryRouteAllowed,
  TradingEngine,
  type EngineConfig,
  type GasSpendKind,
} from "../../../src/trading/onchain-executor";
import { FakeChainClient, PAIR, ROUTER, TOKEN0, TOKEN1, TRADER } from "./fake-chain";

const START = 1_700_000_000_000;

const CONFIG: EngineConfig = {
  token0Address: TOKEN0,
  token1Address: TOKEN1,
  pairAddress: PAIR,
  routerAddress: ROUTER,
  poolFeeBps: 25,
  slippageBps: 50,
  txRoute: "private_relay",
  minTradeIntervalS: 30,
  gasPriceGwei: 2,
  gasLimit: undefined,
  legacyTx: true,
  minNativeBalanceWei: 1000n,
  topupAmountWei: 0n,
  confirmTimeoutS: 10,
  confirmPollMs: 1000,
  swapDeadlineS: 60,
  gasPerSwap: 200_000,
  nativePriceUsd: 3000,
};

describe("TradingEngine", () => {
  let clock: { now: number };
  let client: FakeChainClient;
  let sleeps: number[];

  const engine = (overrides: Partial<EngineConfig> = {}, funding?: FakeChainClient): TradingEngine =>
    new TradingEngine({
      config: { ...CONFIG, ...overrides },
      client,
      funding,
      now: () => clock.now,
      sleep: async (ms) => {
        sleeps.push(ms);
        clock.now += ms;
      },
    });

  beforeEach(() => {
    clock = { now: START };
    client = new FakeChainClient();
    sleeps = [];
  });

  describe("buy", () => {
    test("submits a swap with the slippage-bounded minimum", async () => {
      const result = await engine().buyToken1(1_000_000n);

      assert.ok(result.ok);
      assert.strictEqual(result.direction, "BUY");
      assert.strictEqual(result.expectedOut, 997_499n);
      assert.strictEqual(result.minOut, 992_511n);
      // 200k gas * 2 gwei = 0.0004 native * $3000
      assert.ok(Math.abs(result.estimatedGasUsd - 1.2) < 1e-9);

      assert.strictEqual(client.sent.length, 1);
      const [swap] = client.sent;
      assert.ok(swap);
      assert.strictEqual(swap.to, ROUTER);
      assert.strictEqual(swap.signature, SIG.SWAP_EXACT_TOKENS);
      assert.deepStrictEqual(swap.args, [
        1_000_000n,
        992_511n,
        [TOKEN0, TOKEN1],
        TRADER,
        1_700_000_060n,
      ]);
      assert.deepStrictEqual(swap.gas, { gasPriceWei: 2_000_000_000n, legacy: true });
    });

    test("passes an explicit gas limit", async () => {
      await engine({ gasLimit: 250_000, legacyTx: false }).buyToken1(1_000_000n);
      assert.deepStrictEqual(client.sent[0]?.gas, {
        gasPriceWei: 2_000_000_000n,
        legacy: false,
        gasLimit: 250_000n,
      });
    });

    test("rejects a non-positive amount", async () => {
      const result = await engine().buyToken1(0n);
      assert.deepStrictEqual(result.ok ? null : result.error, "invalid_amount");
      assert.strictEqual(client.sent.length, 0);
    });
  });

  describe("sell", () => {
    test("swaps token1 back to token0", async () => {
      client.reserves = [2_000_000_000_000n, 1_000_000_000_000n, 0n];
      const result = await engine().sellToken1(1_000_000n);
      assert.ok(result.ok);
      assert.strictEqual(result.direction, "SELL");
      // reserveIn = reserve1, reserveOut = reserve0
      assert.strictEqual(result.expectedOut, 1_994_998n);
      assert.deepStrictEqual(client.sent[0]?.args[2], [TOKEN1, TOKEN0]);
    });
  });

  describe("rate limit", () => {
    test("rejects a second trade inside the interval without moving lastTradeTs", async () => {
      const e = engine();
      assert.ok((await e.buyToken1(1_000_000n)).ok);
      assert.strictEqual(e.lastTradeTs, START);

      clock.now += 29_999;
      const second = await e.buyToken1(1_000_000n);
      assert.strictEqual(second.ok ? null : second.error, "rate_limited");
      assert.strictEqual(e.lastTradeTs, START);
      assert.strictEqual(client.sent.length, 1);

      clock.now += 1;
      assert.ok((await e.sellToken1(1_000_000n)).ok);
      assert.strictEqual(e.lastTradeTs, START + 30_000);
    });

    test("a rejected trade does not start the interval", async () => {
      const e = engine();
      client.sendResults.push({ ok: false, error: "nonce too low" });
      const failed = await e.buyToken1(1_000_000n);
      assert.deepStrictEqual(failed, {
        ok: false,
        error: "submission_failed",
        detail: "nonce too low",
      });
      assert.strictEqual(e.lastTradeTs, null);
      assert.ok((await e.buyToken1(1_000_000n)).ok);
    });
  });

  describe("reserves", () => {
    test("maps a failed read to reserves_unavailable", async () => {
      client.reservesError = new NetworkError("timeout", "rpc");
      const result = await engine().buyToken1(1_000_000n);
      assert.deepStrictEqual(result, { ok: false, error: "reserves_unavailable", detail: "timeout" });
    });

    test("rejects empty reserves", async () => {
      client.reserves = [0n, 1000n, 0n];
      const result = await engine().buyToken1(1_000_000n);
      assert.strictEqual(result.ok ? null : result.error, "reserves_unavailable");
    });

    test("maps a malformed answer to malformed_response", async () => {
      client.reserves = ["lots", "more", 0n];
      const result = await engine().buyToken1(1_000_000n);
      assert.strictEqual(result.ok ? null : result.error, "malformed_response");
    });

    test("getReserves throws on a malformed answer", async () => {
      client.reserves = [1n];
      await assert.rejects(engine().getReserves(), MalformedResponseError);
    });
  });

  describe("slippage", () => {
    test("refuses a trade whose impact exceeds the bound", async () => {
      client.reserves = [100_000_000n, 100_000_000n, 0n];
      const result = await engine().buyToken1(1_000_000n);
      assert.deepStrictEqual(result, {
        ok: false,
        error: "slippage_cap",
        detail: "impact 98bps, minOut 982709",
      });
      assert.strictEqual(client.sent.length, 0);
    });
  });

  describe("allowance", () => {
    test("approves the router before the swap when short", async () => {
      client.allowance = 0n;
      const result = await engine().buyToken1(1_000_000n);
      assert.ok(result.ok);
      assert.strictEqual(client.sent.length, 2);
      assert.strictEqual(client.sent[0]?.to, TOKEN0);
      assert.strictEqual(client.sent[0]?.signature, SIG.APPROVE);
      assert.deepStrictEqual(client.sent[0]?.args, [ROUTER, MaxUint256]);
      assert.strictEqual(client.sent[1]?.signature, SIG.SWAP_EXACT_TOKENS);
    });

    test("a failed approval stops the trade", async () => {
      client.allowance = 0n;
      client.sendResults.push({ ok: false, error: "reverted" });
      const result = await engine().buyToken1(1_000_000n);
      assert.deepStrictEqual(result, {
        ok: false,
        error: "submission_failed",
        detail: "approve: reverted",
      });
      assert.strictEqual(client.sent.length, 1);
    });
  });

  describe("gas balance", () => {
    test("rejects when below the minimum and no top-up is configured", async () => {
      client.nativeBalance = 10n;
      const result = await engine().buyToken1(1_000_000n);
      assert.deepStrictEqual(result, { ok: false, error: "insufficient_gas_balance" });
      assert.strictEqual(client.sent.length, 0);
    });

    test("tops up once from the funding account", async () => {
      client.nativeBalance = 10n;
      const funding = new FakeChainClient("0x6666666666666666666666666666666666666666");
      funding.onSendValue = (_to, value) => {
        client.nativeBalance += value;
        client.receipts.set("0xvalue1", "success");
      };
      const result = await engine({ topupAmountWei: 5000n }, funding).buyToken1(1_000_000n);
      assert.ok(result.ok);
      assert.deepStrictEqual(funding.values, [{ to: TRADER, valueWei: 5000n }]);
    });

    test("a failed balance read counts as insufficient gas", async () => {
      client.nativeBalanceError = new Error("rpc down");
      const result = await engine().buyToken1(1_000_000n);
      assert.deepStrictEqual(result, { ok: false, error: "insufficient_gas_balance" });
      assert.strictEqual(client.sent.length, 0);
    });

    test("rejects when the top-up does not lift the balance", async () => {
      client.nativeBalance = 10n;
      const funding = new FakeChainClient("0x6666666666666666666666666666666666666666");
      funding.onSendValue = () => {
        client.receipts.set("0xvalue1", "success");
      };
      const result = await engine({ topupAmountWei: 5000n }, funding).buyToken1(1_000_000n);
      assert.strictEqual(result.ok ? null : result.error, "insufficient_gas_balance");
      assert.strictEqual(client.sent.length, 0);
    });
  });

  describe("waitForConfirmation", () => {
    test("returns true once a receipt appears", async () => {
      const e = engine();
      let polls = 0;
      client.getReceipt = async () => (++polls >= 2 ? "success" : null);
      assert.strictEqual(await e.waitForConfirmation("0xabc"), true);
      assert.deepStrictEqual(sleeps, [1000]);
    });

    test("survives a failing receipt poll", async () => {
      const e = engine();
      let polls = 0;
      client.getReceipt = async () => {
        polls++;
        if (polls === 1) throw new Error("flaky");
        return "success";
      };
      assert.strictEqual(await e.waitForConfirmation("0xabc"), true);
    });

    test("gives up after the timeout", async () => {
      const e = engine();
      const confirmed = await e.waitForConfirmation("0xmissing", {
        timeoutMs: 3000,
        pollIntervalMs: 1000,
      });
      assert.strictEqual(confirmed, false);
      assert.deepStrictEqual(sleeps, [1000, 1000, 1000]);
    });

    test("stops polling once the transaction reverted", async () => {
      const e = engine();
      client.receipts.set("0xbad", "reverted");
      assert.strictEqual(await e.waitForConfirmation("0xbad"), false);
      assert.deepStrictEqual(sleeps, []);
    });

    test("stops on abort", async () => {
      const controller = new AbortController();
      controller.abort();
      const confirmed = await engine().waitForConfirmation("0xmissing", {
        signal: controller.signal,
      });
      assert.strictEqual(confirmed, false);
      assert.deepStrictEqual(sleeps, []);
    });
  });

  describe("entry route", () => {
    test("public route refuses entries above 10 bps slippage", async () => {
      const result = await engine({ txRoute: "public", slippageBps: 50 }).buyToken1(1_000_000n);
      assert.deepStrictEqual(result, {
        ok: false,
        error: "route_policy",
        detail: "public route allows entries up to 10bps slippage",
      });
      assert.strictEqual(client.sent.length, 0);
    });

    test("public route still allows exits", async () => {
      const result = await engine({ txRoute: "public", slippageBps: 50 }).sellToken1(1_000_000n);
      assert.ok(result.ok);
    });

    test("policy table", () => {
      assert.strictEqual(entryRouteAllowed("private_relay", 50), true);
      assert.strictEqual(entryRouteAllowed("public", 10), true);
      assert.strictEqual(entryRouteAllowed("public", 11), false);
    });
  });

  describe("gas accounting", () => {
    const collect = (e: TradingEngine): Array<[GasSpendKind, number]> => {
      const spent: Array<[GasSpendKind, number]> = [];
      e.onGasSpent((usd, kind) => spent.push([kind, usd]));
      return spent;
    };
    const near = (actual: number | undefined, expected: number): boolean =>
      actual !== undefined && Math.abs(actual - expected) < 1e-9;

    test("charges the approval and the swap", async () => {
      client.allowance = 0n;
      const e = engine();
      const spent = collect(e);
      const result = await e.buyToken1(1_000_000n);
      assert.ok(result.ok);
      assert.deepStrictEqual(
        spent.map(([kind]) => kind),
        ["approve", "swap"],
      );
      // 50k gas and 200k gas at 2 gwei, native at $3000
      assert.ok(near(spent[0]?.[1], 0.3));
      assert.ok(near(spent[1]?.[1], 1.2));
    });

    test("charges the top-up transfer", async () => {
      client.nativeBalance = 10n;
      const funding = new FakeChainClient("0x6666666666666666666666666666666666666666");
      funding.onSendValue = (_to, value) => {
        client.nativeBalance += value;
        client.receipts.set("0xvalue1", "success");
      };
      const e = engine({ topupAmountWei: 5000n }, funding);
      const spent = collect(e);
      assert.ok((await e.buyToken1(1_000_000n)).ok);
      assert.deepStrictEqual(
        spent.map(([kind]) => kind),
        ["topup", "swap"],
      );
      // 21k gas at 2 gwei
      assert.ok(near(spent[0]?.[1], 0.126));
    });

    test("a rejected submission charges nothing", async () => {
      client.sendResults.push({ ok: false, error: "reverted" });
      const e = engine();
      const spent = collect(e);
      await e.buyToken1(1_000_000n);
      assert.deepStrictEqual(spent, []);
    });
  });

  test("reads the trading account's token balance", async () => {
    client.tokenBalances.set(TOKEN1, 42n);
    assert.strictEqual(await engine().tokenBalance(TOKEN1), 42n);
  });
});
