import assert from "node:assert";
import { describe, test } from "node:test";
import type { BreakerStatus } from "../../src/core/breakers";
import { createSnapshot } from "../../src/core/signals";
import type { BotOutcome } from "../../src/core/state-machine";
import {
  formatBreakerAlert,
  formatBreakerStatus,
  formatOutcomeLine,
  formatOutcomes,
  formatPnlWindows,
  formatTradeAlert,
  formatWindow,
} from "../../src/telegram/reports";

const SIGNAL = createSnapshot({
  followThroughRatio: 2,
  impactPersistenceBps: 10,
  slippageElasticity: 1,
  orderFlowImbalance: -0.25,
  liquidityDelta: -1,
  spotTwapDeviationBps: 3,
  pendingBuyPressure: 1.5,
  pendingSellPressure: 0.5,
});

const STATUS: BreakerStatus = {
  tradingEnabled: false,
  probesEnabled: false,
  entriesEnabled: false,
  tripped: ["DAILY_LOSS", "KILL_SWITCH"],
  lpDrainPct: 12.345,
  dailyGasUsd: 3.5,
  dailyPnlUsd: -120.456,
  note: "manual",
};

describe("reports", () => {
  test("formatWindow labels trailing windows", () => {
    assert.strictEqual(formatWindow(3600), "1h");
    assert.strictEqual(formatWindow(14_400), "4h");
    assert.strictEqual(formatWindow(86_400), "1d");
    assert.strictEqual(formatWindow(900), "15m");
    assert.strictEqual(formatWindow(45), "45s");
  });

  test("formatOutcomeLine renders signal, position and exit", () => {
    const outcome: BotOutcome = {
      state: "EXIT",
      signal: SIGNAL,
      position: { size: 0.5, entryPrice: 100, openedAt: 0 },
      exited: true,
      reason: "OFI_REVERSAL",
    };
    assert.strictEqual(
      formatOutcomeLine(outcome, 4),
      "[4] EXIT (OFI_REVERSAL) | FT=2.00 IP=10.0 SE=1.00 OFI=-0.25 LD=-1.00 DEV=3.0 | pos=0.50 entry=100.00 | Exited",
    );
    assert.strictEqual(
      formatOutcomeLine({ state: "IDLE", exited: false, reason: "GAS_HIGH" }, 1),
      "[1] IDLE (GAS_HIGH)",
    );
  });

  test("formatOutcomes handles an empty run", () => {
    assert.strictEqual(formatOutcomes([]), "Paper Trading Outcomes:\n(no outcomes)");
  });

  test("formatPnlWindows signs and pluralizes", () => {
    assert.strictEqual(
      formatPnlWindows([
        { windowSeconds: 3600, realizedPnlUsd: 1.5, trades: 1 },
        { windowSeconds: 86_400, realizedPnlUsd: -2.25, trades: 3 },
      ]),
      "📊 Realized PnL\n1h   +$1.50 (1 trade)\n1d   -$2.25 (3 trades)",
    );
  });

  test("formatBreakerStatus lists latches and the note", () => {
    assert.strictEqual(
      formatBreakerStatus(STATUS),
      [
        "Trading: OFF",
        "Probes/entries: OFF",
        "Tripped: DAILY_LOSS, KILL_SWITCH",
        "LP drain: 12.3%",
        "Gas (24h): $3.50",
        "PnL (24h): -$120.46",
        "Note: manual",
      ].join("\n"),
    );
  });

  test("formatBreakerAlert leads with the reason", () => {
    assert.ok(formatBreakerAlert("DAILY_LOSS", STATUS).startsWith("🚨 Breaker tripped: DAILY_LOSS\n\nTrading: OFF"));
  });

  test("formatTradeAlert covers dry runs, fills and rejections", () => {
    assert.strictEqual(
      formatTradeAlert({ iteration: 1, direction: "BUY", amountIn: 500n, dryRun: true }),
      "🟢 BUY [DRY RUN]\nAmount in: 500",
    );
    assert.strictEqual(
      formatTradeAlert({
        iteration: 2,
        direction: "SELL",
        amountIn: 700n,
        dryRun: false,
        confirmed: true,
        result: {
          ok: true,
          txHash: "0xabc",
          direction: "SELL",
          amountIn: 700n,
          expectedOut: 690n,
          minOut: 686n,
          estimatedGasUsd: 1,
        },
      }),
      "🔴 SELL\nAmount in: 700\nTx: 0xabc\nConfirmed: yes",
    );
    assert.strictEqual(
      formatTradeAlert({
        iteration: 3,
        direction: "BUY",
        amountIn: 1n,
        dryRun: false,
        result: { ok: false, error: "rate_limited" },
      }),
      "🟢 BUY\nAmount in: 1\nRejected: rate_limited",
    );
  });
});
