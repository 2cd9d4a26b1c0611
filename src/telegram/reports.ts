/**
 * Telegram Reporting
 *
 * Plain-text renderers for chat replies and alerts: paper-run outcomes,
 * PnL windows, bot status, breaker trips and live trades.
 */

import type { BreakerReason, BreakerStatus } from "../core/breakers";
import type { PnlWindow } from "../core/pnl-ledger";
import type { BotOutcome, BotStatus } from "../core/state-machine";
import type { TradeEvent } from "../trading/live-runner";

/** Outcome lines shown per reply */
export const MAX_OUTCOME_LINES = 25;

const signed = (value: number, digits = 2): string =>
  `${value >= 0 ? "+" : "-"}$${Math.abs(value).toFixed(digits)}`;

/**
 * Human label for a trailing window in seconds (3600 -> "1h")
 */
export function formatWindow(seconds: number): string {
  if (seconds % 86_400 === 0) return `${seconds / 86_400}d`;
  if (seconds % 3600 === 0) return `${seconds / 3600}h`;
  if (seconds % 60 === 0) return `${seconds / 60}m`;
  return `${seconds}s`;
}

/**
 * One outcome per line:
 * [3] MANAGE | FT=2.00 IP=10.0 SE=1.00 OFI=0.20 LD=-1.00 DEV=3.0 | pos=0.50 entry=100.00
 */
export function formatOutcomeLine(outcome: BotOutcome, index: number): string {
  const head = outcome.reason
    ? `[${index}] ${outcome.state} (${outcome.reason})`
    : `[${index}] ${outcome.state}`;
  const segs = [head];
  const s = outcome.signal;
  if (s) {
    segs.push(
      `FT=${s.followThroughRatio.toFixed(2)} IP=${s.impactPersistenceBps.toFixed(1)} ` +
        `SE=${s.slippageElasticity.toFixed(2)} OFI=${s.orderFlowImbalance.toFixed(2)} ` +
        `LD=${s.liquidityDelta.toFixed(2)} DEV=${s.spotTwapDeviationBps.toFixed(1)}`,
    );
  }
  if (outcome.position) {
    segs.push(
      `pos=${outcome.position.size.toFixed(2)} entry=${outcome.position.entryPrice.toFixed(2)}`,
    );
  }
  if (outcome.exited) segs.push("Exited");
  return segs.join(" | ");
}

export function formatOutcomes(outcomes: readonly BotOutcome[]): string {
  if (outcomes.length === 0) return "Paper Trading Outcomes:\n(no outcomes)";
  const lines = outcomes
    .slice(0, MAX_OUTCOME_LINES)
    .map((o, i) => formatOutcomeLine(o, i + 1));
  if (outcomes.length > MAX_OUTCOME_LINES) {
    lines.push(`... ${outcomes.length - MAX_OUTCOME_LINES} more`);
  }
  return `Paper Trading Outcomes:\n${lines.join("\n")}`;
}

export function formatPnlWindows(windows: readonly PnlWindow[]): string {
  const lines = windows.map(
    (w) =>
      `${formatWindow(w.windowSeconds).padEnd(4)} ${signed(w.realizedPnlUsd)} (${w.trades} trade${w.trades === 1 ? "" : "s"})`,
  );
  return ["📊 Realized PnL", ...lines].join("\n");
}

export function formatBreakerStatus(status: BreakerStatus): string {
  const tripped = status.tripped.length > 0 ? status.tripped.join(", ") : "none";
  const lines = [
    `Trading: ${status.tradingEnabled ? "ON" : "OFF"}`,
    `Probes/entries: ${status.probesEnabled ? "ON" : "OFF"}`,
    `Tripped: ${tripped}`,
    `LP drain: ${status.lpDrainPct.toFixed(1)}%`,
    `Gas (24h): $${status.dailyGasUsd.toFixed(2)}`,
    `PnL (24h): ${signed(status.dailyPnlUsd)}`,
  ];
  if (status.note) lines.push(`Note: ${status.note}`);
  return lines.join("\n");
}

export function formatBotStatus(status: BotStatus, environment: string): string {
  const position = status.position
    ? `size=${status.position.size.toFixed(2)} entry=${status.position.entryPrice.toFixed(4)}`
    : "none";
  return [
    `🤖 Bot ready. env=${environment}`,
    `State: ${status.state}`,
    `Iterations: ${status.iterations}`,
    `Position: ${position}`,
    "",
    formatBreakerStatus(status.breakers),
  ].join("\n");
}

export function formatBreakerAlert(reason: BreakerReason, status: BreakerStatus): string {
  return [`🚨 Breaker tripped: ${reason}`, "", formatBreakerStatus(status)].join("\n");
}

export function formatTradeAlert(event: TradeEvent): string {
  const emoji = event.direction === "BUY" ? "🟢" : "🔴";
  const mode = event.dryRun ? " [DRY RUN]" : "";
  const lines = [`${emoji} ${event.direction}${mode}`, `Amount in: ${event.amountIn}`];
  if (event.result?.ok) {
    lines.push(`Tx: ${event.result.txHash}`);
    lines.push(`Confirmed: ${event.confirmed ? "yes" : "no"}`);
  } else if (event.result) {
    lines.push(`Rejected: ${event.result.error}`);
  }
  return lines.join("\n");
}
