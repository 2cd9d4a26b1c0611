/**
 * PnL Ledger - append-only realized PnL records
 *
 * Queried by fixed trailing windows (1h / 4h / 24h). Simple summation over the
 * filtered window; no index is needed at this scale.
 */

export interface PnlRecord {
  /** Epoch ms */
  timestamp: number;
  realizedPnlUsd: number;
}

export interface PnlWindow {
  windowSeconds: number;
  realizedPnlUsd: number;
  trades: number;
}

export const DEFAULT_PNL_WINDOWS_S: readonly number[] = [3600, 14400, 86400];

export class PnLLedger {
  private readonly records: PnlRecord[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  record(realizedPnlUsd: number, timestamp: number = this.now()): PnlRecord {
    const entry = Object.freeze({ timestamp, realizedPnlUsd });
    this.records.push(entry);
    return entry;
  }

  all(): readonly PnlRecord[] {
    return [...this.records];
  }

  /**
   * Sum of realized PnL with timestamp in (now - windowSeconds, now]
   * and not before `notBefore` (if given)
   */
  sumSince(windowSeconds: number, notBefore?: number): PnlWindow {
    const now = this.now();
    const from = Math.max(now - windowSeconds * 1000, notBefore ?? -Infinity);
    let realizedPnlUsd = 0;
    let trades = 0;
    for (const r of this.records) {
      if (r.timestamp > from && r.timestamp <= now) {
        realizedPnlUsd += r.realizedPnlUsd;
        trades++;
      }
    }
    return { windowSeconds, realizedPnlUsd, trades };
  }

  windows(windowsS: readonly number[] = DEFAULT_PNL_WINDOWS_S): PnlWindow[] {
    return windowsS.map((w) => this.sumSince(w));
  }
}
