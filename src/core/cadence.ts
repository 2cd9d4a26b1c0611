/**
 * Probe cadence: how much to stretch the base loop interval.
 */

export interface CadenceContext {
  gasGwei: number;
  swaps10m: number;
  /** Share of recent iterations whose snapshot failed the entry gate */
  weakSignalsRatio: number;
}

export interface CadenceConfig {
  gasCapGwei: number;
  quietSwapsMin: number;
}

export const WEAK_SIGNALS_RATIO_THRESHOLD = 0.66;

/**
 * 2.0 when gas is above the cap, 2.0 in a quiet market, 1.5 when most recent
 * signals were weak; the largest applicable factor wins, 1.0 otherwise.
 */
export function cooldownFactor(ctx: CadenceContext, config: CadenceConfig): number {
  let factor = 1.0;
  if (ctx.gasGwei > config.gasCapGwei) factor = Math.max(factor, 2.0);
  if (ctx.swaps10m < config.quietSwapsMin) factor = Math.max(factor, 2.0);
  if (ctx.weakSignalsRatio >= WEAK_SIGNALS_RATIO_THRESHOLD) {
    factor = Math.max(factor, 1.5);
  }
  return factor;
}

/**
 * Rolling share of weak (entry-rejected) signals over the last N observations
 */
export class WeakSignalTracker {
  private readonly samples: boolean[] = [];

  constructor(private readonly size = 12) {}

  record(weak: boolean): void {
    this.samples.push(weak);
    if (this.samples.length > this.size) this.samples.shift();
  }

  ratio(): number {
    if (this.samples.length === 0) return 0;
    return this.samples.filter(Boolean).length / this.samples.length;
  }
}
