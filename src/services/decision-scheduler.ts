/**
 * Decision Scheduler
 *
 * Drives one decision iteration per tick on a self-rescheduling timer.
 * The delay after each tick is the base interval stretched by the cadence
 * cooldown factor. A failing tick is logged and the loop carries on.
 */

import type { RiskConfig, SchedulerConfig } from "../config/schema";
import { cooldownFactor } from "../core/cadence";
import { toError } from "../errors/app.errors";
import type { Logger } from "../utils/logger.util";

/**
 * Live market readings for the cadence factor
 */
export interface CadenceSource {
  gasGwei(): Promise<number>;
  swaps10m(): Promise<number>;
}

export interface DecisionSchedulerDeps {
  tick: () => Promise<unknown>;
  config: Readonly<SchedulerConfig>;
  risk: Readonly<Pick<RiskConfig, "gasCapGwei">>;
  weakSignalsRatio: () => number;
  cadence?: CadenceSource;
  logger?: Logger;
}

export class DecisionScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private ticks = 0;
  private readonly deps: DecisionSchedulerDeps;

  constructor(deps: DecisionSchedulerDeps) {
    this.deps = deps;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get tickCount(): number {
    return this.ticks;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.deps.logger?.info(
      `[Scheduler] Started (base interval ${this.deps.config.intervalMs}ms)`,
    );
    this.schedule(0);
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.deps.logger?.info("[Scheduler] Stopped");
  }

  /**
   * Run one tick and return the delay before the next one
   */
  async runOnce(): Promise<number> {
    this.ticks++;
    try {
      await this.deps.tick();
    } catch (err) {
      const error = toError(err);
      this.deps.logger?.error(`[Scheduler] Tick ${this.ticks} failed: ${error.message}`, error);
    }
    return this.nextDelayMs();
  }

  /**
   * Base interval x cooldown factor. Unreadable cadence inputs count as
   * neutral (factor 1.0 for that input).
   */
  async nextDelayMs(): Promise<number> {
    const { config, risk, cadence } = this.deps;
    let gasGwei = 0;
    let swaps10m = config.quietSwapsMin;
    if (cadence) {
      try {
        [gasGwei, swaps10m] = await Promise.all([cadence.gasGwei(), cadence.swaps10m()]);
      } catch (err) {
        this.deps.logger?.debug(`[Scheduler] Cadence inputs unavailable: ${toError(err).message}`);
        gasGwei = 0;
        swaps10m = config.quietSwapsMin;
      }
    }
    const factor = cooldownFactor(
      { gasGwei, swaps10m, weakSignalsRatio: this.deps.weakSignalsRatio() },
      { gasCapGwei: risk.gasCapGwei, quietSwapsMin: config.quietSwapsMin },
    );
    if (factor > 1) {
      this.deps.logger?.debug(`[Scheduler] Cooling down x${factor}`);
    }
    return Math.round(config.intervalMs * factor);
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runOnce().then(
        (next) => {
          if (this.running) this.schedule(next);
        },
        (err: unknown) => {
          this.deps.logger?.error("[Scheduler] Loop failed", toError(err));
          if (this.running) this.schedule(this.deps.config.intervalMs);
        },
      );
    }, delayMs);
  }
}
