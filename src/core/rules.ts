/**
 * Entry / Exit Rules
 *
 * Pure, total functions over a snapshot. Entry is a conjunction of favorable
 * conditions (any single failure vetoes); exit is a disjunction of adverse
 * conditions (any single one forces the exit). Keep the two separate.
 */

import type { ExitPolicy, RiskConfig } from "../config/schema";
import type { SignalSnapshot } from "./signals";

export type EntryThresholds = Pick<
  RiskConfig,
  "ftMin" | "ipMinBps" | "seMin" | "seMax"
>;

export type ExitThresholds = Pick<
  RiskConfig,
  "tpBps" | "slBps" | "timeStopS" | "ofiNormThreshold"
> & { exitPolicy: ExitPolicy };

/**
 * Why a position was closed
 */
export type ExitReason =
  | "OFI_REVERSAL"
  | "LIQUIDITY_ADDED"
  | "TAKE_PROFIT"
  | "STOP_LOSS"
  | "TIME_STOP"
  | "OFI_THRESHOLD"
  | "LP_DRAIN";

/**
 * Position state needed by the extended exit policy
 */
export interface ExitContext {
  /** Running markout vs entry (bps, positive = in profit) */
  markoutBps: number;

  /** Seconds since the position was opened */
  elapsedSeconds: number;
}

/**
 * Per-condition breakdown of the entry gate
 */
export interface EntryChecks {
  followThrough: boolean;
  impactPersistence: boolean;
  liquidityNotAdded: boolean;
  buyPressureDominant: boolean;
  elasticityInBand: boolean;
}

export function entryChecks(
  s: SignalSnapshot,
  cfg: EntryThresholds,
): EntryChecks {
  return {
    followThrough: s.followThroughRatio >= cfg.ftMin,
    impactPersistence: s.impactPersistenceBps >= cfg.ipMinBps,
    liquidityNotAdded: s.liquidityDelta <= 0,
    buyPressureDominant: s.pendingBuyPressure > s.pendingSellPressure,
    elasticityInBand:
      cfg.seMin <= s.slippageElasticity && s.slippageElasticity <= cfg.seMax,
  };
}

/**
 * True iff FT >= ftMin, IP >= ipMinBps, LD <= 0, PBP > PSP and
 * seMin <= SE <= seMax.
 */
export function strongReaction(
  s: SignalSnapshot,
  cfg: EntryThresholds,
): boolean {
  const checks = entryChecks(s, cfg);
  return (
    checks.followThrough &&
    checks.impactPersistence &&
    checks.liquidityNotAdded &&
    checks.buyPressureDominant &&
    checks.elasticityInBand
  );
}

/**
 * Position size as a fraction of max allocation: min(1, (FT - 1) * 0.5),
 * never negative.
 */
export function sizeFrom(s: SignalSnapshot): number {
  const raw = Math.min(1.0, (s.followThroughRatio - 1.0) * 0.5);
  return Math.max(0, raw);
}

/**
 * Order flow reversing against us, or liquidity being added
 */
export function exitConditions(s: SignalSnapshot): boolean {
  return s.orderFlowImbalance < 0 || s.liquidityDelta > 0;
}

/**
 * Take-profit, stop-loss, time-stop and normalized OFI threshold
 */
export function extendedExitReason(
  s: SignalSnapshot,
  ctx: ExitContext,
  cfg: ExitThresholds,
): ExitReason | null {
  if (ctx.markoutBps >= cfg.tpBps) return "TAKE_PROFIT";
  if (ctx.markoutBps <= -cfg.slBps) return "STOP_LOSS";
  if (ctx.elapsedSeconds >= cfg.timeStopS) return "TIME_STOP";
  if (s.orderFlowImbalance <= -cfg.ofiNormThreshold) return "OFI_THRESHOLD";
  return null;
}

/**
 * Full exit decision for MANAGE: the minimal rule first, then the extended
 * policy when enabled.
 */
export function exitReason(
  s: SignalSnapshot,
  ctx: ExitContext,
  cfg: ExitThresholds,
): ExitReason | null {
  if (exitConditions(s)) {
    return s.orderFlowImbalance < 0 ? "OFI_REVERSAL" : "LIQUIDITY_ADDED";
  }
  if (cfg.exitPolicy === "extended") {
    return extendedExitReason(s, ctx, cfg);
  }
  return null;
}

/**
 * Markout of the current price against entry, in bps
 */
export function markoutBps(entryPrice: number, currentPrice: number): number {
  if (entryPrice <= 0) return 0;
  return ((currentPrice - entryPrice) / entryPrice) * 10_000;
}
