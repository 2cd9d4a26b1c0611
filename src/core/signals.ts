/**
 * Market Microstructure Signals
 *
 * A SignalSnapshot is one atomic observation of the pool:
 *
 *   FT   followThroughRatio      price continuation after the initial move (>= 0)
 *   IP   impactPersistenceBps    how long a price impact persists (bps)
 *   SE   slippageElasticity      slippage sensitivity to size (bps per $100)
 *   OFI  orderFlowImbalance      signed buy/sell imbalance, roughly [-1, 1]
 *   LD   liquidityDelta          pool liquidity change; < 0 favors us, > 0 adverse
 *   DEV  spotTwapDeviationBps    spot vs TWAP deviation (bps)
 *   PBP  pendingBuyPressure      gas-weighted pending buys (>= 0)
 *   PSP  pendingSellPressure     gas-weighted pending sells (>= 0)
 *
 * Snapshots are frozen on creation and only referenced afterwards.
 */

export interface SignalSnapshot {
  readonly followThroughRatio: number;
  readonly impactPersistenceBps: number;
  readonly slippageElasticity: number;
  readonly orderFlowImbalance: number;
  readonly liquidityDelta: number;
  readonly spotTwapDeviationBps: number;
  readonly pendingBuyPressure: number;
  readonly pendingSellPressure: number;
}

/**
 * Source of snapshots. One probe per iteration; the state machine does not
 * care whether the data is simulated, replayed or live.
 */
export interface SignalProvider {
  probe(): SignalSnapshot | Promise<SignalSnapshot>;
}

/**
 * Source of the reference price used to open positions and compute markout
 */
export interface PriceFeed {
  currentPrice(): number | Promise<number>;
}

const SNAPSHOT_FIELDS = [
  "followThroughRatio",
  "impactPersistenceBps",
  "slippageElasticity",
  "orderFlowImbalance",
  "liquidityDelta",
  "spotTwapDeviationBps",
  "pendingBuyPressure",
  "pendingSellPressure",
] as const satisfies readonly (keyof SignalSnapshot)[];

/**
 * Build a frozen snapshot
 */
export function createSnapshot(fields: SignalSnapshot): SignalSnapshot {
  return Object.freeze({
    followThroughRatio: fields.followThroughRatio,
    impactPersistenceBps: fields.impactPersistenceBps,
    slippageElasticity: fields.slippageElasticity,
    orderFlowImbalance: fields.orderFlowImbalance,
    liquidityDelta: fields.liquidityDelta,
    spotTwapDeviationBps: fields.spotTwapDeviationBps,
    pendingBuyPressure: fields.pendingBuyPressure,
    pendingSellPressure: fields.pendingSellPressure,
  });
}

/**
 * Validate an untyped record (e.g. parsed JSON) into a snapshot.
 * Returns null when any field is missing or not a finite number.
 */
export function parseSnapshot(raw: unknown): SignalSnapshot | null {
  if (raw === null || typeof raw !== "object") return null;
  const values: Partial<Record<keyof SignalSnapshot, number>> = {};
  for (const field of SNAPSHOT_FIELDS) {
    const value: unknown = Reflect.get(raw, field);
    if (typeof value !== "number" || !Number.isFinite(value)) return null;
    values[field] = value;
  }
  const {
    followThroughRatio,
    impactPersistenceBps,
    slippageElasticity,
    orderFlowImbalance,
    liquidityDelta,
    spotTwapDeviationBps,
    pendingBuyPressure,
    pendingSellPressure,
  } = values;
  if (
    followThroughRatio === undefined ||
    impactPersistenceBps === undefined ||
    slippageElasticity === undefined ||
    orderFlowImbalance === undefined ||
    liquidityDelta === undefined ||
    spotTwapDeviationBps === undefined ||
    pendingBuyPressure === undefined ||
    pendingSellPressure === undefined
  ) {
    return null;
  }
  return createSnapshot({
    followThroughRatio,
    impactPersistenceBps,
    slippageElasticity,
    orderFlowImbalance,
    liquidityDelta,
    spotTwapDeviationBps,
    pendingBuyPressure,
    pendingSellPressure,
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// DETERMINISTIC RANDOMNESS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * 32-bit FNV-1a hash of a seed string
 */
export function hashSeed(seed: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    hash ^= seed.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * mulberry32 PRNG, returns floats in [0, 1)
 */
export function createRng(seed: string): () => number {
  let state = hashSeed(seed);
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const uniform = (rng: () => number, min: number, max: number): number =>
  min + (max - min) * rng();

// ═══════════════════════════════════════════════════════════════════════════
// PAPER PROVIDERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Paper-mode provider: simulated snapshots, reproducible for a given seed.
 * No I/O, never blocks.
 */
export class SeededSignalProvider implements SignalProvider {
  private readonly rng: () => number;

  constructor(seed: string) {
    this.rng = createRng(seed);
  }

  probe(): SignalSnapshot {
    const rng = this.rng;
    return createSnapshot({
      followThroughRatio: uniform(rng, 1.0, 3.0),
      impactPersistenceBps: uniform(rng, 0, 20),
      slippageElasticity: uniform(rng, 0, 2.5),
      orderFlowImbalance: uniform(rng, -1, 1),
      liquidityDelta: uniform(rng, -2, 1),
      spotTwapDeviationBps: uniform(rng, -50, 50),
      pendingBuyPressure: uniform(rng, 0, 2),
      pendingSellPressure: uniform(rng, 0, 2),
    });
  }
}

/**
 * Cycles through a fixed list of snapshots (dry runs, tests)
 */
export class ReplaySignalProvider implements SignalProvider {
  private readonly snapshots: readonly SignalSnapshot[];
  private index = 0;

  constructor(snapshots: readonly SignalSnapshot[]) {
    if (snapshots.length === 0) {
      throw new Error("ReplaySignalProvider needs at least one snapshot");
    }
    this.snapshots = snapshots.map(createSnapshot);
  }

  probe(): SignalSnapshot {
    const snapshot = this.snapshots[this.index % this.snapshots.length];
    this.index++;
    if (snapshot === undefined) {
      throw new Error("ReplaySignalProvider index out of range");
    }
    return snapshot;
  }
}

/**
 * Paper price: a seeded random walk of +/- maxStepBps per call
 */
export class SeededPriceFeed implements PriceFeed {
  private readonly rng: () => number;
  private price: number;

  constructor(
    seed: string,
    startPrice = 100,
    private readonly maxStepBps = 20,
  ) {
    this.rng = createRng(`${seed}:price`);
    this.price = startPrice;
  }

  currentPrice(): number {
    const stepBps = uniform(this.rng, -this.maxStepBps, this.maxStepBps);
    this.price = this.price * (1 + stepBps / 10_000);
    return this.price;
  }
}

/**
 * Fixed price (tests, manual runs)
 */
export class StaticPriceFeed implements PriceFeed {
  constructor(private price: number) {}

  set(price: number): void {
    this.price = price;
  }

  currentPrice(): number {
    return this.price;
  }
}
