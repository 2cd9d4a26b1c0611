/**
 * Constant-product AMM math (bigint, floor division)
 */

export const BPS = 10_000n;

/**
 * amountOut = amountIn * (10000 - fee) * reserveOut
 *             / (reserveIn * 10000 + amountIn * (10000 - fee))
 *
 * Returns 0 for non-positive inputs or reserves.
 */
export function calcAmountOut(
  amountIn: bigint,
  reserveIn: bigint,
  reserveOut: bigint,
  feeBps: number,
): bigint {
  if (amountIn <= 0n || reserveIn <= 0n || reserveOut <= 0n) return 0n;
  const fee = BigInt(Math.trunc(feeBps));
  if (fee < 0n || fee >= BPS) return 0n;
  const amountInWithFee = amountIn * (BPS - fee);
  const numerator = amountInWithFee * reserveOut;
  const denominator = reserveIn * BPS + amountInWithFee;
  return numerator / denominator;
}

/**
 * Minimum acceptable output: expected * (10000 - slippageBps) / 10000
 */
export function minOutput(expected: bigint, slippageBps: number): bigint {
  const slip = BigInt(Math.trunc(slippageBps));
  if (slip <= 0n) return expected;
  if (slip >= BPS) return 0n;
  return (expected * (BPS - slip)) / BPS;
}

/**
 * Output at the spot price (no curve), after the pool fee
 */
export function spotAmountOut(
  amountIn: bigint,
  reserveIn: bigint,
  reserveOut: bigint,
  feeBps: number,
): bigint {
  if (reserveIn <= 0n) return 0n;
  const fee = BigInt(Math.trunc(feeBps));
  return (amountIn * (BPS - fee) * reserveOut) / (reserveIn * BPS);
}

/**
 * Price impact of a quote against the fee-adjusted spot output, in bps
 */
export function priceImpactBps(quoted: bigint, spot: bigint): number {
  if (spot <= 0n) return Number.POSITIVE_INFINITY;
  if (quoted >= spot) return 0;
  return Number(((spot - quoted) * BPS) / spot);
}
