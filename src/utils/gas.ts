import { formatUnits, parseUnits } from "ethers";
import type { Logger } from "./logger.util";

export const parseGwei = (gwei: number): bigint => parseUnits(String(gwei), "gwei");

export const formatGwei = (wei: bigint): number => parseFloat(formatUnits(wei, "gwei"));

/**
 * Checks if gas price is within the configured cap.
 * Debug note above 80% of the cap, warning above it.
 */
export const isGasWithinCap = (
  gasPriceWei: bigint,
  gasCapGwei: number,
  logger?: Logger,
): boolean => {
  const gasCap = parseGwei(gasCapGwei);
  const gasGwei = formatGwei(gasPriceWei);

  if (gasPriceWei > gasCap) {
    logger?.warn(
      `[Gas][Safety] Gas price ${gasGwei.toFixed(2)} gwei exceeds cap of ${gasCapGwei} gwei, skipping probe`,
    );
    return false;
  }

  // Warning at 80% of cap - BigInt arithmetic for precision
  const warningThreshold = (gasCap * 80n) / 100n;
  if (gasPriceWei > warningThreshold) {
    const percentOfCap = (gasPriceWei * 100n) / gasCap;
    logger?.debug(
      `[Gas][Safety] Gas price ${gasGwei.toFixed(2)} gwei is ${percentOfCap}% of cap (${gasCapGwei} gwei)`,
    );
  }
  return true;
};

/**
 * Gas cost of a transaction in USD
 */
export const gasCostUsd = (
  gasUnits: number,
  gasPriceWei: bigint,
  nativePriceUsd: number,
): number => {
  const costWei = BigInt(gasUnits) * gasPriceWei;
  return parseFloat(formatUnits(costWei, "ether")) * nativePriceUsd;
};
