/**
 * Narrow chain-interaction contract used by the execution engine.
 *
 * Calls are addressed by human-readable function signature
 * (e.g. "function balanceOf(address account) view returns (uint256)").
 */

export interface GasParams {
  gasPriceWei: bigint;
  gasLimit?: bigint;
  /** Send a type-0 transaction instead of EIP-1559 */
  legacy?: boolean;
}

/** Mined receipt outcome; a pending transaction has no receipt */
export type ReceiptStatus = "success" | "reverted";

export type SendResult =
  | { ok: true; txHash: string }
  | { ok: false; error: string };

export interface ChainClient {
  /** Address of the signing account */
  readonly address: string;

  /** Decoded return values of a view call */
  readContractValue(
    address: string,
    signature: string,
    args?: readonly unknown[],
  ): Promise<readonly unknown[]>;

  sendTransaction(
    address: string,
    signature: string,
    args: readonly unknown[],
    gas: GasParams,
  ): Promise<SendResult>;

  /** Plain native-token transfer */
  sendValue(to: string, valueWei: bigint, gas: GasParams): Promise<SendResult>;

  /** Status of the mined receipt, or null while the transaction is pending */
  getReceipt(txHash: string): Promise<ReceiptStatus | null>;

  getBlockNumber(): Promise<number>;

  getNativeBalance(address: string): Promise<bigint>;

  /** Current gas price, or null when the node does not report one */
  getGasPrice(): Promise<bigint | null>;
}

/**
 * Narrow an unknown decoded value to bigint
 */
export function asBigInt(value: unknown): bigint | null {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
  return null;
}
