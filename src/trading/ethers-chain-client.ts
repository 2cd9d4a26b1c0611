/**
 * ChainClient over ethers v6 (JsonRpcProvider + Wallet)
 *
 * With a relay URL, signed transactions go to that endpoint (a private
 * relay) while reads, receipts and gas data stay on the main RPC.
 */

import {
  EventFragment,
  FunctionFragment,
  Interface,
  JsonRpcProvider,
  Wallet,
  type TransactionRequest,
} from "ethers";
import { NetworkError, toError } from "../errors/app.errors";
import type { Logger } from "../utils/logger.util";
import type { ChainClient, GasParams, ReceiptStatus, SendResult } from "./chain-client";

export interface EthersChainClientOptions {
  rpcUrl: string;
  chainId: number;
  privateKey: string;
  /** Private relay endpoint for transaction submission */
  relayUrl?: string;
  logger?: Logger;
}

interface ParsedFunction {
  iface: Interface;
  fragment: FunctionFragment;
}

export class EthersChainClient implements ChainClient {
  readonly address: string;
  private readonly provider: JsonRpcProvider;
  private readonly wallet: Wallet;
  private readonly logger?: Logger;
  private readonly options: EthersChainClientOptions;
  private readonly abis = new Map<string, ParsedFunction>();

  constructor(options: EthersChainClientOptions) {
    this.provider = new JsonRpcProvider(options.rpcUrl, options.chainId);
    const sender = options.relayUrl
      ? new JsonRpcProvider(options.relayUrl, options.chainId)
      : this.provider;
    this.wallet = new Wallet(options.privateKey, sender);
    this.address = this.wallet.address;
    this.logger = options.logger;
    this.options = options;
  }

  /**
   * Same RPC endpoint, different signer (gas top-up funding account)
   */
  withSigner(privateKey: string): EthersChainClient {
    return new EthersChainClient({ ...this.options, privateKey });
  }

  async readContractValue(
    address: string,
    signature: string,
    args: readonly unknown[] = [],
  ): Promise<readonly unknown[]> {
    const { iface, fragment } = this.parse(signature);
    try {
      const data = iface.encodeFunctionData(fragment, args);
      const raw = await this.provider.call({ to: address, data });
      return Array.from(iface.decodeFunctionResult(fragment, raw));
    } catch (err) {
      throw new NetworkError(
        `eth_call ${fragment.name} on ${address} failed: ${toError(err).message}`,
        address,
        toError(err),
      );
    }
  }

  async sendTransaction(
    address: string,
    signature: string,
    args: readonly unknown[],
    gas: GasParams,
  ): Promise<SendResult> {
    try {
      const { iface, fragment } = this.parse(signature);
      const data = iface.encodeFunctionData(fragment, args);
      const tx = await this.wallet.sendTransaction({
        to: address,
        data,
        ...this.gasFields(gas),
      });
      this.logger?.info(`[Chain] ${fragment.name} sent: ${tx.hash}`);
      return { ok: true, txHash: tx.hash };
    } catch (err) {
      return { ok: false, error: toError(err).message };
    }
  }

  async sendValue(to: string, valueWei: bigint, gas: GasParams): Promise<SendResult> {
    try {
      const tx = await this.wallet.sendTransaction({
        to,
        value: valueWei,
        ...this.gasFields(gas),
      });
      this.logger?.info(`[Chain] transfer sent: ${tx.hash}`);
      return { ok: true, txHash: tx.hash };
    } catch (err) {
      return { ok: false, error: toError(err).message };
    }
  }

  async getReceipt(txHash: string): Promise<ReceiptStatus | null> {
    const receipt = await this.provider.getTransactionReceipt(txHash);
    if (receipt === null) return null;
    return receipt.status === 1 ? "success" : "reverted";
  }

  getBlockNumber(): Promise<number> {
    return this.provider.getBlockNumber();
  }

  getNativeBalance(address: string): Promise<bigint> {
    return this.provider.getBalance(address);
  }

  async getGasPrice(): Promise<bigint | null> {
    const feeData = await this.provider.getFeeData();
    return feeData.gasPrice ?? feeData.maxFeePerGas;
  }

  /**
   * Number of `eventSignature` logs emitted by `address` over the last
   * `lookbackBlocks` blocks
   */
  async countLogs(
    address: string,
    eventSignature: string,
    lookbackBlocks: number,
  ): Promise<number> {
    const topic = EventFragment.from(eventSignature).topicHash;
    try {
      const logs = await this.provider.getLogs({
        address,
        topics: [topic],
        fromBlock: -Math.abs(lookbackBlocks),
        toBlock: "latest",
      });
      return logs.length;
    } catch (err) {
      throw new NetworkError(
        `eth_getLogs on ${address} failed: ${toError(err).message}`,
        address,
        toError(err),
      );
    }
  }

  private gasFields(gas: GasParams): TransactionRequest {
    const fields: TransactionRequest = gas.legacy
      ? { type: 0, gasPrice: gas.gasPriceWei }
      : { maxFeePerGas: gas.gasPriceWei, maxPriorityFeePerGas: gas.gasPriceWei };
    if (gas.gasLimit !== undefined) fields.gasLimit = gas.gasLimit;
    return fields;
  }

  /**
   * @throws Error when the signature is not a function fragment
   */
  private parse(signature: string): ParsedFunction {
    let parsed = this.abis.get(signature);
    if (!parsed) {
      const fragment = FunctionFragment.from(signature);
      parsed = { iface: new Interface([fragment]), fragment };
      this.abis.set(signature, parsed);
    }
    return parsed;
  }
}
