/**
 * Contract binding
 *
 * Pairs a deployed address with its ABI. Reads go through eth_call and are
 * decoded here; writes become transaction intents for the executor.
 */

import {
  type Address,
  type ChainClient,
  ConfigurationError,
  ContractCallError,
  type HexString,
  type PendingTransaction,
  type Signer,
  type TransactionExecutor,
  TransportError,
  errorMessage,
  nodeReason,
} from "@jasmine-eth/core";
import { type Abi, decodeFunctionResult, encodeFunctionData, isAddress, maxUint256 } from "viem";

/** What a binding needs to reach the chain */
export interface BindingContext {
  client: ChainClient;
  executor: TransactionExecutor;
  /** Where ABI artifacts are read from (default: the shipped artifacts) */
  artifactsDir?: string;
}

export class ContractBinding {
  readonly address: Address;
  readonly abi: Abi;
  private context: BindingContext;

  constructor(abi: Abi, address: Address, context: BindingContext) {
    this.abi = abi;
    this.address = address;
    this.context = context;
  }

  /**
   * Call a view function and return its decoded result
   */
  async read(functionName: string, args: readonly unknown[] = []): Promise<unknown> {
    let data: HexString;
    try {
      data = encodeFunctionData({ abi: this.abi, functionName, args });
    } catch (error) {
      throw new ContractCallError(
        functionName,
        `Cannot encode call to ${functionName}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    let result: HexString;
    try {
      result = await this.context.client.call(this.address, data);
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      throw new ContractCallError(
        functionName,
        `${functionName}() on ${this.address} reverted: ${nodeReason(error)}`,
        { cause: error }
      );
    }

    if (result === "0x") {
      throw new ContractCallError(
        functionName,
        `${functionName}() on ${this.address} returned no data (is a contract deployed there?)`
      );
    }

    try {
      return decodeFunctionResult({ abi: this.abi, functionName, data: result });
    } catch (error) {
      throw new ContractCallError(
        functionName,
        `Cannot decode ${functionName}() result: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async readBigint(functionName: string, args?: readonly unknown[]): Promise<bigint> {
    const value = await this.read(functionName, args);
    if (typeof value !== "bigint") {
      throw unexpected(functionName, "an integer", value);
    }
    return value;
  }

  async readNumber(functionName: string, args?: readonly unknown[]): Promise<number> {
    const value = await this.read(functionName, args);
    if (typeof value !== "number") {
      throw unexpected(functionName, "a small integer", value);
    }
    return value;
  }

  async readString(functionName: string, args?: readonly unknown[]): Promise<string> {
    const value = await this.read(functionName, args);
    if (typeof value !== "string") {
      throw unexpected(functionName, "a string", value);
    }
    return value;
  }

  async readAddress(functionName: string, args?: readonly unknown[]): Promise<Address> {
    const value = await this.read(functionName, args);
    if (typeof value !== "string" || !isAddress(value)) {
      throw unexpected(functionName, "an address", value);
    }
    return value;
  }

  /**
   * Send a state-changing call signed by `sender`
   */
  write(functionName: string, args: readonly unknown[], sender: Signer): PendingTransaction {
    let data: HexString;
    try {
      data = encodeFunctionData({ abi: this.abi, functionName, args });
    } catch (error) {
      throw new ConfigurationError(
        `Invalid arguments for ${functionName}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    return this.context.executor.submit({ from: sender.address, to: this.address, data }, sender);
  }
}

function unexpected(functionName: string, expected: string, value: unknown): ContractCallError {
  return new ContractCallError(
    functionName,
    `${functionName}() returned ${typeof value}, expected ${expected}`
  );
}

/**
 * Validate a uint256 amount
 */
export function toUint256(value: bigint, label: string): bigint {
  if (value < 0n || value > maxUint256) {
    throw new ConfigurationError(`${label} must be between 0 and 2^256 - 1, got ${value}`);
  }
  return value;
}
