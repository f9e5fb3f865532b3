/**
 * Transaction lifecycle types
 */

import type { Address, ChainId, HexString, Wei } from "./primitives.js";

/**
 * An unsigned transaction as requested by the caller.
 *
 * Only `from` is required. Absent fields are completed by the executor;
 * present ones are never overwritten.
 */
export interface TransactionIntent {
  /** Sender address; must match the signing account */
  from: Address;
  /** Recipient address. Absent for contract creation */
  to?: Address;
  /** Value in wei (default 0) */
  value?: Wei;
  /** Encoded calldata or init bytecode (default 0x) */
  data?: HexString;
  /** Gas limit */
  gas?: bigint;
  /** Legacy gas price in wei */
  gasPrice?: Wei;
  /** Sender transaction count */
  nonce?: number;
  /** Chain ID used for replay protection */
  chainId?: ChainId;
}

/** A transaction intent with every field filled in */
export interface PopulatedTransaction extends TransactionIntent {
  value: Wei;
  data: HexString;
  gas: bigint;
  gasPrice: Wei;
  nonce: number;
  chainId: ChainId;
}

/** Signed, serialized transaction ready for broadcast */
export interface SignedTransaction {
  /** RLP-serialized signed transaction */
  serialized: HexString;
  /** keccak256 of the serialized bytes, i.e. the transaction hash */
  hash: HexString;
}

/** Transaction receipt after confirmation */
export interface TransactionReceipt {
  /** Transaction hash */
  hash: HexString;
  /** Block number */
  blockNumber: bigint;
  /** Block hash */
  blockHash: HexString;
  /** Sender */
  from: Address;
  /** Recipient, null for contract creation */
  to: Address | null;
  /** Transaction status */
  status: "success" | "reverted";
  /** Gas used */
  gasUsed: bigint;
  /** Effective gas price */
  effectiveGasPrice: bigint;
  /** Contract address if deployment */
  contractAddress?: Address;
  /** Transaction logs */
  logs: TransactionLog[];
}

/** Transaction log entry */
export interface TransactionLog {
  /** Contract address that emitted the log */
  address: Address;
  /** Log topics */
  topics: HexString[];
  /** Log data */
  data: HexString;
  /** Log index in the block */
  logIndex: number;
}

/** Lifecycle stages of a submission, in order */
export type TransactionStage =
  | "validate"
  | "estimate"
  | "price"
  | "nonce"
  | "chainId"
  | "sign"
  | "submit"
  | "confirm";
