/**
 * Wallet and transaction types
 */

import type { Address, ChainId, HexString, Wei } from "../types/primitives.js";
import type {
  PopulatedTransaction,
  SignedTransaction,
  TransactionIntent,
  TransactionReceipt,
} from "../types/transaction.js";

/** Supported key source types */
export type KeySourceType = "raw" | "env" | "mnemonic" | "keystore";

/** Configuration for loading a private key */
export interface KeyConfig {
  /** Type of key source */
  type: KeySourceType;
  /** Source value - env var name, file path, mnemonic phrase, or raw hex */
  source: string;
  /** Password for keystore files */
  password?: string;
  /** Derivation path for mnemonic (default: m/44'/60'/0'/0/0) */
  derivationPath?: string;
}

/** Anything that can sign transactions for one address */
export interface Signer {
  /** The signer's address */
  readonly address: Address;
  /** Sign a fully populated transaction */
  sign(tx: PopulatedTransaction): Promise<SignedTransaction>;
}

/**
 * Chain access used by the executor and contract bindings.
 *
 * Implementations must be safe to call concurrently; no locking is done
 * by callers.
 */
export interface ChainClient {
  /** Chain ID used for replay protection */
  getChainId(): Promise<ChainId>;
  /** Estimate the gas limit of a transaction */
  estimateGas(intent: Readonly<TransactionIntent>): Promise<bigint>;
  /** Network-suggested legacy gas price */
  suggestGasPrice(): Promise<Wei>;
  /** Number of transactions sent from an address */
  getTransactionCount(address: Address): Promise<number>;
  /** Broadcast a signed transaction, returning its hash */
  sendRawTransaction(serialized: HexString): Promise<HexString>;
  /** Wait until a transaction is mined and return its receipt */
  waitForReceipt(hash: HexString): Promise<TransactionReceipt>;
  /** Execute a read-only call against current state */
  call(address: Address, data: HexString): Promise<HexString>;
  /** Native balance of an address in wei */
  getBalance(address: Address): Promise<Wei>;
  /** Release any open connection */
  close?(): Promise<void>;
}

/** Options shared by every chain client */
export interface ChainClientOptions {
  /** Chain ID; fetched from the node when omitted */
  chainId?: ChainId;
  /** Request timeout in ms */
  timeout?: number;
  /** Transport-level retry attempts (default: 0) */
  retries?: number;
  /** Blocks to wait for before a receipt is returned (default: 1) */
  confirmations?: number;
  /** Give up waiting for a receipt after this many ms (default: wait forever) */
  confirmationTimeout?: number;
  /** Receipt polling interval in ms */
  pollingInterval?: number;
}

/** RPC chain client configuration */
export interface ChainClientConfig extends ChainClientOptions {
  /** http(s):// or ws(s):// RPC endpoint */
  endpoint: string;
}
