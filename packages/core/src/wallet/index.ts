/**
 * Wallet module
 *
 * Provides key management, chain access, and transaction execution.
 */

// Types
export type {
  ChainClient,
  ChainClientConfig,
  ChainClientOptions,
  KeyConfig,
  KeySourceType,
  Signer,
} from "./types.js";

// Keystore
export type { KeystoreOptions } from "./keystore.js";
export { Account, loadAccount } from "./keystore.js";

// Chain client
export {
  ViemChainClient,
  createChainClient,
  isTransportFailure,
  nodeReason,
  toReceipt,
} from "./chain-client.js";

// Gas pricing
export type { GasPriceStrategy } from "./gas-price.js";
export {
  fixedGasPriceStrategy,
  rpcGasPriceStrategy,
  scaledGasPriceStrategy,
} from "./gas-price.js";

// Executor
export type { Lifecycle, LifecycleHooks, TransactionStatus } from "./pending-transaction.js";
export { PendingTransaction } from "./pending-transaction.js";
export type { ExecutorOptions } from "./executor.js";
export { TransactionExecutor } from "./executor.js";
