export type { Address, ChainId, HexString, Wei } from "./primitives.js";
export { ZERO_ADDRESS } from "./primitives.js";
export type {
  PopulatedTransaction,
  SignedTransaction,
  TransactionIntent,
  TransactionLog,
  TransactionReceipt,
  TransactionStage,
} from "./transaction.js";
