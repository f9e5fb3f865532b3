/**
 * Error taxonomy for the SDK
 *
 * Every failure carries a `code` and, for transaction submissions, the
 * lifecycle stage it originated in. Errors raised after signing also carry
 * the transaction hash so a caller can inspect the transaction manually.
 */

import type { HexString } from "../types/primitives.js";
import type { TransactionReceipt, TransactionStage } from "../types/transaction.js";

export type SdkErrorCode =
  | "CONFIGURATION"
  | "ESTIMATION_FAILED"
  | "PRICING_FAILED"
  | "NONCE_FAILED"
  | "CHAIN_ID_FAILED"
  | "SIGNING_FAILED"
  | "SUBMISSION_REJECTED"
  | "CONFIRMATION_FAILED"
  | "TRANSPORT"
  | "CONTRACT_CALL_FAILED";

export interface SdkErrorOptions {
  cause?: unknown;
  stage?: TransactionStage;
  txHash?: HexString;
}

/** Base error class for the SDK */
export class SdkError extends Error {
  readonly code: SdkErrorCode;
  readonly stage?: TransactionStage;
  readonly txHash?: HexString;

  constructor(code: SdkErrorCode, message: string, options: SdkErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "SdkError";
    this.code = code;
    this.stage = options.stage;
    this.txHash = options.txHash;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.stage && { stage: this.stage }),
      ...(this.txHash && { txHash: this.txHash }),
      ...(this.cause instanceof Error && { cause: this.cause.message }),
    };
  }
}

/** Malformed endpoint, address, key, artifact, or mismatched signer */
export class ConfigurationError extends SdkError {
  constructor(message: string, options?: SdkErrorOptions) {
    super("CONFIGURATION", message, options);
    this.name = "ConfigurationError";
  }
}

/** Gas estimation failed (usually the call would revert) */
export class EstimationError extends SdkError {
  constructor(message: string, options?: Omit<SdkErrorOptions, "stage">) {
    super("ESTIMATION_FAILED", message, { ...options, stage: "estimate" });
    this.name = "EstimationError";
  }
}

/** Gas price could not be determined */
export class PricingError extends SdkError {
  constructor(message: string, options?: Omit<SdkErrorOptions, "stage">) {
    super("PRICING_FAILED", message, { ...options, stage: "price" });
    this.name = "PricingError";
  }
}

/** Sender nonce could not be fetched */
export class NonceError extends SdkError {
  constructor(message: string, options?: Omit<SdkErrorOptions, "stage">) {
    super("NONCE_FAILED", message, { ...options, stage: "nonce" });
    this.name = "NonceError";
  }
}

/** Chain ID for replay protection could not be fetched */
export class ChainIdError extends SdkError {
  constructor(message: string, options?: Omit<SdkErrorOptions, "stage">) {
    super("CHAIN_ID_FAILED", message, { ...options, stage: "chainId" });
    this.name = "ChainIdError";
  }
}

/** The signer failed to produce a signed transaction */
export class SigningError extends SdkError {
  constructor(message: string, options?: Omit<SdkErrorOptions, "stage">) {
    super("SIGNING_FAILED", message, { ...options, stage: "sign" });
    this.name = "SigningError";
  }
}

/** Node-side rejection categories */
export type RejectionKind =
  | "insufficient_funds"
  | "nonce_too_low"
  | "underpriced"
  | "already_known"
  | "gas_limit"
  | "unknown";

/** The node refused the raw transaction */
export class SubmissionRejected extends SdkError {
  /** Reason as reported by the node */
  readonly reason: string;
  readonly kind: RejectionKind;

  constructor(
    reason: string,
    kind: RejectionKind,
    options?: Omit<SdkErrorOptions, "stage">
  ) {
    super("SUBMISSION_REJECTED", `Transaction rejected by node: ${reason}`, {
      ...options,
      stage: "submit",
    });
    this.name = "SubmissionRejected";
    this.reason = reason;
    this.kind = kind;
  }
}

export type ConfirmationFailureReason = "reverted" | "dropped" | "replaced" | "timeout";

/** The transaction was broadcast but did not confirm successfully */
export class ConfirmationFailed extends SdkError {
  readonly reason: ConfirmationFailureReason;
  /** Receipt, when the transaction was mined but reverted */
  readonly receipt?: TransactionReceipt;

  constructor(
    reason: ConfirmationFailureReason,
    message: string,
    options?: Omit<SdkErrorOptions, "stage"> & { receipt?: TransactionReceipt }
  ) {
    super("CONFIRMATION_FAILED", message, { ...options, stage: "confirm" });
    this.name = "ConfirmationFailed";
    this.reason = reason;
    this.receipt = options?.receipt;
  }
}

/** Connectivity failure talking to the node */
export class TransportError extends SdkError {
  constructor(message: string, options?: SdkErrorOptions) {
    super("TRANSPORT", message, options);
    this.name = "TransportError";
  }
}

/** A read-only contract call reverted or returned an unexpected value */
export class ContractCallError extends SdkError {
  readonly functionName: string;

  constructor(functionName: string, message: string, options?: SdkErrorOptions) {
    super("CONTRACT_CALL_FAILED", message, options);
    this.name = "ContractCallError";
    this.functionName = functionName;
  }
}

/** Check whether a value is one of the SDK's errors */
export function isSdkError(error: unknown): error is SdkError {
  return error instanceof SdkError;
}

/** Best-effort message extraction from an unknown thrown value */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
