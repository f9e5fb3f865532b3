/**
 * Handle for an in-flight transaction submission
 */

import type { HexString } from "../types/primitives.js";
import type { TransactionIntent, TransactionReceipt } from "../types/transaction.js";

export type TransactionStatus = "pending" | "submitted" | "confirmed" | "failed";

type Outcome = { ok: true; receipt: TransactionReceipt } | { ok: false; error: unknown };

/** Callbacks the lifecycle uses to report progress into its handle */
export interface LifecycleHooks {
  submitted(hash: HexString): void;
}

export type Lifecycle = (hooks: LifecycleHooks) => Promise<TransactionReceipt>;

/**
 * Single-resolution handle returned by TransactionExecutor.submit.
 *
 * Awaiting the handle yields the receipt or throws the stage error. The
 * outcome is recorded once; later awaits observe the same result. A handle
 * that is dropped before it settles never raises an unhandled rejection.
 */
export class PendingTransaction implements PromiseLike<TransactionReceipt> {
  /** The intent as submitted (frozen) */
  readonly intent: Readonly<TransactionIntent>;
  private currentHash?: HexString;
  private currentStatus: TransactionStatus = "pending";
  private readonly outcome: Promise<Outcome>;

  constructor(intent: Readonly<TransactionIntent>, lifecycle: Lifecycle) {
    this.intent = intent;
    this.outcome = lifecycle({
      submitted: (hash) => {
        this.currentHash = hash;
        this.currentStatus = "submitted";
      },
    }).then(
      (receipt): Outcome => {
        this.currentStatus = "confirmed";
        return { ok: true, receipt };
      },
      (error: unknown): Outcome => {
        this.currentStatus = "failed";
        return { ok: false, error };
      }
    );
  }

  /** Transaction hash, once the node has accepted the transaction */
  get hash(): HexString | undefined {
    return this.currentHash;
  }

  get status(): TransactionStatus {
    return this.currentStatus;
  }

  /** Wait for the receipt */
  async wait(): Promise<TransactionReceipt> {
    const outcome = await this.outcome;
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.receipt;
  }

  then<TResult1 = TransactionReceipt, TResult2 = never>(
    onfulfilled?: ((receipt: TransactionReceipt) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.wait().then(onfulfilled, onrejected);
  }
}
