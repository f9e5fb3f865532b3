/**
 * Transaction executor
 *
 * Takes an unsigned intent through field completion, signing, submission
 * and confirmation, and hands back a single PendingTransaction.
 *
 * The executor keeps no state between submissions: every nonce is read
 * from the chain. Two concurrent submissions from the same sender can
 * therefore pick the same nonce; sequencing them is up to the caller.
 */

import { isAddress, isAddressEqual } from "viem";
import {
  ChainIdError,
  ConfigurationError,
  ConfirmationFailed,
  EstimationError,
  NonceError,
  PricingError,
  SdkError,
  SigningError,
  SubmissionRejected,
  TransportError,
  errorMessage,
} from "../errors/errors.js";
import { classifyRejection } from "../errors/rejection-classifier.js";
import type { HexString } from "../types/primitives.js";
import type {
  PopulatedTransaction,
  SignedTransaction,
  TransactionIntent,
  TransactionReceipt,
  TransactionStage,
} from "../types/transaction.js";
import { weiToEther } from "../utils/units.js";
import { shortenAddress } from "../utils/hex.js";
import { nodeReason } from "./chain-client.js";
import { type GasPriceStrategy, rpcGasPriceStrategy } from "./gas-price.js";
import { type LifecycleHooks, PendingTransaction } from "./pending-transaction.js";
import type { ChainClient, Signer } from "./types.js";

/** Executor options */
export interface ExecutorOptions {
  /** Chain access */
  client: ChainClient;
  /** Gas price policy for intents without a gasPrice (default: node suggestion) */
  gasPriceStrategy?: GasPriceStrategy;
  /** Callback for progress updates */
  progressCallback?: (message: string) => void;
}

/**
 * Transaction executor class
 */
export class TransactionExecutor {
  private client: ChainClient;
  private gasPriceStrategy: GasPriceStrategy;
  private options: ExecutorOptions;

  constructor(options: ExecutorOptions) {
    this.client = options.client;
    this.gasPriceStrategy = options.gasPriceStrategy ?? rpcGasPriceStrategy;
    this.options = options;
  }

  /**
   * Submit a transaction intent signed by `signer`
   */
  submit(intent: TransactionIntent, signer: Signer): PendingTransaction {
    const frozen = Object.freeze({ ...intent });
    return new PendingTransaction(frozen, (hooks) => this.run(frozen, signer, hooks));
  }

  private async run(
    intent: Readonly<TransactionIntent>,
    signer: Signer,
    hooks: LifecycleHooks
  ): Promise<TransactionReceipt> {
    this.validate(intent, signer);

    const tx = await this.populate(intent);
    const signed = await this.sign(tx, signer);
    const hash = await this.broadcast(signed);
    hooks.submitted(hash);

    return await this.confirm(hash);
  }

  private validate(intent: Readonly<TransactionIntent>, signer: Signer): void {
    if (!isAddress(intent.from, { strict: false })) {
      throw new ConfigurationError(`Invalid sender address: ${intent.from}`, {
        stage: "validate",
      });
    }
    if (intent.to !== undefined && !isAddress(intent.to, { strict: false })) {
      throw new ConfigurationError(`Invalid recipient address: ${intent.to}`, {
        stage: "validate",
      });
    }
    if (!isAddressEqual(signer.address, intent.from)) {
      throw new ConfigurationError(
        `Signer ${signer.address} does not match transaction sender ${intent.from}`,
        { stage: "validate" }
      );
    }
  }

  /**
   * Fill gas, gasPrice, nonce and chainId where the intent leaves them out
   */
  async populate(intent: Readonly<TransactionIntent>): Promise<PopulatedTransaction> {
    const gas =
      intent.gas ??
      (await this.stage(
        "estimate",
        () => this.client.estimateGas(intent),
        (cause) => new EstimationError(`Gas estimation failed: ${nodeReason(cause)}`, { cause })
      ));

    const gasPrice =
      intent.gasPrice ??
      (await this.stage(
        "price",
        () => this.gasPriceStrategy(this.client, intent),
        (cause) => new PricingError(`Gas price lookup failed: ${errorMessage(cause)}`, { cause })
      ));

    const nonce =
      intent.nonce ??
      (await this.stage(
        "nonce",
        () => this.client.getTransactionCount(intent.from),
        (cause) =>
          new NonceError(`Nonce lookup for ${intent.from} failed: ${errorMessage(cause)}`, {
            cause,
          })
      ));

    const chainId =
      intent.chainId ??
      (await this.stage(
        "chainId",
        () => this.client.getChainId(),
        (cause) => new ChainIdError(`Chain ID lookup failed: ${errorMessage(cause)}`, { cause })
      ));

    return Object.freeze({
      ...intent,
      value: intent.value ?? 0n,
      data: intent.data ?? "0x",
      gas,
      gasPrice,
      nonce,
      chainId,
    });
  }

  private async sign(tx: PopulatedTransaction, signer: Signer): Promise<SignedTransaction> {
    const signed = await this.stage(
      "sign",
      () => signer.sign(tx),
      (cause) => new SigningError(`Signing failed: ${errorMessage(cause)}`, { cause })
    );

    this.progress(
      `Signed ${summarize(tx)} (nonce ${tx.nonce}, gas ${tx.gas}, gasPrice ${tx.gasPrice})`
    );
    return signed;
  }

  private async broadcast(signed: SignedTransaction): Promise<HexString> {
    const hash = await this.stage(
      "submit",
      () => this.client.sendRawTransaction(signed.serialized),
      (cause) => {
        const reason = nodeReason(cause);
        return new SubmissionRejected(reason, classifyRejection(reason), {
          cause,
          txHash: signed.hash,
        });
      },
      signed.hash
    );

    this.progress(`Submitted ${hash}`);
    return hash;
  }

  private async confirm(hash: HexString): Promise<TransactionReceipt> {
    const receipt = await this.stage(
      "confirm",
      () => this.client.waitForReceipt(hash),
      (cause) =>
        new ConfirmationFailed(
          "dropped",
          `No receipt for transaction ${hash}: ${errorMessage(cause)}`,
          { cause, txHash: hash }
        ),
      hash
    );

    if (receipt.status === "reverted") {
      throw new ConfirmationFailed(
        "reverted",
        `Transaction ${hash} reverted in block ${receipt.blockNumber}`,
        { txHash: hash, receipt }
      );
    }

    this.progress(`✓ Confirmed: ${hash} (block ${receipt.blockNumber})`);
    return receipt;
  }

  /**
   * Run one lifecycle stage, mapping its failure to the stage's error.
   * Transport failures keep their class and gain the stage; other SDK
   * errors pass through unchanged.
   */
  private async stage<T>(
    stage: TransactionStage,
    fn: () => Promise<T>,
    toError: (cause: unknown) => SdkError,
    txHash?: HexString
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof TransportError) {
        throw new TransportError(error.message, { cause: error, stage, txHash });
      }
      if (error instanceof SdkError) {
        throw error;
      }
      throw toError(error);
    }
  }

  /**
   * Send progress update
   */
  private progress(message: string): void {
    if (this.options.progressCallback) {
      this.options.progressCallback(message);
    }
  }
}

function summarize(tx: PopulatedTransaction): string {
  if (tx.to === undefined) {
    return `contract creation from ${shortenAddress(tx.from)}`;
  }
  const value = tx.value > 0n ? `${weiToEther(tx.value)} ETH ` : "";
  return `${value}${shortenAddress(tx.from)} → ${shortenAddress(tx.to)}`;
}
