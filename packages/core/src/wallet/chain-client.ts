/**
 * RPC chain client
 *
 * Wraps a viem client behind the ChainClient interface:
 * - HTTP or WebSocket transport selected from the endpoint scheme
 * - Connectivity failures surfaced as TransportError
 * - Receipts mapped to the SDK's receipt type
 * - close() releases a WebSocket connection once it has been opened
 */

import {
  BaseError,
  type Chain,
  HttpRequestError,
  type TransactionReceipt as ViemTransactionReceipt,
  TimeoutError,
  type Transport,
  WaitForTransactionReceiptTimeoutError,
  WebSocketRequestError,
  type WebSocketTransport,
  createWalletClient,
  defineChain,
  http,
  publicActions,
  webSocket,
} from "viem";
import { hardhat, localhost, mainnet, sepolia } from "viem/chains";
import {
  ConfigurationError,
  ConfirmationFailed,
  TransportError,
  errorMessage,
} from "../errors/errors.js";
import type { Address, ChainId, HexString, Wei } from "../types/primitives.js";
import type { TransactionIntent, TransactionReceipt } from "../types/transaction.js";
import type { ChainClient, ChainClientConfig, ChainClientOptions } from "./types.js";

/** Map chain IDs to viem chain objects */
const VIEM_CHAINS: Record<number, Chain> = {
  1: mainnet,
  1337: localhost,
  31337: hardhat,
  11155111: sepolia,
};

function createRpcClient(transport: Transport, chain: Chain | undefined, pollingInterval?: number) {
  return createWalletClient({ chain, transport, pollingInterval }).extend(publicActions);
}

type RpcClient = ReturnType<typeof createRpcClient>;

/** Releases the connection behind a transport */
export type ReleaseTransport = () => Promise<void>;

/**
 * Chain client backed by viem
 */
export class ViemChainClient implements ChainClient {
  private client: RpcClient;
  private options: ChainClientOptions;
  private release?: ReleaseTransport;
  private opened = false;

  constructor(transport: Transport, options: ChainClientOptions = {}, release?: ReleaseTransport) {
    this.options = {
      ...options,
      confirmations: options.confirmations ?? 1,
    };
    this.release = release;
    this.client = createRpcClient(
      transport,
      resolveChain(options.chainId),
      options.pollingInterval
    );
  }

  async getChainId(): Promise<ChainId> {
    if (this.options.chainId !== undefined) {
      return this.options.chainId;
    }
    return await this.withTransport(() => this.client.getChainId());
  }

  async estimateGas(intent: Readonly<TransactionIntent>): Promise<bigint> {
    return await this.withTransport(() =>
      this.client.estimateGas({
        account: intent.from,
        to: intent.to,
        data: intent.data,
        value: intent.value,
      })
    );
  }

  async suggestGasPrice(): Promise<Wei> {
    return await this.withTransport(() => this.client.getGasPrice());
  }

  async getTransactionCount(address: Address): Promise<number> {
    return await this.withTransport(() => this.client.getTransactionCount({ address }));
  }

  async sendRawTransaction(serialized: HexString): Promise<HexString> {
    return await this.withTransport(() =>
      this.client.sendRawTransaction({ serializedTransaction: serialized })
    );
  }

  /**
   * Wait for a transaction receipt.
   *
   * A transaction replaced by a different one (cancelled or replaced, not
   * merely repriced) is reported as a ConfirmationFailed.
   */
  async waitForReceipt(hash: HexString): Promise<TransactionReceipt> {
    const replacement: { reason?: string } = {};

    const receipt = await this.withTransport(async () => {
      try {
        return await this.client.waitForTransactionReceipt({
          hash,
          confirmations: this.options.confirmations,
          // viem applies its own 180s limit when timeout is undefined; 0 disables it
          timeout: this.options.confirmationTimeout ?? 0,
          pollingInterval: this.options.pollingInterval,
          onReplaced: (replaced) => {
            replacement.reason = replaced.reason;
          },
        });
      } catch (error) {
        if (error instanceof WaitForTransactionReceiptTimeoutError) {
          throw new ConfirmationFailed(
            "timeout",
            `Timed out waiting for transaction ${hash}`,
            { cause: error, txHash: hash }
          );
        }
        throw error;
      }
    });

    if (replacement.reason !== undefined && replacement.reason !== "repriced") {
      throw new ConfirmationFailed(
        "replaced",
        `Transaction ${hash} was ${replacement.reason} by ${receipt.transactionHash}`,
        { txHash: hash, receipt: toReceipt(receipt) }
      );
    }

    return toReceipt(receipt);
  }

  async call(address: Address, data: HexString): Promise<HexString> {
    const result = await this.withTransport(() => this.client.call({ to: address, data }));
    return result.data ?? "0x";
  }

  async getBalance(address: Address): Promise<Wei> {
    return await this.withTransport(() => this.client.getBalance({ address }));
  }

  /**
   * Release the underlying connection. Requests after close() reopen it.
   */
  async close(): Promise<void> {
    if (!this.opened || !this.release) {
      return;
    }
    this.opened = false;
    await this.release();
  }

  /**
   * Run an RPC request, translating connectivity failures
   */
  private async withTransport<T>(fn: () => Promise<T>): Promise<T> {
    this.opened = true;
    try {
      return await fn();
    } catch (error) {
      if (isTransportFailure(error)) {
        throw new TransportError(`RPC transport failure: ${errorMessage(error)}`, {
          cause: error,
        });
      }
      throw error;
    }
  }
}

/**
 * Check whether an error was caused by the connection rather than the node
 */
export function isTransportFailure(error: unknown): boolean {
  if (!(error instanceof BaseError)) {
    return false;
  }
  const found = error.walk(
    (cause) =>
      cause instanceof HttpRequestError ||
      cause instanceof WebSocketRequestError ||
      cause instanceof TimeoutError
  );
  return found !== null;
}

/**
 * Extract the node-reported reason from a failed request
 */
export function nodeReason(error: unknown): string {
  if (error instanceof BaseError) {
    return error.details || error.shortMessage;
  }
  return errorMessage(error);
}

/**
 * Map a viem receipt to the SDK receipt
 */
export function toReceipt(receipt: ViemTransactionReceipt): TransactionReceipt {
  const mapped: TransactionReceipt = {
    hash: receipt.transactionHash,
    blockNumber: receipt.blockNumber,
    blockHash: receipt.blockHash,
    from: receipt.from,
    to: receipt.to,
    status: receipt.status === "success" ? "success" : "reverted",
    gasUsed: receipt.gasUsed,
    effectiveGasPrice: receipt.effectiveGasPrice,
    ...(receipt.contractAddress ? { contractAddress: receipt.contractAddress } : {}),
    logs: receipt.logs.map((log) => ({
      address: log.address,
      topics: [...log.topics],
      data: log.data,
      logIndex: log.logIndex,
    })),
  };
  return Object.freeze(mapped);
}

function resolveChain(chainId: ChainId | undefined): Chain | undefined {
  if (chainId === undefined) {
    return undefined;
  }

  const known = VIEM_CHAINS[chainId];
  if (known) {
    return known;
  }

  return defineChain({
    id: chainId,
    name: `Chain ${chainId}`,
    nativeCurrency: { name: "Ether", symbol: "ETH", decimals: 18 },
    rpcUrls: {
      default: { http: [] },
    },
  });
}

/**
 * Create a chain client for an RPC endpoint
 */
export function createChainClient(config: ChainClientConfig): ViemChainClient {
  const endpoint = config.endpoint.trim();
  const transportOptions = {
    timeout: config.timeout,
    retryCount: config.retries ?? 0,
  };

  if (/^https?:\/\//i.test(endpoint)) {
    return new ViemChainClient(http(endpoint, transportOptions), config);
  }
  if (/^wss?:\/\//i.test(endpoint)) {
    const transport = webSocket(endpoint, transportOptions);
    return new ViemChainClient(transport, config, () => closeSocket(transport));
  }
  throw new ConfigurationError(`Unsupported Ethereum endpoint: '${endpoint}'`);
}

/**
 * Close the socket viem keeps open (with its keep-alive timer) for a
 * WebSocket transport
 */
async function closeSocket(transport: WebSocketTransport): Promise<void> {
  const { value } = transport({});
  if (value) {
    const rpcClient = await value.getRpcClient();
    rpcClient.close();
  }
}
