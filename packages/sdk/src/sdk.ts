/**
 * SDK facade
 *
 * One entry point over accounts, native transfers and the TFC contracts.
 * Every component reaches the chain through the same ChainClient.
 */

import {
  Account,
  type Address,
  type ChainClient,
  ConfigurationError,
  ConfirmationFailed,
  type KeyConfig,
  type PendingTransaction,
  type Signer,
  TransactionExecutor,
  type Wei,
  createChainClient,
  etherToWei,
  loadAccount,
  toAddress,
  weiToEther,
} from "@jasmine-eth/core";
import { type BindingContext, TFCManager, TFCToken, deployContract } from "@jasmine-eth/contracts";
import type { SdkOptions, SdkSettings } from "./config.js";

export class JasmineSdk {
  readonly client: ChainClient;
  readonly executor: TransactionExecutor;
  private context: BindingContext;
  private settings: SdkSettings;

  constructor(client: ChainClient, settings: SdkSettings = {}) {
    this.client = client;
    this.settings = settings;
    this.executor = new TransactionExecutor({
      client,
      gasPriceStrategy: settings.gasPriceStrategy,
      progressCallback: settings.progressCallback,
    });
    this.context = { client, executor: this.executor, artifactsDir: settings.artifactsDir };
  }

  /** Generate a fresh random account */
  createAccount(): Account {
    return Account.generate();
  }

  /** Import an account from its private key */
  retrieveAccount(privateKey: string): Account {
    return Account.fromPrivateKey(privateKey);
  }

  /** Load an account from a key source (raw, env, mnemonic, keystore) */
  loadAccount(config: KeyConfig): Promise<Account> {
    return loadAccount(config);
  }

  /** Native balance in wei */
  balanceOf(address: string): Promise<Wei> {
    return this.client.getBalance(toAddress(address));
  }

  /**
   * Send `amount` wei from `sender` to `recipient`
   */
  transfer(recipient: string, amount: Wei, sender: Signer): PendingTransaction {
    if (amount < 0n) {
      throw new ConfigurationError(`Transfer amount must not be negative: ${amount}`);
    }
    return this.executor.submit(
      { from: sender.address, to: toAddress(recipient, "recipient address"), value: amount },
      sender
    );
  }

  weiToEther(amount: Wei): string {
    return weiToEther(amount);
  }

  etherToWei(amount: string | number): Wei {
    return etherToWei(amount);
  }

  /**
   * Deploy a new TFCManager and return its address.
   *
   * Only ABIs ship with the contracts package. The creation bytecode is read
   * from `TFCManager.bin` in `artifactsDir`, so that setting must point at a
   * directory holding it; otherwise this rejects with a ConfigurationError.
   */
  async deployTFCManager(deployer: Signer): Promise<Address> {
    this.progress(`Deploying TFCManager from ${deployer.address}`);
    const receipt = await deployContract("TFCManager", this.context, deployer);

    if (!receipt.contractAddress) {
      throw new ConfirmationFailed(
        "reverted",
        `Deployment ${receipt.hash} confirmed without a contract address`,
        { txHash: receipt.hash, receipt }
      );
    }

    this.progress(`TFCManager deployed at ${receipt.contractAddress}`);
    return receipt.contractAddress;
  }

  getTFCManager(address: string): TFCManager {
    return new TFCManager(address, this.context);
  }

  getTFCToken(address: string): TFCToken {
    return new TFCToken(address, this.context);
  }

  /**
   * Release the chain client's connection (an open WebSocket, for one)
   */
  async close(): Promise<void> {
    if (this.client.close) {
      await this.client.close();
    }
  }

  private progress(message: string): void {
    if (this.settings.progressCallback) {
      this.settings.progressCallback(message);
    }
  }
}

/**
 * Create an SDK connected to an RPC endpoint
 */
export function createSdk(options: SdkOptions): JasmineSdk {
  return new JasmineSdk(createChainClient(options), options);
}
