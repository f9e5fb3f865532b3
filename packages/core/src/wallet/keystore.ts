/**
 * Private key management
 *
 * Accounts can be created from:
 * - A freshly generated key
 * - Raw hex strings
 * - Environment variables
 * - BIP-39 mnemonics
 * - Encrypted keystore JSON files
 */

import { readFileSync } from "node:fs";
import { Wallet as EthersWallet, encryptKeystoreJson } from "ethers";
import { bytesToHex, keccak256 } from "viem";
import {
  type PrivateKeyAccount,
  generatePrivateKey,
  mnemonicToAccount,
  privateKeyToAccount,
} from "viem/accounts";
import { ConfigurationError, errorMessage } from "../errors/errors.js";
import type { Address, HexString } from "../types/primitives.js";
import type { PopulatedTransaction, SignedTransaction } from "../types/transaction.js";
import type { KeyConfig, Signer } from "./types.js";

const DEFAULT_DERIVATION_PATH = "m/44'/60'/0'/0/0";

/** Options for exporting an encrypted keystore */
export interface KeystoreOptions {
  /** scrypt cost parameter (default: ethers' 131072) */
  scryptN?: number;
}

/**
 * An externally owned account holding a private key.
 *
 * The key is never part of the account's JSON or inspected form; use
 * exportPrivateKey() or toKeystore() to get it out deliberately.
 */
export class Account implements Signer {
  private readonly privateKey: HexString;
  private readonly signerAccount: PrivateKeyAccount;

  private constructor(privateKey: HexString) {
    this.privateKey = privateKey;
    this.signerAccount = privateKeyToAccount(privateKey);
  }

  /** Generate an account with a new random key */
  static generate(): Account {
    return new Account(generatePrivateKey());
  }

  /** Import an account from a hex private key (0x prefix optional) */
  static fromPrivateKey(privateKey: string): Account {
    return new Account(validatePrivateKey(privateKey));
  }

  /** Derive an account from a BIP-39 mnemonic */
  static fromMnemonic(mnemonic: string, derivationPath = DEFAULT_DERIVATION_PATH): Account {
    if (!isValidMnemonic(mnemonic)) {
      throw new ConfigurationError("Invalid mnemonic phrase");
    }
    if (!isEthereumPath(derivationPath)) {
      throw new ConfigurationError(`Invalid derivation path: ${derivationPath}`);
    }

    const hdAccount = mnemonicToAccount(mnemonic.trim(), { path: derivationPath });
    const key = hdAccount.getHdKey().privateKey;
    if (!key) {
      throw new ConfigurationError("Mnemonic did not yield a private key");
    }
    return new Account(bytesToHex(key));
  }

  /** Decrypt an encrypted keystore JSON string */
  static async fromKeystore(json: string, password: string): Promise<Account> {
    if (!password) {
      throw new ConfigurationError("Keystore password is required");
    }

    try {
      const wallet = await EthersWallet.fromEncryptedJson(json, password);
      return Account.fromPrivateKey(wallet.privateKey);
    } catch (error) {
      throw new ConfigurationError(`Failed to decrypt keystore: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  get address(): Address {
    return this.signerAccount.address;
  }

  /**
   * Sign a populated transaction as a legacy (gasPrice) transaction
   */
  async sign(tx: PopulatedTransaction): Promise<SignedTransaction> {
    const serialized = await this.signerAccount.signTransaction({
      type: "legacy",
      to: tx.to ?? null,
      value: tx.value,
      data: tx.data,
      gas: tx.gas,
      gasPrice: tx.gasPrice,
      nonce: tx.nonce,
      chainId: tx.chainId,
    });

    return { serialized, hash: keccak256(serialized) };
  }

  /** Return the raw private key */
  exportPrivateKey(): HexString {
    return this.privateKey;
  }

  /** Encrypt the private key into a keystore JSON string */
  async toKeystore(password: string, options: KeystoreOptions = {}): Promise<string> {
    if (!password) {
      throw new ConfigurationError("Keystore password must not be empty");
    }
    return await encryptKeystoreJson(
      { address: this.address, privateKey: this.privateKey },
      password,
      options.scryptN === undefined ? {} : { scrypt: { N: options.scryptN } }
    );
  }

  toJSON(): { address: Address } {
    return { address: this.address };
  }

  toString(): string {
    return `Account(${this.address})`;
  }

  [Symbol.for("nodejs.util.inspect.custom")](): string {
    return this.toString();
  }
}

/**
 * Validate and normalize a private key
 */
function validatePrivateKey(key: string): HexString {
  // Remove whitespace
  let normalized = key.trim();

  // Add 0x prefix if missing
  if (!normalized.startsWith("0x")) {
    normalized = `0x${normalized}`;
  }

  // Check length (32 bytes = 64 hex chars + 0x prefix)
  if (normalized.length !== 66) {
    throw new ConfigurationError(
      `Invalid private key length: expected 66 characters, got ${normalized.length}`
    );
  }

  if (!isPrivateKeyHex(normalized)) {
    throw new ConfigurationError("Invalid private key: must be 32 bytes of hex");
  }

  return normalized;
}

function isPrivateKeyHex(value: string): value is HexString {
  return /^0x[0-9a-fA-F]{64}$/.test(value);
}

function isEthereumPath(path: string): path is `m/44'/60'/${string}` {
  return path.startsWith("m/44'/60'/");
}

/**
 * Check if a string is a valid BIP-39 mnemonic
 */
function isValidMnemonic(phrase: string): boolean {
  const words = phrase.trim().split(/\s+/);
  // BIP-39 mnemonics are 12, 15, 18, 21, or 24 words
  return [12, 15, 18, 21, 24].includes(words.length);
}

/**
 * Resolve a mnemonic given either inline or as an env var name
 */
function resolveMnemonic(source: string): string {
  if (source.includes(" ")) {
    return source;
  }
  return process.env[source] ?? source;
}

/**
 * Resolve keystore JSON from file path, env var, or raw JSON string
 */
function resolveKeystoreSource(source: string): string {
  const trimmed = source.trim();

  if (trimmed.startsWith("{") && trimmed.endsWith("}")) {
    return trimmed;
  }

  const envValue = process.env[source];
  if (envValue) {
    return envValue;
  }

  try {
    return readFileSync(source, "utf-8");
  } catch (error) {
    throw new ConfigurationError(
      `Unable to read keystore JSON from '${source}': ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

/**
 * Load an account from the specified key source
 */
export async function loadAccount(config: KeyConfig): Promise<Account> {
  switch (config.type) {
    case "raw":
      return Account.fromPrivateKey(config.source);

    case "env": {
      const value = process.env[config.source];
      if (!value) {
        throw new ConfigurationError(`Environment variable ${config.source} is not set`);
      }
      return Account.fromPrivateKey(value);
    }

    case "mnemonic":
      return Account.fromMnemonic(resolveMnemonic(config.source), config.derivationPath);

    case "keystore":
      return await Account.fromKeystore(
        resolveKeystoreSource(config.source),
        config.password ?? ""
      );

    default:
      throw new ConfigurationError(`Unknown key source type: ${String(config.type)}`);
  }
}
