/**
 * SDK configuration
 */

import {
  type ChainClientConfig,
  ConfigurationError,
  type GasPriceStrategy,
} from "@jasmine-eth/core";

/** Settings that apply on top of the chain client */
export interface SdkSettings {
  /** Gas price policy for transactions without an explicit price */
  gasPriceStrategy?: GasPriceStrategy;
  /** Directory with contract ABI and bytecode artifacts */
  artifactsDir?: string;
  /** Callback for progress updates */
  progressCallback?: (message: string) => void;
}

export interface SdkOptions extends ChainClientConfig, SdkSettings {}

export type Environment = Record<string, string | undefined>;

/**
 * Read SDK options from environment variables:
 *
 * - `JASMINE_ETH_ENDPOINT` (required): http(s):// or ws(s):// RPC endpoint
 * - `JASMINE_ETH_CHAIN_ID`
 * - `JASMINE_ETH_CONFIRMATIONS`
 * - `JASMINE_ETH_CONFIRMATION_TIMEOUT_MS`
 * - `JASMINE_ETH_ARTIFACTS_DIR`
 */
export function sdkOptionsFromEnv(env: Environment = process.env): SdkOptions {
  const endpoint = env.JASMINE_ETH_ENDPOINT?.trim();
  if (!endpoint) {
    throw new ConfigurationError("Environment variable JASMINE_ETH_ENDPOINT is not set");
  }

  const options: SdkOptions = { endpoint };

  const chainId = positiveInteger(env, "JASMINE_ETH_CHAIN_ID");
  if (chainId !== undefined) options.chainId = chainId;

  const confirmations = positiveInteger(env, "JASMINE_ETH_CONFIRMATIONS");
  if (confirmations !== undefined) options.confirmations = confirmations;

  const timeout = positiveInteger(env, "JASMINE_ETH_CONFIRMATION_TIMEOUT_MS");
  if (timeout !== undefined) options.confirmationTimeout = timeout;

  const artifactsDir = env.JASMINE_ETH_ARTIFACTS_DIR?.trim();
  if (artifactsDir) options.artifactsDir = artifactsDir;

  return options;
}

function positiveInteger(env: Environment, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) {
    return undefined;
  }

  const value = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got '${raw}'`);
  }
  return value;
}
