/**
 * Gas price strategies
 *
 * A strategy is passed to the executor at construction time and asked for a
 * price whenever an intent arrives without one.
 */

import { ConfigurationError } from "../errors/errors.js";
import type { Wei } from "../types/primitives.js";
import type { TransactionIntent } from "../types/transaction.js";
import type { ChainClient } from "./types.js";

export type GasPriceStrategy = (
  client: ChainClient,
  intent: Readonly<TransactionIntent>
) => Promise<Wei>;

/** Use the node's eth_gasPrice suggestion */
export const rpcGasPriceStrategy: GasPriceStrategy = (client) => client.suggestGasPrice();

/** Always use the same price */
export function fixedGasPriceStrategy(price: Wei): GasPriceStrategy {
  if (price < 0n) {
    throw new ConfigurationError(`Gas price must not be negative: ${price}`);
  }
  return async () => price;
}

/**
 * Scale another strategy's price by an integer percentage (120 = +20%)
 */
export function scaledGasPriceStrategy(
  percent: number,
  base: GasPriceStrategy = rpcGasPriceStrategy
): GasPriceStrategy {
  if (!Number.isSafeInteger(percent) || percent <= 0) {
    throw new ConfigurationError(`Gas price percentage must be a positive integer: ${percent}`);
  }
  const factor = BigInt(percent);
  return async (client, intent) => ((await base(client, intent)) * factor) / 100n;
}
