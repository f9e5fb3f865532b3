/**
 * Hex string helpers
 */

import { bytesToHex, getAddress, hexToBytes, isAddress } from "viem";
import { ConfigurationError } from "../errors/errors.js";
import type { Address, HexString } from "../types/primitives.js";

/**
 * Decode a hex string (with or without 0x prefix) into raw bytes.
 * Rejects odd-length input and non-hex characters.
 */
export function decodeHexBytes(value: string, label = "hex value"): Uint8Array {
  const body = value.trim().replace(/^0x/i, "");

  if (body.length % 2 !== 0) {
    throw new ConfigurationError(`Invalid ${label}: odd number of hex digits (${body.length})`);
  }
  if (!/^[0-9a-fA-F]*$/.test(body)) {
    throw new ConfigurationError(`Invalid ${label}: contains non-hex characters`);
  }

  return hexToBytes(`0x${body}`);
}

/**
 * Normalize a hex byte string to lowercase 0x-prefixed form
 */
export function normalizeHexBytes(value: string, label?: string): HexString {
  return bytesToHex(decodeHexBytes(value, label));
}

/**
 * Validate an address and return its checksummed form
 */
export function toAddress(value: string, label = "address"): Address {
  const trimmed = value.trim();
  if (!isAddress(trimmed, { strict: false })) {
    throw new ConfigurationError(`Invalid ${label}: ${value}`);
  }
  return getAddress(trimmed);
}

/**
 * Shorten an address for display
 */
export function shortenAddress(address: Address): string {
  return `${address.slice(0, 6)}...${address.slice(-4)}`;
}
