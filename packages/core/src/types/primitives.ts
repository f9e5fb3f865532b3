/**
 * Primitive types used throughout the SDK
 */

/** EIP-155 chain ID */
export type ChainId = number;

/** 0x-prefixed Ethereum address (40 hex chars) */
export type Address = `0x${string}`;

/** Hex-encoded data */
export type HexString = `0x${string}`;

/** Amount in wei, the smallest denomination of the native currency */
export type Wei = bigint;

/** The zero address */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";
