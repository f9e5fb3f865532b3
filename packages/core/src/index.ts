/**
 * @jasmine-eth/core
 * Chain access, accounts, and the transaction lifecycle
 */

// Types
export * from "./types/index.js";

// Errors
export * from "./errors/index.js";

// Utilities
export * from "./utils/index.js";

// Wallet
export * from "./wallet/index.js";
