/**
 * @jasmine-eth/contracts
 * ABI artifacts and bindings for TFCToken and TFCManager
 */

export type { ContractName } from "./artifacts.js";
export { DEFAULT_ARTIFACTS_DIR, isAbi, loadAbi, loadBytecode } from "./artifacts.js";
export type { BindingContext } from "./contract-binding.js";
export { ContractBinding, toUint256 } from "./contract-binding.js";
export { deployContract } from "./deploy.js";
export { TFCManager } from "./tfc-manager.js";
export { TFCToken } from "./tfc-token.js";
