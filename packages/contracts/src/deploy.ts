/**
 * Contract deployment
 */

import type { PendingTransaction, Signer } from "@jasmine-eth/core";
import { type ContractName, loadBytecode } from "./artifacts.js";
import type { BindingContext } from "./contract-binding.js";

/**
 * Submit a creation transaction for a contract whose constructor takes no
 * arguments. The receipt's contractAddress is the new contract.
 */
export function deployContract(
  name: ContractName,
  context: BindingContext,
  deployer: Signer
): PendingTransaction {
  const bytecode = loadBytecode(name, context.artifactsDir);
  return context.executor.submit({ from: deployer.address, data: bytecode }, deployer);
}
