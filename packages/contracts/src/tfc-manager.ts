/**
 * TFCManager binding
 *
 * The manager owns the TFCToken it created at deployment and mints to
 * holders of a signed voucher. Vouchers are checked on chain only.
 */

import {
  type Address,
  type PendingTransaction,
  type Signer,
  normalizeHexBytes,
  toAddress,
} from "@jasmine-eth/core";
import { loadAbi } from "./artifacts.js";
import { type BindingContext, ContractBinding, toUint256 } from "./contract-binding.js";
import { TFCToken } from "./tfc-token.js";

export class TFCManager {
  private binding: ContractBinding;
  private context: BindingContext;

  constructor(address: string, context: BindingContext) {
    this.context = context;
    this.binding = new ContractBinding(
      loadAbi("TFCManager", context.artifactsDir),
      toAddress(address, "manager address"),
      context
    );
  }

  get address(): Address {
    return this.binding.address;
  }

  /** Address of the token this manager mints */
  tfcTokenAddress(): Promise<Address> {
    return this.binding.readAddress("tfcToken");
  }

  async tfcToken(): Promise<TFCToken> {
    return new TFCToken(await this.tfcTokenAddress(), this.context);
  }

  /**
   * Redeem a voucher. `signature` is hex with or without 0x and is passed
   * to the contract byte for byte.
   */
  claimTFC(amount: bigint, nonce: bigint, signature: string, claimer: Signer): PendingTransaction {
    return this.binding.write(
      "claimTFC",
      [
        toUint256(amount, "Claim amount"),
        toUint256(nonce, "Claim nonce"),
        normalizeHexBytes(signature, "voucher signature"),
      ],
      claimer
    );
  }
}
