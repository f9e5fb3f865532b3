/**
 * TFCToken binding (ERC-20)
 */

import { type Address, type PendingTransaction, type Signer, toAddress } from "@jasmine-eth/core";
import { loadAbi } from "./artifacts.js";
import { type BindingContext, ContractBinding, toUint256 } from "./contract-binding.js";

export class TFCToken {
  private binding: ContractBinding;

  constructor(address: string, context: BindingContext) {
    this.binding = new ContractBinding(
      loadAbi("TFCToken", context.artifactsDir),
      toAddress(address, "token address"),
      context
    );
  }

  get address(): Address {
    return this.binding.address;
  }

  name(): Promise<string> {
    return this.binding.readString("name");
  }

  symbol(): Promise<string> {
    return this.binding.readString("symbol");
  }

  decimals(): Promise<number> {
    return this.binding.readNumber("decimals");
  }

  totalSupply(): Promise<bigint> {
    return this.binding.readBigint("totalSupply");
  }

  /** Token balance of `owner` in base units */
  balanceOf(owner: string): Promise<bigint> {
    return this.binding.readBigint("balanceOf", [toAddress(owner, "owner address")]);
  }

  /** Amount `spender` may still move on behalf of `owner` */
  allowance(owner: string, spender: string): Promise<bigint> {
    return this.binding.readBigint("allowance", [
      toAddress(owner, "owner address"),
      toAddress(spender, "spender address"),
    ]);
  }

  transfer(recipient: string, amount: bigint, sender: Signer): PendingTransaction {
    return this.binding.write(
      "transfer",
      [toAddress(recipient, "recipient address"), toUint256(amount, "Transfer amount")],
      sender
    );
  }

  /**
   * Move `amount` from `owner` to `recipient` using the allowance granted
   * to `spender`
   */
  transferFrom(
    owner: string,
    recipient: string,
    amount: bigint,
    spender: Signer
  ): PendingTransaction {
    return this.binding.write(
      "transferFrom",
      [
        toAddress(owner, "owner address"),
        toAddress(recipient, "recipient address"),
        toUint256(amount, "Transfer amount"),
      ],
      spender
    );
  }

  approve(spender: string, amount: bigint, owner: Signer): PendingTransaction {
    return this.binding.write(
      "approve",
      [toAddress(spender, "spender address"), toUint256(amount, "Allowance")],
      owner
    );
  }
}
