/**
 * Executor tests
 */

import { keccak256, parseTransaction } from "viem";
import { describe, expect, test, vi } from "vitest";
import {
  ChainIdError,
  ConfigurationError,
  ConfirmationFailed,
  EstimationError,
  NonceError,
  PricingError,
  SigningError,
  SubmissionRejected,
  TransportError,
} from "../errors/errors.js";
import type { Address, HexString } from "../types/primitives.js";
import type { TransactionReceipt } from "../types/transaction.js";
import { TransactionExecutor } from "./executor.js";
import { fixedGasPriceStrategy } from "./gas-price.js";
import { Account } from "./keystore.js";
import type { ChainClient, Signer } from "./types.js";

const TEST_PRIVATE_KEY = "0xac0974bec39a17e36ba4a6b4d238ff944bacb478cbed5efcae784d7bf4f2ff80";
const TEST_ADDRESS: Address = "0xf39Fd6e51aad88F6F4ce6aB8827279cffFb92266";
const RECIPIENT: Address = "0x0000000000000000000000000000000000000002";
const ONE_ETHER = 10n ** 18n;

function receiptFor(
  hash: HexString,
  status: TransactionReceipt["status"] = "success"
): TransactionReceipt {
  return {
    hash,
    blockNumber: 7n,
    blockHash: `0x${"11".repeat(32)}`,
    from: TEST_ADDRESS,
    to: RECIPIENT,
    status,
    gasUsed: 21000n,
    effectiveGasPrice: 5n,
    logs: [],
  };
}

function stubClient(overrides: Partial<ChainClient> = {}): ChainClient {
  return {
    getChainId: async () => 1337,
    estimateGas: async () => 21000n,
    suggestGasPrice: async () => 5n,
    getTransactionCount: async () => 4,
    sendRawTransaction: async (serialized) => keccak256(serialized),
    waitForReceipt: async (hash) => receiptFor(hash),
    call: async () => "0x",
    getBalance: async () => 0n,
    ...overrides,
  };
}

const account = Account.fromPrivateKey(TEST_PRIVATE_KEY);

describe("TransactionExecutor", () => {
  describe("populate", () => {
    test("fills missing fields from the chain", async () => {
      const sendRawTransaction = vi.fn(async (serialized: HexString) => keccak256(serialized));
      const executor = new TransactionExecutor({ client: stubClient({ sendRawTransaction }) });

      const handle = executor.submit({ from: TEST_ADDRESS, to: RECIPIENT, value: ONE_ETHER }, account);
      const receipt = await handle;

      expect(sendRawTransaction).toHaveBeenCalledTimes(1);
      const serialized = sendRawTransaction.mock.calls[0][0];
      const parsed = parseTransaction(serialized);
      expect(parsed.to).toBe(RECIPIENT);
      expect(parsed.value).toBe(ONE_ETHER);
      expect(parsed.gas).toBe(21000n);
      expect(parsed.gasPrice).toBe(5n);
      expect(parsed.nonce).toBe(4);
      expect(parsed.chainId).toBe(1337);

      expect(handle.hash).toBe(keccak256(serialized));
      expect(receipt.hash).toBe(keccak256(serialized));
    });

    test("keeps fields the intent already sets", async () => {
      const estimateGas = vi.fn(async () => 1n);
      const suggestGasPrice = vi.fn(async () => 1n);
      const getTransactionCount = vi.fn(async () => 0);
      const getChainId = vi.fn(async () => 1);
      const executor = new TransactionExecutor({
        client: stubClient({ estimateGas, suggestGasPrice, getTransactionCount, getChainId }),
      });

      const tx = await executor.populate({
        from: TEST_ADDRESS,
        to: RECIPIENT,
        gas: 30000n,
        gasPrice: 9n,
        nonce: 11,
        chainId: 31337,
      });

      expect(tx).toEqual({
        from: TEST_ADDRESS,
        to: RECIPIENT,
        value: 0n,
        data: "0x",
        gas: 30000n,
        gasPrice: 9n,
        nonce: 11,
        chainId: 31337,
      });
      expect(Object.isFrozen(tx)).toBe(true);
      expect(estimateGas).not.toHaveBeenCalled();
      expect(suggestGasPrice).not.toHaveBeenCalled();
      expect(getTransactionCount).not.toHaveBeenCalled();
      expect(getChainId).not.toHaveBeenCalled();
    });

    test("prices with the configured strategy", async () => {
      const executor = new TransactionExecutor({
        client: stubClient(),
        gasPriceStrategy: fixedGasPriceStrategy(42n),
      });

      const tx = await executor.populate({ from: TEST_ADDRESS, to: RECIPIENT });
      expect(tx.gasPrice).toBe(42n);
    });
  });

  describe("validation", () => {
    test("rejects a signer that does not match the sender", async () => {
      const sendRawTransaction = vi.fn(async (serialized: HexString) => keccak256(serialized));
      const executor = new TransactionExecutor({ client: stubClient({ sendRawTransaction }) });

      const error = await executor
        .submit({ from: "0x0000000000000000000000000000000000000001", to: RECIPIENT }, account)
        .then(
          () => undefined,
          (e: unknown) => e
        );

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ stage: "validate" });
      expect(sendRawTransaction).not.toHaveBeenCalled();
    });

    test("rejects a malformed recipient", async () => {
      const executor = new TransactionExecutor({ client: stubClient() });

      await expect(
        executor.submit({ from: TEST_ADDRESS, to: "0x1234" }, account)
      ).rejects.toThrow("Invalid recipient address: 0x1234");
    });

    test("accepts a lowercase sender", async () => {
      const executor = new TransactionExecutor({ client: stubClient() });

      const lower: Address = "0xf39fd6e51aad88f6f4ce6ab8827279cfffb92266";
      const receipt = await executor.submit({ from: lower, to: RECIPIENT }, account);
      expect(receipt.status).toBe("success");
    });
  });

  describe("stage failures", () => {
    const intent = { from: TEST_ADDRESS, to: RECIPIENT, value: 1n };

    test("estimation failure", async () => {
      const sendRawTransaction = vi.fn(async (serialized: HexString) => keccak256(serialized));
      const executor = new TransactionExecutor({
        client: stubClient({
          estimateGas: async () => {
            throw new Error("execution reverted");
          },
          sendRawTransaction,
        }),
      });

      const handle = executor.submit(intent, account);
      await expect(handle).rejects.toThrow(EstimationError);
      await expect(handle).rejects.toThrow("Gas estimation failed: execution reverted");
      await expect(handle).rejects.toMatchObject({ stage: "estimate" });
      expect(sendRawTransaction).not.toHaveBeenCalled();
      expect(handle.status).toBe("failed");
    });

    test("pricing failure", async () => {
      const executor = new TransactionExecutor({
        client: stubClient({
          suggestGasPrice: async () => {
            throw new Error("method not supported");
          },
        }),
      });

      await expect(executor.submit(intent, account)).rejects.toBeInstanceOf(PricingError);
    });

    test("nonce failure", async () => {
      const executor = new TransactionExecutor({
        client: stubClient({
          getTransactionCount: async () => {
            throw new Error("header not found");
          },
        }),
      });

      await expect(executor.submit(intent, account)).rejects.toBeInstanceOf(NonceError);
    });

    test("chain ID failure", async () => {
      const executor = new TransactionExecutor({
        client: stubClient({
          getChainId: async () => {
            throw new Error("method not found");
          },
        }),
      });

      const handle = executor.submit(intent, account);
      await expect(handle).rejects.toBeInstanceOf(ChainIdError);
      await expect(handle).rejects.toMatchObject({
        stage: "chainId",
        message: "Chain ID lookup failed: method not found",
      });
    });

    test("signing failure", async () => {
      const signer: Signer = {
        address: TEST_ADDRESS,
        sign: async () => {
          throw new Error("device locked");
        },
      };
      const executor = new TransactionExecutor({ client: stubClient() });

      const handle = executor.submit(intent, signer);
      await expect(handle).rejects.toBeInstanceOf(SigningError);
      await expect(handle).rejects.toThrow("Signing failed: device locked");
    });

    test("node rejection carries reason, kind and hash", async () => {
      const executor = new TransactionExecutor({
        client: stubClient({
          sendRawTransaction: async () => {
            throw new Error("insufficient funds for gas * price + value");
          },
        }),
      });
      const expected = await account.sign(
        await executor.populate({ from: TEST_ADDRESS, to: RECIPIENT, value: 1n })
      );

      const handle = executor.submit(intent, account);
      const error = await handle.then(
        () => undefined,
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(SubmissionRejected);
      expect(error).toMatchObject({
        stage: "submit",
        reason: "insufficient funds for gas * price + value",
        kind: "insufficient_funds",
        txHash: expected.hash,
        message: "Transaction rejected by node: insufficient funds for gas * price + value",
      });
      expect(handle.hash).toBeUndefined();
    });

    test("missing receipt", async () => {
      const executor = new TransactionExecutor({
        client: stubClient({
          waitForReceipt: async () => {
            throw new Error("not found");
          },
        }),
      });

      const handle = executor.submit(intent, account);
      const error = await handle.then(
        () => undefined,
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(ConfirmationFailed);
      expect(error).toMatchObject({ reason: "dropped", stage: "confirm", txHash: handle.hash });
      expect(handle.hash).toMatch(/^0x[0-9a-f]{64}$/);
    });

    test("reverted transaction", async () => {
      const executor = new TransactionExecutor({
        client: stubClient({
          waitForReceipt: async (hash) => receiptFor(hash, "reverted"),
        }),
      });

      const handle = executor.submit(intent, account);
      const error = await handle.then(
        () => undefined,
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(ConfirmationFailed);
      expect(error).toMatchObject({ reason: "reverted" });
      if (error instanceof ConfirmationFailed) {
        expect(error.receipt?.status).toBe("reverted");
        expect(error.message).toBe(`Transaction ${handle.hash} reverted in block 7`);
      }
    });

    test("transport failure keeps its class and gains the stage", async () => {
      const executor = new TransactionExecutor({
        client: stubClient({
          getTransactionCount: async () => {
            throw new TransportError("RPC transport failure: ECONNREFUSED");
          },
        }),
      });

      const error = await executor.submit(intent, account).then(
        () => undefined,
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({
        stage: "nonce",
        message: "RPC transport failure: ECONNREFUSED",
      });
    });

    test("SDK errors from the client pass through unchanged", async () => {
      const timeout = new ConfirmationFailed("timeout", "Timed out waiting");
      const executor = new TransactionExecutor({
        client: stubClient({
          waitForReceipt: async () => {
            throw timeout;
          },
        }),
      });

      await expect(executor.submit(intent, account)).rejects.toBe(timeout);
    });
  });

  describe("pending transaction", () => {
    test("resolves once", async () => {
      const sendRawTransaction = vi.fn(async (serialized: HexString) => keccak256(serialized));
      const executor = new TransactionExecutor({ client: stubClient({ sendRawTransaction }) });

      const handle = executor.submit({ from: TEST_ADDRESS, to: RECIPIENT }, account);
      const first = await handle;
      const second = await handle.wait();

      expect(second).toBe(first);
      expect(sendRawTransaction).toHaveBeenCalledTimes(1);
      expect(handle.status).toBe("confirmed");
    });

    test("freezes the submitted intent", () => {
      const executor = new TransactionExecutor({ client: stubClient() });
      const handle = executor.submit({ from: TEST_ADDRESS, to: RECIPIENT }, account);

      expect(Object.isFrozen(handle.intent)).toBe(true);
      expect(handle.status).toBe("pending");
    });

    test("a dropped failing handle settles quietly", async () => {
      const executor = new TransactionExecutor({
        client: stubClient({
          estimateGas: async () => {
            throw new Error("execution reverted");
          },
        }),
      });

      const handle = executor.submit({ from: TEST_ADDRESS, to: RECIPIENT }, account);
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(handle.status).toBe("failed");
    });
  });

  test("reports progress", async () => {
    const messages: string[] = [];
    const executor = new TransactionExecutor({
      client: stubClient(),
      progressCallback: (message) => messages.push(message),
    });

    const handle = executor.submit({ from: TEST_ADDRESS, to: RECIPIENT, value: ONE_ETHER }, account);
    await handle;

    expect(messages).toEqual([
      "Signed 1 ETH 0xf39F...2266 → 0x0000...0002 (nonce 4, gas 21000, gasPrice 5)",
      `Submitted ${handle.hash}`,
      `✓ Confirmed: ${handle.hash} (block 7)`,
    ]);
  });
});
