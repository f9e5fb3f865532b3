/**
 * Hex helper tests
 */

import { describe, expect, test } from "vitest";
import { ConfigurationError } from "../errors/errors.js";
import { decodeHexBytes, normalizeHexBytes, shortenAddress, toAddress } from "./hex.js";

describe("decodeHexBytes", () => {
  test("decodes with and without prefix", () => {
    expect(decodeHexBytes("0xabc123")).toEqual(new Uint8Array([0xab, 0xc1, 0x23]));
    expect(decodeHexBytes("ABC123")).toEqual(new Uint8Array([0xab, 0xc1, 0x23]));
  });

  test("decodes empty input", () => {
    expect(decodeHexBytes("0x")).toEqual(new Uint8Array([]));
  });

  test("rejects odd length", () => {
    expect(() => decodeHexBytes("0xabc")).toThrow(
      "Invalid hex value: odd number of hex digits (3)"
    );
  });

  test("rejects non-hex characters", () => {
    expect(() => decodeHexBytes("0xzz", "signature")).toThrow(
      "Invalid signature: contains non-hex characters"
    );
  });
});

describe("normalizeHexBytes", () => {
  test("lowercases and prefixes", () => {
    expect(normalizeHexBytes("ABCD")).toBe("0xabcd");
    expect(normalizeHexBytes("0xAbCd")).toBe("0xabcd");
  });
});

describe("toAddress", () => {
  test("checksums a valid address", () => {
    expect(toAddress("0xf39fd6e51aad88f6f4ce6ab8827279cfffb92266")).toBe(
      "0xf39Fd6e51aad88F6F4ce6aB8827279cffFb92266"
    );
  });

  test("rejects malformed input", () => {
    expect(() => toAddress("nope", "recipient")).toThrow(ConfigurationError);
    expect(() => toAddress("nope", "recipient")).toThrow("Invalid recipient: nope");
  });
});

describe("shortenAddress", () => {
  test("keeps the first six and last four characters", () => {
    expect(shortenAddress("0xf39Fd6e51aad88F6F4ce6aB8827279cffFb92266")).toBe("0xf39F...2266");
  });
});
