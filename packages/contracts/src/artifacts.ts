/**
 * Contract artifacts
 *
 * Each contract ships as `<name>.abi.json`; deployable contracts also need
 * `<name>.bin` holding the creation bytecode as hex text.
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  ConfigurationError,
  type HexString,
  errorMessage,
  normalizeHexBytes,
} from "@jasmine-eth/core";
import type { Abi } from "viem";

export type ContractName = "TFCToken" | "TFCManager";

/** Directory holding the artifacts shipped with this package */
export const DEFAULT_ARTIFACTS_DIR = join(
  dirname(fileURLToPath(import.meta.url)),
  "..",
  "artifacts"
);

const ABI_ENTRY_TYPES = new Set([
  "function",
  "constructor",
  "event",
  "error",
  "fallback",
  "receive",
]);

const abiCache = new Map<string, Abi>();

/**
 * Check that a parsed JSON value has the shape of a contract ABI
 */
export function isAbi(value: unknown): value is Abi {
  return (
    Array.isArray(value) &&
    value.every(
      (entry: unknown) =>
        typeof entry === "object" &&
        entry !== null &&
        "type" in entry &&
        typeof entry.type === "string" &&
        ABI_ENTRY_TYPES.has(entry.type)
    )
  );
}

/**
 * Load a contract ABI
 */
export function loadAbi(name: ContractName, dir: string = DEFAULT_ARTIFACTS_DIR): Abi {
  const path = join(dir, `${name}.abi.json`);
  const cached = abiCache.get(path);
  if (cached) {
    return cached;
  }

  const text = readArtifactFile(path, `${name} ABI`);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Malformed ${name} ABI in ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  if (!isAbi(parsed)) {
    throw new ConfigurationError(`Malformed ${name} ABI in ${path}`);
  }

  abiCache.set(path, parsed);
  return parsed;
}

/**
 * Load a contract's creation bytecode
 */
export function loadBytecode(name: ContractName, dir: string = DEFAULT_ARTIFACTS_DIR): HexString {
  const path = join(dir, `${name}.bin`);
  const text = readArtifactFile(path, `${name} bytecode`).trim();

  if (text === "" || text === "0x") {
    throw new ConfigurationError(`${name} bytecode in ${path} is empty`);
  }
  return normalizeHexBytes(text, `${name} bytecode`);
}

function readArtifactFile(path: string, label: string): string {
  try {
    return readFileSync(path, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${label} from ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
