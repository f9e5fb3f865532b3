/**
 * Native currency unit conversion
 *
 * 1 ether = 10^18 wei. All arithmetic is done on bigint; wei values are
 * never routed through floating point.
 */

import { formatEther, parseEther } from "viem";
import { ConfigurationError } from "../errors/errors.js";
import type { Wei } from "../types/primitives.js";

export const WEI_PER_ETHER = 10n ** 18n;

const DECIMAL_PATTERN = /^\d+(?:\.\d*)?$|^\.\d+$/;

/**
 * Format wei as an exact decimal ether string ("1.5", "0.000000001")
 */
export function weiToEther(wei: Wei): string {
  if (wei < 0n) {
    throw new ConfigurationError(`Wei amount must not be negative: ${wei}`);
  }
  return formatEther(wei);
}

/**
 * Parse an ether amount into wei.
 *
 * Accepts a decimal string or a number. Digits past the 18th decimal place
 * are rounded half-up at the 18th place. Numbers that only have an exponent
 * representation (1e-7) are rejected; pass a decimal string instead.
 */
export function etherToWei(ether: string | number): Wei {
  let text: string;

  if (typeof ether === "number") {
    if (!Number.isFinite(ether)) {
      throw new ConfigurationError(`Ether amount must be finite: ${ether}`);
    }
    if (Number.isSafeInteger(ether) && ether >= 0) {
      return BigInt(ether) * WEI_PER_ETHER;
    }
    text = String(ether);
  } else {
    text = ether.trim();
  }

  if (!DECIMAL_PATTERN.test(text)) {
    throw new ConfigurationError(
      `Invalid ether amount '${text}': expected a non-negative decimal number`
    );
  }

  return parseEther(text);
}
