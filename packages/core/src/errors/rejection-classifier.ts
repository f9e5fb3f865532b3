/**
 * Rejection Classifier
 * Maps node rejection messages to typed RejectionKind values
 */

import type { RejectionKind } from "./errors.js";

const REJECTION_PATTERNS: Array<[RegExp, RejectionKind]> = [
  [/insufficient.*funds/i, "insufficient_funds"],
  [/nonce.*too.*low/i, "nonce_too_low"],
  [/(?:underpriced|fee.*too.*low|max fee per gas less than)/i, "underpriced"],
  [/(?:already known|known transaction)/i, "already_known"],
  [/(?:intrinsic gas too low|exceeds block gas limit|gas limit reached)/i, "gas_limit"],
];

/**
 * Classify a rejection reason reported by the node.
 * Returns "unknown" if no pattern matches.
 */
export function classifyRejection(reason: string): RejectionKind {
  for (const [pattern, kind] of REJECTION_PATTERNS) {
    if (pattern.test(reason)) {
      return kind;
    }
  }
  return "unknown";
}
