/**
 * Token counting utilities using tiktoken
 *
 * Uses the cl100k_base encoding as an approximation of the service's own
 * tokenizer. Good enough for budget checks, not for billing.
 */

import { get_encoding, type Tiktoken } from "tiktoken";

let encoder: Tiktoken | null = null;

function getEncoder(): Tiktoken {
  if (!encoder) {
    encoder = get_encoding("cl100k_base");
  }
  return encoder;
}

/**
 * Count tokens in a string. Special-token markers such as `<|endoftext|>` are
 * ordinary text in a Lean file, so none are disallowed.
 */
export function countTokens(text: string): number {
  if (text.length === 0) return 0;
  return getEncoder().encode(text, "all").length;
}

export type TokenCounter = (text: string) => number;

/**
 * Free the encoder when done
 */
export function releaseEncoder(): void {
  if (encoder) {
    encoder.free();
    encoder = null;
  }
}
