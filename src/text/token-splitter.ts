/**
 * @module text/token-splitter
 * @fileoverview Split text into overlapping windows of tokens.
 *
 * The extraction pipeline sends one window per LLM call. Windows are taken
 * over the encoded token sequence and decoded back to text:
 *
 * ```
 *   tokens:   [0 ........................................ n)
 *   window 0: [0, size)
 *   window 1:         [size - overlap, 2*size - overlap)
 *   window 2:                  [2*(size - overlap), ...)
 * ```
 *
 * The last window is the first one that reaches the end of the sequence, so
 * no window is a strict suffix of its predecessor.
 */

import type { Tokenizer } from "./tokenizer.js";

export interface TokenSplitOptions {
  /** Tokens per window. Must be positive. */
  chunkSize: number;

  /** Tokens shared by consecutive windows. Must be in [0, chunkSize). */
  chunkOverlap: number;
}

/**
 * Validate window parameters.
 *
 * @throws {RangeError} If `chunkSize < 1`, `chunkOverlap < 0` or
 *   `chunkOverlap >= chunkSize`.
 */
export function assertSplitOptions({ chunkSize, chunkOverlap }: TokenSplitOptions): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new RangeError(`chunkOverlap must be a non-negative integer, got ${chunkOverlap}`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new RangeError(
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`,
    );
  }
}

/**
 * Split `text` into windows of at most `chunkSize` tokens, consecutive
 * windows sharing `chunkOverlap` tokens. Empty text yields no windows.
 *
 * @example
 * ```ts
 * // With a tokenizer that treats each word as one token:
 * splitTextByTokens("a b c d e", { chunkSize: 3, chunkOverlap: 1 }, words);
 * // => ["a b c", "c d e"]
 * ```
 */
export function splitTextByTokens(
  text: string,
  options: TokenSplitOptions,
  tokenizer: Tokenizer,
): string[] {
  assertSplitOptions(options);
  const { chunkSize, chunkOverlap } = options;

  const tokens = tokenizer.encode(text);
  const chunks: string[] = [];
  const step = chunkSize - chunkOverlap;

  for (let start = 0; start < tokens.length; start += step) {
    const end = Math.min(start + chunkSize, tokens.length);
    chunks.push(tokenizer.decode(tokens.slice(start, end)));
    if (end === tokens.length) {
      break;
    }
  }

  return chunks;
}
