/**
 * @module preprocess/chunker
 * @fileoverview Greedy word packing under a token budget.
 *
 * Words are whitespace-separated and rejoined with single spaces. After each
 * word the candidate chunk is re-counted with the tokenizer, so the budget is
 * checked against the joined text, not a sum of per-word counts.
 */

import type { ChunkOverflowMode } from "../config.js";
import type { Tokenizer } from "../text/tokenizer.js";

/**
 * Pack the words of `text` into chunks of at most `maxTokens` tokens.
 *
 * `"strict"`: a chunk closes before the word that would push it past the
 * budget, or as soon as it reaches the budget exactly. A single word that is
 * over budget on its own becomes its own chunk.
 *
 * `"overshoot"`: each word is appended first; the chunk closes once it meets
 * or exceeds the budget, so a chunk may end one word over.
 *
 * @example
 * ```ts
 * // One token per word:
 * packWords("a b c d e", 2, words, "strict");    // => ["a b", "c d", "e"]
 * packWords("a b c d e", 2, words, "overshoot"); // => ["a b", "c d", "e"]
 * ```
 */
export function packWords(
  text: string,
  maxTokens: number,
  tokenizer: Tokenizer,
  overflow: ChunkOverflowMode = "strict",
): string[] {
  if (maxTokens < 1) {
    throw new RangeError(`maxTokens must be at least 1, got ${maxTokens}`);
  }

  const words = text.split(/\s+/).filter((word) => word.length > 0);
  return overflow === "strict"
    ? packStrict(words, maxTokens, tokenizer)
    : packOvershoot(words, maxTokens, tokenizer);
}

function packStrict(words: string[], maxTokens: number, tokenizer: Tokenizer): string[] {
  const chunks: string[] = [];
  let current: string[] = [];

  for (const word of words) {
    const candidate = [...current, word];
    const count = tokenizer.countTokens(candidate.join(" "));

    if (count > maxTokens) {
      if (current.length > 0) {
        chunks.push(current.join(" "));
      }
      if (tokenizer.countTokens(word) >= maxTokens) {
        chunks.push(word);
        current = [];
      } else {
        current = [word];
      }
    } else if (count === maxTokens) {
      chunks.push(candidate.join(" "));
      current = [];
    } else {
      current = candidate;
    }
  }

  if (current.length > 0) {
    chunks.push(current.join(" "));
  }
  return chunks;
}

function packOvershoot(words: string[], maxTokens: number, tokenizer: Tokenizer): string[] {
  const chunks: string[] = [];
  let current: string[] = [];

  for (const word of words) {
    current.push(word);
    if (tokenizer.countTokens(current.join(" ")) >= maxTokens) {
      chunks.push(current.join(" "));
      current = [];
    }
  }

  if (current.length > 0) {
    chunks.push(current.join(" "));
  }
  return chunks;
}
