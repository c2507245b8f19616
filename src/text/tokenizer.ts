/**
 * @module text/tokenizer
 * @fileoverview Exact BPE token counting with the `cl100k_base` encoding.
 *
 * Token counts recorded in the raw-text and LLM-ready files, the
 * preprocessor's chunk budget and the extraction splitter's windows all use
 * the same encoding, so a count written by one stage means the same thing to
 * the next.
 *
 * `js-tiktoken` is the pure-JavaScript port of tiktoken: no WASM or native
 * binding, so it loads anywhere Node does. The encoding is built once per
 * process on first use.
 *
 * ## Architecture Position
 * ```
 *   pdf/downloader ──┐
 *   preprocess/* ────┼──>  text/tokenizer  (this file)  ──> js-tiktoken
 *   text/token-splitter ─┘
 * ```
 */

import { getEncoding, type Tiktoken } from "js-tiktoken";

/**
 * Encoder/decoder pair plus a counting shortcut.
 *
 * Components take a `Tokenizer` rather than calling js-tiktoken directly so
 * tests can substitute a whitespace tokenizer with predictable counts.
 */
export interface Tokenizer {
  encode(text: string): number[];
  decode(tokens: readonly number[]): string;
  countTokens(text: string): number;
}

/** The `cl100k_base` encoding as a {@link Tokenizer}. */
export class TiktokenTokenizer implements Tokenizer {
  constructor(private readonly encoding: Tiktoken) {}

  encode(text: string): number[] {
    return this.encoding.encode(text);
  }

  decode(tokens: readonly number[]): string {
    return this.encoding.decode([...tokens]);
  }

  countTokens(text: string): number {
    if (!text) {
      return 0;
    }
    return this.encoding.encode(text).length;
  }
}

let shared: TiktokenTokenizer | undefined;

/**
 * Process-wide `cl100k_base` tokenizer.
 *
 * @example
 * ```ts
 * defaultTokenizer().countTokens("hello world"); // => 2
 * ```
 */
export function defaultTokenizer(): Tokenizer {
  shared ??= new TiktokenTokenizer(getEncoding("cl100k_base"));
  return shared;
}
