/**
 * @fileoverview Tests for overlapping token windows.
 *
 * Uses the whitespace tokenizer so one word is one token.
 */

import { describe, it, expect } from "vitest";
import { assertSplitOptions, splitTextByTokens } from "../../src/text/token-splitter.js";
import { WhitespaceTokenizer } from "../fakes/whitespace-tokenizer.js";

const words = new WhitespaceTokenizer();

describe("splitTextByTokens", () => {
  it("returns a single window when the text fits", () => {
    expect(splitTextByTokens("a b c", { chunkSize: 5, chunkOverlap: 1 }, words)).toEqual([
      "a b c",
    ]);
  });

  it("shares chunkOverlap tokens between consecutive windows", () => {
    expect(splitTextByTokens("a b c d e", { chunkSize: 3, chunkOverlap: 1 }, words)).toEqual([
      "a b c",
      "c d e",
    ]);
  });

  it("stops at the first window that reaches the end", () => {
    expect(
      splitTextByTokens("a b c d e f g", { chunkSize: 4, chunkOverlap: 2 }, words),
    ).toEqual(["a b c d", "c d e f", "e f g"]);
  });

  it("produces disjoint windows with zero overlap", () => {
    expect(splitTextByTokens("a b c d e", { chunkSize: 2, chunkOverlap: 0 }, words)).toEqual([
      "a b",
      "c d",
      "e",
    ]);
  });

  it("yields no windows for empty text", () => {
    expect(splitTextByTokens("", { chunkSize: 3, chunkOverlap: 1 }, words)).toEqual([]);
  });
});

describe("assertSplitOptions", () => {
  it("accepts a valid configuration", () => {
    expect(() => assertSplitOptions({ chunkSize: 2000, chunkOverlap: 200 })).not.toThrow();
  });

  it.each([
    [{ chunkSize: 0, chunkOverlap: 0 }, "chunkSize must be a positive integer, got 0"],
    [{ chunkSize: 1.5, chunkOverlap: 0 }, "chunkSize must be a positive integer, got 1.5"],
    [{ chunkSize: 10, chunkOverlap: -1 }, "chunkOverlap must be a non-negative integer, got -1"],
    [{ chunkSize: 10, chunkOverlap: 10 }, "chunkOverlap (10) must be smaller than chunkSize (10)"],
  ])("rejects %o", (options, message) => {
    expect(() => assertSplitOptions(options)).toThrow(new RangeError(message));
  });
});
