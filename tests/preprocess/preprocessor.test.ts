/**
 * @fileoverview Tests for the preprocessing stage.
 *
 * Counts use the whitespace tokenizer: one token per word.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  preprocessFile,
  preprocessRecord,
  preprocessRecords,
  type PreprocessOptions,
} from "../../src/preprocess/preprocessor.js";
import { LlmReadyRecordSchema } from "../../src/records.js";
import { readJsonl } from "../../src/utils/jsonl.js";
import { WhitespaceTokenizer } from "../fakes/whitespace-tokenizer.js";

const options: PreprocessOptions = {
  maxTokens: 3,
  overflow: "strict",
  tokenizer: new WhitespaceTokenizer(),
};

const DOC_URL = "https://a.com/doc.pdf";
const DOC_TEXT = [
  "Intro line one",
  "",
  "## Setup",
  "Run [the script](https://a.com/s.sh) now.",
  "Second line here",
].join("\n");

// ---------------------------------------------------------------------------
// preprocessRecord
// ---------------------------------------------------------------------------

describe("preprocessRecord", () => {
  it("chunks each section with ids numbered per section", () => {
    expect(preprocessRecord({ url: DOC_URL, text: DOC_TEXT }, options)).toEqual([
      { id: `${DOC_URL}#chunk-1`, url: DOC_URL, title: "General", text: "Intro line one", tokens: 3 },
      { id: `${DOC_URL}#chunk-1`, url: DOC_URL, title: "Setup", text: "Run the script", tokens: 3 },
      { id: `${DOC_URL}#chunk-2`, url: DOC_URL, title: "Setup", text: "now. Second line", tokens: 3 },
      { id: `${DOC_URL}#chunk-3`, url: DOC_URL, title: "Setup", text: "here", tokens: 1 },
    ]);
  });

  it("skips records without a url", () => {
    expect(preprocessRecord({ text: "some text" }, options)).toEqual([]);
  });

  it("skips records with empty text", () => {
    expect(preprocessRecord({ url: DOC_URL, text: "" }, options)).toEqual([]);
  });

  it("skips records whose url or text is null", () => {
    expect(preprocessRecord({ url: null, text: "some text" }, options)).toEqual([]);
    expect(preprocessRecord({ url: DOC_URL, text: null }, options)).toEqual([]);
  });
});

describe("preprocessRecords", () => {
  it("keeps record order", () => {
    const chunks = preprocessRecords(
      [
        { url: "https://a.com/1", text: "first" },
        { url: "https://a.com/2", text: "second" },
      ],
      options,
    );
    expect(chunks.map((chunk) => chunk.id)).toEqual([
      "https://a.com/1#chunk-1",
      "https://a.com/2#chunk-1",
    ]);
  });
});

// ---------------------------------------------------------------------------
// preprocessFile
// ---------------------------------------------------------------------------

describe("preprocessFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "preprocess-test-"));
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes chunks and counts documents, skipping bad lines", async () => {
    const inputFile = path.join(dir, "raw_text.jsonl");
    const outputFile = path.join(dir, "llm_ready.jsonl");
    await fs.writeFile(
      inputFile,
      [
        JSON.stringify({ id: "1", url: DOC_URL, title: "doc.pdf", text: DOC_TEXT, tokens: 14 }),
        JSON.stringify({ id: "2", text: "no url" }),
        "not json",
        JSON.stringify({ id: "3", url: "https://a.com/empty.pdf", text: "" }),
      ].join("\n"),
    );
    await fs.writeFile(outputFile, '{"stale":true}\n');

    const summary = await preprocessFile({ ...options, inputFile, outputFile });

    expect(summary).toEqual({ documents: 1, chunks: 4, invalidLines: 1 });
    const written = await readJsonl(outputFile, LlmReadyRecordSchema);
    expect(written.map((record) => record.text)).toEqual([
      "Intro line one",
      "Run the script",
      "now. Second line",
      "here",
    ]);
  });

  it("skips null url or text silently and ignores unread fields", async () => {
    const inputFile = path.join(dir, "raw_text.jsonl");
    const outputFile = path.join(dir, "llm_ready.jsonl");
    await fs.writeFile(
      inputFile,
      [
        JSON.stringify({ id: "1", url: null, title: "x", text: "orphan text" }),
        JSON.stringify({ id: "2", url: "https://a.com/y.pdf", title: "y", text: null }),
        JSON.stringify({ id: 7, url: "https://a.com/x.pdf", title: 3, text: "real text" }),
      ].join("\n"),
    );

    const summary = await preprocessFile({ ...options, inputFile, outputFile });

    expect(summary).toEqual({ documents: 1, chunks: 1, invalidLines: 0 });
    expect(await readJsonl(outputFile, LlmReadyRecordSchema)).toEqual([
      {
        id: "https://a.com/x.pdf#chunk-1",
        url: "https://a.com/x.pdf",
        title: "General",
        text: "real text",
        tokens: 2,
      },
    ]);
  });

  it("returns an empty summary when the input is missing", async () => {
    const outputFile = path.join(dir, "llm_ready.jsonl");

    const summary = await preprocessFile({
      ...options,
      inputFile: path.join(dir, "missing.jsonl"),
      outputFile,
    });

    expect(summary).toEqual({ documents: 0, chunks: 0, invalidLines: 0 });
    await expect(fs.access(outputFile)).rejects.toThrow();
  });
});
