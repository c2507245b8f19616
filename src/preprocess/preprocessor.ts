/**
 * @module preprocess/preprocessor
 * @fileoverview Turn raw document text into LLM-ready section chunks.
 *
 * ```
 *   { url, text } ──cleanMarkdown──> extractSections ──> per section:
 *        join lines with " " ──packWords──> chunk 1..n
 *            └──> { id: "<url>#chunk-<n>", url, title: heading, text, tokens }
 * ```
 *
 * Chunk numbers restart at 1 in every section, so two sections of one
 * document both produce `<url>#chunk-1`. Ids are labels here, not keys; the
 * graph keys chunks by content hash.
 */

import type { ChunkOverflowMode } from "../config.js";
import {
  PreprocessInputSchema,
  type LlmReadyRecord,
  type PreprocessInput,
} from "../records.js";
import type { Tokenizer } from "../text/tokenizer.js";
import {
  appendJsonl,
  isNotFoundError,
  readJsonl,
  resetJsonl,
} from "../utils/jsonl.js";
import { packWords } from "./chunker.js";
import { cleanMarkdown, extractSections } from "./markdown-cleaner.js";

export interface PreprocessOptions {
  maxTokens: number;
  overflow: ChunkOverflowMode;
  tokenizer: Tokenizer;
}

/**
 * Preprocess one record. Records without a `url` or with empty `text` yield
 * nothing.
 */
export function preprocessRecord(
  record: PreprocessInput,
  options: PreprocessOptions,
): LlmReadyRecord[] {
  const { url, text } = record;
  if (!url || !text) {
    return [];
  }

  const output: LlmReadyRecord[] = [];
  for (const section of extractSections(cleanMarkdown(text))) {
    const chunks = packWords(
      section.lines.join(" "),
      options.maxTokens,
      options.tokenizer,
      options.overflow,
    );
    chunks.forEach((chunk, index) => {
      output.push({
        id: `${url}#chunk-${index + 1}`,
        url,
        title: section.heading,
        text: chunk,
        tokens: options.tokenizer.countTokens(chunk),
      });
    });
  }
  return output;
}

/** Preprocess many records, preserving record order. */
export function preprocessRecords(
  records: readonly PreprocessInput[],
  options: PreprocessOptions,
): LlmReadyRecord[] {
  return records.flatMap((record) => preprocessRecord(record, options));
}

/* ────────────────────────────────────────────────────────────────────────────
 * File Runner
 * ──────────────────────────────────────────────────────────────────────────── */

export interface PreprocessFileOptions extends PreprocessOptions {
  inputFile: string;
  outputFile: string;
}

export interface PreprocessSummary {
  documents: number;
  chunks: number;
  invalidLines: number;
}

/**
 * Read a raw-text JSON-lines file and write the LLM-ready file. The output
 * is rewritten from scratch. Unparsable lines are logged and skipped; a
 * missing input file is logged and leaves the output untouched.
 */
export async function preprocessFile(
  options: PreprocessFileOptions,
): Promise<PreprocessSummary> {
  const summary: PreprocessSummary = { documents: 0, chunks: 0, invalidLines: 0 };

  let records: PreprocessInput[];
  try {
    records = await readJsonl(options.inputFile, PreprocessInputSchema, {
      onInvalid: (error) => {
        summary.invalidLines++;
        console.error(`[preprocessor] WARNING: Error processing line: ${error.message}`);
      },
    });
  } catch (error: unknown) {
    if (isNotFoundError(error)) {
      console.error(`[preprocessor] WARNING: ${options.inputFile} not found. Nothing to do.`);
      return summary;
    }
    throw error;
  }

  await resetJsonl(options.outputFile);
  for (const record of records) {
    const chunks = preprocessRecord(record, options);
    if (chunks.length > 0) {
      summary.documents++;
    }
    for (const chunk of chunks) {
      await appendJsonl(options.outputFile, chunk);
      summary.chunks++;
    }
  }

  console.error(
    `[preprocessor] ${summary.chunks} chunks from ${summary.documents} documents -> ${options.outputFile}`,
  );
  return summary;
}
