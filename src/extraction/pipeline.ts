/**
 * @module extraction/pipeline
 * @fileoverview Document ingestion: token windows → LLM extraction → graph.
 *
 * ## ingestDocument
 * ```
 *   text ──splitTextByTokens(size, overlap)──> chunk_0 .. chunk_{n-1}
 *                                                 │
 *              model.extract(chunk_i) for all i, launched together
 *                                                 │
 *                              Promise.allSettled (barrier)
 *                                                 │
 *               any rejection or schema mismatch ─┼─> ExtractionError
 *                                                 v
 *      ChunkExtraction { chunkId: md5(chunk), chunkText, index, facts }
 *                                                 │
 *            store.importDocument ──> store.linkChunkSequence
 * ```
 *
 * A document is all-or-nothing up to the graph write: nothing is written
 * unless every chunk's extraction succeeded.
 *
 * ## ingestJsonl
 * Records are processed strictly one after another. A record that fails is
 * logged and counted; the run continues with the next record.
 */

import { IngestionRecordSchema } from "../records.js";
import type { ChunkExtraction, GraphStore } from "../graph/graph-store.js";
import { splitTextByTokens, type TokenSplitOptions } from "../text/token-splitter.js";
import type { Tokenizer } from "../text/tokenizer.js";
import { ExtractionError, formatError } from "../utils/errors.js";
import { atomicFactId, chunkId } from "../utils/hash.js";
import { readJsonl } from "../utils/jsonl.js";
import type { ExtractionModel } from "./model.js";
import { ExtractionSchema, type Extraction } from "./schema.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

export type IngestOptions = Partial<TokenSplitOptions>;

export interface DocumentIngestSummary {
  documentName: string;
  chunks: number;
  atomicFacts: number;
  elapsedMs: number;
}

export interface JsonlIngestSummary {
  processed: number;
  failed: number;
  invalidLines: number;
}

export interface IngestionPipelineOptions {
  model: ExtractionModel;
  store: GraphStore;
  tokenizer: Tokenizer;
  /** Window size and overlap used when a call does not override them. */
  defaults: TokenSplitOptions;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Result Assembly
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Attach content-hash ids and chunk position to a validated extraction.
 * Empty key-element strings are dropped.
 */
export function toChunkExtraction(
  chunkText: string,
  index: number,
  extraction: Extraction,
): ChunkExtraction {
  return {
    chunkId: chunkId(chunkText),
    chunkText,
    index,
    atomicFacts: extraction.atomic_facts.map((fact) => ({
      id: atomicFactId(fact.atomic_fact),
      text: fact.atomic_fact,
      keyElements: fact.key_elements.filter((element) => element.length > 0),
    })),
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Pipeline
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Extraction and ingestion over an {@link ExtractionModel} and a
 * {@link GraphStore}.
 *
 * @example
 * ```ts
 * const pipeline = new IngestionPipeline({ model, store, tokenizer, defaults: { chunkSize: 2000, chunkOverlap: 200 } });
 * await pipeline.ingestDocument("Alice met Bob in Paris.", "doc-1");
 * ```
 */
export class IngestionPipeline {
  private readonly model: ExtractionModel;
  private readonly store: GraphStore;
  private readonly tokenizer: Tokenizer;
  private readonly defaults: TokenSplitOptions;

  constructor(options: IngestionPipelineOptions) {
    this.model = options.model;
    this.store = options.store;
    this.tokenizer = options.tokenizer;
    this.defaults = options.defaults;
  }

  /**
   * Extract and merge one document.
   *
   * @throws {RangeError} If the window options are invalid (before any model call).
   * @throws {ExtractionError} If any chunk's extraction fails; the graph is
   *   not written.
   */
  async ingestDocument(
    text: string,
    documentName: string,
    options: IngestOptions = {},
  ): Promise<DocumentIngestSummary> {
    const started = Date.now();
    const split: TokenSplitOptions = {
      chunkSize: options.chunkSize ?? this.defaults.chunkSize,
      chunkOverlap: options.chunkOverlap ?? this.defaults.chunkOverlap,
    };
    const chunks = splitTextByTokens(text, split, this.tokenizer);
    console.error(`[extraction] ${documentName}: ${chunks.length} chunks`);

    const extractions = await this.extractAll(chunks, documentName);
    console.error(
      `[extraction] ${documentName}: LLM extraction finished after ${Date.now() - started}ms`,
    );

    await this.store.importDocument(documentName, extractions);
    await this.store.linkChunkSequence(documentName);

    const elapsedMs = Date.now() - started;
    console.error(`[extraction] ${documentName}: import finished after ${elapsedMs}ms`);

    return {
      documentName,
      chunks: extractions.length,
      atomicFacts: extractions.reduce((sum, chunk) => sum + chunk.atomicFacts.length, 0),
      elapsedMs,
    };
  }

  /**
   * Ingest every record of a JSON-lines file, one at a time.
   *
   * Lines that are not JSON or lack a string `id` and `text` are logged and
   * skipped. A record whose ingestion fails is logged and counted.
   *
   * @throws The `fs` error when the file cannot be read.
   */
  async ingestJsonl(filePath: string, options: IngestOptions = {}): Promise<JsonlIngestSummary> {
    const summary: JsonlIngestSummary = { processed: 0, failed: 0, invalidLines: 0 };

    const records = await readJsonl(filePath, IngestionRecordSchema, {
      onInvalid: (error) => {
        summary.invalidLines++;
        console.error(`[extraction] Failed to process line: ${error.message}`);
      },
    });

    for (const record of records) {
      try {
        await this.ingestDocument(record.text, record.id, options);
        summary.processed++;
        console.error(`[extraction] Processed: ${record.id}`);
      } catch (error: unknown) {
        summary.failed++;
        console.error(`[extraction] Failed to process ${record.id}: ${formatError(error)}`);
      }
    }

    return summary;
  }

  /** Remove the whole graph. */
  async deleteGraph(): Promise<void> {
    await this.store.deleteAll();
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  /* ── Internals ────────────────────────────────────────────────────────── */

  private async extractAll(
    chunks: readonly string[],
    documentName: string,
  ): Promise<ChunkExtraction[]> {
    const settled = await Promise.allSettled(
      chunks.map((chunk) => this.model.extract(chunk)),
    );

    const extractions: ChunkExtraction[] = [];
    const failures: Array<{ index: number; reason: unknown }> = [];

    settled.forEach((result, index) => {
      const chunkText = chunks[index] ?? "";
      if (result.status === "rejected") {
        failures.push({ index, reason: result.reason });
        return;
      }
      const parsed = ExtractionSchema.safeParse(result.value);
      if (!parsed.success) {
        failures.push({
          index,
          reason: new Error(`Invalid extraction output: ${parsed.error.message}`),
        });
        return;
      }
      extractions.push(toChunkExtraction(chunkText, index, parsed.data));
    });

    const first = failures[0];
    if (first) {
      throw new ExtractionError(
        `${failures.length} of ${chunks.length} chunk extractions failed for "${documentName}"; ` +
          `first at chunk ${first.index}: ${formatError(first.reason)}`,
        first.index,
        { cause: first.reason },
      );
    }

    return extractions;
  }
}
