/**
 * @module tools/ingest
 * @fileoverview MCP Tools: ingest_document, ingest_jsonl, delete_graph.
 *
 * Each ingest call builds a pipeline from {@link config}, runs one operation
 * and closes the Neo4j driver. Missing OpenAI or Neo4j credentials fail the
 * call before any work starts. `delete_graph` needs the Neo4j credentials
 * only.
 */

import { z } from "zod";
import { config } from "../config.js";
import { createGraphStore, createIngestionPipeline } from "../extraction/factory.js";
import type { IngestionPipeline } from "../extraction/pipeline.js";
import type { GraphStore } from "../graph/graph-store.js";
import { errorResult, textResult, type ToolResult } from "./response.js";

const chunkSize = z
  .number()
  .int()
  .min(1)
  .optional()
  .describe(`Tokens per extraction window (default: ${config.chunkSize})`);

const chunkOverlap = z
  .number()
  .int()
  .min(0)
  .optional()
  .describe(`Tokens shared by consecutive windows (default: ${config.chunkOverlap})`);

async function withPipeline(
  run: (pipeline: IngestionPipeline) => Promise<string>,
): Promise<ToolResult> {
  let pipeline: IngestionPipeline | undefined;
  try {
    pipeline = await createIngestionPipeline(config);
    return textResult(await run(pipeline));
  } catch (error) {
    return errorResult(error);
  } finally {
    await pipeline?.close();
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * ingest_document
 * ──────────────────────────────────────────────────────────────────────────── */

export const IngestDocumentSchema = {
  text: z.string().describe("Document text to extract atomic facts from"),
  document_name: z.string().min(1).describe("Id of the Document node"),
  chunk_size: chunkSize,
  chunk_overlap: chunkOverlap,
};

interface IngestDocumentParams {
  text: string;
  document_name: string;
  chunk_size?: number;
  chunk_overlap?: number;
}

export async function handleIngestDocument(params: IngestDocumentParams): Promise<ToolResult> {
  return withPipeline(async (pipeline) => {
    const summary = await pipeline.ingestDocument(params.text, params.document_name, {
      chunkSize: params.chunk_size,
      chunkOverlap: params.chunk_overlap,
    });
    return [
      `# Ingested ${summary.documentName}`,
      `> Chunks: ${summary.chunks}`,
      `> Atomic facts: ${summary.atomicFacts}`,
      `> Elapsed: ${summary.elapsedMs}ms`,
    ].join("\n");
  });
}

/* ────────────────────────────────────────────────────────────────────────────
 * ingest_jsonl
 * ──────────────────────────────────────────────────────────────────────────── */

export const IngestJsonlSchema = {
  file_path: z
    .string()
    .optional()
    .describe(`JSON-lines file of { id, text } records (default: ${config.llmReadyFile})`),
  chunk_size: chunkSize,
  chunk_overlap: chunkOverlap,
};

interface IngestJsonlParams {
  file_path?: string;
  chunk_size?: number;
  chunk_overlap?: number;
}

export async function handleIngestJsonl(params: IngestJsonlParams): Promise<ToolResult> {
  const filePath = params.file_path ?? config.llmReadyFile;
  return withPipeline(async (pipeline) => {
    const summary = await pipeline.ingestJsonl(filePath, {
      chunkSize: params.chunk_size,
      chunkOverlap: params.chunk_overlap,
    });
    return [
      `# Ingested ${filePath}`,
      `> Documents processed: ${summary.processed}`,
      `> Documents failed: ${summary.failed}`,
      `> Invalid lines: ${summary.invalidLines}`,
    ].join("\n");
  });
}

/* ────────────────────────────────────────────────────────────────────────────
 * delete_graph
 * ──────────────────────────────────────────────────────────────────────────── */

export const DeleteGraphSchema = {
  confirm: z.literal(true).describe("Must be true: deletes every node and relationship"),
};

export async function handleDeleteGraph(): Promise<ToolResult> {
  let store: GraphStore | undefined;
  try {
    store = createGraphStore(config);
    await store.deleteAll();
    return textResult("Graph deleted successfully.");
  } catch (error) {
    return errorResult(error);
  } finally {
    await store?.close();
  }
}
