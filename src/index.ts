#!/usr/bin/env node
/**
 * @module index
 * @fileoverview crawl-graph MCP server entry point.
 *
 * Creates an {@link McpServer}, registers one tool per pipeline stage and
 * listens on stdio. Logs go to stderr; stdout carries the protocol.
 *
 * ## Available Tools
 * | Tool                 | Stage                                         | Module                     |
 * |----------------------|-----------------------------------------------|----------------------------|
 * | `crawl_pdfs`         | BFS crawl, record PDF links                   | `./tools/crawl-pdfs.js`    |
 * | `download_pdfs`      | download PDFs, extract text                   | `./tools/download-pdfs.js` |
 * | `preprocess_for_llm` | clean, section and chunk text                 | `./tools/preprocess.js`    |
 * | `ingest_document`    | extract atomic facts from one text, merge     | `./tools/ingest.js`        |
 * | `ingest_jsonl`       | ingest every record of a JSON-lines file      | `./tools/ingest.js`        |
 * | `delete_graph`       | wipe the graph                                | `./tools/ingest.js`        |
 *
 * ## Architecture
 * ```
 * MCP Client
 *   |
 *   | stdio (JSON-RPC over stdin/stdout)
 *   v
 * index.ts (this file) -- McpServer
 *   |
 *   +-- crawl_pdfs         --> crawler/bfs-crawler --> crawler/page-fetcher --> services/*
 *   +-- download_pdfs      --> pdf/downloader --> pdf/pdf-text
 *   +-- preprocess_for_llm --> preprocess/preprocessor
 *   +-- ingest_*           --> extraction/pipeline --> graph/neo4j-store
 *   +-- delete_graph       --> extraction/pipeline --> graph/neo4j-store
 * ```
 *
 * Configuration comes from environment variables; see {@link config}.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { CrawlPdfsSchema, handleCrawlPdfs } from "./tools/crawl-pdfs.js";
import { DownloadPdfsSchema, handleDownloadPdfs } from "./tools/download-pdfs.js";
import { PreprocessSchema, handlePreprocess } from "./tools/preprocess.js";
import {
  DeleteGraphSchema,
  IngestDocumentSchema,
  IngestJsonlSchema,
  handleDeleteGraph,
  handleIngestDocument,
  handleIngestJsonl,
} from "./tools/ingest.js";

const server = new McpServer(
  {
    name: "crawl-graph",
    version: "1.0.0",
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

server.tool(
  "crawl_pdfs",
  "Crawl breadth-first from seed URLs and record every PDF link found, appending each to the PDF links JSON-lines file. Optionally captures page content as Markdown.",
  CrawlPdfsSchema,
  handleCrawlPdfs,
);

server.tool(
  "download_pdfs",
  "Download every PDF in the PDF links file (using the local cache when present), extract its text and write one raw-text record per PDF.",
  DownloadPdfsSchema,
  handleDownloadPdfs,
);

server.tool(
  "preprocess_for_llm",
  "Clean raw document text, split it into sections at Markdown headings and pack each section into token-bounded chunks for LLM extraction.",
  PreprocessSchema,
  handlePreprocess,
);

server.tool(
  "ingest_document",
  "Extract atomic facts and key elements from a text with an LLM and merge them into the Neo4j knowledge graph under the given document name.",
  IngestDocumentSchema,
  handleIngestDocument,
);

server.tool(
  "ingest_jsonl",
  "Ingest every { id, text } record of a JSON-lines file into the knowledge graph, one document at a time. Failed records are reported and skipped.",
  IngestJsonlSchema,
  handleIngestJsonl,
);

server.tool(
  "delete_graph",
  "Delete every node and relationship in the knowledge graph.",
  DeleteGraphSchema,
  handleDeleteGraph,
);

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[index] crawl-graph MCP server listening on stdio");
}

main().catch((error) => {
  console.error("Server error:", error);
  process.exit(1);
});
