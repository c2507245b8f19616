/**
 * @module tools/crawl-pdfs
 * @fileoverview MCP Tool: crawl_pdfs -- breadth-first crawl that records PDF links.
 *
 * Starting from one or more seed URLs, the crawler fetches each level as a
 * batch, follows every crawlable link (internal and external) and appends
 * each newly found PDF to the PDF links file as soon as it is seen.
 *
 * ## Usage Example (from MCP client)
 * ```json
 * {
 *   "tool": "crawl_pdfs",
 *   "arguments": {
 *     "seed_urls": ["https://docs.example.com/"],
 *     "max_depth": 2,
 *     "capture_pages": true
 *   }
 * }
 * ```
 *
 * ## Response Format
 * A Markdown summary: levels crawled, pages fetched, failures, PDFs found,
 * stop reason and the files written.
 */

import { z } from "zod";
import { PdfCrawler } from "../crawler/bfs-crawler.js";
import { HttpPageFetcher } from "../crawler/page-fetcher.js";
import { config } from "../config.js";
import type { PageRecord, PdfLinkRecord } from "../records.js";
import { FetchPool, MemoryGate } from "../services/queue.js";
import { JsonlSink } from "../utils/jsonl.js";
import { errorResult, textResult, type ToolResult } from "./response.js";

/**
 * Zod shape for the `crawl_pdfs` tool parameters (passed to `server.tool()`
 * as a plain object, not wrapped in `z.object()`).
 */
export const CrawlPdfsSchema = {
  seed_urls: z
    .array(z.string().url())
    .min(1)
    .describe("URLs to start crawling from (depth 0)"),

  max_depth: z
    .number()
    .int()
    .min(1)
    .optional()
    .describe(`Number of levels to crawl (default: ${config.maxDepth})`),

  capture_pages: z
    .boolean()
    .optional()
    .describe(
      "Also write each page's main content as Markdown to the pages file (default: on when PAGES_FILE is set)",
    ),

  output_file: z
    .string()
    .optional()
    .describe(`PDF links JSON-lines file (default: ${config.pdfLinksFile})`),
};

interface CrawlPdfsParams {
  seed_urls: string[];
  max_depth?: number;
  capture_pages?: boolean;
  output_file?: string;
}

/** Pages file to write to, or `undefined` when capture is off. */
function resolvePagesFile(capture: boolean | undefined): string | undefined {
  if (capture === false) {
    return undefined;
  }
  if (config.pagesFile) {
    return config.pagesFile;
  }
  return capture ? "output/pages.jsonl" : undefined;
}

export async function handleCrawlPdfs(params: CrawlPdfsParams): Promise<ToolResult> {
  try {
    const pdfLinksFile = params.output_file ?? config.pdfLinksFile;
    const pagesFile = resolvePagesFile(params.capture_pages);

    const pool = new FetchPool({
      maxConcurrent: config.maxConcurrent,
      gate: new MemoryGate({
        thresholdPercent: config.memoryThresholdPercent,
        intervalMs: config.memoryCheckIntervalMs,
      }),
    });
    const fetcher = new HttpPageFetcher({
      pool,
      captureMarkdown: pagesFile !== undefined,
    });
    const crawler = new PdfCrawler(fetcher, {
      maxDepth: params.max_depth ?? config.maxDepth,
      pdfSink: new JsonlSink<PdfLinkRecord>(pdfLinksFile),
      pageSink: pagesFile ? new JsonlSink<PageRecord>(pagesFile) : undefined,
    });

    const summary = await crawler.crawl(params.seed_urls);

    const lines = [
      `# Crawl Results`,
      `> Seeds: ${params.seed_urls.join(", ")}`,
      `> Levels crawled: ${summary.levelsCrawled}`,
      `> Pages fetched: ${summary.pagesFetched}`,
      `> Failures: ${summary.failures}`,
      `> PDFs found: ${summary.pdfsFound}`,
      `> Stop reason: ${summary.stoppedReason}`,
      `> PDF links file: ${pdfLinksFile}`,
    ];
    if (pagesFile) {
      lines.push(`> Pages captured: ${summary.pagesCaptured} (${pagesFile})`);
    }
    return textResult(lines.join("\n"));
  } catch (error) {
    return errorResult(error);
  }
}
