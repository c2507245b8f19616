/**
 * @module pdf/downloader
 * @fileoverview Download discovered PDFs and write their text as JSON lines.
 *
 * ## Flow
 * ```
 *   pdf_links.jsonl ──read + validate──> unique URLs (first-seen order)
 *        │
 *        v   for each URL, sequentially:
 *   ┌──────────────────────────────────────────────────────────────┐
 *   │ cache hit?  ── no ──> fetchBinary ──> write <downloadDir>/f  │
 *   │      │                                                       │
 *   │     yes                                                      │
 *   │      v                                                       │
 *   │ read file ──> PdfTextExtractor ──> countTokens               │
 *   │      v                                                       │
 *   │ append { id, url, title, text, tokens } to raw_text.jsonl    │
 *   └──────────────────────────────────────────────────────────────┘
 * ```
 *
 * The raw-text file is truncated at the start of each run. A failure on one
 * URL is logged and the run moves on to the next.
 *
 * ## Cache Keys
 * - `"url-hash"`: `<md5(url)>-<basename>`. Distinct URLs never share a file.
 * - `"basename"`: the URL's last path segment. Two URLs ending in the same
 *   file name share (and overwrite) one cache entry.
 */

import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import type { PdfCacheKeyMode } from "../config.js";
import {
  PdfLinkRecordSchema,
  type PdfLinkRecord,
  type RawTextRecord,
} from "../records.js";
import { fetchBinary } from "../services/fetch.js";
import type { Tokenizer } from "../text/tokenizer.js";
import { formatError } from "../utils/errors.js";
import { contentHash } from "../utils/hash.js";
import {
  appendJsonl,
  fileExists,
  isNotFoundError,
  readJsonl,
  resetJsonl,
} from "../utils/jsonl.js";
import { fileNameFromUrl } from "../utils/url.js";
import type { PdfTextExtractor } from "./pdf-text.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

export interface PdfDownloaderOptions {
  /** PdfLinkRecord JSON lines written by the crawler. */
  linksFile: string;

  /** RawTextRecord JSON lines, rewritten on each run. */
  outputFile: string;

  /** Local PDF cache directory. */
  downloadDir: string;

  cacheKey: PdfCacheKeyMode;

  extractor: PdfTextExtractor;

  tokenizer: Tokenizer;

  /** Binary loader. @default fetchBinary */
  download?: (url: string) => Promise<Uint8Array>;
}

export interface DownloadSummary {
  /** Unique URLs read from the links file. */
  total: number;

  /** Records written. */
  written: number;

  /** Served from the local cache. */
  cached: number;

  failed: number;

  /** Repeated URLs and invalid lines skipped while reading. */
  skipped: number;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Cache Naming
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Local file name of a PDF URL's cache entry. Path separators that survive
 * percent-decoding are replaced with `_`.
 *
 * @example
 * ```ts
 * cacheFileName("https://a.com/x/report.pdf", "basename"); // => "report.pdf"
 * cacheFileName("https://a.com/x/report.pdf", "url-hash");
 * // => "<32 hex chars>-report.pdf"
 * ```
 */
export function cacheFileName(url: string, mode: PdfCacheKeyMode): string {
  const baseName = fileNameFromUrl(url).replace(/[\\/]/g, "_");
  return mode === "url-hash" ? `${contentHash(url)}-${baseName}` : baseName;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Downloader
 * ──────────────────────────────────────────────────────────────────────────── */

async function downloadWithFetch(url: string): Promise<Uint8Array> {
  const result = await fetchBinary(url);
  return result.data;
}

/**
 * Second pipeline stage: PDF links in, raw document text out.
 */
export class PdfDownloader {
  private readonly options: PdfDownloaderOptions;
  private readonly download: (url: string) => Promise<Uint8Array>;

  constructor(options: PdfDownloaderOptions) {
    this.options = options;
    this.download = options.download ?? downloadWithFetch;
  }

  /**
   * Process every PDF link. A missing links file is logged as a warning and
   * produces an empty summary without touching the output file.
   */
  async run(): Promise<DownloadSummary> {
    const summary: DownloadSummary = {
      total: 0,
      written: 0,
      cached: 0,
      failed: 0,
      skipped: 0,
    };

    const urls = await this.readUrls(summary);
    if (urls === null) {
      return summary;
    }
    summary.total = urls.length;

    await fs.mkdir(this.options.downloadDir, { recursive: true });
    await resetJsonl(this.options.outputFile);

    for (const url of urls) {
      try {
        const fromCache = await this.processUrl(url);
        summary.written++;
        if (fromCache) {
          summary.cached++;
        }
      } catch (error: unknown) {
        summary.failed++;
        console.error(`[pdf-downloader] Failed processing ${url}: ${formatError(error)}`);
      }
    }

    console.error(
      `[pdf-downloader] ${summary.written}/${summary.total} PDFs extracted (${summary.cached} cached, ${summary.failed} failed)`,
    );
    return summary;
  }

  /** Path of the cache entry for a URL. */
  cachePath(url: string): string {
    return path.join(this.options.downloadDir, cacheFileName(url, this.options.cacheKey));
  }

  /* ── Internals ────────────────────────────────────────────────────────── */

  private async readUrls(summary: DownloadSummary): Promise<string[] | null> {
    let records: PdfLinkRecord[];
    try {
      records = await readJsonl(this.options.linksFile, PdfLinkRecordSchema, {
        onInvalid: (error) => {
          summary.skipped++;
          console.error(`[pdf-downloader] Skipping ${this.options.linksFile}: ${error.message}`);
        },
      });
    } catch (error: unknown) {
      if (isNotFoundError(error)) {
        console.error(
          `[pdf-downloader] WARNING: ${this.options.linksFile} not found. Skipping download.`,
        );
        return null;
      }
      throw error;
    }

    const unique = new Set<string>();
    for (const record of records) {
      if (unique.has(record.pdf_url)) {
        summary.skipped++;
        continue;
      }
      unique.add(record.pdf_url);
    }
    return [...unique];
  }

  /** @returns Whether the PDF came from the cache. */
  private async processUrl(url: string): Promise<boolean> {
    const filePath = this.cachePath(url);
    const fromCache = await fileExists(filePath);

    let data: Uint8Array;
    if (fromCache) {
      data = await fs.readFile(filePath);
    } else {
      data = await this.download(url);
      await fs.writeFile(filePath, data);
    }

    const { text } = await this.options.extractor.extractText(data);
    const record: RawTextRecord = {
      id: randomUUID(),
      url,
      title: fileNameFromUrl(url),
      text,
      tokens: this.options.tokenizer.countTokens(text),
    };
    await appendJsonl(this.options.outputFile, record);
    return fromCache;
  }
}
