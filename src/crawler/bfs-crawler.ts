/**
 * @module crawler/bfs-crawler
 * @fileoverview Level-synchronous breadth-first crawler that collects PDF links.
 *
 * ## Algorithm
 *
 * Each depth is fetched as one batch; the next level is not started until
 * every page of the current one has an outcome.
 *
 * ```
 *   frontier = normalized seeds
 *   for depth in 0 .. maxDepth-1:
 *     toCrawl = frontier - visited, crawlable only     (empty => stop)
 *     outcomes = fetcher.fetchAll(toCrawl)             (barrier)
 *     for outcome in outcomes:                         (sequential)
 *       visited += requested url, resolved url
 *       failure  -> log, next
 *       processing throws -> log, count as failure, next
 *       success  -> resolve hrefs against resolved url
 *                   PDF, not yet seen  -> pdfLinks, sink.write  (immediately)
 *                   page, not visited  -> next frontier
 *     frontier = next frontier - visited
 * ```
 *
 * All state changes happen in the sequential loop over outcomes, after the
 * batch has completed. No fetch task ever touches `visited` or `pdfLinks`.
 *
 * ## Visited Marking
 * Failed fetches are marked visited too, so a URL that failed once is not
 * retried at a deeper level.
 *
 * ## Stop Reasons
 * - `frontier_exhausted` -- a level had nothing left to crawl.
 * - `max_depth` -- `maxDepth` levels were crawled and undiscovered pages remain.
 */

import { randomUUID } from "node:crypto";
import { partitionLinks } from "./link-resolver.js";
import type { FetchOutcome, FetchSuccess, PageFetcher } from "./page-fetcher.js";
import type { PageRecord, PdfLinkRecord } from "../records.js";
import { defaultTokenizer, type Tokenizer } from "../text/tokenizer.js";
import { formatError } from "../utils/errors.js";
import type { ArtifactSink } from "../utils/jsonl.js";
import { isCrawlable, normalizeUrl } from "../utils/url.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

export interface PdfCrawlerOptions {
  /** Number of levels to crawl; the seeds are depth 0. */
  maxDepth: number;

  /** Destination for each newly discovered PDF link. */
  pdfSink: ArtifactSink<PdfLinkRecord>;

  /** When set, successful pages with Markdown content are written here. */
  pageSink?: ArtifactSink<PageRecord>;

  /** Token counter for captured pages. @default defaultTokenizer() */
  tokenizer?: Tokenizer;
}

export type CrawlStopReason = "frontier_exhausted" | "max_depth";

/** Result of one BFS level. */
export interface LevelResult {
  /** URLs handed to the fetcher. */
  attempted: number;

  /** Successful outcomes. */
  fetched: number;

  failures: number;

  /** PDF URLs first seen at this level, in discovery order. */
  newPdfs: string[];

  /** Pages captured to the page sink. */
  captured: number;

  /** Unvisited page URLs for the next level. */
  nextFrontier: string[];
}

export interface CrawlSummary {
  levelsCrawled: number;
  pagesFetched: number;
  failures: number;
  pdfsFound: number;
  pagesCaptured: number;
  stoppedReason: CrawlStopReason;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Crawler
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Breadth-first crawler over a {@link PageFetcher}.
 *
 * One instance is one crawl: `visited` and `pdfLinks` accumulate across
 * levels and across calls.
 *
 * @example
 * ```ts
 * const crawler = new PdfCrawler(fetcher, {
 *   maxDepth: 3,
 *   pdfSink: new JsonlSink("output/pdf_links.jsonl"),
 * });
 * const summary = await crawler.crawl(["https://example.com/"]);
 * console.error(`${summary.pdfsFound} PDFs, stopped: ${summary.stoppedReason}`);
 * ```
 */
export class PdfCrawler {
  /** Normalized URLs already fetched or attempted. */
  readonly visited = new Set<string>();

  /** Normalized PDF URLs already recorded. */
  readonly pdfLinks = new Set<string>();

  private readonly maxDepth: number;
  private readonly pdfSink: ArtifactSink<PdfLinkRecord>;
  private readonly pageSink: ArtifactSink<PageRecord> | undefined;
  private readonly tokenizer: Tokenizer | undefined;

  constructor(
    private readonly fetcher: PageFetcher,
    options: PdfCrawlerOptions,
  ) {
    this.maxDepth = options.maxDepth;
    this.pdfSink = options.pdfSink;
    this.pageSink = options.pageSink;
    this.tokenizer = options.tokenizer;
  }

  /**
   * Crawl from the seed URLs until the frontier is empty or `maxDepth`
   * levels have been crawled.
   */
  async crawl(seeds: readonly string[]): Promise<CrawlSummary> {
    const summary: CrawlSummary = {
      levelsCrawled: 0,
      pagesFetched: 0,
      failures: 0,
      pdfsFound: 0,
      pagesCaptured: 0,
      stoppedReason: "frontier_exhausted",
    };

    let frontier = seeds.map(normalizeUrl);

    for (let depth = 0; depth < this.maxDepth; depth++) {
      if (this.pendingUrls(frontier).length === 0) {
        summary.stoppedReason = "frontier_exhausted";
        return summary;
      }

      console.error(`[bfs-crawler] === Crawling depth ${depth} ===`);
      const level = await this.crawlLevel(frontier);

      summary.levelsCrawled++;
      summary.pagesFetched += level.fetched;
      summary.failures += level.failures;
      summary.pdfsFound += level.newPdfs.length;
      summary.pagesCaptured += level.captured;
      frontier = level.nextFrontier;
    }

    summary.stoppedReason =
      this.pendingUrls(frontier).length === 0 ? "frontier_exhausted" : "max_depth";
    return summary;
  }

  /**
   * Crawl one level: fetch every pending frontier URL as a single batch,
   * then process the outcomes in order.
   */
  async crawlLevel(frontier: readonly string[]): Promise<LevelResult> {
    const toCrawl = this.pendingUrls(frontier);
    const result: LevelResult = {
      attempted: toCrawl.length,
      fetched: 0,
      failures: 0,
      newPdfs: [],
      captured: 0,
      nextFrontier: [],
    };
    if (toCrawl.length === 0) {
      return result;
    }

    const outcomes = await this.fetcher.fetchAll(toCrawl);
    const next = new Set<string>();

    for (const outcome of outcomes) {
      this.markVisited(outcome);

      if (!outcome.ok) {
        result.failures++;
        console.error(`[bfs-crawler] Failed: ${outcome.url} - ${outcome.error}`);
        continue;
      }

      try {
        await this.collectLinks(outcome, result.newPdfs, next);
        if (await this.capturePage(outcome)) {
          result.captured++;
        }
        result.fetched++;
      } catch (error) {
        result.failures++;
        console.error(
          `[bfs-crawler] Error processing result from ${outcome.url}: ${formatError(error)}`,
        );
      }
    }

    result.nextFrontier = [...next].filter((url) => !this.visited.has(url));
    return result;
  }

  /* ── Internals ────────────────────────────────────────────────────────── */

  /** Unique, unvisited, crawlable URLs of a frontier, in order. */
  private pendingUrls(frontier: readonly string[]): string[] {
    const pending = new Set<string>();
    for (const raw of frontier) {
      const url = normalizeUrl(raw);
      if (!this.visited.has(url) && isCrawlable(url)) {
        pending.add(url);
      }
    }
    return [...pending];
  }

  private markVisited(outcome: FetchOutcome): void {
    this.visited.add(normalizeUrl(outcome.url));
    if (outcome.ok) {
      this.visited.add(normalizeUrl(outcome.finalUrl));
    }
  }

  private async collectLinks(
    outcome: FetchSuccess,
    newPdfs: string[],
    next: Set<string>,
  ): Promise<void> {
    const sourcePage = normalizeUrl(outcome.finalUrl);
    const hrefs = [...outcome.links.internal, ...outcome.links.external].map(
      (link) => link.href,
    );
    const { pdfs, pages } = partitionLinks(sourcePage, hrefs);

    for (const pdfUrl of pdfs) {
      if (this.pdfLinks.has(pdfUrl)) {
        continue;
      }
      console.error(`[bfs-crawler] [PDF] ${pdfUrl}`);
      await this.pdfSink.write({ pdf_url: pdfUrl, source_page: sourcePage });
      this.pdfLinks.add(pdfUrl);
      newPdfs.push(pdfUrl);
    }

    for (const page of pages) {
      if (!this.visited.has(page)) {
        next.add(page);
      }
    }
  }

  private async capturePage(outcome: FetchSuccess): Promise<boolean> {
    if (!this.pageSink || !outcome.markdown) {
      return false;
    }
    const tokenizer = this.tokenizer ?? defaultTokenizer();
    await this.pageSink.write({
      id: randomUUID(),
      url: normalizeUrl(outcome.finalUrl),
      title: outcome.title ?? "",
      text: outcome.markdown,
      tokens: tokenizer.countTokens(outcome.markdown),
    });
    return true;
  }
}
