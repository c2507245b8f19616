/**
 * @module crawler/page-fetcher
 * @fileoverview Batch page-fetch boundary used by the crawler.
 *
 * The crawler hands a whole level to {@link PageFetcher.fetchAll} and gets
 * back exactly one {@link FetchOutcome} per requested URL. The call never
 * rejects: every per-URL problem is a `{ ok: false }` outcome.
 *
 * Outcomes are validated with zod at this boundary ({@link parseFetchOutcome})
 * so the crawler only ever sees well-formed success or failure values.
 *
 * ```
 *   fetchAll(urls)
 *     │
 *     ├── pool.run(fetchOne(url_1)) ─┐
 *     ├── pool.run(fetchOne(url_2)) ─┤  bounded + memory-gated
 *     └── pool.run(fetchOne(url_n)) ─┘
 *                                     │
 *                    parseFetchOutcome(url, raw)
 *                                     v
 *                          FetchOutcome[] (input order)
 * ```
 */

import { z } from "zod";
import { extractLinks } from "./link-resolver.js";
import { extractPageContent } from "../extractor/html-extractor.js";
import { htmlToMarkdown } from "../extractor/markdown-converter.js";
import { fetchHtml, type FetchOptions, type HtmlFetchResult } from "../services/fetch.js";
import type { FetchPool } from "../services/queue.js";
import { formatError } from "../utils/errors.js";
import { normalizeUrl } from "../utils/url.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Outcome Schema
 * ──────────────────────────────────────────────────────────────────────────── */

const PageLinkSchema = z.object({
  href: z.string(),
  text: z.string().default(""),
});

/** Zod schema of a single fetch outcome. */
export const FetchOutcomeSchema = z.discriminatedUnion("ok", [
  z.object({
    ok: z.literal(true),
    url: z.string(),
    finalUrl: z.string(),
    links: z.object({
      internal: z.array(PageLinkSchema).default([]),
      external: z.array(PageLinkSchema).default([]),
    }),
    markdown: z.string().optional(),
    title: z.string().optional(),
  }),
  z.object({
    ok: z.literal(false),
    url: z.string(),
    error: z.string(),
  }),
]);

/** Result of fetching one page. */
export type FetchOutcome = z.infer<typeof FetchOutcomeSchema>;

export type FetchSuccess = Extract<FetchOutcome, { ok: true }>;

/**
 * Validate a raw fetch result. Anything that does not match the schema
 * becomes a failure outcome for `url`.
 *
 * @example
 * ```ts
 * parseFetchOutcome("https://a.com", { ok: true });
 * // => { ok: false, url: "https://a.com", error: "Malformed fetch result: ..." }
 * ```
 */
export function parseFetchOutcome(url: string, raw: unknown): FetchOutcome {
  const parsed = FetchOutcomeSchema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  return { ok: false, url, error: `Malformed fetch result: ${issues}` };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Fetcher Interface
 * ──────────────────────────────────────────────────────────────────────────── */

/** Fetches a batch of pages. */
export interface PageFetcher {
  /**
   * Fetch every URL and return one outcome per URL, in input order. Never
   * rejects.
   */
  fetchAll(urls: readonly string[]): Promise<FetchOutcome[]>;
}

/* ────────────────────────────────────────────────────────────────────────────
 * HTTP Implementation
 * ──────────────────────────────────────────────────────────────────────────── */

export interface HttpPageFetcherOptions {
  /** Concurrency and memory admission for every fetch. */
  pool: FetchPool;

  /** Convert each page's main content to Markdown. */
  captureMarkdown?: boolean;

  /** Timeout, size limit and User-Agent overrides. */
  fetchOptions?: FetchOptions;

  /** Page loader. @default fetchHtml */
  loadPage?: (url: string, options: FetchOptions) => Promise<HtmlFetchResult>;
}

/**
 * {@link PageFetcher} over plain HTTP. HTML is fetched without JavaScript
 * rendering; links come from the raw HTML.
 */
export class HttpPageFetcher implements PageFetcher {
  private readonly pool: FetchPool;
  private readonly captureMarkdown: boolean;
  private readonly fetchOptions: FetchOptions;
  private readonly loadPage: (url: string, options: FetchOptions) => Promise<HtmlFetchResult>;

  constructor(options: HttpPageFetcherOptions) {
    this.pool = options.pool;
    this.captureMarkdown = options.captureMarkdown ?? false;
    this.fetchOptions = options.fetchOptions ?? {};
    this.loadPage = options.loadPage ?? fetchHtml;
  }

  async fetchAll(urls: readonly string[]): Promise<FetchOutcome[]> {
    return Promise.all(
      urls.map((url) =>
        this.pool
          .run(() => this.fetchOne(url))
          .then(
            (raw) => parseFetchOutcome(url, raw),
            (error: unknown): FetchOutcome => ({
              ok: false,
              url,
              error: formatError(error),
            }),
          ),
      ),
    );
  }

  private async fetchOne(url: string): Promise<unknown> {
    const page = await this.loadPage(url, this.fetchOptions);
    const finalUrl = normalizeUrl(page.url);
    const links = extractLinks(page.html, finalUrl);

    if (!this.captureMarkdown) {
      return { ok: true, url, finalUrl, links };
    }

    const content = extractPageContent(page.html, finalUrl);
    return {
      ok: true,
      url,
      finalUrl,
      links,
      title: content.title,
      markdown: htmlToMarkdown(content.contentHtml),
    };
  }
}
