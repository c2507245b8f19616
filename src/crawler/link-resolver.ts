/**
 * @module crawler/link-resolver
 * @fileoverview Link extraction from HTML and PDF/page partitioning.
 *
 * Two steps sit between a fetched page and the next crawl level:
 *
 * 1. {@link extractLinks} pulls every `<a href>` out of the HTML with cheerio
 *    and sorts the hrefs into internal and external by hostname. Hrefs are
 *    kept as written; resolution happens in step 2.
 * 2. {@link partitionLinks} resolves each href against the page URL,
 *    normalizes it, and splits the results into PDF targets and crawlable
 *    page targets.
 *
 * ```
 *   HTML ──> extractLinks ──> { internal[], external[] }
 *                                      │
 *                         hrefs ───────┘
 *                                      v
 *            partitionLinks(pageUrl, hrefs) ──> { pdfs[], pages[] }
 * ```
 *
 * @example
 * ```ts
 * const { internal, external } = extractLinks(html, "https://a.com/docs/");
 * const hrefs = [...internal, ...external].map((link) => link.href);
 * const { pdfs, pages } = partitionLinks("https://a.com/docs/", hrefs);
 * ```
 */

import * as cheerio from "cheerio";
import {
  extractDomain,
  isCrawlable,
  isPdfUrl,
  normalizeUrl,
  resolveUrl,
} from "../utils/url.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/** A hyperlink as found on the page. */
export interface PageLink {
  /** The `href` attribute, trimmed but otherwise unresolved. */
  href: string;

  /** Visible anchor text, whitespace-collapsed. */
  text: string;
}

/** Links of a page, split by whether they stay on the page's host. */
export interface CategorizedLinks {
  internal: PageLink[];
  external: PageLink[];
}

/** Resolved link targets of a page. */
export interface PartitionedLinks {
  /** Normalized PDF URLs, in document order, deduplicated. */
  pdfs: string[];

  /** Normalized crawlable page URLs, in document order, deduplicated. */
  pages: string[];
}

/* ────────────────────────────────────────────────────────────────────────────
 * Scheme Filtering
 * ──────────────────────────────────────────────────────────────────────────── */

const NON_FETCHABLE_SCHEMES: readonly string[] = [
  "javascript:",
  "mailto:",
  "tel:",
  "data:",
  "blob:",
  "ftp:",
  "file:",
];

function hasNonFetchableScheme(href: string): boolean {
  const lower = href.toLowerCase();
  return NON_FETCHABLE_SCHEMES.some((scheme) => lower.startsWith(scheme));
}

/* ────────────────────────────────────────────────────────────────────────────
 * Extraction
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Extract the anchors of an HTML document, categorised internal/external.
 *
 * Skipped: empty hrefs, fragment-only hrefs (`#top`), non-fetchable schemes
 * (`mailto:`, `javascript:`, ...) and hrefs that do not resolve against
 * `baseUrl`. A link is internal when its resolved hostname equals the
 * hostname of `baseUrl`.
 */
export function extractLinks(html: string, baseUrl: string): CategorizedLinks {
  const $ = cheerio.load(html);
  const baseHost = extractDomain(baseUrl);
  const result: CategorizedLinks = { internal: [], external: [] };

  $("a[href]").each((_index, element) => {
    const href = $(element).attr("href")?.trim();
    if (!href || href.startsWith("#") || hasNonFetchableScheme(href)) {
      return;
    }

    let host: string;
    try {
      host = extractDomain(resolveUrl(baseUrl, href));
    } catch {
      return;
    }

    const link: PageLink = {
      href,
      text: $(element).text().replace(/\s+/g, " ").trim(),
    };
    if (host === baseHost) {
      result.internal.push(link);
    } else {
      result.external.push(link);
    }
  });

  return result;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Partitioning
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Resolve hrefs against the page they were found on and split them into PDF
 * and page targets.
 *
 * - Each href is resolved with WHATWG rules, then fragment-stripped.
 * - A target whose path ends in `.pdf` (any case) is a PDF.
 * - Any other target is a page only if {@link isCrawlable} accepts it.
 * - Hrefs that fail to resolve are dropped.
 *
 * @example
 * ```ts
 * partitionLinks("https://a.com/docs/intro", ["../files/A.PDF#p2", "next", "mailto:x@a.com"]);
 * // => { pdfs: ["https://a.com/files/A.PDF"], pages: ["https://a.com/docs/next"] }
 * ```
 */
export function partitionLinks(
  pageUrl: string,
  hrefs: readonly string[],
): PartitionedLinks {
  const pdfs = new Set<string>();
  const pages = new Set<string>();

  for (const href of hrefs) {
    let target: string;
    try {
      target = normalizeUrl(resolveUrl(pageUrl, href));
    } catch {
      continue;
    }

    if (isPdfUrl(target)) {
      pdfs.add(target);
    } else if (isCrawlable(target)) {
      pages.add(target);
    }
  }

  return { pdfs: [...pdfs], pages: [...pages] };
}
