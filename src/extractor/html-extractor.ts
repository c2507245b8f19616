/**
 * @module extractor/html-extractor
 * @fileoverview Main-content extraction for captured crawl pages.
 *
 * When page capture is on, each fetched page is reduced to its main article
 * before conversion to Markdown:
 *
 * ```
 *   raw HTML
 *     |
 *     +--> cheerio: drop NOISE_SELECTORS and comments
 *     |
 *     +--> JSDOM + Readability: article title and content HTML
 *     |        |
 *     |        +-- null (no article found)
 *     |               |
 *     |               +--> cheerio fallback: <title>/<h1> + body HTML
 *     v
 *   PageContent
 * ```
 *
 * Link extraction does not go through this module; links are read from the
 * unmodified HTML so navigation menus still feed the crawl frontier.
 */

import * as cheerio from "cheerio";
import { JSDOM } from "jsdom";
import { Readability } from "@mozilla/readability";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/** Main content of a page, ready for Markdown conversion. */
export interface PageContent {
  /** Page title; empty when none could be found. */
  title: string;

  /** Article body as HTML. */
  contentHtml: string;

  /** Whether Readability found an article (false means the body fallback). */
  fromReadability: boolean;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Preprocessing
 * ──────────────────────────────────────────────────────────────────────────── */

const NOISE_SELECTORS: readonly string[] = [
  "script",
  "noscript",
  "style",
  "template",
  "nav",
  "footer",
  "aside",
  "iframe",
  "form",
  "[role='navigation']",
  "[role='contentinfo']",
] as const;

/** Remove page chrome and HTML comments. */
export function stripNoise(html: string): string {
  const $ = cheerio.load(html);

  for (const selector of NOISE_SELECTORS) {
    $(selector).remove();
  }

  $("*")
    .contents()
    .filter((_index, node) => node.nodeType === 8)
    .remove();

  return $.html();
}

/* ────────────────────────────────────────────────────────────────────────────
 * Fallback
 * ──────────────────────────────────────────────────────────────────────────── */

function fallbackTitle($: cheerio.CheerioAPI): string {
  const candidates = [
    $('meta[property="og:title"]').attr("content"),
    $("title").first().text(),
    $("h1").first().text(),
  ];
  for (const candidate of candidates) {
    const trimmed = candidate?.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  return "";
}

/* ────────────────────────────────────────────────────────────────────────────
 * Public API
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Extract the main content of an HTML page.
 *
 * @param html - Raw HTML as fetched.
 * @param url - Page URL; Readability uses it to absolutize relative links.
 *
 * @example
 * ```ts
 * const page = extractPageContent(html, "https://example.com/guide");
 * page.title;       // "Getting Started"
 * page.contentHtml; // "<div><p>First, install ...</p></div>"
 * ```
 */
export function extractPageContent(html: string, url: string): PageContent {
  const cleanedHtml = stripNoise(html);
  const dom = new JSDOM(cleanedHtml, { url });

  try {
    const article = new Readability(dom.window.document).parse();
    if (article?.content) {
      return {
        title: article.title?.trim() ?? "",
        contentHtml: article.content,
        fromReadability: true,
      };
    }
  } finally {
    dom.window.close();
  }

  const $ = cheerio.load(cleanedHtml);
  return {
    title: fallbackTitle($),
    contentHtml: $("body").html() ?? "",
    fromReadability: false,
  };
}
