/**
 * @module extractor/markdown-converter
 * @fileoverview HTML to Markdown conversion for captured pages.
 *
 * Captured pages are written as Markdown so they can go through the same
 * cleaning and sectioning as any other preprocessor input. ATX headings are
 * required: the preprocessor splits sections on lines starting with `#`.
 *
 * Links and images are kept as Markdown syntax; the preprocessor's cleaner
 * decides what to do with them.
 */

import TurndownService from "turndown";

/* ────────────────────────────────────────────────────────────────────────────
 * Patterns
 * ──────────────────────────────────────────────────────────────────────────── */

/** Zero-width and invisible formatting characters. */
const ZERO_WIDTH_CHARS_REGEX =
  /[\u200B\u200C\u200D\u200E\u200F\uFEFF\u00AD\u2060]/g;

const EXCESSIVE_NEWLINES_REGEX = /\n{3,}/g;

const TRAILING_WHITESPACE_REGEX = /[ \t]+$/gm;

/* ────────────────────────────────────────────────────────────────────────────
 * Converter
 * ──────────────────────────────────────────────────────────────────────────── */

function createTurndownService(): TurndownService {
  const service = new TurndownService({
    headingStyle: "atx",
    codeBlockStyle: "fenced",
    bulletListMarker: "-",
    emDelimiter: "_",
  });

  service.addRule("strikethrough", {
    filter: ["del", "s"],
    replacement: (content: string) => (content.trim() ? `~~${content}~~` : ""),
  });

  return service;
}

/**
 * Tidy converter output: remove invisible characters, cap blank-line runs at
 * one, drop trailing spaces and trim.
 *
 * @example
 * ```ts
 * postProcessMarkdown("# A  \n\n\n\nB"); // => "# A\n\nB"
 * ```
 */
export function postProcessMarkdown(markdown: string): string {
  return markdown
    .replace(ZERO_WIDTH_CHARS_REGEX, "")
    .replace(EXCESSIVE_NEWLINES_REGEX, "\n\n")
    .replace(TRAILING_WHITESPACE_REGEX, "")
    .trim();
}

/**
 * Convert an HTML fragment to Markdown. Blank input yields `""`.
 *
 * @example
 * ```ts
 * htmlToMarkdown("<h2>Usage</h2><p>Run <code>init</code>.</p>");
 * // => "## Usage\n\nRun `init`."
 * ```
 */
export function htmlToMarkdown(html: string): string {
  if (!html.trim()) {
    return "";
  }
  return postProcessMarkdown(createTurndownService().turndown(html));
}
