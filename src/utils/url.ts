/**
 * @module utils/url
 * @fileoverview URL canonicalization and classification for the crawler.
 *
 * The crawler's `visited` set, its PDF dedup set and the PDF cache all key on
 * URLs, so every URL entering one of those sets goes through
 * {@link normalizeUrl} first.
 *
 * ## Rules
 * - Normalization removes the fragment and nothing else. Query order, case,
 *   default ports and trailing slashes are left exactly as written.
 * - A URL is crawlable when it is http(s), is not a PDF and its path does
 *   not end in one of {@link BINARY_EXTENSIONS}.
 * - A URL is a PDF when its path ends in `.pdf`, in any case.
 *
 * @example
 * ```ts
 * import { normalizeUrl, isCrawlable, isPdfUrl } from "./utils/url.js";
 *
 * normalizeUrl("https://a.com/x#frag");          // => "https://a.com/x"
 * isCrawlable("https://a.com/archive.tar.gz");   // => false
 * isPdfUrl("https://a.com/report.PDF?v=2");      // => true
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

/** URL schemes the crawler will fetch. */
const CRAWLABLE_SCHEMES: ReadonlySet<string> = new Set(["http:", "https:"]);

/**
 * Path extensions of binary archives that are never queued for crawling.
 */
export const BINARY_EXTENSIONS: readonly string[] = [
  ".zip",
  ".tar",
  ".gz",
  ".rar",
  ".jar",
  ".exe",
  ".iso",
  ".7z",
  ".bz2",
] as const;

const PDF_EXTENSION = ".pdf";

/* ────────────────────────────────────────────────────────────────────────────
 * Normalization
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Strip the fragment component from a URL.
 *
 * Only the `#...` suffix is removed; the rest of the string is returned
 * byte-for-byte, so the function is a fixed point on its own output. Inputs
 * that are not absolute URLs are handled the same way (everything from the
 * first `#` is dropped).
 *
 * @example
 * ```ts
 * normalizeUrl("https://a.com/x#frag");     // => "https://a.com/x"
 * normalizeUrl("https://a.com/x?q=1#top");  // => "https://a.com/x?q=1"
 * normalizeUrl("https://A.com/x/");         // => "https://A.com/x/"
 * ```
 */
export function normalizeUrl(url: string): string {
  const hashIndex = url.indexOf("#");
  return hashIndex === -1 ? url : url.slice(0, hashIndex);
}

/**
 * Resolve a possibly relative href against the page it was found on.
 *
 * @throws {TypeError} If the combination does not form a valid URL.
 *
 * @example
 * ```ts
 * resolveUrl("https://a.com/docs/intro", "../files/a.pdf");
 * // => "https://a.com/files/a.pdf"
 * ```
 */
export function resolveUrl(base: string, relative: string): string {
  return new URL(relative, base).href;
}

/**
 * Hostname of a URL, lowercased by the WHATWG parser.
 *
 * @throws {TypeError} If the input is not a valid URL.
 */
export function extractDomain(url: string): string {
  return new URL(url).hostname;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Classification
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Lowercased path of a URL, or `null` when the string does not parse.
 */
function lowerPath(url: string): string | null {
  try {
    return new URL(url).pathname.toLowerCase();
  } catch {
    return null;
  }
}

/**
 * Whether the URL's path ends in `.pdf` (case-insensitive). Query strings
 * and fragments are ignored.
 *
 * @example
 * ```ts
 * isPdfUrl("https://a.com/files/report.pdf");     // => true
 * isPdfUrl("https://a.com/view?file=report.pdf"); // => false
 * ```
 */
export function isPdfUrl(url: string): boolean {
  const path = lowerPath(url);
  return path !== null && path.endsWith(PDF_EXTENSION);
}

/**
 * Whether a URL should be queued for crawling.
 *
 * True iff the scheme is http/https, the URL is not a PDF, and the path does
 * not end in a binary-archive extension. This governs link following only;
 * PDFs are collected separately by the crawler.
 *
 * @example
 * ```ts
 * isCrawlable("https://a.com/page");          // => true
 * isCrawlable("https://a.com/setup.EXE");     // => false
 * isCrawlable("mailto:someone@a.com");        // => false
 * ```
 */
export function isCrawlable(url: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }

  if (!CRAWLABLE_SCHEMES.has(parsed.protocol)) {
    return false;
  }

  const path = parsed.pathname.toLowerCase();
  if (path.endsWith(PDF_EXTENSION)) {
    return false;
  }

  return !BINARY_EXTENSIONS.some((ext) => path.endsWith(ext));
}

/* ────────────────────────────────────────────────────────────────────────────
 * File Names
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Last non-empty path segment of a URL, percent-decoded.
 *
 * Used as the display title of a downloaded PDF and as the local cache file
 * name. Falls back to `"document.pdf"` when the path has no segments.
 *
 * @example
 * ```ts
 * fileNameFromUrl("https://a.com/docs/Annual%20Report.pdf?x=1");
 * // => "Annual Report.pdf"
 * ```
 */
export function fileNameFromUrl(url: string): string {
  let path: string;
  try {
    path = new URL(url).pathname;
  } catch {
    path = normalizeUrl(url).split("?")[0] ?? "";
  }

  const segments = path.split("/").filter((segment) => segment.length > 0);
  const last = segments[segments.length - 1];
  if (!last) {
    return "document.pdf";
  }

  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}
