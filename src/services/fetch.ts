/**
 * @fileoverview HTTP fetch service for crawl pages and PDF downloads.
 *
 * Wraps the Node.js native `fetch()` with the controls every outbound request
 * in the pipeline shares:
 *
 * 1. **Timeout** - `AbortSignal.timeout()`; expiry surfaces as {@link TimeoutError}
 * 2. **Status check** - non-2xx responses become {@link FetchError} with the status
 * 3. **Content-Type filter** - pages must be HTML-like ({@link fetchHtml} only)
 * 4. **Size limit** - the body is streamed and abandoned once it exceeds the
 *    limit ({@link ResponseTooLargeError})
 *
 * ```
 *   fetchHtml(url) / fetchBinary(url)
 *     |
 *     +--> protocol check (http/https)
 *     +--> fetch() with timeout, User-Agent, redirect: "follow"
 *     +--> status check
 *     +--> content-type check (HTML only)
 *     +--> streamed body read with byte limit
 * ```
 *
 * Concurrency is not handled here; callers run these functions inside a
 * {@link FetchPool} (see `services/queue`).
 *
 * @module services/fetch
 */

import { config } from "../config.js";
import {
  FetchError,
  ContentTypeError,
  ResponseTooLargeError,
  TimeoutError,
} from "../utils/errors.js";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/** Result of a successful page fetch. */
export interface HtmlFetchResult {
  html: string;

  /** URL after redirects. */
  url: string;

  contentType: string;

  statusCode: number;
}

/** Result of a successful binary download. */
export interface BinaryFetchResult {
  data: Buffer;

  /** URL after redirects. */
  url: string;

  contentType: string;
}

export interface FetchOptions {
  /** @default config.fetchTimeout */
  timeoutMs?: number;

  /** Body size limit in bytes. Defaults depend on the variant. */
  maxBytes?: number;

  /** @default config.userAgent */
  userAgent?: string;
}

// ---------------------------------------------------------------------------
// Content-Type Handling
// ---------------------------------------------------------------------------

const HTML_CONTENT_TYPES = new Set<string>([
  "text/html",
  "application/xhtml+xml",
]);

/** `"text/html; charset=utf-8"` -> `"text/html"` */
export function extractMimeType(contentType: string | null): string {
  if (!contentType) {
    return "";
  }
  const mimeType = contentType.split(";")[0] ?? "";
  return mimeType.trim().toLowerCase();
}

// ---------------------------------------------------------------------------
// Body Reading
// ---------------------------------------------------------------------------

function checkDeclaredLength(response: Response, maxBytes: number): void {
  const contentLength = response.headers.get("content-length");
  if (contentLength) {
    const declaredSize = parseInt(contentLength, 10);
    if (!isNaN(declaredSize) && declaredSize > maxBytes) {
      throw new ResponseTooLargeError(
        `Response Content-Length (${declaredSize} bytes) exceeds limit of ${maxBytes} bytes`
      );
    }
  }
}

/**
 * Stream a response body into memory, aborting once `maxBytes` is exceeded.
 * The declared Content-Length is checked first; the streamed count is the
 * authoritative check since servers may omit or misreport the header.
 */
async function readBytesWithLimit(
  response: Response,
  maxBytes: number
): Promise<Buffer> {
  checkDeclaredLength(response, maxBytes);

  if (!response.body) {
    return Buffer.alloc(0);
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let totalBytes = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }

      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel();
        throw new ResponseTooLargeError(
          `Response body exceeds limit of ${maxBytes} bytes (read ${totalBytes} bytes so far)`
        );
      }
      chunks.push(value);
    }
  } catch (error) {
    if (error instanceof ResponseTooLargeError) {
      throw error;
    }
    throw new FetchError(
      `Error reading response body: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return Buffer.concat(chunks, totalBytes);
}

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

function isAbortLike(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

async function request(
  url: string,
  accept: string,
  options: FetchOptions
): Promise<Response> {
  let parsedUrl: URL;
  try {
    parsedUrl = new URL(url);
  } catch {
    throw new FetchError(`Invalid URL: ${url}`);
  }
  if (parsedUrl.protocol !== "http:" && parsedUrl.protocol !== "https:") {
    throw new FetchError(
      `Unsupported protocol: ${parsedUrl.protocol} (only http: and https: are allowed)`
    );
  }

  const timeoutMs = options.timeoutMs ?? config.fetchTimeout;

  let response: Response;
  try {
    response = await fetch(parsedUrl.href, {
      signal: AbortSignal.timeout(timeoutMs),
      headers: {
        "User-Agent": options.userAgent ?? config.userAgent,
        Accept: accept,
      },
      redirect: "follow",
    });
  } catch (error) {
    if (isAbortLike(error)) {
      throw new TimeoutError(`Request to ${url} timed out after ${timeoutMs}ms`);
    }
    throw new FetchError(
      `Failed to fetch ${url}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!response.ok) {
    throw new FetchError(
      `HTTP ${response.status} ${response.statusText} for ${url}`,
      response.status
    );
  }

  return response;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Fetch an HTML page.
 *
 * @throws {FetchError} Invalid URL, network failure or non-2xx status.
 * @throws {TimeoutError} The request exceeded its timeout.
 * @throws {ContentTypeError} The response is not HTML.
 * @throws {ResponseTooLargeError} The body exceeded `maxBytes`.
 *
 * @example
 * ```ts
 * const page = await fetchHtml("https://example.com/docs");
 * page.url;  // final URL after redirects
 * page.html; // "<!DOCTYPE html>..."
 * ```
 */
export async function fetchHtml(
  url: string,
  options: FetchOptions = {}
): Promise<HtmlFetchResult> {
  const response = await request(
    url,
    "text/html, application/xhtml+xml, */*;q=0.1",
    options
  );

  const contentType = response.headers.get("content-type");
  const mimeType = extractMimeType(contentType);
  if (!HTML_CONTENT_TYPES.has(mimeType)) {
    throw new ContentTypeError(
      `Unacceptable Content-Type: "${mimeType || "(none)"}" for ${url}. ` +
        `Expected one of: ${Array.from(HTML_CONTENT_TYPES).join(", ")}`
    );
  }

  const body = await readBytesWithLimit(
    response,
    options.maxBytes ?? config.maxResponseSize
  );

  return {
    html: new TextDecoder("utf-8", { fatal: false }).decode(body),
    url: response.url || url,
    contentType: contentType ?? "text/html",
    statusCode: response.status,
  };
}

/**
 * Download a binary resource (PDFs). Any content type is accepted since
 * many servers label PDFs `application/octet-stream`.
 *
 * @throws {FetchError} Invalid URL, network failure or non-2xx status.
 * @throws {TimeoutError} The request exceeded its timeout.
 * @throws {ResponseTooLargeError} The body exceeded `maxBytes`.
 */
export async function fetchBinary(
  url: string,
  options: FetchOptions = {}
): Promise<BinaryFetchResult> {
  const response = await request(url, "application/pdf, */*;q=0.5", options);
  const data = await readBytesWithLimit(
    response,
    options.maxBytes ?? config.maxPdfSize
  );

  return {
    data,
    url: response.url || url,
    contentType: response.headers.get("content-type") ?? "",
  };
}
