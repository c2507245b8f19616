/**
 * @module utils/errors
 * @fileoverview Error class hierarchy for crawl-graph.
 *
 * Every error raised by the pipeline extends {@link CrawlGraphError}, which
 * carries a machine-readable `code` next to the human-readable `message`.
 * Batch loops (crawl levels, PDF downloads, JSONL ingestion) log these and
 * move on; MCP tool handlers render them with {@link formatError}.
 *
 * ## Error Hierarchy
 * ```
 * Error (built-in)
 *   └── CrawlGraphError (base)  ─── code: string
 *         ├── FetchError             ─── "FETCH_FAILED"  + optional statusCode
 *         ├── TimeoutError           ─── "TIMEOUT"
 *         ├── ContentTypeError       ─── "CONTENT_TYPE_REJECTED"
 *         ├── ResponseTooLargeError  ─── "RESPONSE_TOO_LARGE"
 *         ├── PdfExtractionError     ─── "PDF_EXTRACTION_FAILED"
 *         ├── ExtractionError        ─── "EXTRACTION_FAILED" + optional chunkIndex
 *         ├── InvalidRecordError     ─── "INVALID_RECORD"
 *         └── ConfigurationError     ─── "CONFIGURATION_ERROR" + missing names
 * ```
 *
 * @example
 * ```ts
 * import { FetchError, formatError } from "./utils/errors.js";
 *
 * try {
 *   throw new FetchError("Server returned 503", 503);
 * } catch (err) {
 *   console.error(formatError(err));
 *   // => "[FETCH_FAILED] Server returned 503"
 * }
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error Class
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Base class for all crawl-graph errors.
 *
 * `name` is set to the concrete subclass so stack traces read
 * `ExtractionError: ...` rather than `Error: ...`.
 */
export class CrawlGraphError extends Error {
  /**
   * Stable SCREAMING_SNAKE_CASE error code.
   *
   * @example "FETCH_FAILED", "EXTRACTION_FAILED"
   */
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Transport Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * An HTTP fetch failed, either at the network level or with a non-2xx
 * status. {@link statusCode} is set only when the server responded.
 */
export class FetchError extends CrawlGraphError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message, "FETCH_FAILED");
    this.statusCode = statusCode;
  }
}

/** A request exceeded its time budget. */
export class TimeoutError extends CrawlGraphError {
  constructor(message: string) {
    super(message, "TIMEOUT");
  }
}

/** The response Content-Type is not one the caller accepts. */
export class ContentTypeError extends CrawlGraphError {
  constructor(message: string) {
    super(message, "CONTENT_TYPE_REJECTED");
  }
}

/** The response body exceeded the configured size limit. */
export class ResponseTooLargeError extends CrawlGraphError {
  constructor(message: string) {
    super(message, "RESPONSE_TOO_LARGE");
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Content Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/** A downloaded file could not be opened or read as a PDF. */
export class PdfExtractionError extends CrawlGraphError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "PDF_EXTRACTION_FAILED", options);
  }
}

/**
 * LLM extraction failed for a document.
 *
 * Raised when a chunk's model call rejects or when its output does not
 * conform to the extraction schema. {@link chunkIndex} identifies the first
 * failing chunk (0-based) when known.
 */
export class ExtractionError extends CrawlGraphError {
  public readonly chunkIndex?: number;

  constructor(
    message: string,
    chunkIndex?: number,
    options?: { cause?: unknown },
  ) {
    super(message, "EXTRACTION_FAILED", options);
    this.chunkIndex = chunkIndex;
  }
}

/** A JSON-lines record could not be parsed or lacks required fields. */
export class InvalidRecordError extends CrawlGraphError {
  /** 1-based line number in the source file, when read from a file. */
  public readonly line?: number;

  constructor(message: string, line?: number) {
    super(message, "INVALID_RECORD");
    this.line = line;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Startup Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Configuration is invalid or required credentials are missing.
 * Raised before any pipeline work starts.
 */
export class ConfigurationError extends CrawlGraphError {
  /** Names of missing or invalid environment variables. */
  public readonly variables: readonly string[];

  constructor(message: string, variables: readonly string[] = []) {
    super(message, "CONFIGURATION_ERROR");
    this.variables = variables;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Render any caught value as a single line for logs and tool responses.
 *
 * - {@link CrawlGraphError}: `"[CODE] message"`
 * - other `Error` instances: `message`
 * - anything else: `String(value)`
 *
 * @example
 * ```ts
 * formatError(new ExtractionError("chunk 3 rejected", 3));
 * // => "[EXTRACTION_FAILED] chunk 3 rejected"
 *
 * formatError("boom");
 * // => "boom"
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof CrawlGraphError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
