/**
 * @module config
 * @fileoverview Centralized application configuration loaded from environment variables.
 *
 * Every stage of the pipeline reads its operational parameters from here. All
 * settings except the ingestion credentials have defaults, so the crawler,
 * downloader and preprocessor run with zero configuration.
 *
 * ## Architecture Position
 * This module sits at the bottom of the dependency graph. It imports only
 * the error classes from `utils`.
 *
 * ```
 *  +---------+  +---------+  +-----+  +------------+  +-------+
 *  |  tools  |  | crawler |  | pdf |  | extraction |  | graph |
 *  +----+----+  +----+----+  +--+--+  +-----+------+  +---+---+
 *       |            |          |           |             |
 *       +------------+-----+----+-----------+-------------+
 *                          |
 *                    +-----v-----+
 *                    |  config   |---> utils/errors
 *                    +-----------+
 * ```
 *
 * ## Environment Variable Naming Convention
 * - All uppercase with underscores (SCREAMING_SNAKE_CASE).
 * - Numeric values are parsed with `parseInt(..., 10)`.
 * - Enumerated values are validated; an unknown value is a
 *   {@link ConfigurationError} at load time.
 * - An empty string disables optional file outputs (`PAGES_FILE=""`).
 *
 * @example
 * ```ts
 * import { config } from "./config.js";
 * console.log(config.maxDepth); // 3 (or whatever env says)
 *
 * // For tests, pass an explicit environment:
 * const testConfig = loadConfig({ MAX_DEPTH: "1" });
 * ```
 */

import { ConfigurationError } from "./utils/errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/** How the preprocessor closes a chunk that would cross its token budget. */
export type ChunkOverflowMode = "strict" | "overshoot";

/** How a downloaded PDF's cache file is named. */
export type PdfCacheKeyMode = "url-hash" | "basename";

/** Environment shape accepted by {@link loadConfig}. */
export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Complete application configuration.
 */
export interface AppConfig {
  /* ── Crawler ─────────────────────────────────────────────────────────── */

  /**
   * Number of BFS levels to crawl. Depth 0 is the seed list.
   * @default 3
   */
  maxDepth: number;

  /**
   * Upper bound on concurrent page fetches within a level.
   * @default 10
   */
  maxConcurrent: number;

  /**
   * Host memory usage (percent) at or above which new fetches wait.
   * @default 70
   */
  memoryThresholdPercent: number;

  /**
   * How often a waiting fetch re-samples memory usage, in milliseconds.
   * @default 1000
   */
  memoryCheckIntervalMs: number;

  /* ── HTTP ────────────────────────────────────────────────────────────── */

  /**
   * Per-request timeout in milliseconds, for pages and PDFs alike.
   * @default 30000
   */
  fetchTimeout: number;

  /**
   * Maximum HTML response body size in bytes.
   * @default 10485760 (10 MiB)
   */
  maxResponseSize: number;

  /**
   * Maximum PDF download size in bytes.
   * @default 104857600 (100 MiB)
   */
  maxPdfSize: number;

  /**
   * User-Agent header sent with every outbound request.
   * @default "crawl-graph/1.0"
   */
  userAgent: string;

  /* ── Artifacts ───────────────────────────────────────────────────────── */

  /** @default "output/pdf_links.jsonl" */
  pdfLinksFile: string;

  /**
   * Page-capture output. Empty disables page capture.
   * @default ""
   */
  pagesFile: string;

  /** @default "output/raw_text.jsonl" */
  rawTextFile: string;

  /** @default "output/llm_ready.jsonl" */
  llmReadyFile: string;

  /** @default "downloads" */
  downloadDir: string;

  /** @default "url-hash" */
  pdfCacheKey: PdfCacheKeyMode;

  /* ── Preprocessing ───────────────────────────────────────────────────── */

  /** @default 512 */
  preprocessMaxTokens: number;

  /** @default "strict" */
  chunkOverflow: ChunkOverflowMode;

  /* ── Extraction ──────────────────────────────────────────────────────── */

  /**
   * Token window size for LLM extraction.
   * @default 2000
   */
  chunkSize: number;

  /**
   * Tokens shared by consecutive extraction windows.
   * @default 200
   */
  chunkOverlap: number;

  openaiApiKey: string | undefined;

  /** @default "gpt-4o-mini" */
  openaiModel: string;

  /** Alternate OpenAI-compatible endpoint. */
  openaiBaseUrl: string | undefined;

  /**
   * Retries the OpenAI client makes on transient errors.
   * @default 2
   */
  llmMaxRetries: number;

  /* ── Graph ───────────────────────────────────────────────────────────── */

  neo4jUri: string | undefined;
  neo4jUsername: string | undefined;
  neo4jPassword: string | undefined;

  /** Target database; the server default when unset. */
  neo4jDatabase: string | undefined;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Parsing Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

function parseIntVar(env: Environment, name: string, fallback: number): number {
  const value = parseInt(env[name] ?? String(fallback), 10);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${name} must be an integer, got "${env[name]}"`, [name]);
  }
  return value;
}

function parseEnumVar<T extends string>(
  env: Environment,
  name: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === raw);
  if (match === undefined) {
    throw new ConfigurationError(
      `${name} must be one of ${allowed.join(", ")}; got "${raw}"`,
      [name],
    );
  }
  return match;
}

/** Unset and empty both read as "not configured". */
function optionalVar(env: Environment, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === "" ? undefined : value;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Config Loader
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Build a complete {@link AppConfig} from an environment.
 *
 * Reads `process.env` unless another environment is passed in.
 *
 * @throws {ConfigurationError} If a numeric variable is not an integer or an
 *   enumerated variable has an unknown value.
 */
export function loadConfig(env: Environment = process.env): AppConfig {
  return {
    maxDepth: parseIntVar(env, "MAX_DEPTH", 3),
    maxConcurrent: parseIntVar(env, "MAX_CONCURRENT", 10),
    memoryThresholdPercent: parseIntVar(env, "MEMORY_THRESHOLD_PERCENT", 70),
    memoryCheckIntervalMs: parseIntVar(env, "MEMORY_CHECK_INTERVAL", 1000),

    fetchTimeout: parseIntVar(env, "FETCH_TIMEOUT", 30000),
    maxResponseSize: parseIntVar(env, "MAX_RESPONSE_SIZE", 10 * 1024 * 1024),
    maxPdfSize: parseIntVar(env, "MAX_PDF_SIZE", 100 * 1024 * 1024),
    userAgent: env.USER_AGENT ?? "crawl-graph/1.0",

    pdfLinksFile: env.PDF_LINKS_FILE ?? "output/pdf_links.jsonl",
    pagesFile: env.PAGES_FILE ?? "",
    rawTextFile: env.RAW_TEXT_FILE ?? "output/raw_text.jsonl",
    llmReadyFile: env.LLM_READY_FILE ?? "output/llm_ready.jsonl",
    downloadDir: env.DOWNLOAD_DIR ?? "downloads",
    pdfCacheKey: parseEnumVar(env, "PDF_CACHE_KEY", ["url-hash", "basename"], "url-hash"),

    preprocessMaxTokens: parseIntVar(env, "PREPROCESS_MAX_TOKENS", 512),
    chunkOverflow: parseEnumVar(env, "CHUNK_OVERFLOW", ["strict", "overshoot"], "strict"),

    chunkSize: parseIntVar(env, "CHUNK_SIZE", 2000),
    chunkOverlap: parseIntVar(env, "CHUNK_OVERLAP", 200),
    openaiApiKey: optionalVar(env, "OPENAI_API_KEY"),
    openaiModel: env.OPENAI_MODEL ?? "gpt-4o-mini",
    openaiBaseUrl: optionalVar(env, "OPENAI_BASE_URL"),
    llmMaxRetries: parseIntVar(env, "LLM_MAX_RETRIES", 2),

    neo4jUri: optionalVar(env, "NEO4J_URI"),
    neo4jUsername: optionalVar(env, "NEO4J_USERNAME"),
    neo4jPassword: optionalVar(env, "NEO4J_PASSWORD"),
    neo4jDatabase: optionalVar(env, "NEO4J_DATABASE"),
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Credential Checks
 * ──────────────────────────────────────────────────────────────────────────── */

/** Credentials the ingestion stage cannot start without. */
export interface IngestionCredentials {
  openaiApiKey: string;
  neo4jUri: string;
  neo4jUsername: string;
  neo4jPassword: string;
}

/**
 * Verify that every LLM and graph credential is present.
 *
 * Called before any ingestion work, so a missing key fails the whole run
 * up front rather than document by document.
 *
 * @throws {ConfigurationError} Listing every missing variable.
 */
export function assertIngestionCredentials(cfg: AppConfig): IngestionCredentials {
  const { openaiApiKey, neo4jUri, neo4jUsername, neo4jPassword } = cfg;

  if (
    openaiApiKey !== undefined &&
    neo4jUri !== undefined &&
    neo4jUsername !== undefined &&
    neo4jPassword !== undefined
  ) {
    return { openaiApiKey, neo4jUri, neo4jUsername, neo4jPassword };
  }

  const missing: string[] = [];
  if (openaiApiKey === undefined) missing.push("OPENAI_API_KEY");
  if (neo4jUri === undefined) missing.push("NEO4J_URI");
  if (neo4jUsername === undefined) missing.push("NEO4J_USERNAME");
  if (neo4jPassword === undefined) missing.push("NEO4J_PASSWORD");

  throw new ConfigurationError(
    `Missing required environment variables: ${missing.join(", ")}`,
    missing,
  );
}

/** Credentials needed to reach the graph alone. */
export type GraphCredentials = Omit<IngestionCredentials, "openaiApiKey">;

/**
 * Verify that the Neo4j credentials are present. Used by graph-only
 * operations that never call the LLM.
 *
 * @throws {ConfigurationError} Listing every missing variable.
 */
export function assertGraphCredentials(cfg: AppConfig): GraphCredentials {
  const { neo4jUri, neo4jUsername, neo4jPassword } = cfg;

  if (neo4jUri !== undefined && neo4jUsername !== undefined && neo4jPassword !== undefined) {
    return { neo4jUri, neo4jUsername, neo4jPassword };
  }

  const missing: string[] = [];
  if (neo4jUri === undefined) missing.push("NEO4J_URI");
  if (neo4jUsername === undefined) missing.push("NEO4J_USERNAME");
  if (neo4jPassword === undefined) missing.push("NEO4J_PASSWORD");

  throw new ConfigurationError(
    `Missing required environment variables: ${missing.join(", ")}`,
    missing,
  );
}

/* ────────────────────────────────────────────────────────────────────────────
 * Singleton Export
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Pre-loaded configuration singleton, evaluated once at module load time.
 *
 * Call {@link loadConfig} directly for a fresh snapshot.
 */
export const config: AppConfig = loadConfig();
