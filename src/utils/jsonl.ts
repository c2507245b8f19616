/**
 * @module utils/jsonl
 * @fileoverview JSON-lines persistence for pipeline artifacts.
 *
 * Every stage hands its output to the next through a JSON-lines file: one
 * JSON object per line, UTF-8, `\n` terminated. Writers append one record at
 * a time so a crash mid-run leaves every completed record on disk. Readers
 * validate each line against a zod schema and report bad lines through a
 * callback instead of failing the whole file.
 *
 * @example
 * ```ts
 * import { z } from "zod";
 * import { appendJsonl, readJsonl } from "./utils/jsonl.js";
 *
 * await appendJsonl("out/links.jsonl", { pdf_url: "https://a.com/x.pdf" });
 * const rows = await readJsonl("out/links.jsonl", z.object({ pdf_url: z.string() }), {
 *   onInvalid: (err) => console.error(err.message),
 * });
 * ```
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { z } from "zod";
import { InvalidRecordError } from "./errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Writing
 * ──────────────────────────────────────────────────────────────────────────── */

async function ensureParentDir(filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
}

/**
 * Append a single record as one line. Creates the file and its parent
 * directory when missing.
 */
export async function appendJsonl(
  filePath: string,
  record: unknown,
): Promise<void> {
  await ensureParentDir(filePath);
  await fs.appendFile(filePath, `${JSON.stringify(record)}\n`, "utf8");
}

/** Create or truncate a JSON-lines file so a run starts from empty output. */
export async function resetJsonl(filePath: string): Promise<void> {
  await ensureParentDir(filePath);
  await fs.writeFile(filePath, "", "utf8");
}

/**
 * Destination for records produced one at a time by a pipeline stage.
 *
 * The crawler writes PDF links and page records through this interface; the
 * JSON-lines implementation persists each record as soon as it is written.
 */
export interface ArtifactSink<T> {
  write(record: T): Promise<void>;
}

/** {@link ArtifactSink} that appends each record to a JSON-lines file. */
export class JsonlSink<T> implements ArtifactSink<T> {
  constructor(readonly filePath: string) {}

  async write(record: T): Promise<void> {
    await appendJsonl(this.filePath, record);
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Reading
 * ──────────────────────────────────────────────────────────────────────────── */

export interface ReadJsonlOptions {
  /**
   * Called once per line that is not valid JSON or fails the schema. The
   * line is skipped either way.
   */
  onInvalid?: (error: InvalidRecordError) => void;
}

/**
 * Parse JSON-lines text into validated records. Blank lines are ignored.
 */
export function parseJsonl<T>(
  content: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: ReadJsonlOptions = {},
): T[] {
  const records: T[] = [];
  const lines = content.split("\n");

  lines.forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line.length === 0) {
      return;
    }

    const lineNumber = index + 1;
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error: unknown) {
      options.onInvalid?.(
        new InvalidRecordError(
          `Line ${lineNumber} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
          lineNumber,
        ),
      );
      return;
    }

    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      options.onInvalid?.(
        new InvalidRecordError(`Line ${lineNumber} is invalid: ${issues}`, lineNumber),
      );
      return;
    }

    records.push(parsed.data);
  });

  return records;
}

/**
 * Read and validate every record of a JSON-lines file.
 *
 * @throws The underlying `fs` error when the file cannot be read (for
 *   example `ENOENT`); callers decide whether a missing file is fatal.
 */
export async function readJsonl<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: ReadJsonlOptions = {},
): Promise<T[]> {
  const content = await fs.readFile(filePath, "utf8");
  return parseJsonl(content, schema, options);
}

/** Whether a path exists on disk. */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** Narrow a caught value to a Node.js "file not found" error. */
export function isNotFoundError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
