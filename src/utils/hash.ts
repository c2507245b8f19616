/**
 * @module utils/hash
 * @fileoverview Content-addressed identifiers.
 *
 * Chunk and atomic-fact ids are the md5 hex digest of their UTF-8 text. The
 * same text always yields the same id, so re-ingesting a document merges into
 * the existing graph nodes instead of creating new ones.
 */

import crypto from "node:crypto";

/**
 * md5 hex digest of a string's UTF-8 bytes.
 *
 * @example
 * ```ts
 * contentHash("hello"); // => "5d41402abc4b2a76b9719d911017c592"
 * ```
 */
export function contentHash(text: string): string {
  return crypto.createHash("md5").update(text, "utf8").digest("hex");
}

/** Id of a chunk node: the hash of its exact text. */
export function chunkId(chunkText: string): string {
  return contentHash(chunkText);
}

/** Id of an atomic-fact node: the hash of the fact sentence. */
export function atomicFactId(factText: string): string {
  return contentHash(factText);
}
