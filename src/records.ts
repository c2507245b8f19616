/**
 * @module records
 * @fileoverview Zod schemas of the JSON-lines records passed between stages.
 *
 * ```
 *   crawler ──PdfLinkRecord──> downloader ──RawTextRecord──> preprocessor
 *      │                                                          │
 *      └──PageRecord (optional)                     LlmReadyRecord│
 *                                                                 v
 *                                        IngestionRecord ──> extraction
 * ```
 *
 * Readers validate with these schemas; unknown fields pass through untouched
 * and are ignored.
 */

import { z } from "zod";

/** One discovered PDF and the page it was linked from. */
export const PdfLinkRecordSchema = z.object({
  pdf_url: z.string().min(1),
  source_page: z.string(),
});
export type PdfLinkRecord = z.infer<typeof PdfLinkRecordSchema>;

/** Full text of one downloaded PDF, or of one captured HTML page. */
export const TextRecordSchema = z.object({
  id: z.string(),
  url: z.string(),
  title: z.string(),
  text: z.string(),
  tokens: z.number().int().nonnegative(),
});
export type RawTextRecord = z.infer<typeof TextRecordSchema>;
export type PageRecord = RawTextRecord;

/**
 * Preprocessor input. Only `url` and `text` are read; a record with either
 * missing or null is skipped rather than rejected. Other fields are not
 * validated.
 */
export const PreprocessInputSchema = z.object({
  url: z.string().nullish(),
  text: z.string().nullish(),
});
export type PreprocessInput = z.infer<typeof PreprocessInputSchema>;

/** One section chunk, sized for a single LLM request. */
export const LlmReadyRecordSchema = z.object({
  /** `<url>#chunk-<n>` */
  id: z.string(),
  url: z.string(),
  /** Section heading, or "General". */
  title: z.string(),
  text: z.string(),
  tokens: z.number().int().nonnegative(),
});
export type LlmReadyRecord = z.infer<typeof LlmReadyRecordSchema>;

/** A document to ingest: its id becomes the Document node id. */
export const IngestionRecordSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
});
