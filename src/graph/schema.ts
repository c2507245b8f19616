/**
 * @module graph/schema
 * Graph schema registry.
 *
 * Every label and relationship type the ingestion queries touch is named
 * here once.
 *
 * ```
 *   (Document)-[:HAS_CHUNK]->(Chunk)-[:HAS_ATOMIC_FACT]->(AtomicFact)
 *                              |                             |
 *                           [:NEXT]                 [:HAS_KEY_ELEMENT]
 *                              v                             v
 *                           (Chunk)                     (KeyElement)
 * ```
 */

// ============================================================
// NODE LABELS
// ============================================================

/**
 * - Document: one ingested record, keyed by the caller's document name
 * - Chunk: one token window, keyed by md5 of its text
 * - AtomicFact: one extracted fact sentence, keyed by md5 of the sentence
 * - KeyElement: one key element string, keyed by the string itself
 */
export const LABELS = {
  DOCUMENT: "Document",
  CHUNK: "Chunk",
  ATOMIC_FACT: "AtomicFact",
  KEY_ELEMENT: "KeyElement",
} as const;

export type Label = (typeof LABELS)[keyof typeof LABELS];

// ============================================================
// RELATIONSHIP TYPES
// ============================================================

/**
 * Containment:
 * - HAS_CHUNK: Document -> Chunk
 * - HAS_ATOMIC_FACT: Chunk -> AtomicFact
 * - HAS_KEY_ELEMENT: AtomicFact -> KeyElement
 *
 * Order:
 * - NEXT: Chunk -> Chunk, between consecutive indices of one document
 */
export const RELS = {
  HAS_CHUNK: "HAS_CHUNK",
  HAS_ATOMIC_FACT: "HAS_ATOMIC_FACT",
  HAS_KEY_ELEMENT: "HAS_KEY_ELEMENT",
  NEXT: "NEXT",
} as const;

// ============================================================
// CONSTRAINTS
// ============================================================

/** Labels whose `id` property carries a uniqueness constraint. */
export const UNIQUE_ID_LABELS: readonly Label[] = [
  LABELS.CHUNK,
  LABELS.ATOMIC_FACT,
  LABELS.KEY_ELEMENT,
  LABELS.DOCUMENT,
];
