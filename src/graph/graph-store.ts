/**
 * @module graph/graph-store
 * @fileoverview Graph store boundary used by the extraction pipeline.
 */

/** One extracted fact, with its content-hash id. */
export interface AtomicFactRecord {
  /** md5 of `text`. */
  id: string;
  text: string;
  keyElements: string[];
}

/** Everything extracted from one chunk of a document. */
export interface ChunkExtraction {
  /** md5 of `chunkText`. */
  chunkId: string;
  chunkText: string;
  /** 0-based position within the document. */
  index: number;
  atomicFacts: AtomicFactRecord[];
}

/**
 * Persistent knowledge graph.
 *
 * All writes merge by id: importing the same document twice must leave the
 * graph as it was after the first import.
 */
export interface GraphStore {
  /** Create the uniqueness constraints on every keyed label. Idempotent. */
  ensureConstraints(): Promise<void>;

  /**
   * Merge the Document node, its chunks, their facts and key elements, and
   * the containment edges between them.
   */
  importDocument(documentName: string, chunks: readonly ChunkExtraction[]): Promise<void>;

  /** Merge `NEXT` edges between the document's consecutive chunks. */
  linkChunkSequence(documentName: string): Promise<void>;

  /** Delete every node and relationship. */
  deleteAll(): Promise<void>;

  close(): Promise<void>;
}
