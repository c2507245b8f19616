import type { ChunkExtraction, GraphStore } from "../../src/graph/graph-store.js";

interface ChunkNode {
  id: string;
  text: string;
  index: number;
  documentName: string;
}

/**
 * In-memory {@link GraphStore} with merge-by-id semantics. Relationships are
 * kept as `"<from>|<to>"` keys per type, so merging an edge twice stores it
 * once.
 */
export class MemoryGraphStore implements GraphStore {
  readonly documents = new Set<string>();
  readonly chunks = new Map<string, ChunkNode>();
  readonly atomicFacts = new Map<string, string>();
  readonly keyElements = new Set<string>();
  readonly hasChunk = new Set<string>();
  readonly hasAtomicFact = new Set<string>();
  readonly hasKeyElement = new Set<string>();
  readonly next = new Set<string>();

  constraintsEnsured = 0;
  closed = false;
  readonly calls: string[] = [];

  async ensureConstraints(): Promise<void> {
    this.constraintsEnsured++;
  }

  async importDocument(documentName: string, chunks: readonly ChunkExtraction[]): Promise<void> {
    this.calls.push(`import:${documentName}`);
    this.documents.add(documentName);
    for (const chunk of chunks) {
      this.chunks.set(chunk.chunkId, {
        id: chunk.chunkId,
        text: chunk.chunkText,
        index: chunk.index,
        documentName,
      });
      this.hasChunk.add(`${documentName}|${chunk.chunkId}`);
      for (const fact of chunk.atomicFacts) {
        this.atomicFacts.set(fact.id, fact.text);
        this.hasAtomicFact.add(`${chunk.chunkId}|${fact.id}`);
        for (const element of fact.keyElements) {
          this.keyElements.add(element);
          this.hasKeyElement.add(`${fact.id}|${element}`);
        }
      }
    }
  }

  async linkChunkSequence(documentName: string): Promise<void> {
    this.calls.push(`link:${documentName}`);
    const ordered = [...this.hasChunk]
      .filter((edge) => edge.startsWith(`${documentName}|`))
      .map((edge) => edge.slice(documentName.length + 1))
      .flatMap((id) => {
        const node = this.chunks.get(id);
        return node ? [node] : [];
      })
      .sort((a, b) => a.index - b.index);
    for (let i = 0; i < ordered.length - 1; i++) {
      this.next.add(`${ordered[i].id}|${ordered[i + 1].id}`);
    }
  }

  async deleteAll(): Promise<void> {
    this.calls.push("deleteAll");
    this.documents.clear();
    this.chunks.clear();
    this.atomicFacts.clear();
    this.keyElements.clear();
    this.hasChunk.clear();
    this.hasAtomicFact.clear();
    this.hasKeyElement.clear();
    this.next.clear();
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Counts of every node and relationship type, for idempotence checks. */
  snapshot(): Record<string, number> {
    return {
      documents: this.documents.size,
      chunks: this.chunks.size,
      atomicFacts: this.atomicFacts.size,
      keyElements: this.keyElements.size,
      hasChunk: this.hasChunk.size,
      hasAtomicFact: this.hasAtomicFact.size,
      hasKeyElement: this.hasKeyElement.size,
      next: this.next.size,
    };
  }
}
