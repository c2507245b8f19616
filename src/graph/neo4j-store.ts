/**
 * @module graph/neo4j-store
 * @fileoverview {@link GraphStore} on Neo4j.
 *
 * ```
 *   Neo4jGraphStore ──(query, params)──> CypherExecutor
 *                                           │
 *                              Neo4jExecutor: driver.executeQuery()
 * ```
 *
 * The store only builds parameters and picks statements from
 * `graph/queries`. Query execution sits behind {@link CypherExecutor} so
 * the parameter mapping can be checked without a database.
 */

import neo4j, { type Driver } from "neo4j-driver";
import type { ChunkExtraction, GraphStore } from "./graph-store.js";
import {
  CONSTRAINT_QUERIES,
  DELETE_ALL_QUERY,
  IMPORT_DOCUMENT_QUERY,
  LINK_CHUNK_SEQUENCE_QUERY,
} from "./queries.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Executor
 * ──────────────────────────────────────────────────────────────────────────── */

/** Runs one Cypher statement in its own transaction. */
export interface CypherExecutor {
  run(query: string, params?: Record<string, unknown>): Promise<void>;
  close(): Promise<void>;
}

export interface Neo4jConnection {
  uri: string;
  username: string;
  password: string;
  /** Server default database when omitted. */
  database?: string;
}

/** {@link CypherExecutor} over a neo4j-driver `Driver`. */
export class Neo4jExecutor implements CypherExecutor {
  private readonly driver: Driver;
  private readonly database: string | undefined;

  constructor(connection: Neo4jConnection) {
    this.driver = neo4j.driver(
      connection.uri,
      neo4j.auth.basic(connection.username, connection.password),
    );
    this.database = connection.database;
  }

  async run(query: string, params: Record<string, unknown> = {}): Promise<void> {
    await this.driver.executeQuery(query, params, { database: this.database });
  }

  async close(): Promise<void> {
    await this.driver.close();
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Parameter Mapping
 * ──────────────────────────────────────────────────────────────────────────── */

/** Row shape expected by `IMPORT_DOCUMENT_QUERY`'s `$data`. */
export interface ImportRow {
  chunk_id: string;
  chunk_text: string;
  index: number;
  atomic_facts: Array<{
    id: string;
    atomic_fact: string;
    key_elements: string[];
  }>;
}

export function toImportRows(chunks: readonly ChunkExtraction[]): ImportRow[] {
  return chunks.map((chunk) => ({
    chunk_id: chunk.chunkId,
    chunk_text: chunk.chunkText,
    index: chunk.index,
    atomic_facts: chunk.atomicFacts.map((fact) => ({
      id: fact.id,
      atomic_fact: fact.text,
      key_elements: fact.keyElements,
    })),
  }));
}

/* ────────────────────────────────────────────────────────────────────────────
 * Store
 * ──────────────────────────────────────────────────────────────────────────── */

export class Neo4jGraphStore implements GraphStore {
  constructor(private readonly executor: CypherExecutor) {}

  async ensureConstraints(): Promise<void> {
    for (const query of CONSTRAINT_QUERIES) {
      await this.executor.run(query);
    }
  }

  async importDocument(
    documentName: string,
    chunks: readonly ChunkExtraction[],
  ): Promise<void> {
    await this.executor.run(IMPORT_DOCUMENT_QUERY, {
      document_name: documentName,
      data: toImportRows(chunks),
    });
  }

  async linkChunkSequence(documentName: string): Promise<void> {
    await this.executor.run(LINK_CHUNK_SEQUENCE_QUERY, {
      document_name: documentName,
    });
  }

  async deleteAll(): Promise<void> {
    await this.executor.run(DELETE_ALL_QUERY);
    console.error("[graph] Graph deleted");
  }

  async close(): Promise<void> {
    await this.executor.close();
  }
}
