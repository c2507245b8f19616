/**
 * @module graph/queries
 * @fileoverview Cypher statements for graph ingestion.
 *
 * Every write is a `MERGE` keyed on `id`, so running the same import twice
 * leaves the graph unchanged.
 */

import { LABELS, RELS, UNIQUE_ID_LABELS, type Label } from "./schema.js";

/** `CREATE CONSTRAINT IF NOT EXISTS` for a label's `id` property. */
export function uniqueIdConstraint(label: Label): string {
  return `CREATE CONSTRAINT IF NOT EXISTS FOR (n:${label}) REQUIRE n.id IS UNIQUE`;
}

/** One uniqueness constraint per keyed label. */
export const CONSTRAINT_QUERIES: readonly string[] = UNIQUE_ID_LABELS.map(uniqueIdConstraint);

/**
 * Merge a document and all of its chunk extractions.
 *
 * Parameters:
 * - `$document_name`: Document id
 * - `$data`: `[{ chunk_id, chunk_text, index, atomic_facts: [{ id, atomic_fact, key_elements }] }]`
 *
 * A chunk with no atomic facts still gets its node and `HAS_CHUNK` edge; the
 * empty `UNWIND` only ends that row's fact and key-element merges.
 */
export const IMPORT_DOCUMENT_QUERY = `
MERGE (d:${LABELS.DOCUMENT} {id: $document_name})
WITH d
UNWIND $data AS row
MERGE (c:${LABELS.CHUNK} {id: row.chunk_id})
SET c.text = row.chunk_text,
    c.index = toInteger(row.index),
    c.document_name = $document_name
MERGE (d)-[:${RELS.HAS_CHUNK}]->(c)
WITH c, row
UNWIND row.atomic_facts AS af
MERGE (a:${LABELS.ATOMIC_FACT} {id: af.id})
SET a.text = af.atomic_fact
MERGE (c)-[:${RELS.HAS_ATOMIC_FACT}]->(a)
WITH a, af
UNWIND af.key_elements AS ke
MERGE (k:${LABELS.KEY_ELEMENT} {id: ke})
MERGE (a)-[:${RELS.HAS_KEY_ELEMENT}]->(k)
`;

/**
 * Link a document's chunks in index order with `NEXT`.
 *
 * For n chunks this merges n-1 edges; with fewer than two chunks the range
 * is empty and nothing is written.
 */
export const LINK_CHUNK_SEQUENCE_QUERY = `
MATCH (c:${LABELS.CHUNK})<-[:${RELS.HAS_CHUNK}]-(d:${LABELS.DOCUMENT})
WHERE d.id = $document_name
WITH c ORDER BY c.index
WITH collect(c) AS nodes
UNWIND range(0, size(nodes) - 2) AS i
WITH nodes[i] AS current, nodes[i + 1] AS next
MERGE (current)-[:${RELS.NEXT}]->(next)
`;

/** Remove every node and relationship. */
export const DELETE_ALL_QUERY = "MATCH (n) DETACH DELETE n";
