/**
 * @module extraction/factory
 * @fileoverview Wire an {@link IngestionPipeline} from configuration.
 */

import {
  assertGraphCredentials,
  assertIngestionCredentials,
  type AppConfig,
  type GraphCredentials,
} from "../config.js";
import { Neo4jExecutor, Neo4jGraphStore } from "../graph/neo4j-store.js";
import { assertSplitOptions } from "../text/token-splitter.js";
import { defaultTokenizer } from "../text/tokenizer.js";
import { OpenAiExtractionModel } from "./model.js";
import { IngestionPipeline } from "./pipeline.js";

function openGraphStore(credentials: GraphCredentials, database?: string): Neo4jGraphStore {
  return new Neo4jGraphStore(
    new Neo4jExecutor({
      uri: credentials.neo4jUri,
      username: credentials.neo4jUsername,
      password: credentials.neo4jPassword,
      database,
    }),
  );
}

/**
 * Build a graph store for graph-only operations. Only the Neo4j credentials
 * are required; the driver connects on first query.
 *
 * @throws {ConfigurationError} If a Neo4j credential is missing.
 */
export function createGraphStore(cfg: AppConfig): Neo4jGraphStore {
  return openGraphStore(assertGraphCredentials(cfg), cfg.neo4jDatabase);
}

/**
 * Build a pipeline on OpenAI and Neo4j and create the graph constraints.
 *
 * Credentials are checked before any connection is opened.
 *
 * @throws {ConfigurationError} If a required credential is missing.
 */
export async function createIngestionPipeline(cfg: AppConfig): Promise<IngestionPipeline> {
  const credentials = assertIngestionCredentials(cfg);
  const defaults = { chunkSize: cfg.chunkSize, chunkOverlap: cfg.chunkOverlap };
  assertSplitOptions(defaults);

  const store = openGraphStore(credentials, cfg.neo4jDatabase);

  try {
    await store.ensureConstraints();
  } catch (error: unknown) {
    await store.close();
    throw error;
  }

  return new IngestionPipeline({
    model: new OpenAiExtractionModel({
      apiKey: credentials.openaiApiKey,
      model: cfg.openaiModel,
      baseURL: cfg.openaiBaseUrl,
      maxRetries: cfg.llmMaxRetries,
    }),
    store,
    tokenizer: defaultTokenizer(),
    defaults,
  });
}
