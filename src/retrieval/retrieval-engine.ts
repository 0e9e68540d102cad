/**
 * retrieval-engine.ts - Similarity search over stored passages
 *
 * retrieve() embeds the query in "query" mode and asks the store for the
 * nearest `topK` records. Hits come back in the store's order (descending
 * score, store-native tie order) and are not re-sorted.
 *
 * An empty result means nothing matched. A failing store is always an error
 * (StorageReadError), never an empty list.
 */

import {
  InvalidInputError,
  RetrievalError,
  StorageReadError,
  errorMessage,
} from "../errors";
import { assertTimeout, withTimeout } from "../utils/timeout";
import { silentLogger, type Logger } from "../utils/logger";
import type {
  CollectionOptions,
  PayloadFilter,
  SearchHit,
  VectorStore,
} from "../vectorstore";
import type { CollectionManager } from "./collection-manager";
import type { EmbeddingAdapter } from "./embedding-adapter";
import type { DeadlineOptions, QueryResult } from "./types";

export const DEFAULT_TOP_K = 5;
export const MAX_TOP_K = 100;

export interface RetrieveOptions extends DeadlineOptions {
  /** Only records whose payload has these exact values */
  filter?: PayloadFilter;
}

export interface RetrievalDeps {
  store: VectorStore;
  collections: CollectionManager;
  embeddings: EmbeddingAdapter;
  collection: string;
  collectionOptions: CollectionOptions;
  timeoutMs: number;
  logger?: Logger;
}

export class RetrievalEngine {
  private readonly logger: Logger;

  constructor(private readonly deps: RetrievalDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Finds the `topK` passages most similar to `query`.
   *
   * @param topK - Integer from 1 to MAX_TOP_K
   * @returns At most `topK` results, best first
   */
  async retrieve(
    query: string,
    topK: number = DEFAULT_TOP_K,
    options: RetrieveOptions = {}
  ): Promise<QueryResult[]> {
    if (query.trim() === "") {
      throw new InvalidInputError("query must not be empty");
    }
    if (!Number.isInteger(topK) || topK < 1 || topK > MAX_TOP_K) {
      throw new InvalidInputError(
        `topK must be an integer from 1 to ${MAX_TOP_K}, got ${topK}`
      );
    }

    const { collection, collectionOptions } = this.deps;
    const timeoutMs = options.timeoutMs ?? this.deps.timeoutMs;
    assertTimeout(timeoutMs);

    await this.deps.collections.ensureReady(collection, collectionOptions, timeoutMs);
    const [vector] = await this.deps.embeddings.embed([query], "query", timeoutMs);

    let hits: SearchHit[];
    try {
      hits = await withTimeout("search", timeoutMs, () =>
        this.deps.store.search(collection, vector, {
          limit: topK,
          where: options.filter,
        })
      );
    } catch (error) {
      this.deps.collections.invalidate(collection);
      if (error instanceof RetrievalError) throw error;
      throw new StorageReadError(
        `Search in "${collection}" failed: ${errorMessage(error)}`,
        error
      );
    }

    this.logger.debug(`Query matched ${hits.length} of at most ${topK} records`);
    return hits.map(toQueryResult);
  }
}

/**
 * Maps a store hit to a QueryResult. A missing or non-string `text` becomes "".
 */
export function toQueryResult(hit: SearchHit): QueryResult {
  const text = hit.payload.text;
  return {
    id: hit.id,
    score: hit.score,
    payload: hit.payload,
    text: typeof text === "string" ? text : "",
  };
}
