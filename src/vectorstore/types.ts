/**
 * types.ts - Vector database interfaces and types
 *
 * What this file does:
 * Defines the interfaces the retrieval core uses to talk to the embedding
 * provider and the vector database. Ingestion, retrieval and health code
 * import from here and never touch Chroma or Voyage AI directly.
 *
 * Key concepts:
 * - EmbeddingFunction: Turns text into vectors, in document or query mode
 * - VectorStore: Collection management, upsert, similarity search, count, delete
 * - VectorRecord: What gets persisted (id + vector + payload)
 * - SearchHit: What a similarity search returns (id + score + payload)
 *
 * The store works with vectors, not text. Embedding happens one layer up so
 * the core can validate every vector before it reaches the database.
 */

/**
 * Which side of an asymmetric embedding a text is on.
 *
 * Retrieval-tuned models embed stored passages and search queries
 * differently. Embedding a query in "document" mode still returns a vector of
 * the right length, it just matches worse, so the purpose is passed
 * explicitly on every call.
 */
export type EmbeddingPurpose = "document" | "query";

/** Per-call options for network-bound operations. */
export interface CallOptions {
  /** Aborted when the caller's deadline passes */
  signal?: AbortSignal;
}

/**
 * A function that converts text into embedding vectors.
 *
 * Implementations map provider errors to EmbeddingProviderError subclasses
 * (RateLimitedError, ProviderFailureError).
 */
export interface EmbeddingFunction {
  /**
   * Converts an array of text strings into embedding vectors.
   *
   * @param texts - The strings to embed
   * @param purpose - "document" for stored passages, "query" for searches
   * @returns One vector per input text, in input order
   */
  embed(
    texts: string[],
    purpose: EmbeddingPurpose,
    options?: CallOptions
  ): Promise<number[][]>;
}

/** Any JSON value. Payload fields may be scalars or nested structures. */
export type PayloadValue =
  | string
  | number
  | boolean
  | null
  | PayloadValue[]
  | { [key: string]: PayloadValue };

/**
 * Structured data stored alongside a vector.
 *
 * Records written by the ingestion pipeline always carry `text` (the source
 * passage) and `created_at` (ISO-8601 timestamp).
 */
export type Payload = Record<string, PayloadValue>;

/**
 * Payload key the Chroma backend uses for its own bookkeeping. Callers may
 * not set it.
 */
export const RESERVED_PAYLOAD_KEY = "_structured_keys";

/** The unit of persistence. */
export interface VectorRecord {
  /** Unique identifier, assigned at ingestion and never changed */
  id: string;
  /** Embedding; its length equals the collection's dimension */
  vector: number[];
  payload: Payload;
}

/**
 * A match returned by similarity search.
 */
export interface SearchHit {
  id: string;
  /**
   * Cosine similarity to the query: 1.0 = same direction, 0.0 = unrelated,
   * -1.0 = opposite. Higher is more similar.
   */
  score: number;
  payload: Payload;
}

/** Distance metric fixed at collection creation. */
export type DistanceMetric = "cosine";

/**
 * Parameters a collection is created with. Both are set once and never
 * migrated; an existing collection is used as it is.
 */
export interface CollectionOptions {
  /** Length of every vector in the collection (e.g., 1024) */
  dimension: number;
  distanceMetric: DistanceMetric;
}

/** Flat equality filter on payload fields. */
export type PayloadFilter = Record<string, string | number | boolean>;

export interface SearchOptions {
  /** Maximum number of hits to return */
  limit: number;
  /** Only records whose payload matches every key/value pair */
  where?: PayloadFilter;
}

/**
 * The main interface for vector database operations.
 *
 * Implementations throw whatever their client throws; the retrieval core
 * maps those failures to its own error taxonomy.
 *
 * Usage pattern:
 *   1. listCollections() / createCollection(): make sure the collection exists
 *   2. upsert(): write records
 *   3. search(): nearest neighbours for a query vector
 *   4. count() / delete(): housekeeping
 */
export interface VectorStore {
  /** Human-readable backend description for logs and health output */
  readonly description: string;

  /** Resolves when the store is reachable. */
  heartbeat(): Promise<void>;

  /** Names of every collection in the store. */
  listCollections(): Promise<string[]>;

  /**
   * Creates a collection if it does not exist. Calling it for an existing
   * collection is a no-op, not an error.
   */
  createCollection(name: string, options: CollectionOptions): Promise<void>;

  /** Inserts or replaces records by id, all or nothing. */
  upsert(collection: string, records: VectorRecord[]): Promise<void>;

  /**
   * Nearest-neighbour search.
   *
   * @returns Hits sorted by descending similarity, at most `options.limit`
   */
  search(
    collection: string,
    vector: number[],
    options: SearchOptions
  ): Promise<SearchHit[]>;

  /** Number of records in a collection. */
  count(collection: string): Promise<number>;

  /** Removes records by id. Unknown ids are ignored. */
  delete(collection: string, ids: string[]): Promise<void>;
}
