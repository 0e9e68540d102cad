/**
 * vectorstore/index.ts - Public API for the vector store module
 *
 * Re-exports everything other modules need from the vector store system.
 * Import from here; never import directly from types.ts, embeddings.ts,
 * or chroma-backend.ts.
 *
 * Usage:
 *   import {
 *     ChromaBackend,
 *     VoyageEmbedding,
 *     connectVectorStore,
 *     type VectorStore,
 *     type VectorRecord,
 *   } from "./vectorstore";
 */

// Interfaces and types: what the retrieval core codes against
export type {
  VectorStore,
  VectorRecord,
  SearchHit,
  SearchOptions,
  CollectionOptions,
  DistanceMetric,
  EmbeddingFunction,
  EmbeddingPurpose,
  CallOptions,
  Payload,
  PayloadValue,
  PayloadFilter,
} from "./types";

export { RESERVED_PAYLOAD_KEY } from "./types";

// Implementations, wired together at startup
export { ChromaBackend, DEFAULT_CHROMA_URL } from "./chroma-backend";
export { MemoryBackend } from "./memory-backend";
export { VoyageEmbedding, DEFAULT_MODEL } from "./embeddings";
export {
  connectVectorStore,
  OfflineBackend,
  type Connectivity,
  type VectorStoreConnection,
} from "./connection";

/**
 * Default collection name for ingested passages.
 */
export const DEFAULT_COLLECTION = "text_embeddings";

/**
 * Vector length of the default embedding model.
 */
export const DEFAULT_DIMENSION = 1024;
