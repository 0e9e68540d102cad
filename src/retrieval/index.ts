/**
 * retrieval/index.ts - Public API for the retrieval core
 */

export { RetrievalService, createRetrievalService } from "./service";
export type { RetrievalServiceOptions } from "./service";
export { CollectionManager } from "./collection-manager";
export { EmbeddingAdapter } from "./embedding-adapter";
export { IngestionPipeline, MAX_BATCH_SIZE } from "./ingestion";
export type { SaveTextsOptions } from "./ingestion";
export {
  RetrievalEngine,
  DEFAULT_TOP_K,
  MAX_TOP_K,
  toQueryResult,
} from "./retrieval-engine";
export type { RetrieveOptions } from "./retrieval-engine";
export { HealthReporter } from "./health";
export { mergePayload } from "./payload";
export type {
  QueryResult,
  HealthReport,
  HealthStatus,
  CollectionState,
  DeadlineOptions,
} from "./types";
