/**
 * service.ts - The retrieval service facade
 *
 * One object owns the two external handles (embedding provider and vector
 * store) and hands them to the components that need them:
 *
 *   EmbeddingAdapter ─┐
 *                     ├─> IngestionPipeline
 *   CollectionManager ┤
 *                     └─> RetrievalEngine
 *   VectorStore ─────────> HealthReporter
 *
 * Front-ends (CLI, MCP server) build it once with createRetrievalService()
 * and call its methods. Each method runs inside an OpenTelemetry span.
 */

import {
  InvalidInputError,
  RetrievalError,
  StorageReadError,
  StorageWriteError,
  errorMessage,
} from "../errors";
import { isCapturePayloads } from "../tracing";
import { withOperationTracing } from "../tracing/operation-tracing";
import { withTimeout } from "../utils/timeout";
import { createLogger, silentLogger, type Logger } from "../utils/logger";
import {
  ChromaBackend,
  MemoryBackend,
  VoyageEmbedding,
  connectVectorStore,
  type CollectionOptions,
  type Connectivity,
  type EmbeddingFunction,
  type EmbeddingPurpose,
  type Payload,
  type VectorStore,
} from "../vectorstore";
import type { Config } from "../config";
import { CollectionManager } from "./collection-manager";
import { EmbeddingAdapter } from "./embedding-adapter";
import { HealthReporter } from "./health";
import { IngestionPipeline, type SaveTextsOptions } from "./ingestion";
import { DEFAULT_TOP_K, RetrievalEngine, type RetrieveOptions } from "./retrieval-engine";
import type { DeadlineOptions, HealthReport, QueryResult } from "./types";

export interface RetrievalServiceOptions {
  store: VectorStore;
  connectivity: Connectivity;
  embedder: EmbeddingFunction;
  collection: string;
  dimension: number;
  timeoutMs: number;
  logger?: Logger;
  now?: () => Date;
  generateId?: () => string;
}

export class RetrievalService {
  readonly collection: string;
  readonly connectivity: Connectivity;

  private readonly store: VectorStore;
  private readonly timeoutMs: number;
  private readonly collectionOptions: CollectionOptions;
  private readonly collections: CollectionManager;
  private readonly embeddings: EmbeddingAdapter;
  private readonly ingestion: IngestionPipeline;
  private readonly engine: RetrievalEngine;
  private readonly health: HealthReporter;

  constructor(options: RetrievalServiceOptions) {
    const logger = options.logger ?? silentLogger;
    const { store, collection, timeoutMs } = options;

    this.store = store;
    this.collection = collection;
    this.connectivity = options.connectivity;
    this.timeoutMs = timeoutMs;
    this.collectionOptions = { dimension: options.dimension, distanceMetric: "cosine" };

    this.collections = new CollectionManager(store, {
      timeoutMs,
      logger: logger.child("Collections"),
    });
    this.embeddings = new EmbeddingAdapter(options.embedder, {
      dimension: options.dimension,
      timeoutMs,
      logger: logger.child("Embeddings"),
    });

    const shared = {
      store,
      collections: this.collections,
      embeddings: this.embeddings,
      collection,
      collectionOptions: this.collectionOptions,
      timeoutMs,
    };
    this.ingestion = new IngestionPipeline({
      ...shared,
      logger: logger.child("Ingestion"),
      now: options.now,
      generateId: options.generateId,
    });
    this.engine = new RetrievalEngine({ ...shared, logger: logger.child("Retrieval") });
    this.health = new HealthReporter({
      store,
      connectivity: options.connectivity,
      collection,
      timeoutMs,
      logger: logger.child("Health"),
      onStoreFailure: () => this.collections.invalidate(collection),
    });
  }

  /** Makes sure the collection exists. Other operations call this themselves. */
  async ensureReady(options: DeadlineOptions = {}): Promise<void> {
    return withOperationTracing("ensure_ready", this.attributes(), () =>
      this.collections.ensureReady(
        this.collection,
        this.collectionOptions,
        options.timeoutMs ?? this.timeoutMs
      )
    );
  }

  async saveText(
    text: string,
    metadata: Payload = {},
    options: DeadlineOptions = {}
  ): Promise<string> {
    return withOperationTracing("save_text", this.attributes(), () =>
      this.ingestion.saveText(text, metadata, options)
    );
  }

  async saveTexts(
    texts: string[],
    metadataList?: Payload[],
    options: SaveTextsOptions = {}
  ): Promise<string[]> {
    return withOperationTracing(
      "save_texts",
      this.attributes({ "retrieval.batch_size": texts.length }),
      async (span) => {
        const ids = await this.ingestion.saveTexts(texts, metadataList, options);
        span.setAttribute("retrieval.saved", ids.length);
        return ids;
      }
    );
  }

  async retrieve(
    query: string,
    topK: number = DEFAULT_TOP_K,
    options: RetrieveOptions = {}
  ): Promise<QueryResult[]> {
    const attributes = this.attributes({ "retrieval.top_k": topK });
    if (isCapturePayloads) attributes["retrieval.query"] = query;

    return withOperationTracing("retrieve", attributes, async (span) => {
      const results = await this.engine.retrieve(query, topK, options);
      span.setAttribute("retrieval.result_count", results.length);
      return results;
    });
  }

  /**
   * Embeds texts without storing them.
   */
  async embedTexts(
    texts: string[],
    purpose: EmbeddingPurpose = "document",
    options: DeadlineOptions = {}
  ): Promise<number[][]> {
    return withOperationTracing(
      "embed",
      this.attributes({ "retrieval.batch_size": texts.length, "retrieval.purpose": purpose }),
      () => this.embeddings.embed(texts, purpose, options.timeoutMs ?? this.timeoutMs)
    );
  }

  /** Number of records in the collection. */
  async countRecords(options: DeadlineOptions = {}): Promise<number> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    return withOperationTracing("count", this.attributes(), async () => {
      await this.collections.ensureReady(this.collection, this.collectionOptions, timeoutMs);
      try {
        return await withTimeout("count", timeoutMs, () => this.store.count(this.collection));
      } catch (error) {
        throw this.storeFailure(error, (message) =>
          new StorageReadError(`Count of "${this.collection}" failed: ${message}`, error)
        );
      }
    });
  }

  /**
   * Deletes records by id. Unknown ids are ignored by the store.
   *
   * @returns Number of ids submitted
   */
  async deleteRecords(ids: string[], options: DeadlineOptions = {}): Promise<number> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    return withOperationTracing(
      "delete",
      this.attributes({ "retrieval.batch_size": ids.length }),
      async () => {
        if (ids.length === 0 || ids.some((id) => id.trim() === "")) {
          throw new InvalidInputError("ids must be a non-empty list of non-empty ids");
        }
        await this.collections.ensureReady(this.collection, this.collectionOptions, timeoutMs);
        try {
          await withTimeout("delete", timeoutMs, () => this.store.delete(this.collection, ids));
        } catch (error) {
          throw this.storeFailure(error, (message) =>
            new StorageWriteError(`Delete from "${this.collection}" failed: ${message}`, error)
          );
        }
        return ids.length;
      }
    );
  }

  /** Never throws; see HealthReporter. */
  async checkHealth(): Promise<HealthReport> {
    return withOperationTracing("health", this.attributes(), async (span) => {
      const report = await this.health.checkHealth();
      span.setAttribute("retrieval.health", report.status);
      return report;
    });
  }

  private attributes(extra: Record<string, string | number> = {}): Record<string, string | number> {
    return {
      "retrieval.collection": this.collection,
      "retrieval.connectivity": this.connectivity,
      ...extra,
    };
  }

  private storeFailure(
    error: unknown,
    wrap: (message: string) => RetrievalError
  ): RetrievalError {
    this.collections.invalidate(this.collection);
    return error instanceof RetrievalError ? error : wrap(errorMessage(error));
  }
}

/**
 * Builds a service from configuration: Voyage AI embeddings, Chroma at
 * CHROMA_URL, and the configured fallback when Chroma doesn't answer.
 */
export async function createRetrievalService(
  config: Config,
  options: { logger?: Logger } = {}
): Promise<RetrievalService> {
  const logger = options.logger ?? createLogger("Service", config.logLevel);

  const candidates: VectorStore[] = [
    new ChromaBackend({ chromaUrl: config.chromaUrl, apiKey: config.chromaApiKey }),
  ];
  if (config.fallback === "chroma") {
    candidates.push(new ChromaBackend({ chromaUrl: config.chromaFallbackUrl }));
  } else if (config.fallback === "memory") {
    candidates.push(new MemoryBackend());
  }

  const { store, connectivity } = await connectVectorStore(candidates, {
    timeoutMs: config.timeoutMs,
    logger: logger.child("Connection"),
  });

  return new RetrievalService({
    store,
    connectivity,
    embedder: new VoyageEmbedding({ apiKey: config.voyageApiKey, model: config.voyageModel }),
    collection: config.collectionName,
    dimension: config.dimension,
    timeoutMs: config.timeoutMs,
    logger,
  });
}
