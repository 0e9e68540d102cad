/**
 * chroma-backend.ts - Chroma implementation of the VectorStore interface
 *
 * What this file does:
 * Implements the VectorStore interface using Chroma as the backend. This is the
 * only file in the project that imports from "chromadb"; everything else codes
 * against the VectorStore interface in types.ts.
 *
 * How it works:
 * 1. createCollection() calls getOrCreateCollection with cosine distance, so
 *    two concurrent creations of the same name never produce two collections
 * 2. upsert() sends pre-computed vectors; Chroma never embeds anything itself
 * 3. search() runs a nearest-neighbour query and converts Chroma's cosine
 *    distance (0 = identical, 2 = opposite) into a similarity (1 - distance)
 * 4. count() and delete() map straight onto the collection API
 *
 * Payload encoding:
 * Chroma metadata values must be string, number, boolean or null. Payload
 * fields holding arrays or objects are stored as JSON strings, and their keys
 * are listed under STRUCTURED_KEYS_FIELD so search() can decode them again.
 * The payload's `text` is also stored as the Chroma document.
 */

import { ChromaClient, type Collection, type Where } from "chromadb";
import type {
  VectorStore,
  VectorRecord,
  SearchHit,
  SearchOptions,
  CollectionOptions,
  Payload,
  PayloadFilter,
  PayloadValue,
} from "./types";
import { RESERVED_PAYLOAD_KEY } from "./types";

/**
 * Default Chroma server URL.
 *
 * Run `chroma run --path ./data` locally or use Docker.
 */
export const DEFAULT_CHROMA_URL = "http://localhost:8000";

/** Metadata key listing the payload fields that were JSON-encoded. */
export const STRUCTURED_KEYS_FIELD = RESERVED_PAYLOAD_KEY;

/** Collections requested per listCollections() round-trip. */
const LIST_PAGE_SIZE = 100;

/** Chroma's flat metadata shape. */
export type ChromaMetadata = Record<string, string | number | boolean | null>;

/**
 * Chroma implementation of the VectorStore interface.
 *
 * Usage:
 *   const store = new ChromaBackend({ chromaUrl: "http://localhost:8000" });
 *   await store.createCollection("text_embeddings", { dimension: 1024, distanceMetric: "cosine" });
 *   await store.upsert("text_embeddings", [{ id, vector, payload }]);
 *   const hits = await store.search("text_embeddings", queryVector, { limit: 5 });
 */
export class ChromaBackend implements VectorStore {
  readonly description: string;
  private readonly client: ChromaClient;

  /**
   * Cache of collection handles.
   *
   * Each operation needs the Collection object. Handles are cached after
   * listCollections() or createCollection() so a normal operation costs one
   * round-trip, not two.
   */
  private readonly collections: Map<string, Collection> = new Map();

  /**
   * @param options.chromaUrl - Chroma server URL. Defaults to http://localhost:8000.
   * @param options.apiKey - Sent as the x-chroma-token header when set
   */
  constructor(options?: { chromaUrl?: string; apiKey?: string }) {
    const url = options?.chromaUrl ?? DEFAULT_CHROMA_URL;
    this.description = `chroma at ${url}`;

    // The Chroma v3 SDK takes host/port/ssl rather than a URL.
    const parsed = new URL(url);
    this.client = new ChromaClient({
      host: parsed.hostname,
      port: parseInt(parsed.port || (parsed.protocol === "https:" ? "443" : "8000"), 10),
      ssl: parsed.protocol === "https:",
      ...(options?.apiKey ? { headers: { "x-chroma-token": options.apiKey } } : {}),
    });
  }

  async heartbeat(): Promise<void> {
    await this.client.heartbeat();
  }

  /**
   * Chroma pages collection listings; keep asking until a short page comes
   * back.
   */
  async listCollections(): Promise<string[]> {
    const names: string[] = [];
    for (let offset = 0; ; offset += LIST_PAGE_SIZE) {
      const page = await this.client.listCollections({ limit: LIST_PAGE_SIZE, offset });
      for (const collection of page) {
        this.collections.set(collection.name, collection);
        names.push(collection.name);
      }
      if (page.length < LIST_PAGE_SIZE) return names;
    }
  }

  /**
   * Creates a collection if it doesn't exist, or gets the existing one.
   *
   * The dimension is recorded in the collection metadata for reference;
   * Chroma itself fixes the dimension on the first insert. We pass
   * embeddingFunction: null because vectors are always pre-computed.
   */
  async createCollection(
    name: string,
    options: CollectionOptions
  ): Promise<void> {
    const collection = await this.client.getOrCreateCollection({
      name,
      metadata: { dimension: options.dimension },
      configuration: {
        hnsw: { space: options.distanceMetric },
      },
      embeddingFunction: null,
    });

    this.collections.set(name, collection);
  }

  async upsert(collection: string, records: VectorRecord[]): Promise<void> {
    if (records.length === 0) return;

    const chromaCollection = await this.getCollection(collection);
    await chromaCollection.upsert({
      ids: records.map((record) => record.id),
      embeddings: records.map((record) => record.vector),
      documents: records.map((record) => documentText(record.payload)),
      metadatas: records.map((record) => encodePayload(record.payload)),
    });
  }

  /**
   * Nearest-neighbour search.
   *
   * Chroma returns nested arrays because query() supports several query
   * vectors at once. We always send one, so index [0] holds our results.
   */
  async search(
    collection: string,
    vector: number[],
    options: SearchOptions
  ): Promise<SearchHit[]> {
    const chromaCollection = await this.getCollection(collection);
    const where = buildWhereFilter(options.where);

    const results = await chromaCollection.query({
      queryEmbeddings: [vector],
      nResults: options.limit,
      include: ["documents", "metadatas", "distances"],
      ...(where ? { where } : {}),
    });

    const ids = results.ids[0] ?? [];
    const documents = results.documents[0] ?? [];
    const metadatas = results.metadatas[0] ?? [];
    const distances = results.distances[0] ?? [];

    return ids.map((id, i) => ({
      id,
      score: 1 - (distances[i] ?? 1),
      payload: decodePayload(metadatas[i] ?? {}, documents[i] ?? null),
    }));
  }

  async count(collection: string): Promise<number> {
    const chromaCollection = await this.getCollection(collection);
    return chromaCollection.count();
  }

  async delete(collection: string, ids: string[]): Promise<void> {
    if (ids.length === 0) return;

    const chromaCollection = await this.getCollection(collection);
    await chromaCollection.delete({ ids });
  }

  /**
   * Returns a cached collection handle, fetching it from the server on a miss.
   *
   * Never creates: a missing collection surfaces as Chroma's not-found error
   * so callers can't write into a collection nobody confirmed.
   */
  private async getCollection(name: string): Promise<Collection> {
    const cached = this.collections.get(name);
    if (cached) return cached;

    const collection = await this.client.getCollection({ name });
    this.collections.set(name, collection);
    return collection;
  }
}

// ---------------------------------------------------------------------------
// Payload encoding
// ---------------------------------------------------------------------------

/**
 * Flattens a payload into Chroma metadata. Scalars pass through; arrays and
 * objects become JSON strings and their keys are recorded.
 */
export function encodePayload(payload: Payload): ChromaMetadata {
  if (STRUCTURED_KEYS_FIELD in payload) {
    throw new Error(`Payload key "${STRUCTURED_KEYS_FIELD}" is reserved`);
  }

  const metadata: ChromaMetadata = {};
  const structured: string[] = [];

  for (const [key, value] of Object.entries(payload)) {
    if (value !== null && typeof value === "object") {
      metadata[key] = JSON.stringify(value);
      structured.push(key);
    } else {
      metadata[key] = value;
    }
  }

  if (structured.length > 0) {
    metadata[STRUCTURED_KEYS_FIELD] = JSON.stringify(structured);
  }
  return metadata;
}

/**
 * Reverses encodePayload(). When the metadata has no `text` field the Chroma
 * document is used instead.
 */
export function decodePayload(
  metadata: Record<string, unknown>,
  document: string | null
): Payload {
  const structured = structuredKeys(metadata[STRUCTURED_KEYS_FIELD]);

  const payload: Payload = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (key === STRUCTURED_KEYS_FIELD) continue;
    if (structured.has(key) && typeof value === "string") {
      payload[key] = parseJson(value);
    } else if (isScalar(value)) {
      payload[key] = value;
    }
  }

  if (!("text" in payload) && document !== null) {
    payload.text = document;
  }
  return payload;
}

/**
 * Builds a Chroma "where" filter from a flat payload filter.
 *
 * Single filter: { category: "AI" }
 * Multiple filters: { $and: [{ category: "AI" }, { source: "book" }] }
 */
export function buildWhereFilter(filter?: PayloadFilter): Where | undefined {
  if (!filter) return undefined;

  const conditions = Object.entries(filter).map(([key, value]) => ({ [key]: value }));
  if (conditions.length === 0) return undefined;
  if (conditions.length === 1) return conditions[0] as Where;
  return { $and: conditions } as Where;
}

function documentText(payload: Payload): string {
  return typeof payload.text === "string" ? payload.text : "";
}

function isScalar(value: unknown): value is string | number | boolean | null {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

/** Reads the JSON array of key names written by encodePayload(). */
function structuredKeys(field: unknown): Set<string> {
  if (typeof field !== "string") return new Set();
  const parsed = parseJson(field);
  if (!Array.isArray(parsed)) return new Set();
  return new Set(parsed.filter((key): key is string => typeof key === "string"));
}

function parseJson(value: string): PayloadValue {
  try {
    return JSON.parse(value);
  } catch {
    // Not JSON after all (written by another client); keep the raw string.
    return value;
  }
}
