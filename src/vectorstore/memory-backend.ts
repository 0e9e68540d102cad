/**
 * memory-backend.ts - In-process implementation of the VectorStore interface
 *
 * Keeps every collection in a Map and answers searches with a brute-force
 * cosine scan. It is the "local" rung of the connectivity ladder when no
 * Chroma server is reachable, and the stand-in store for unit tests.
 *
 * Nothing is persisted: records live as long as the process.
 *
 * Records and payloads are deep-copied on the way in and out, so callers
 * can't mutate stored data through a reference they kept.
 */

import type {
  CollectionOptions,
  PayloadFilter,
  SearchHit,
  SearchOptions,
  VectorRecord,
  VectorStore,
} from "./types";

interface MemoryCollection {
  options: CollectionOptions;
  /** Insertion-ordered; ties in search keep this order */
  records: Map<string, VectorRecord>;
}

export class MemoryBackend implements VectorStore {
  private readonly collections: Map<string, MemoryCollection> = new Map();

  constructor(readonly description: string = "in-memory store") {}

  async heartbeat(): Promise<void> {}

  async listCollections(): Promise<string[]> {
    return [...this.collections.keys()];
  }

  async createCollection(
    name: string,
    options: CollectionOptions
  ): Promise<void> {
    if (this.collections.has(name)) return;
    this.collections.set(name, { options: { ...options }, records: new Map() });
  }

  /**
   * Writes every record or none: dimensions are checked before the first
   * write.
   */
  async upsert(collection: string, records: VectorRecord[]): Promise<void> {
    const target = this.getCollection(collection);

    for (const record of records) {
      if (record.vector.length !== target.options.dimension) {
        throw new Error(
          `Vector for "${record.id}" has ${record.vector.length} dimensions, ` +
            `collection "${collection}" expects ${target.options.dimension}`
        );
      }
    }

    for (const record of records) {
      target.records.set(record.id, structuredClone(record));
    }
  }

  /**
   * Scores every matching record and returns the best `limit` of them.
   * Array.prototype.sort is stable, so equal scores keep insertion order.
   */
  async search(
    collection: string,
    vector: number[],
    options: SearchOptions
  ): Promise<SearchHit[]> {
    const target = this.getCollection(collection);

    const scored: SearchHit[] = [];
    for (const record of target.records.values()) {
      if (!matchesFilter(record, options.where)) continue;
      scored.push({
        id: record.id,
        score: cosineSimilarity(record.vector, vector),
        payload: structuredClone(record.payload),
      });
    }

    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, options.limit);
  }

  async count(collection: string): Promise<number> {
    return this.getCollection(collection).records.size;
  }

  async delete(collection: string, ids: string[]): Promise<void> {
    const target = this.getCollection(collection);
    for (const id of ids) {
      target.records.delete(id);
    }
  }

  private getCollection(name: string): MemoryCollection {
    const collection = this.collections.get(name);
    if (!collection) {
      throw new Error(`Collection "${name}" does not exist`);
    }
    return collection;
  }
}

/**
 * Cosine of the angle between two vectors. Zero vectors score 0.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dot / denominator;
}

function matchesFilter(record: VectorRecord, filter?: PayloadFilter): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(
    ([key, value]) => record.payload[key] === value
  );
}
