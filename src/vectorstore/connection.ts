/**
 * connection.ts - Picks the vector store to use at startup
 *
 * Tries each candidate store in order (typically: remote Chroma, then a
 * local fallback) and settles on the first one that answers a heartbeat.
 * The outcome is one of three connectivity states:
 *
 * - "primary":  the first candidate answered
 * - "fallback": a later candidate answered
 * - "offline":  nobody answered; the service runs with OfflineBackend,
 *               whose every call fails with CollectionUnavailableError
 *
 * The state is reported by the health check. Ingestion and retrieval never
 * look at it: they get a working store or loud errors, never silent no-ops.
 */

import { CollectionUnavailableError, errorMessage } from "../errors";
import { withTimeout } from "../utils/timeout";
import { silentLogger, type Logger } from "../utils/logger";
import type { SearchHit, VectorStore } from "./types";

export type Connectivity = "primary" | "fallback" | "offline";

export interface VectorStoreConnection {
  store: VectorStore;
  connectivity: Connectivity;
  /** One line per candidate explaining why it was skipped */
  failures: string[];
}

/**
 * Stand-in store used when no candidate is reachable.
 */
export class OfflineBackend implements VectorStore {
  readonly description = "offline (no vector store reachable)";

  async heartbeat(): Promise<void> {
    throw this.unavailable("*");
  }

  async listCollections(): Promise<string[]> {
    throw this.unavailable("*");
  }

  async createCollection(name: string): Promise<void> {
    throw this.unavailable(name);
  }

  async upsert(collection: string): Promise<void> {
    throw this.unavailable(collection);
  }

  async search(collection: string): Promise<SearchHit[]> {
    throw this.unavailable(collection);
  }

  async count(collection: string): Promise<number> {
    throw this.unavailable(collection);
  }

  async delete(collection: string): Promise<void> {
    throw this.unavailable(collection);
  }

  private unavailable(collection: string): CollectionUnavailableError {
    return new CollectionUnavailableError(
      collection,
      "No vector store is reachable; check CHROMA_URL and the fallback settings."
    );
  }
}

/**
 * Tries candidates in order and returns the first reachable one.
 *
 * @param candidates - Stores in preference order; must not be empty
 * @param options.timeoutMs - Deadline for each heartbeat
 */
export async function connectVectorStore(
  candidates: VectorStore[],
  options: { timeoutMs: number; logger?: Logger }
): Promise<VectorStoreConnection> {
  const logger = options.logger ?? silentLogger;
  const failures: string[] = [];

  for (const [index, candidate] of candidates.entries()) {
    try {
      await withTimeout("heartbeat", options.timeoutMs, () => candidate.heartbeat());
    } catch (error) {
      const failure = `${candidate.description}: ${errorMessage(error)}`;
      failures.push(failure);
      logger.warn(`Vector store unreachable, ${failure}`);
      continue;
    }

    const connectivity: Connectivity = index === 0 ? "primary" : "fallback";
    if (connectivity === "fallback") {
      logger.warn(`Using fallback vector store: ${candidate.description}`);
    } else {
      logger.info(`Connected to ${candidate.description}`);
    }
    return { store: candidate, connectivity, failures };
  }

  logger.error("No vector store reachable; running offline");
  return { store: new OfflineBackend(), connectivity: "offline", failures };
}
