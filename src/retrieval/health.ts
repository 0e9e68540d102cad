/**
 * health.ts - Read-only diagnostics for the store connection
 *
 * checkHealth() never throws. Every failure becomes an UNHEALTHY report with
 * the reason in `detail`.
 *
 * | Situation                                  | status    |
 * |--------------------------------------------|-----------|
 * | primary store up, collection present       | HEALTHY   |
 * | fallback store in use, or collection absent| DEGRADED  |
 * | offline, or any store call failed          | UNHEALTHY |
 */

import { errorMessage } from "../errors";
import { withTimeout } from "../utils/timeout";
import { silentLogger, type Logger } from "../utils/logger";
import type { Connectivity, VectorStore } from "../vectorstore";
import type { HealthReport } from "./types";

export interface HealthDeps {
  store: VectorStore;
  connectivity: Connectivity;
  collection: string;
  timeoutMs: number;
  logger?: Logger;
  /** Called when a store call fails or the collection has gone missing */
  onStoreFailure?: () => void;
}

export class HealthReporter {
  private readonly logger: Logger;

  constructor(private readonly deps: HealthDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  async checkHealth(): Promise<HealthReport> {
    const { store, connectivity, collection, timeoutMs } = this.deps;

    if (connectivity === "offline") {
      return {
        status: "UNHEALTHY",
        collectionExists: false,
        connectivity,
        detail: "No vector store is reachable",
      };
    }

    let collectionExists = false;
    try {
      await withTimeout("heartbeat", timeoutMs, () => store.heartbeat());
      const names = await withTimeout("listCollections", timeoutMs, () =>
        store.listCollections()
      );

      if (!names.includes(collection)) {
        this.deps.onStoreFailure?.();
        return {
          status: "DEGRADED",
          collectionExists: false,
          connectivity,
          detail: `${store.description} is reachable but collection "${collection}" does not exist yet`,
        };
      }

      collectionExists = true;
      const recordCount = await withTimeout("count", timeoutMs, () =>
        store.count(collection)
      );
      const onFallback = connectivity === "fallback";
      return {
        status: onFallback ? "DEGRADED" : "HEALTHY",
        collectionExists: true,
        recordCount,
        connectivity,
        detail: onFallback
          ? `Using fallback ${store.description}; collection "${collection}" has ${recordCount} records`
          : `Collection "${collection}" on ${store.description} has ${recordCount} records`,
      };
    } catch (error) {
      const detail = `${store.description} failed the health check: ${errorMessage(error)}`;
      this.logger.warn(detail);
      this.deps.onStoreFailure?.();
      return { status: "UNHEALTHY", collectionExists, connectivity, detail };
    }
  }
}
