/**
 * collection-manager.ts - Makes sure a collection exists before it is used
 *
 * ensureReady() lists the store's collections and creates the named one if
 * it is missing. An existing collection is taken as it is: its dimension and
 * metric are not compared with the requested ones.
 *
 * Readiness is cached per name for the life of the process. Concurrent
 * callers for the same name share one in-flight check, so a fresh
 * collection is created once. Any failure drops the cache entry, and
 * ingestion/retrieval call invalidate() when the store fails under them, so
 * the next call checks again instead of trusting a stale "ready". An
 * invalidate() that lands while a check is in flight wins: that check still
 * settles for its callers but does not mark the collection ready.
 */

import {
  CollectionUnavailableError,
  TimeoutError,
  errorMessage,
} from "../errors";
import { assertTimeout, withTimeout } from "../utils/timeout";
import { silentLogger, type Logger } from "../utils/logger";
import type { CollectionOptions, VectorStore } from "../vectorstore";
import type { CollectionState } from "./types";

export class CollectionManager {
  private readonly states: Map<string, CollectionState> = new Map();
  private readonly pending: Map<string, Promise<void>> = new Map();
  /** Bumped by invalidate(); a check only records "ready" for the generation it started in */
  private readonly generations: Map<string, number> = new Map();
  private readonly logger: Logger;

  constructor(
    private readonly store: VectorStore,
    private readonly defaults: { timeoutMs: number; logger?: Logger }
  ) {
    this.logger = defaults.logger ?? silentLogger;
  }

  /** Current state of a collection; "unknown" if never checked. */
  stateOf(name: string): CollectionState {
    return this.states.get(name) ?? "unknown";
  }

  /**
   * Resolves once `name` exists in the store.
   *
   * @throws CollectionUnavailableError when the check or the create fails
   * @throws TimeoutError when the store doesn't answer in time
   * @throws InvalidInputError for a timeoutMs that assertTimeout() refuses
   */
  async ensureReady(
    name: string,
    options: CollectionOptions,
    timeoutMs: number = this.defaults.timeoutMs
  ): Promise<void> {
    assertTimeout(timeoutMs);
    if (this.states.get(name) === "ready") return;

    const inFlight = this.pending.get(name);
    if (inFlight) return inFlight;

    const check: Promise<void> = this.check(name, options, timeoutMs).finally(() => {
      if (this.pending.get(name) === check) this.pending.delete(name);
    });
    this.pending.set(name, check);
    return check;
  }

  /**
   * Forgets cached readiness, e.g. after the store failed a read or write.
   */
  invalidate(name: string): void {
    if (this.states.has(name)) {
      this.logger.debug(`Readiness of "${name}" invalidated`);
    }
    this.states.delete(name);
    this.pending.delete(name);
    this.generations.set(name, this.generationOf(name) + 1);
  }

  private generationOf(name: string): number {
    return this.generations.get(name) ?? 0;
  }

  private async check(
    name: string,
    options: CollectionOptions,
    timeoutMs: number
  ): Promise<void> {
    const generation = this.generationOf(name);
    const current = () => this.generationOf(name) === generation;
    try {
      this.states.set(name, "checking");
      const existing = await withTimeout("listCollections", timeoutMs, () =>
        this.store.listCollections()
      );

      if (existing.includes(name)) {
        if (current()) this.states.set(name, "exists");
      } else {
        if (current()) this.states.set(name, "creating");
        await withTimeout("createCollection", timeoutMs, () =>
          this.store.createCollection(name, options)
        );
        this.logger.info(
          `Created collection "${name}" (${options.dimension} dimensions, ${options.distanceMetric})`
        );
      }

      if (current()) {
        this.states.set(name, "ready");
      } else {
        this.logger.debug(`Readiness of "${name}" was invalidated during its check`);
      }
    } catch (error) {
      if (current()) this.states.set(name, "unavailable");
      if (error instanceof TimeoutError || error instanceof CollectionUnavailableError) {
        throw error;
      }
      throw new CollectionUnavailableError(
        name,
        `Collection "${name}" could not be confirmed: ${errorMessage(error)}`,
        error
      );
    }
  }
}
