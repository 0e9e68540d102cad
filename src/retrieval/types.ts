/**
 * types.ts - Shared types for the retrieval core
 *
 * What the service hands back to its callers: query results and health
 * reports. Record and store types live in ../vectorstore/types.ts.
 */

import type { Connectivity, Payload } from "../vectorstore";

/**
 * One similarity-search match, built fresh for every query.
 */
export interface QueryResult {
  id: string;
  /** Cosine similarity; higher is more similar */
  score: number;
  payload: Payload;
  /** payload.text when it is a string, "" otherwise */
  text: string;
}

/**
 * Readiness of one collection, as tracked by the CollectionManager.
 *
 * unknown → checking → exists → ready
 *                    ↘ creating → ready
 * Any failure lands in "unavailable"; the next ensureReady() starts over.
 */
export type CollectionState =
  | "unknown"
  | "checking"
  | "exists"
  | "creating"
  | "ready"
  | "unavailable";

export type HealthStatus = "HEALTHY" | "DEGRADED" | "UNHEALTHY";

export interface HealthReport {
  status: HealthStatus;
  collectionExists: boolean;
  /** Absent when the count could not be read */
  recordCount?: number;
  connectivity: Connectivity;
  /** Which store answered, and what went wrong if anything */
  detail: string;
}

/** Per-call deadline override, in milliseconds. */
export interface DeadlineOptions {
  timeoutMs?: number;
}
