/**
 * payload.ts - Builds the payload stored with each record
 *
 * Every record carries `text`, `created_at` and its own `id`, so an exported
 * payload stands alone. Those are defaults: a caller that puts any of them in
 * its own metadata wins, and every other caller key is copied through as
 * given.
 */

import type { Payload } from "../vectorstore";

/**
 * Merges caller metadata over defaults. A key present in `metadata` always
 * takes the caller's value, even when it is null; defaults fill in only the
 * keys the caller left out. Keys are copied as own data properties, so
 * "__proto__" is stored like any other key.
 */
export function mergePayload(defaults: Payload, metadata: Payload = {}): Payload {
  return Object.fromEntries([
    ...Object.entries(defaults).filter(([key]) => !Object.hasOwn(metadata, key)),
    ...Object.entries(metadata),
  ]);
}

/**
 * Default fields for a newly ingested passage.
 */
export function defaultPayload(text: string, createdAt: Date, id: string): Payload {
  return { text, created_at: createdAt.toISOString(), id };
}
