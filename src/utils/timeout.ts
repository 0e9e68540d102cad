/**
 * timeout.ts - Deadlines for network-bound calls
 *
 * Every call to the embedding provider or the vector store runs through
 * withTimeout(). When the deadline passes, the returned promise rejects with
 * a retryable TimeoutError and the AbortSignal handed to the call is aborted,
 * so clients that accept a signal (Voyage AI) stop the request too. Clients
 * that don't (Chroma) are left to finish in the background; their result is
 * ignored.
 *
 * The timer is always cleared, so a finished call never keeps the process
 * alive.
 */

import { InvalidInputError, TimeoutError } from "../errors";

/** Longest delay setTimeout() honours; larger values fire immediately. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Rejects a deadline that setTimeout() cannot represent.
 *
 * @throws InvalidInputError unless timeoutMs is a positive integer no larger
 *   than MAX_TIMEOUT_MS
 */
export function assertTimeout(timeoutMs: number): void {
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
    throw new InvalidInputError(
      `timeoutMs must be a positive integer up to ${MAX_TIMEOUT_MS}, got ${timeoutMs}`
    );
  }
}

/**
 * Runs `call` under a deadline.
 *
 * @param operation - Name used in the TimeoutError message (e.g., "embed")
 * @param timeoutMs - Deadline in milliseconds
 * @param call - The network call; receives a signal aborted on expiry
 * @throws InvalidInputError, before `call` runs, for a deadline assertTimeout() refuses
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  assertTimeout(timeoutMs);
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(operation, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
