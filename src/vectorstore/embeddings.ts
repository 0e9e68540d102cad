/**
 * embeddings.ts - Voyage AI embedding implementation
 *
 * What this file does:
 * Implements the EmbeddingFunction interface using Voyage AI's embedding API.
 * This is the only file in the project that imports from "voyageai".
 *
 * How it works:
 * 1. Text strings go in, tagged with their purpose ("document" or "query")
 * 2. The purpose becomes Voyage's input_type, which prepends a retrieval
 *    prompt on the provider side so queries and passages land close together
 * 3. Voyage AI returns one 1024-dimensional vector per text (voyage-3.5 default)
 * 4. Provider errors are mapped to RateLimitedError (HTTP 429, retryable)
 *    or ProviderFailureError (everything else)
 *
 * The SDK's built-in retries are turned off (maxRetries: 0). Retry policy
 * belongs to whoever calls the retrieval service.
 */

import { VoyageAIClient, VoyageAIError } from "voyageai";
import { ProviderFailureError, RateLimitedError, errorMessage } from "../errors";
import type { CallOptions, EmbeddingFunction, EmbeddingPurpose } from "./types";

/**
 * Default embedding model.
 *
 * voyage-3.5 returns 1024-dimensional vectors by default, matching the
 * default collection dimension.
 */
export const DEFAULT_MODEL = "voyage-3.5";

const HTTP_TOO_MANY_REQUESTS = 429;

/**
 * Embedding function that uses Voyage AI's API to convert text to vectors.
 *
 * Usage:
 *   const embedder = new VoyageEmbedding({ apiKey: config.voyageApiKey });
 *   const [vector] = await embedder.embed(["A cat sleeps"], "document");
 */
export class VoyageEmbedding implements EmbeddingFunction {
  private readonly client: VoyageAIClient;
  readonly model: string;

  /**
   * @param options.apiKey - Voyage AI API key
   * @param options.model - Model to use. Defaults to "voyage-3.5".
   */
  constructor(options: { apiKey: string; model?: string }) {
    if (!options.apiKey) {
      throw new Error("Voyage AI API key is required.");
    }

    this.client = new VoyageAIClient({ apiKey: options.apiKey });
    this.model = options.model ?? DEFAULT_MODEL;
  }

  /**
   * Converts text strings into embedding vectors in one batch request.
   *
   * @throws RateLimitedError when Voyage AI answers 429
   * @throws ProviderFailureError for any other failure or an empty response
   */
  async embed(
    texts: string[],
    purpose: EmbeddingPurpose,
    options?: CallOptions
  ): Promise<number[][]> {
    const response = await this.client
      .embed(
        {
          input: texts,
          model: this.model,
          inputType: purpose,
        },
        {
          maxRetries: 0,
          abortSignal: options?.signal,
        }
      )
      .catch((error: unknown) => {
        throw toProviderError(error);
      });

    // The API returns { data: [{ embedding: number[], index: number }, ...] }
    if (!response.data) {
      throw new ProviderFailureError("Voyage AI returned no embedding data");
    }

    // Sort by index to ensure order matches input order
    const sorted = [...response.data].sort(
      (a, b) => (a.index ?? 0) - (b.index ?? 0)
    );

    return sorted.map((item) => {
      if (!item.embedding) {
        throw new ProviderFailureError(
          "Voyage AI returned an embedding without vector data"
        );
      }
      return item.embedding;
    });
  }
}

/**
 * Maps a Voyage AI SDK error to the provider error taxonomy.
 *
 * 429 is the only status worth retrying; 401/403 (bad key), 400 (bad input)
 * and 5xx are reported as ProviderFailureError with the status attached.
 */
export function toProviderError(error: unknown): RateLimitedError | ProviderFailureError {
  if (error instanceof VoyageAIError) {
    if (error.statusCode === HTTP_TOO_MANY_REQUESTS) {
      return new RateLimitedError(
        `Voyage AI rate limit exceeded: ${error.message}`,
        error
      );
    }
    return new ProviderFailureError(`Voyage AI request failed: ${error.message}`, {
      statusCode: error.statusCode,
      cause: error,
    });
  }
  return new ProviderFailureError(`Voyage AI request failed: ${errorMessage(error)}`, {
    cause: error,
  });
}
