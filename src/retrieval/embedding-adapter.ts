/**
 * embedding-adapter.ts - Validating wrapper around the embedding provider
 *
 * The provider is a black box; this adapter holds it to its contract:
 * - input: at least one text, none blank
 * - output: one vector per text, in order, each exactly `dimension` long
 *
 * A vector of the wrong length is a ContractViolationError. It is logged at
 * error level and never truncated or padded. Provider failures keep their
 * RateLimited/ProviderFailure kind; anything unrecognized becomes a
 * ProviderFailureError. Nothing is cached and nothing is retried.
 */

import {
  ContractViolationError,
  InvalidInputError,
  ProviderFailureError,
  RetrievalError,
  errorMessage,
} from "../errors";
import { assertTimeout, withTimeout } from "../utils/timeout";
import { silentLogger, type Logger } from "../utils/logger";
import type { EmbeddingFunction, EmbeddingPurpose } from "../vectorstore";

export interface EmbeddingAdapterOptions {
  /** Required length of every returned vector */
  dimension: number;
  /** Default deadline for one provider call */
  timeoutMs: number;
  logger?: Logger;
}

export class EmbeddingAdapter {
  private readonly logger: Logger;

  constructor(
    private readonly provider: EmbeddingFunction,
    private readonly options: EmbeddingAdapterOptions
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  get dimension(): number {
    return this.options.dimension;
  }

  /**
   * Embeds `texts` in one provider call.
   *
   * @param purpose - "document" for passages being stored, "query" for searches
   * @throws InvalidInputError on an empty list or a blank text
   * @throws ContractViolationError when the provider breaks the vector contract
   */
  async embed(
    texts: string[],
    purpose: EmbeddingPurpose,
    timeoutMs: number = this.options.timeoutMs
  ): Promise<number[][]> {
    if (texts.length === 0) {
      throw new InvalidInputError("texts must contain at least one entry");
    }
    const blank = texts.findIndex((text) => text.trim() === "");
    if (blank !== -1) {
      throw new InvalidInputError(`text at index ${blank} is empty`);
    }
    assertTimeout(timeoutMs);

    const vectors = await withTimeout("embed", timeoutMs, (signal) =>
      this.provider.embed(texts, purpose, { signal })
    ).catch((error: unknown) => {
      if (error instanceof RetrievalError) throw error;
      throw new ProviderFailureError(
        `Embedding provider failed: ${errorMessage(error)}`,
        { cause: error }
      );
    });

    this.checkContract(texts.length, vectors);
    return vectors;
  }

  private checkContract(expected: number, vectors: number[][]): void {
    if (vectors.length !== expected) {
      this.violation(
        `Embedding provider returned ${vectors.length} vectors for ${expected} texts`
      );
    }
    vectors.forEach((vector, index) => {
      if (vector.length !== this.options.dimension) {
        this.violation(
          `Embedding ${index} has ${vector.length} dimensions, expected ${this.options.dimension}`
        );
      }
    });
  }

  private violation(message: string): never {
    this.logger.error(`Contract violation: ${message}`);
    throw new ContractViolationError(message);
  }
}
