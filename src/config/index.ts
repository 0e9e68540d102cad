/**
 * config/index.ts - Environment configuration
 *
 * Reads every setting once at startup and validates it with zod. A missing
 * credential or a malformed value fails here, with every problem listed,
 * instead of on the first request.
 *
 * | Variable              | Default                 |
 * |-----------------------|-------------------------|
 * | VOYAGE_API_KEY        | (required)              |
 * | VOYAGE_MODEL          | voyage-3.5              |
 * | EMBEDDING_DIMENSION   | 1024                    |
 * | CHROMA_URL            | http://localhost:8000   |
 * | CHROMA_API_KEY        | (none)                  |
 * | VECTOR_STORE_FALLBACK | none (chroma or memory) |
 * | CHROMA_FALLBACK_URL   | http://localhost:8000   |
 * | COLLECTION_NAME       | text_embeddings         |
 * | REQUEST_TIMEOUT_MS    | 30000                   |
 * | LOG_LEVEL             | info                    |
 */

import { z } from "zod";
import { ConfigError } from "../errors";
import type { LogLevel } from "../utils/logger";
import { MAX_TIMEOUT_MS } from "../utils/timeout";
import {
  DEFAULT_CHROMA_URL,
  DEFAULT_COLLECTION,
  DEFAULT_DIMENSION,
  DEFAULT_MODEL,
} from "../vectorstore";

/** Where to go when the primary Chroma server is unreachable. */
export type FallbackMode = "none" | "chroma" | "memory";

export interface Config {
  voyageApiKey: string;
  voyageModel: string;
  dimension: number;
  chromaUrl: string;
  chromaApiKey?: string;
  fallback: FallbackMode;
  chromaFallbackUrl: string;
  collectionName: string;
  timeoutMs: number;
  logLevel: LogLevel;
}

/** Empty strings count as unset, as they do when a .env line has no value. */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value.trim()));

const positiveInt = (fallback: number, max = Number.MAX_SAFE_INTEGER) =>
  optionalString.pipe(
    z.coerce.number().int().positive().max(max).optional()
  ).transform((value) => value ?? fallback);

const envSchema = z.object({
  VOYAGE_API_KEY: optionalString.pipe(
    z.string({ required_error: "is required" })
  ),
  VOYAGE_MODEL: optionalString.transform((value) => value ?? DEFAULT_MODEL),
  EMBEDDING_DIMENSION: positiveInt(DEFAULT_DIMENSION),
  CHROMA_URL: optionalString.pipe(z.string().url().optional()).transform(
    (value) => value ?? DEFAULT_CHROMA_URL
  ),
  CHROMA_API_KEY: optionalString,
  VECTOR_STORE_FALLBACK: optionalString
    .pipe(z.enum(["none", "chroma", "memory"]).optional())
    .transform((value) => value ?? "none"),
  CHROMA_FALLBACK_URL: optionalString.pipe(z.string().url().optional()).transform(
    (value) => value ?? DEFAULT_CHROMA_URL
  ),
  COLLECTION_NAME: optionalString.transform((value) => value ?? DEFAULT_COLLECTION),
  REQUEST_TIMEOUT_MS: positiveInt(30_000, MAX_TIMEOUT_MS),
  LOG_LEVEL: optionalString
    .pipe(z.enum(["debug", "info", "warn", "error", "silent"]).optional())
    .transform((value) => value ?? "info"),
});

/**
 * Builds the configuration from environment variables.
 *
 * @param env - Defaults to process.env; tests pass a plain object
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      )
    );
  }

  const values = parsed.data;
  return {
    voyageApiKey: values.VOYAGE_API_KEY,
    voyageModel: values.VOYAGE_MODEL,
    dimension: values.EMBEDDING_DIMENSION,
    chromaUrl: values.CHROMA_URL,
    chromaApiKey: values.CHROMA_API_KEY,
    fallback: values.VECTOR_STORE_FALLBACK,
    chromaFallbackUrl: values.CHROMA_FALLBACK_URL,
    collectionName: values.COLLECTION_NAME,
    timeoutMs: values.REQUEST_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL,
  };
}
