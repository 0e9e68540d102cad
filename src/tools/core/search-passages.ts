/**
 * search-passages core - Semantic search over stored passages
 *
 * What this file does:
 * Shared logic behind the MCP search_passages tool and the CLI search
 * command: validate the input, run RetrievalService.retrieve(), format the
 * hits.
 *
 * The query is embedded in "query" mode, so it matches passages that mean
 * the same thing even when the words differ ("feline napping" finds "A cat
 * sleeps").
 */

import { z } from "zod";
import {
  DEFAULT_TOP_K,
  MAX_TOP_K,
  type RetrievalService,
} from "../../retrieval";
import { formatQueryResults } from "./format-results";
import { payloadFilterSchema } from "./schemas";

export const searchPassagesSchema = z.object({
  query: z
    .string()
    .describe(
      "Natural language description of what you're looking for (e.g., 'pets that sleep a lot'). Matches by meaning, not exact words."
    ),
  topK: z
    .number()
    .int()
    .min(1)
    .max(MAX_TOP_K)
    .optional()
    .describe(`Maximum number of passages to return (default: ${DEFAULT_TOP_K})`),
  filter: payloadFilterSchema
    .optional()
    .describe(
      "Only passages whose metadata has these exact values (e.g., { \"category\": \"pets\" })"
    ),
});

export type SearchPassagesInput = z.infer<typeof searchPassagesSchema>;

export const searchPassagesDescription = `Search stored passages by meaning.

Returns the passages most similar to the query, best first, with a similarity
score (1.0 = same meaning) and their metadata. Use the filter to narrow the
search to passages with specific metadata values.`;

/**
 * Runs a search and returns the formatted results.
 *
 * @throws RetrievalError subclasses from the service (InvalidInput, RateLimited, ...)
 */
export async function searchPassages(
  service: RetrievalService,
  input: SearchPassagesInput
): Promise<string> {
  const results = await service.retrieve(input.query, input.topK ?? DEFAULT_TOP_K, {
    filter: input.filter,
  });
  return formatQueryResults(results, service.collection);
}
