/**
 * format-results.ts - Formats query results for people and LLMs
 *
 * What this file does:
 * Converts QueryResult arrays into readable text. The CLI prints it, and
 * the MCP search tool returns it to the client's model.
 *
 * Design choices:
 * - Plain text, not JSON: both audiences read prose better
 * - Score shown with a label, so a reader knows what 0.42 means
 * - Metadata on its own line, without the text or id it would repeat
 * - Numbered results, so a reader can refer to "result 2"
 */

import type { QueryResult } from "../../retrieval";
import type { PayloadValue } from "../../vectorstore";

/**
 * Formats query results.
 *
 * Example output:
 *   Found 2 results in "text_embeddings":
 *
 *   1. 4f7c… (score: 0.91, very similar)
 *      A cat sleeps on the windowsill
 *      Metadata: category=pets, created_at=2026-03-01T12:00:00.000Z
 *
 *   2. …
 *
 * @param collection - Which collection was searched (for the header)
 */
export function formatQueryResults(results: QueryResult[], collection: string): string {
  if (results.length === 0) {
    return `No results found in "${collection}".`;
  }

  const header = `Found ${results.length} result${results.length === 1 ? "" : "s"} in "${collection}":\n`;

  const formatted = results.map((result, index) => {
    const lines = [
      `${index + 1}. ${result.id} (score: ${result.score.toFixed(2)}, ${describeSimilarity(result.score)})`,
      `   ${result.text}`,
    ];

    const metadataLine = formatMetadata(result.payload, result.id);
    if (metadataLine) {
      lines.push(`   Metadata: ${metadataLine}`);
    }

    return lines.join("\n");
  });

  return header + "\n" + formatted.join("\n\n");
}

/**
 * Converts a cosine similarity into a label.
 *
 * - 0.8 and up: very similar
 * - 0.5 to 0.8: similar
 * - 0.2 to 0.5: somewhat related
 * - below 0.2: weak match
 */
export function describeSimilarity(score: number): string {
  if (score >= 0.8) return "very similar";
  if (score >= 0.5) return "similar";
  if (score >= 0.2) return "somewhat related";
  return "weak match";
}

/**
 * Joins payload fields other than `text` as key=value pairs.
 * Structured values are shown as JSON.
 */
function formatMetadata(payload: Record<string, PayloadValue>, id: string): string {
  return Object.entries(payload)
    .filter(([key, value]) => key !== "text" && !(key === "id" && value === id))
    .map(([key, value]) => `${key}=${typeof value === "object" ? JSON.stringify(value) : value}`)
    .join(", ");
}
