/**
 * save-passage core - Stores one passage with optional metadata
 */

import { z } from "zod";
import type { RetrievalService } from "../../retrieval";
import { scalarValueSchema } from "./schemas";

export const savePassageSchema = z.object({
  text: z.string().describe("The passage to store"),
  metadata: z
    .record(scalarValueSchema)
    .optional()
    .describe("Flat key/value metadata to store with the passage (e.g., { \"source\": \"notes\" })"),
});

export type SavePassageInput = z.infer<typeof savePassageSchema>;

export const savePassageDescription = `Store a passage so later searches can find it.

The passage is embedded and saved with its metadata and a created_at
timestamp. Returns the id of the new record.`;

export async function savePassage(
  service: RetrievalService,
  input: SavePassageInput
): Promise<string> {
  const id = await service.saveText(input.text, input.metadata ?? {});
  return `Saved passage ${id} to "${service.collection}".`;
}
