/**
 * schemas.ts - zod schemas shared by the CLI and the MCP tools
 */

import { z } from "zod";
import type { PayloadValue } from "../../vectorstore";

/** Any JSON value, as stored in a payload. */
export const payloadValueSchema: z.ZodType<PayloadValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(payloadValueSchema),
    z.record(payloadValueSchema),
  ])
);

/** Caller metadata for a saved passage. */
export const payloadSchema = z.record(payloadValueSchema);

/** Flat metadata: what MCP clients may attach, and what filters match on. */
export const scalarValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const payloadFilterSchema = z.record(scalarValueSchema);

/** One entry of a save-file batch: `{ "text": "...", "metadata": {...} }`. */
export const passageFileSchema = z
  .array(
    z.object({
      text: z.string(),
      metadata: payloadSchema.optional(),
    })
  )
  .min(1, "file must contain at least one passage");

export type PassageFileEntry = z.infer<typeof passageFileSchema>[number];
