/**
 * Core tools - Shared logic for the CLI and the MCP server
 *
 * Re-exports every core tool function, schema, and description. Import from
 * here when you need the shared logic without a framework wrapper.
 *
 * Usage:
 *   import { searchPassages, searchPassagesSchema } from "./tools/core";
 */

export {
  searchPassages,
  searchPassagesSchema,
  searchPassagesDescription,
  type SearchPassagesInput,
} from "./search-passages";

export {
  savePassage,
  savePassageSchema,
  savePassageDescription,
  type SavePassageInput,
} from "./save-passage";

export {
  collectionHealth,
  collectionHealthSchema,
  collectionHealthDescription,
  formatHealthReport,
} from "./collection-health";

export { formatQueryResults, describeSimilarity } from "./format-results";

export {
  payloadSchema,
  payloadFilterSchema,
  passageFileSchema,
  type PassageFileEntry,
} from "./schemas";
