/**
 * MCP tool registration for the passage retriever
 *
 * Registers three tools on an McpServer:
 * - search_passages: semantic search over stored passages
 * - save_passage: store a passage with flat metadata
 * - collection_health: store reachability and record count
 *
 * Each tool validates its input with the shared zod schema from
 * tools/core, calls the same core function the CLI uses, and turns a
 * RetrievalError into an isError response carrying "kind: message". The
 * client's model can read the kind and decide whether to retry.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { toErrorSummary } from "../../errors";
import type { RetrievalService } from "../../retrieval";
import type { Logger } from "../../utils/logger";
import {
  collectionHealth,
  collectionHealthDescription,
  collectionHealthSchema,
  savePassage,
  savePassageDescription,
  savePassageSchema,
  searchPassages,
  searchPassagesDescription,
  searchPassagesSchema,
  type SavePassageInput,
  type SearchPassagesInput,
} from "../core";

/** What every tool handler returns. */
export interface ToolResponse {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  isError?: boolean;
}

/**
 * Runs a core tool and converts its outcome into an MCP response.
 * Failures are logged and returned, not thrown.
 */
export async function toToolResponse(
  tool: string,
  logger: Logger,
  run: () => Promise<string>
): Promise<ToolResponse> {
  try {
    return { content: [{ type: "text", text: await run() }] };
  } catch (error) {
    const summary = toErrorSummary(error);
    logger.warn(`${tool} failed with ${summary.kind}: ${summary.message}`);
    const retryHint = summary.retryable ? " (retryable)" : "";
    return {
      content: [{ type: "text", text: `${summary.kind}${retryHint}: ${summary.message}` }],
      isError: true,
    };
  }
}

/**
 * Registers every passage tool with an MCP server.
 *
 * @param service - The service the tools read and write through
 */
export function registerPassageTools(
  server: McpServer,
  service: RetrievalService,
  logger: Logger
): void {
  server.registerTool(
    "search_passages",
    {
      description: searchPassagesDescription,
      inputSchema: searchPassagesSchema.shape,
    },
    async (input: SearchPassagesInput) =>
      toToolResponse("search_passages", logger, () => searchPassages(service, input))
  );

  server.registerTool(
    "save_passage",
    {
      description: savePassageDescription,
      inputSchema: savePassageSchema.shape,
    },
    async (input: SavePassageInput) =>
      toToolResponse("save_passage", logger, () => savePassage(service, input))
  );

  server.registerTool(
    "collection_health",
    {
      description: collectionHealthDescription,
      inputSchema: collectionHealthSchema.shape,
    },
    async () => toToolResponse("collection_health", logger, () => collectionHealth(service))
  );
}
