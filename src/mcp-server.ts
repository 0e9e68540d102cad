#!/usr/bin/env node
/**
 * mcp-server.ts - MCP server entry point for the passage retriever
 *
 * What is this file?
 * The entry point for the MCP (Model Context Protocol) server. An MCP client
 * spawns this process and talks JSON-RPC over stdio; the server exposes the
 * passage tools (search_passages, save_passage, collection_health).
 *
 * How it works:
 * 1. Load and validate configuration (exit 1 on a bad environment)
 * 2. Build the RetrievalService (Chroma, fallback, or offline)
 * 3. Register the passage tools
 * 4. Start the stdio transport and wait for requests
 *
 * stdout belongs to the transport, so every log line goes to stderr, and
 * tracing must export over OTLP: the console exporter is refused at startup.
 */

// Initialize OpenTelemetry tracing before any other imports
// This ensures the tracer provider is registered before any instrumented code runs
import { assertStdoutFree } from "./tracing";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config";
import { ConfigError, errorMessage } from "./errors";
import { createRetrievalService } from "./retrieval";
import { registerPassageTools } from "./tools/mcp";
import { createLogger, stderrSink } from "./utils/logger";

async function main(): Promise<void> {
  assertStdoutFree();
  const config = loadConfig();
  const logger = createLogger("MCP", config.logLevel, stderrSink);

  const service = await createRetrievalService(config, { logger });

  const server = new McpServer({
    name: "passage-retriever",
    version: "0.1.0",
  });
  registerPassageTools(server, service, logger);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`Serving collection "${service.collection}" (${service.connectivity})`);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error("MCP server error:", errorMessage(error));
  }
  process.exit(1);
});
