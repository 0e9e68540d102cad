#!/usr/bin/env node
/**
 * index.ts - CLI entry point for passage-retriever
 *
 * What this file does:
 * Loads configuration, connects to the vector store on first use, and hands
 * the command line to commander. The commands live in cli.ts.
 *
 *   passage-retriever save "A cat sleeps" --metadata '{"category":"pets"}'
 *   passage-retriever search "feline napping" --top-k 3
 *   passage-retriever health
 *
 * Log lines go to stderr so stdout carries only command output (pipe-safe
 * with --json).
 */

// Initialize OpenTelemetry tracing before any other imports
// This ensures the tracer provider is registered before any instrumented code runs
import "./tracing";

import { createProgram } from "./cli";
import { loadConfig } from "./config";
import { errorMessage } from "./errors";
import { createRetrievalService } from "./retrieval";
import { createLogger, stderrSink } from "./utils/logger";

async function main(): Promise<void> {
  const program = createProgram(async () => {
    const config = loadConfig();
    return createRetrievalService(config, {
      logger: createLogger("CLI", config.logLevel, stderrSink),
    });
  });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error("Error:", errorMessage(error));
  process.exit(1);
});
