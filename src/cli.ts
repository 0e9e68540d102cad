/**
 * cli.ts - Command definitions for the passage-retriever CLI
 *
 * Commands:
 *   save <text> [--metadata <json>]      store one passage
 *   save-file <path>                     store passages from a JSON file
 *   search <query> [-k n] [--filter <json>] [--json]
 *   count                                number of stored passages
 *   delete <ids...>                      remove passages by id
 *   health [--json]                      store and collection status
 *
 * The service is built on the first command that needs it, so --help and
 * --version work without credentials. Any failure prints "kind: message"
 * and sets exit code 1; a retryable one says so.
 */

import { readFile } from "fs/promises";
import { Command, InvalidArgumentError } from "commander";
import type { z } from "zod";
import { ConfigError, InvalidInputError, errorMessage, toErrorSummary } from "./errors";
import { DEFAULT_TOP_K, MAX_BATCH_SIZE, type RetrievalService } from "./retrieval";
import {
  formatHealthReport,
  formatQueryResults,
  passageFileSchema,
  payloadFilterSchema,
  payloadSchema,
} from "./tools/core";

/** Where command output goes; tests pass a recorder. */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
}

export const processIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

/**
 * Builds the commander program.
 *
 * @param connect - Builds the service; called at most once
 */
export function createProgram(
  connect: () => Promise<RetrievalService>,
  io: CliIO = processIO
): Command {
  let connection: Promise<RetrievalService> | undefined;
  const service = () => (connection ??= connect());

  /** Runs an action, reporting failures instead of throwing them. */
  const run = async (action: (svc: RetrievalService) => Promise<void>): Promise<void> => {
    try {
      await action(await service());
    } catch (error) {
      if (error instanceof ConfigError) {
        io.err(error.message);
      } else {
        const summary = toErrorSummary(error);
        io.err(`${summary.kind}${summary.retryable ? " (retryable)" : ""}: ${summary.message}`);
      }
      io.setExitCode(1);
    }
  };

  const program = new Command();

  program
    .name("passage-retriever")
    .description("Store text passages as embeddings and search them by meaning")
    .version("0.1.0");

  program
    .command("save")
    .description("Embed and store one passage")
    .argument("<text>", "Passage text")
    .option("-m, --metadata <json>", "JSON object stored with the passage")
    .action((text: string, options: { metadata?: string }) =>
      run(async (svc) => {
        const metadata = options.metadata
          ? parseJsonOption("--metadata", options.metadata, payloadSchema)
          : {};
        io.out(await svc.saveText(text, metadata));
      })
    );

  program
    .command("save-file")
    .description("Store every passage in a JSON file: [{ \"text\": ..., \"metadata\": {...} }]")
    .argument("<path>", "Path to the JSON file")
    .action((path: string) =>
      run(async (svc) => {
        const entries = parseJsonOption(path, await readFile(path, "utf-8"), passageFileSchema);
        let saved = 0;
        for (let start = 0; start < entries.length; start += MAX_BATCH_SIZE) {
          const batch = entries.slice(start, start + MAX_BATCH_SIZE);
          const ids = await svc.saveTexts(
            batch.map((entry) => entry.text),
            batch.map((entry) => entry.metadata ?? {})
          );
          ids.forEach((id) => io.out(id));
          saved += ids.length;
        }
        io.err(`Saved ${saved} passages to "${svc.collection}"`);
      })
    );

  program
    .command("search")
    .description("Find the passages most similar to a query")
    .argument("<query>", "Natural language query")
    .option("-k, --top-k <n>", "Number of results", parseInteger, DEFAULT_TOP_K)
    .option("-f, --filter <json>", "Only passages whose metadata has these exact values")
    .option("--json", "Print results as JSON")
    .action((query: string, options: { topK: number; filter?: string; json?: boolean }) =>
      run(async (svc) => {
        const filter = options.filter
          ? parseJsonOption("--filter", options.filter, payloadFilterSchema)
          : undefined;
        const results = await svc.retrieve(query, options.topK, { filter });
        io.out(
          options.json
            ? JSON.stringify(results, null, 2)
            : formatQueryResults(results, svc.collection)
        );
      })
    );

  program
    .command("count")
    .description("Print the number of stored passages")
    .action(() =>
      run(async (svc) => {
        io.out(String(await svc.countRecords()));
      })
    );

  program
    .command("delete")
    .description("Remove passages by id")
    .argument("<ids...>", "Record ids")
    .action((ids: string[]) =>
      run(async (svc) => {
        const count = await svc.deleteRecords(ids);
        io.out(`Deleted ${count} ids from "${svc.collection}"`);
      })
    );

  program
    .command("health")
    .description("Report store connectivity, collection status and record count")
    .option("--json", "Print the report as JSON")
    .action((options: { json?: boolean }) =>
      run(async (svc) => {
        const report = await svc.checkHealth();
        io.out(
          options.json
            ? JSON.stringify(report, null, 2)
            : formatHealthReport(report, svc.collection)
        );
        if (report.status === "UNHEALTHY") io.setExitCode(1);
      })
    );

  return program;
}

/**
 * Parses a JSON string and validates it.
 *
 * @param source - Flag or file name used in the error message
 * @throws InvalidInputError when the text is not JSON or fails the schema
 */
export function parseJsonOption<T>(source: string, raw: string, schema: z.ZodType<T>): T {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new InvalidInputError(`${source} is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new InvalidInputError(`${source} is invalid${where}: ${issue.message}`);
  }
  return parsed.data;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("must be an integer");
  }
  return parsed;
}
