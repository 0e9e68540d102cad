/**
 * seed-sample-texts.ts - Loads a few sample passages into the collection
 *
 * Stores a handful of short passages with metadata, then runs one search to
 * show the ranking. Uses the same environment as the CLI (VOYAGE_API_KEY,
 * CHROMA_URL, COLLECTION_NAME, ...).
 *
 * Usage:
 *   npx tsx scripts/seed-sample-texts.ts
 */

import { loadConfig } from "../src/config";
import { errorMessage } from "../src/errors";
import { createRetrievalService } from "../src/retrieval";
import { formatQueryResults } from "../src/tools/core";
import { createLogger } from "../src/utils/logger";
import type { Payload } from "../src/vectorstore";

const samplePassages: { text: string; metadata: Payload }[] = [
  {
    text: "A cat sleeps on the warm windowsill for most of the afternoon.",
    metadata: { category: "pets", source: "sample" },
  },
  {
    text: "A dog barks at the mail carrier every morning.",
    metadata: { category: "pets", source: "sample" },
  },
  {
    text: "Retrieval-augmented generation grounds model answers in stored documents.",
    metadata: { category: "AI", source: "sample" },
  },
  {
    text: "Cosine similarity compares the angle between two vectors, not their length.",
    metadata: { category: "AI", source: "sample" },
  },
  {
    text: "Sourdough bread needs a long, slow rise to develop its flavor.",
    metadata: { category: "cooking", source: "sample" },
  },
];

async function main() {
  const config = loadConfig();
  const logger = createLogger("Seed", config.logLevel);
  const service = await createRetrievalService(config, { logger });

  logger.info(`Storing ${samplePassages.length} passages...`);
  const ids = await service.saveTexts(
    samplePassages.map((passage) => passage.text),
    samplePassages.map((passage) => passage.metadata)
  );
  logger.info(`Stored ${ids.length} passages.`);

  console.log("\nVerification search: 'feline napping'");
  const results = await service.retrieve("feline napping", 3);
  console.log(formatQueryResults(results, service.collection));

  console.log("\nSeed complete.");
}

main().catch((error: unknown) => {
  console.error("Seed failed:", errorMessage(error));
  process.exitCode = 1;
});
