/**
 * ingestion.ts - Turns text and metadata into stored records
 *
 * Flow for one batch:
 * 1. Validate input (non-blank texts, matching list lengths, unique ids)
 * 2. Ensure the collection is ready
 * 3. Embed every text in one provider call, in "document" mode
 * 4. Assign ids and build payloads (text + created_at, caller keys win)
 * 5. Upsert the whole batch in one store call
 *
 * Each step is all or nothing: if one text fails to embed, nothing is
 * written; if the upsert fails, it surfaces as StorageWriteError and the
 * collection's cached readiness is dropped.
 */

import { randomUUID } from "crypto";
import {
  InvalidInputError,
  RetrievalError,
  StorageWriteError,
  errorMessage,
} from "../errors";
import { assertTimeout, withTimeout } from "../utils/timeout";
import { silentLogger, type Logger } from "../utils/logger";
import {
  RESERVED_PAYLOAD_KEY,
  type CollectionOptions,
  type Payload,
  type VectorRecord,
  type VectorStore,
} from "../vectorstore";
import type { CollectionManager } from "./collection-manager";
import type { EmbeddingAdapter } from "./embedding-adapter";
import { defaultPayload, mergePayload } from "./payload";
import type { DeadlineOptions } from "./types";

/** Largest batch accepted by saveTexts(). */
export const MAX_BATCH_SIZE = 100;

export interface SaveTextsOptions extends DeadlineOptions {
  /** Caller-chosen ids, one per text; generated when absent */
  ids?: string[];
}

export interface IngestionDeps {
  store: VectorStore;
  collections: CollectionManager;
  embeddings: EmbeddingAdapter;
  collection: string;
  collectionOptions: CollectionOptions;
  timeoutMs: number;
  logger?: Logger;
  /** Source of created_at timestamps */
  now?: () => Date;
  /** Source of record ids */
  generateId?: () => string;
}

export class IngestionPipeline {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(private readonly deps: IngestionDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? randomUUID;
  }

  /**
   * Saves one passage and returns its id.
   */
  async saveText(
    text: string,
    metadata: Payload = {},
    options: DeadlineOptions = {}
  ): Promise<string> {
    const [id] = await this.saveTexts([text], [metadata], options);
    return id;
  }

  /**
   * Saves a batch of passages with one embedding call and one upsert.
   *
   * @param metadataList - One metadata object per text, when given
   * @returns Ids in input order
   * @throws InvalidInputError before any network call when the input is bad
   */
  async saveTexts(
    texts: string[],
    metadataList?: Payload[],
    options: SaveTextsOptions = {}
  ): Promise<string[]> {
    this.validate(texts, metadataList, options.ids);

    const { collection, collectionOptions } = this.deps;
    const timeoutMs = options.timeoutMs ?? this.deps.timeoutMs;
    assertTimeout(timeoutMs);

    await this.deps.collections.ensureReady(collection, collectionOptions, timeoutMs);
    const vectors = await this.deps.embeddings.embed(texts, "document", timeoutMs);

    const createdAt = this.now();
    const records: VectorRecord[] = texts.map((text, index) => {
      const id = options.ids?.[index] ?? this.generateId();
      return {
        id,
        vector: vectors[index],
        payload: mergePayload(defaultPayload(text, createdAt, id), metadataList?.[index]),
      };
    });

    try {
      await withTimeout("upsert", timeoutMs, () =>
        this.deps.store.upsert(collection, records)
      );
    } catch (error) {
      this.deps.collections.invalidate(collection);
      if (error instanceof RetrievalError) throw error;
      throw new StorageWriteError(
        `Failed to save ${records.length} records to "${collection}": ${errorMessage(error)}`,
        error
      );
    }

    this.logger.info(`Saved ${records.length} records to "${collection}"`);
    return records.map((record) => record.id);
  }

  private validate(texts: string[], metadataList?: Payload[], ids?: string[]): void {
    if (texts.length === 0) {
      throw new InvalidInputError("texts must contain at least one entry");
    }
    if (texts.length > MAX_BATCH_SIZE) {
      throw new InvalidInputError(
        `batch of ${texts.length} texts exceeds the maximum of ${MAX_BATCH_SIZE}`
      );
    }
    texts.forEach((text, index) => {
      if (text.trim() === "") {
        throw new InvalidInputError(
          texts.length === 1 ? "text must not be empty" : `text at index ${index} is empty`
        );
      }
    });
    if (metadataList !== undefined && metadataList.length !== texts.length) {
      throw new InvalidInputError(
        `metadataList has ${metadataList.length} entries for ${texts.length} texts`
      );
    }
    if (metadataList?.some((metadata) => Object.hasOwn(metadata, RESERVED_PAYLOAD_KEY))) {
      throw new InvalidInputError(`metadata key "${RESERVED_PAYLOAD_KEY}" is reserved`);
    }
    if (ids !== undefined) {
      if (ids.length !== texts.length) {
        throw new InvalidInputError(`ids has ${ids.length} entries for ${texts.length} texts`);
      }
      if (ids.some((id) => id.trim() === "")) {
        throw new InvalidInputError("ids must not be empty");
      }
      if (new Set(ids).size !== ids.length) {
        throw new InvalidInputError("ids must be unique within a batch");
      }
    }
  }
}
