/**
 * chroma-backend.test.ts - Unit tests for the Chroma backend
 *
 * The chromadb SDK is replaced with a mock client and mock collection
 * handles, so these tests check what the backend sends to Chroma and how it
 * converts Chroma's answers, without a Chroma server.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockClient, mockCollection, clientArgs } = vi.hoisted(() => {
  const mockCollection = {
    name: "docs",
    upsert: vi.fn(),
    query: vi.fn(),
    count: vi.fn(),
    delete: vi.fn(),
  };
  const mockClient = {
    heartbeat: vi.fn(),
    listCollections: vi.fn(),
    getOrCreateCollection: vi.fn(),
    getCollection: vi.fn(),
  };
  return { mockClient, mockCollection, clientArgs: [] as unknown[] };
});

vi.mock("chromadb", () => ({
  // Regular function so it works as a constructor with `new`
  ChromaClient: vi.fn().mockImplementation(function (args: unknown) {
    clientArgs.push(args);
    return mockClient;
  }),
}));

import {
  ChromaBackend,
  STRUCTURED_KEYS_FIELD,
  buildWhereFilter,
  decodePayload,
  encodePayload,
} from "./chroma-backend";

beforeEach(() => {
  vi.clearAllMocks();
  clientArgs.length = 0;
  mockClient.heartbeat.mockResolvedValue(1);
  mockClient.listCollections.mockResolvedValue([mockCollection]);
  mockClient.getOrCreateCollection.mockResolvedValue(mockCollection);
  mockClient.getCollection.mockResolvedValue(mockCollection);
  mockCollection.upsert.mockResolvedValue(undefined);
  mockCollection.count.mockResolvedValue(0);
  mockCollection.delete.mockResolvedValue(undefined);
});

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

describe("ChromaBackend constructor", () => {
  it("splits the URL into host, port and ssl", () => {
    new ChromaBackend({ chromaUrl: "https://chroma.example.com" });

    expect(clientArgs[0]).toEqual({
      host: "chroma.example.com",
      port: 443,
      ssl: true,
    });
  });

  it("sends the API key as x-chroma-token", () => {
    new ChromaBackend({ chromaUrl: "http://localhost:9000", apiKey: "test-token" });

    expect(clientArgs[0]).toEqual({
      host: "localhost",
      port: 9000,
      ssl: false,
      headers: { "x-chroma-token": "test-token" },
    });
  });

  it("describes itself by URL", () => {
    const store = new ChromaBackend();

    expect(store.description).toBe("chroma at http://localhost:8000");
  });
});

// ---------------------------------------------------------------------------
// Collections
// ---------------------------------------------------------------------------

describe("collections", () => {
  it("lists collection names", async () => {
    const store = new ChromaBackend();

    await expect(store.listCollections()).resolves.toEqual(["docs"]);
  });

  it("pages through more collections than fit in one listing", async () => {
    const all = Array.from({ length: 150 }, (_, i) => ({ ...mockCollection, name: `c${i}` }));
    mockClient.listCollections.mockImplementation(
      async ({ limit, offset }: { limit: number; offset: number }) => all.slice(offset, offset + limit)
    );
    const store = new ChromaBackend();

    const names = await store.listCollections();

    expect(names).toHaveLength(150);
    expect(names).toContain("c140");
    expect(mockClient.listCollections.mock.calls).toEqual([
      [{ limit: 100, offset: 0 }],
      [{ limit: 100, offset: 100 }],
    ]);
  });

  it("asks for one more page when the last one was exactly full", async () => {
    const all = Array.from({ length: 100 }, (_, i) => ({ ...mockCollection, name: `c${i}` }));
    mockClient.listCollections.mockImplementation(
      async ({ limit, offset }: { limit: number; offset: number }) => all.slice(offset, offset + limit)
    );
    const store = new ChromaBackend();

    await expect(store.listCollections()).resolves.toHaveLength(100);
    expect(mockClient.listCollections).toHaveBeenCalledTimes(2);
  });

  it("creates with getOrCreateCollection, cosine space and no embedding function", async () => {
    const store = new ChromaBackend();

    await store.createCollection("docs", { dimension: 1024, distanceMetric: "cosine" });

    expect(mockClient.getOrCreateCollection).toHaveBeenCalledWith({
      name: "docs",
      metadata: { dimension: 1024 },
      configuration: { hnsw: { space: "cosine" } },
      embeddingFunction: null,
    });
  });

  it("reuses the handle from createCollection for later calls", async () => {
    const store = new ChromaBackend();
    await store.createCollection("docs", { dimension: 1024, distanceMetric: "cosine" });

    await store.count("docs");

    expect(mockClient.getCollection).not.toHaveBeenCalled();
  });

  it("fetches an unseen collection instead of creating it", async () => {
    const store = new ChromaBackend();

    await store.count("docs");

    expect(mockClient.getCollection).toHaveBeenCalledWith({ name: "docs" });
    expect(mockClient.getOrCreateCollection).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

describe("upsert", () => {
  it("sends ids, vectors, text as documents and encoded metadata", async () => {
    const store = new ChromaBackend();

    await store.upsert("docs", [
      {
        id: "id-1",
        vector: [0.1, 0.2],
        payload: { text: "foo", created_at: "2026-01-01T00:00:00.000Z", category: "AI" },
      },
    ]);

    expect(mockCollection.upsert).toHaveBeenCalledWith({
      ids: ["id-1"],
      embeddings: [[0.1, 0.2]],
      documents: ["foo"],
      metadatas: [
        { text: "foo", created_at: "2026-01-01T00:00:00.000Z", category: "AI" },
      ],
    });
  });

  it("skips the round-trip for an empty batch", async () => {
    const store = new ChromaBackend();

    await store.upsert("docs", []);

    expect(mockCollection.upsert).not.toHaveBeenCalled();
  });
});

describe("search", () => {
  it("converts cosine distance to similarity and keeps Chroma's order", async () => {
    mockCollection.query.mockResolvedValue({
      ids: [["a", "b"]],
      documents: [["A cat sleeps", "A dog barks"]],
      metadatas: [[{ text: "A cat sleeps" }, { text: "A dog barks" }]],
      distances: [[0.25, 0.75]],
    });
    const store = new ChromaBackend();

    const hits = await store.search("docs", [1, 0], { limit: 2 });

    expect(hits).toEqual([
      { id: "a", score: 0.75, payload: { text: "A cat sleeps" } },
      { id: "b", score: 0.25, payload: { text: "A dog barks" } },
    ]);
    expect(mockCollection.query).toHaveBeenCalledWith({
      queryEmbeddings: [[1, 0]],
      nResults: 2,
      include: ["documents", "metadatas", "distances"],
    });
  });

  it("passes a payload filter as a where clause", async () => {
    mockCollection.query.mockResolvedValue({
      ids: [[]],
      documents: [[]],
      metadatas: [[]],
      distances: [[]],
    });
    const store = new ChromaBackend();

    await store.search("docs", [1, 0], { limit: 3, where: { category: "AI" } });

    expect(mockCollection.query.mock.calls[0][0].where).toEqual({ category: "AI" });
  });

  it("returns no hits when Chroma returns empty columns", async () => {
    mockCollection.query.mockResolvedValue({
      ids: [],
      documents: [],
      metadatas: [],
      distances: [],
    });
    const store = new ChromaBackend();

    await expect(store.search("docs", [1], { limit: 5 })).resolves.toEqual([]);
  });
});

describe("count and delete", () => {
  it("returns the collection count", async () => {
    mockCollection.count.mockResolvedValue(7);
    const store = new ChromaBackend();

    await expect(store.count("docs")).resolves.toBe(7);
  });

  it("deletes by id", async () => {
    const store = new ChromaBackend();

    await store.delete("docs", ["x", "y"]);

    expect(mockCollection.delete).toHaveBeenCalledWith({ ids: ["x", "y"] });
  });
});

// ---------------------------------------------------------------------------
// Payload encoding helpers
// ---------------------------------------------------------------------------

describe("encodePayload / decodePayload", () => {
  it("JSON-encodes structured values and lists their keys", () => {
    const metadata = encodePayload({
      text: "foo",
      tags: ["a", "b"],
      source: { page: 3 },
      rank: 2,
    });

    expect(metadata).toEqual({
      text: "foo",
      tags: '["a","b"]',
      source: '{"page":3}',
      rank: 2,
      [STRUCTURED_KEYS_FIELD]: '["tags","source"]',
    });
  });

  it("restores structured values on decode", () => {
    const payload = decodePayload(
      {
        text: "foo",
        tags: '["a","b"]',
        [STRUCTURED_KEYS_FIELD]: '["tags"]',
      },
      "foo"
    );

    expect(payload).toEqual({ text: "foo", tags: ["a", "b"] });
  });

  it("round-trips structured values under keys containing commas", () => {
    const payload = { text: "foo", "a,b": { x: 1 }, "c,d": "[2]" };

    expect(decodePayload(encodePayload(payload), "foo")).toEqual(payload);
  });

  it("refuses to encode the reserved key", () => {
    expect(() =>
      encodePayload({ text: "foo", [STRUCTURED_KEYS_FIELD]: "category", category: "[1]" })
    ).toThrow('Payload key "_structured_keys" is reserved');
  });

  it("ignores a key list that is not a JSON array", () => {
    expect(decodePayload({ tags: '["a"]', [STRUCTURED_KEYS_FIELD]: "tags" }, null)).toEqual({
      tags: '["a"]',
    });
  });

  it("leaves unlisted JSON-looking strings alone", () => {
    expect(decodePayload({ note: "[1,2]" }, null)).toEqual({ note: "[1,2]" });
  });

  it("falls back to the Chroma document for text", () => {
    expect(decodePayload({ category: "AI" }, "from document")).toEqual({
      category: "AI",
      text: "from document",
    });
  });
});

describe("buildWhereFilter", () => {
  it("returns undefined without conditions", () => {
    expect(buildWhereFilter()).toBeUndefined();
    expect(buildWhereFilter({})).toBeUndefined();
  });

  it("wraps several conditions in $and", () => {
    expect(buildWhereFilter({ category: "AI", page: 3 })).toEqual({
      $and: [{ category: "AI" }, { page: 3 }],
    });
  });
});
