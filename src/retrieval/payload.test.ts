/**
 * payload.test.ts - Unit tests for payload merging
 */

import { describe, it, expect } from "vitest";
import { defaultPayload, mergePayload } from "./payload";
import type { Payload } from "../vectorstore";

const CREATED = new Date("2026-03-01T12:00:00.000Z");

describe("defaultPayload", () => {
  it("carries the text and an ISO timestamp", () => {
    expect(defaultPayload("foo", CREATED, "id-1")).toEqual({
      text: "foo",
      created_at: "2026-03-01T12:00:00.000Z",
      id: "id-1",
    });
  });
});

describe("mergePayload", () => {
  it("adds caller fields next to the defaults", () => {
    expect(mergePayload(defaultPayload("foo", CREATED, "id-1"), { category: "AI" })).toEqual({
      text: "foo",
      created_at: "2026-03-01T12:00:00.000Z",
      id: "id-1",
      category: "AI",
    });
  });

  it("lets an explicit caller value override a default", () => {
    const merged = mergePayload(defaultPayload("foo", CREATED, "id-1"), {
      created_at: "2020-01-01T00:00:00.000Z",
    });

    expect(merged.created_at).toBe("2020-01-01T00:00:00.000Z");
    expect(merged.text).toBe("foo");
  });

  it("keeps an explicit null from the caller", () => {
    expect(mergePayload({ text: "foo" }, { text: null })).toEqual({ text: null });
  });

  it("keeps nested caller values as given", () => {
    const merged = mergePayload({ text: "foo" }, { tags: ["a", "b"], source: { page: 3 } });

    expect(merged.tags).toEqual(["a", "b"]);
    expect(merged.source).toEqual({ page: 3 });
  });

  it("stores a __proto__ key as data instead of changing the prototype", () => {
    const metadata: Payload = JSON.parse('{"__proto__": {"polluted": true}, "category": "AI"}');

    const merged = mergePayload({ text: "foo" }, metadata);

    expect(Object.keys(merged)).toEqual(["text", "__proto__", "category"]);
    expect(Object.getPrototypeOf(merged)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(merged, "__proto__")?.value).toEqual({ polluted: true });
  });

  it("lets the caller replace the id field without touching other defaults", () => {
    expect(mergePayload(defaultPayload("foo", CREATED, "id-1"), { id: "external-7" })).toEqual({
      text: "foo",
      created_at: "2026-03-01T12:00:00.000Z",
      id: "external-7",
    });
  });

  it("does not modify its inputs", () => {
    const defaults = { text: "foo" };
    const metadata = { text: "bar" };

    mergePayload(defaults, metadata);

    expect(defaults).toEqual({ text: "foo" });
    expect(metadata).toEqual({ text: "bar" });
  });
});
