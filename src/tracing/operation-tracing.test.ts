/**
 * operation-tracing.test.ts - Unit tests for the operation span wrapper
 *
 * Replaces getTracer() with a fake tracer whose spans are plain spies, so
 * the tests can check what gets recorded without an SDK installed.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const { fakeSpan, fakeTracer } = vi.hoisted(() => {
  const fakeSpan = {
    setStatus: vi.fn(),
    setAttribute: vi.fn(),
    recordException: vi.fn(),
    end: vi.fn(),
    spanContext: vi.fn(() => ({ traceId: "0".repeat(32), spanId: "0".repeat(16), traceFlags: 0 })),
    isRecording: vi.fn(() => true),
  };
  const fakeTracer = { startSpan: vi.fn(() => fakeSpan) };
  return { fakeSpan, fakeTracer };
});

vi.mock("./index", () => ({
  getTracer: () => fakeTracer,
}));

import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { withOperationTracing } from "./operation-tracing";
import { InvalidInputError } from "../errors";

beforeEach(() => {
  vi.clearAllMocks();
});

describe("withOperationTracing", () => {
  it("names the span after the operation and merges attributes", async () => {
    await withOperationTracing("retrieve", { "retrieval.top_k": 3 }, async () => []);

    expect(fakeTracer.startSpan).toHaveBeenCalledWith("retrieval.retrieve", {
      kind: SpanKind.INTERNAL,
      attributes: { "retrieval.operation": "retrieve", "retrieval.top_k": 3 },
    });
  });

  it("returns the handler result and marks the span OK", async () => {
    const result = await withOperationTracing("count", {}, async () => 42);

    expect(result).toBe(42);
    expect(fakeSpan.setStatus).toHaveBeenCalledWith({ code: SpanStatusCode.OK });
    expect(fakeSpan.end).toHaveBeenCalledOnce();
  });

  it("hands the span to the handler for result attributes", async () => {
    await withOperationTracing("save_texts", {}, async (span) => {
      span.setAttribute("retrieval.saved", 2);
    });

    expect(fakeSpan.setAttribute).toHaveBeenCalledWith("retrieval.saved", 2);
  });

  it("records failures with the error kind and rethrows", async () => {
    const failure = new InvalidInputError("query must not be empty");

    await expect(
      withOperationTracing("retrieve", {}, async () => {
        throw failure;
      })
    ).rejects.toBe(failure);

    expect(fakeSpan.recordException).toHaveBeenCalledWith(failure);
    expect(fakeSpan.setStatus).toHaveBeenCalledWith({
      code: SpanStatusCode.ERROR,
      message: "query must not be empty",
    });
    expect(fakeSpan.setAttribute).toHaveBeenCalledWith("error.type", "InvalidInput");
    expect(fakeSpan.end).toHaveBeenCalledOnce();
  });

  it("wraps non-Error throws before recording them", async () => {
    await expect(
      withOperationTracing("delete", {}, async () => {
        throw "plain string";
      })
    ).rejects.toBe("plain string");

    expect(fakeSpan.recordException).toHaveBeenCalledWith(new Error("plain string"));
  });
});
