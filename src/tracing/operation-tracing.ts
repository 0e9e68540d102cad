/**
 * operation-tracing.ts - OpenTelemetry instrumentation for service operations
 *
 * What this file does:
 * Provides a wrapper that runs one retrieval-service operation (save, search,
 * count, delete, health) inside a span. Instead of duplicating tracing code in
 * every operation, the service wraps its handlers with withOperationTracing().
 *
 * Attributes:
 * | Attribute            | Description                                   |
 * |----------------------|-----------------------------------------------|
 * | retrieval.operation  | Operation name (e.g., "retrieve")             |
 * | retrieval.collection | Target collection                             |
 * | (caller-supplied)    | Counts such as retrieval.top_k                |
 * | error.type           | Error kind when the operation fails           |
 *
 * Error handling:
 * Exceptions are recorded with span.recordException() and status ERROR, then
 * rethrown unchanged.
 */

import {
  SpanKind,
  SpanStatusCode,
  context,
  trace,
  type Attributes,
  type Span,
} from "@opentelemetry/api";
import { RetrievalError } from "../errors";
import { getTracer } from "./index";

/**
 * Runs `handler` inside a span named "retrieval.<operation>".
 *
 * @param operation - Operation name (e.g., "save_text")
 * @param attributes - Extra span attributes known before the call
 * @param handler - The operation; receives the span to add result attributes
 */
export async function withOperationTracing<T>(
  operation: string,
  attributes: Attributes,
  handler: (span: Span) => Promise<T>
): Promise<T> {
  const tracer = getTracer();

  // Create span manually so we can use context.with() for proper async propagation
  const span = tracer.startSpan(`retrieval.${operation}`, {
    kind: SpanKind.INTERNAL,
    attributes: { "retrieval.operation": operation, ...attributes },
  });

  const activeContext = trace.setSpan(context.active(), span);

  return context.with(activeContext, async () => {
    try {
      const result = await handler(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const exception = error instanceof Error ? error : new Error(String(error));
      span.recordException(exception);
      span.setStatus({ code: SpanStatusCode.ERROR, message: exception.message });
      if (error instanceof RetrievalError) {
        span.setAttribute("error.type", error.kind);
      }
      throw error;
    } finally {
      span.end();
    }
  });
}
