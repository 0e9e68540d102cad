/**
 * tracing/index.ts - OpenTelemetry initialization
 *
 * What this file does:
 * Sets up OpenTelemetry tracing so each save, search and health check shows
 * up as a span with its timing, counts and failure kind.
 *
 * Opt-in by default:
 * Tracing is disabled unless OTEL_TRACING_ENABLED=true. When disabled, the OTel API
 * returns a "no-op" tracer that does nothing.
 *
 * Optional SDK packages:
 * @opentelemetry/sdk-trace-node and @opentelemetry/exporter-trace-otlp-proto
 * are optional peer dependencies loaded via dynamic require(). When absent,
 * initialization is skipped and the OTel API returns no-op implementations.
 *
 * Exporter options (OTEL_EXPORTER_TYPE):
 * - console (default): Prints spans to stdout, useful for development
 * - otlp: Sends spans via OTLP to a collector at OTEL_EXPORTER_OTLP_ENDPOINT
 *
 * The MCP server needs stdout for JSON-RPC, so it refuses to start with the
 * console exporter (see assertStdoutFree).
 *
 * Status lines go to stderr: stdout carries command output (CLI) or the
 * JSON-RPC stream (MCP server).
 */

import { trace, type Tracer } from "@opentelemetry/api";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import { ConfigError } from "../errors";
import { loadSdkTraceNode, loadExporterOtlpProto } from "./optional-deps";

const sdkTraceNode = loadSdkTraceNode();
const exporterOtlpProto = loadExporterOtlpProto();

const SERVICE_NAME = "passage-retriever";

const isTracingEnabled = process.env.OTEL_TRACING_ENABLED === "true";

/**
 * Whether query and passage text may be written to span attributes.
 *
 * SECURITY: Default to false; passages can contain anything users ingested.
 */
const isCapturePayloads = process.env.OTEL_CAPTURE_PAYLOADS === "true";

const exporterType = process.env.OTEL_EXPORTER_TYPE || "console";

/** Exporter of the registered provider; null while tracing is off */
let activeExporter: "console" | "otlp" | null = null;

/**
 * Create the span exporter selected by OTEL_EXPORTER_TYPE.
 *
 * Throws with an install hint when the requested exporter's package is
 * missing, and when OTLP is selected without an endpoint.
 */
function createSpanExporter(
  sdk: typeof import("@opentelemetry/sdk-trace-node")
): SpanExporter {
  if (exporterType === "otlp") {
    if (!exporterOtlpProto) {
      throw new Error(
        "OTEL_EXPORTER_TYPE=otlp requires @opentelemetry/exporter-trace-otlp-proto. " +
          "Install it: npm install @opentelemetry/exporter-trace-otlp-proto"
      );
    }
    const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
    if (!endpoint) {
      throw new Error(
        "OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_EXPORTER_TYPE=otlp. " +
          "Set it to your collector URL (e.g., http://localhost:4318)."
      );
    }
    // Normalize: strip trailing slashes to avoid double-slash in URL
    const base = endpoint.replace(/\/+$/, "");
    const url = base.endsWith("/v1/traces") ? base : `${base}/v1/traces`;
    console.error(`[OTel] Using OTLP exporter → ${base}`);
    return new exporterOtlpProto.OTLPTraceExporter({ url });
  }

  if (exporterType !== "console") {
    throw new Error(
      `Unsupported OTEL_EXPORTER_TYPE: "${exporterType}". Valid options: "console", "otlp".`
    );
  }

  console.error("[OTel] Using console exporter");
  return new sdk.ConsoleSpanExporter();
}

/**
 * Register a global TracerProvider when tracing is enabled and the SDK is
 * installed. Spans are exported one by one (SimpleSpanProcessor): the CLI is
 * short-lived, and batching would drop the last spans on exit.
 */
if (isTracingEnabled) {
  if (!sdkTraceNode) {
    console.warn(
      "[OTel] OTEL_TRACING_ENABLED=true but @opentelemetry/sdk-trace-node is not installed. " +
        "Tracing will be no-op. Install SDK packages for full telemetry."
    );
  } else {
    console.error("[OTel] Initializing OpenTelemetry tracing...");

    const exporter = createSpanExporter(sdkTraceNode);
    const provider = new sdkTraceNode.NodeTracerProvider({
      spanProcessors: [new sdkTraceNode.SimpleSpanProcessor(exporter)],
    });
    provider.register();
    activeExporter = exporterType === "otlp" ? "otlp" : "console";

    console.error(`[OTel] Tracing enabled for ${SERVICE_NAME}`);

    /**
     * Flush pending spans before the process exits.
     */
    const shutdown = async () => {
      try {
        await provider.shutdown();
      } catch (error) {
        console.error("[OTel] Error shutting down tracing:", error);
      }
    };

    process.once("beforeExit", shutdown);
    process.once("SIGTERM", () => {
      void shutdown().then(() => process.exit(143));
    });
    process.once("SIGINT", () => {
      void shutdown().then(() => process.exit(130));
    });
  }
}

/**
 * Get a tracer for creating spans.
 *
 * When tracing is disabled, the global TracerProvider returns a no-op tracer
 * (safe to call, does nothing).
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}

/**
 * Throws when spans are being printed to stdout, for entry points whose
 * stdout carries a protocol stream.
 */
export function assertStdoutFree(): void {
  if (activeExporter === "console") {
    throw new ConfigError([
      "OTEL_EXPORTER_TYPE: console prints spans to stdout, which carries the MCP " +
        "JSON-RPC stream; use OTEL_EXPORTER_TYPE=otlp or disable tracing",
    ]);
  }
}

export { isCapturePayloads };
