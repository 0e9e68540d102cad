/**
 * optional-deps.ts - Loads the OTel SDK packages only if they are installed
 *
 * Tracing works without the SDK: the API package alone hands out no-op
 * tracers. Each loader returns null when its package is not installed and
 * lets any other load failure escape, so a broken install is reported at
 * startup instead of looking like "tracing off".
 *
 * tracing/index.ts imports these loaders instead of calling require() itself,
 * which lets its tests swap this module out with vi.mock().
 */

/** Missing-package error that names `packageName` (not one of its imports). */
function isModuleNotFound(error: unknown, packageName: string): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "MODULE_NOT_FOUND" &&
    error.message.includes(packageName)
  );
}

/** NodeTracerProvider, SimpleSpanProcessor and ConsoleSpanExporter. */
export function loadSdkTraceNode(): typeof import("@opentelemetry/sdk-trace-node") | null {
  try {
    return require("@opentelemetry/sdk-trace-node");
  } catch (error) {
    if (isModuleNotFound(error, "@opentelemetry/sdk-trace-node")) return null;
    throw error;
  }
}

/** OTLPTraceExporter, used when OTEL_EXPORTER_TYPE=otlp. */
export function loadExporterOtlpProto(): typeof import("@opentelemetry/exporter-trace-otlp-proto") | null {
  try {
    return require("@opentelemetry/exporter-trace-otlp-proto");
  } catch (error) {
    if (isModuleNotFound(error, "@opentelemetry/exporter-trace-otlp-proto")) return null;
    throw error;
  }
}
