/**
 * index.test.ts - Unit tests for tracing initialization
 *
 * Tests the graceful degradation behavior of src/tracing/index.ts when
 * optional OTel SDK packages are absent, and the initialization behavior
 * when they're present.
 *
 * Each test resets the module registry (vi.resetModules) and re-imports
 * the tracing module, since initialization runs at module load time.
 *
 * Mocking strategy:
 * The source uses optional-deps.ts to load optional packages via require().
 * We mock that module (interceptable by Vitest) rather than the npm
 * packages directly (CJS require, not interceptable).
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

// ---------------------------------------------------------------------------
// Hoisted mock configuration
// ---------------------------------------------------------------------------

const { mockConfig } = vi.hoisted(() => {
  const providerSpy = {
    register: vi.fn(),
    shutdown: vi.fn(async () => undefined),
  };
  // Use regular functions (not arrows) so they work as constructors with `new`
  const nodeTracerProviderSpy = vi.fn(function () {
    return providerSpy;
  });
  const simpleSpanProcessorSpy = vi.fn(function () {});
  const consoleSpanExporterSpy = vi.fn(function () {});
  const otlpTraceExporterSpy = vi.fn(function (_options: { url: string }) {});

  return {
    mockConfig: {
      /** Whether loadSdkTraceNode() returns the mock module or null */
      sdkTraceNodeAvailable: true,
      /** Whether loadExporterOtlpProto() returns the mock module or null */
      exporterOtlpProtoAvailable: true,

      providerSpy,
      nodeTracerProviderSpy,
      simpleSpanProcessorSpy,
      consoleSpanExporterSpy,
      otlpTraceExporterSpy,
    },
  };
});

vi.mock("./optional-deps", () => ({
  loadSdkTraceNode: () =>
    mockConfig.sdkTraceNodeAvailable
      ? {
          NodeTracerProvider: mockConfig.nodeTracerProviderSpy,
          SimpleSpanProcessor: mockConfig.simpleSpanProcessorSpy,
          ConsoleSpanExporter: mockConfig.consoleSpanExporterSpy,
        }
      : null,
  loadExporterOtlpProto: () =>
    mockConfig.exporterOtlpProtoAvailable
      ? { OTLPTraceExporter: mockConfig.otlpTraceExporterSpy }
      : null,
}));

// ---------------------------------------------------------------------------
// Test setup / teardown
// ---------------------------------------------------------------------------

/** Snapshot of process.env before tests run, restored after each test */
const ORIGINAL_ENV = { ...process.env };

beforeEach(() => {
  vi.resetModules();
  vi.clearAllMocks();

  delete process.env.OTEL_TRACING_ENABLED;
  delete process.env.OTEL_CAPTURE_PAYLOADS;
  delete process.env.OTEL_EXPORTER_TYPE;
  delete process.env.OTEL_EXPORTER_OTLP_ENDPOINT;

  mockConfig.sdkTraceNodeAvailable = true;
  mockConfig.exporterOtlpProtoAvailable = true;

  // Initialization registers exit handlers; keep them off the real process
  vi.spyOn(process, "once").mockImplementation(() => process);
});

afterEach(() => {
  vi.restoreAllMocks();
  process.env = { ...ORIGINAL_ENV };
});

// ---------------------------------------------------------------------------
// Tracing disabled
// ---------------------------------------------------------------------------

describe("tracing disabled", () => {
  it("does not create a TracerProvider", async () => {
    await import("./index");

    expect(mockConfig.nodeTracerProviderSpy).not.toHaveBeenCalled();
  });

  it("getTracer returns a tracer with standard OTel methods", async () => {
    const tracing = await import("./index");
    const tracer = tracing.getTracer();

    expect(tracer.startActiveSpan).toBeTypeOf("function");
    expect(tracer.startSpan).toBeTypeOf("function");
  });

  it("leaves stdout to the caller", async () => {
    const tracing = await import("./index");

    expect(() => tracing.assertStdoutFree()).not.toThrow();
  });

  it("does not capture payloads by default", async () => {
    const tracing = await import("./index");

    expect(tracing.isCapturePayloads).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Tracing enabled
// ---------------------------------------------------------------------------

describe("tracing enabled", () => {
  beforeEach(() => {
    process.env.OTEL_TRACING_ENABLED = "true";
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("warns and stays no-op when the SDK is absent", async () => {
    mockConfig.sdkTraceNodeAvailable = false;
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

    await import("./index");

    expect(warnSpy).toHaveBeenCalledWith(
      expect.stringContaining("@opentelemetry/sdk-trace-node is not installed")
    );
    expect(mockConfig.nodeTracerProviderSpy).not.toHaveBeenCalled();
  });

  it("registers a provider with the console exporter by default", async () => {
    await import("./index");

    expect(mockConfig.consoleSpanExporterSpy).toHaveBeenCalledOnce();
    expect(mockConfig.simpleSpanProcessorSpy).toHaveBeenCalledOnce();
    expect(mockConfig.providerSpy.register).toHaveBeenCalledOnce();
  });

  it("uses the OTLP exporter with a normalized endpoint", async () => {
    process.env.OTEL_EXPORTER_TYPE = "otlp";
    process.env.OTEL_EXPORTER_OTLP_ENDPOINT = "http://localhost:4318/";

    await import("./index");

    expect(mockConfig.otlpTraceExporterSpy).toHaveBeenCalledWith({
      url: "http://localhost:4318/v1/traces",
    });
  });

  it("refuses a stdout-bound caller while spans go to the console", async () => {
    const tracing = await import("./index");

    expect(() => tracing.assertStdoutFree()).toThrow(
      "OTEL_EXPORTER_TYPE: console prints spans to stdout"
    );
  });

  it("leaves stdout free when exporting over OTLP", async () => {
    process.env.OTEL_EXPORTER_TYPE = "otlp";
    process.env.OTEL_EXPORTER_OTLP_ENDPOINT = "http://localhost:4318";
    const tracing = await import("./index");

    expect(() => tracing.assertStdoutFree()).not.toThrow();
  });

  it("fails when OTLP is selected without an endpoint", async () => {
    process.env.OTEL_EXPORTER_TYPE = "otlp";

    await expect(import("./index")).rejects.toThrow(
      "OTEL_EXPORTER_OTLP_ENDPOINT is required"
    );
  });

  it("fails on an unknown exporter type", async () => {
    process.env.OTEL_EXPORTER_TYPE = "zipkin";

    await expect(import("./index")).rejects.toThrow(
      'Unsupported OTEL_EXPORTER_TYPE: "zipkin"'
    );
  });

  it("flushes spans before exit", async () => {
    await import("./index");

    expect(process.once).toHaveBeenCalledWith("beforeExit", expect.any(Function));
  });
});
