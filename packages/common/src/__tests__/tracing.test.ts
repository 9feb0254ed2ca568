import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { SpanStatusCode, trace, type Span } from "@opentelemetry/api";
import { createTracing, withSpan } from "../tracing.js";

const tracing = createTracing("wiki-chunker-test");

beforeEach(() => {
  tracing._resetTracing();
  delete process.env.OTEL_ENABLED;
  vi.clearAllMocks();
});

afterEach(() => {
  delete process.env.OTEL_ENABLED;
});

describe("initTracing", () => {
  it("is a no-op when OTEL_ENABLED is not set", async () => {
    await expect(tracing.initTracing()).resolves.toBeUndefined();
  });

  it("is a no-op when OTEL_ENABLED=false", async () => {
    process.env.OTEL_ENABLED = "false";
    await expect(tracing.initTracing()).resolves.toBeUndefined();
  });

  it("starts the SDK once when OTEL_ENABLED=true", async () => {
    const start = vi.fn();
    vi.doMock("@opentelemetry/sdk-node", () => ({
      NodeSDK: class {
        start = start;
      },
    }));
    vi.doMock("@opentelemetry/auto-instrumentations-node", () => ({
      getNodeAutoInstrumentations: () => [],
    }));
    vi.doMock("@opentelemetry/exporter-trace-otlp-http", () => ({
      OTLPTraceExporter: class {},
    }));

    process.env.OTEL_ENABLED = "true";
    await tracing.initTracing();
    await tracing.initTracing();
    expect(start).toHaveBeenCalledTimes(1);

    vi.doUnmock("@opentelemetry/sdk-node");
    vi.doUnmock("@opentelemetry/auto-instrumentations-node");
    vi.doUnmock("@opentelemetry/exporter-trace-otlp-http");
  });
});

describe("getTracer", () => {
  it("returns a tracer whose spans can be started and ended", () => {
    const span = tracing.getTracer().startSpan("ingest.page");
    span.setAttribute("chunks", 3);
    span.end();
    expect(typeof tracing.getTracer().startActiveSpan).toBe("function");
  });
});

function spyOnSpan(span: Span) {
  return {
    setStatus: vi.spyOn(span, "setStatus"),
    recordException: vi.spyOn(span, "recordException"),
    end: vi.spyOn(span, "end"),
  };
}

describe("withSpan", () => {
  it("returns the callback result and marks the span OK", async () => {
    const tracer = trace.getTracer("with-span-test");
    const startActiveSpan = vi.spyOn(tracer, "startActiveSpan");
    const captured: { spies?: ReturnType<typeof spyOnSpan> } = {};

    const result = await withSpan(tracer, "ingest.run", { source: "files" }, async (span) => {
      captured.spies = spyOnSpan(span);
      return 42;
    });

    expect(result).toBe(42);
    expect(startActiveSpan.mock.calls[0][0]).toBe("ingest.run");
    expect(startActiveSpan.mock.calls[0][1]).toEqual({ attributes: { source: "files" } });
    expect(captured.spies?.setStatus).toHaveBeenCalledWith({ code: SpanStatusCode.OK });
    expect(captured.spies?.end).toHaveBeenCalledTimes(1);
  });

  it("records the error, ends the span and rethrows", async () => {
    const captured: { spies?: ReturnType<typeof spyOnSpan> } = {};

    await expect(
      withSpan(trace.getTracer("with-span-test"), "ingest.page", {}, async (span) => {
        captured.spies = spyOnSpan(span);
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(captured.spies?.setStatus).toHaveBeenCalledWith({ code: SpanStatusCode.ERROR, message: "boom" });
    expect(captured.spies?.recordException).toHaveBeenCalledTimes(1);
    expect(captured.spies?.end).toHaveBeenCalledTimes(1);
  });
});
