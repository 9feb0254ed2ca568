import { SpanStatusCode, trace, type Attributes, type Span, type Tracer } from "@opentelemetry/api";

export interface Tracing {
  initTracing(): Promise<void>;
  getTracer(): Tracer;
  _resetTracing(): void;
}

export function createTracing(serviceName: string): Tracing {
  let sdkStarted = false;

  /**
   * Starts the OpenTelemetry SDK with an OTLP/HTTP exporter.
   * No-op unless OTEL_ENABLED=true.
   */
  async function initTracing(): Promise<void> {
    if (process.env.OTEL_ENABLED !== "true") return;
    if (sdkStarted) return;

    const { NodeSDK } = await import("@opentelemetry/sdk-node");
    const { getNodeAutoInstrumentations } = await import(
      "@opentelemetry/auto-instrumentations-node"
    );
    const { OTLPTraceExporter } = await import(
      "@opentelemetry/exporter-trace-otlp-http"
    );

    const endpoint =
      process.env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318";

    const sdk = new NodeSDK({
      serviceName,
      traceExporter: new OTLPTraceExporter({ url: `${endpoint}/v1/traces` }),
      instrumentations: [getNodeAutoInstrumentations()],
    });

    sdk.start();
    sdkStarted = true;
  }

  /** When no SDK is registered all spans are no-ops. */
  function getTracer(): Tracer {
    return trace.getTracer(serviceName);
  }

  /** Reset internal state (for tests only). */
  function _resetTracing(): void {
    sdkStarted = false;
  }

  return { initTracing, getTracer, _resetTracing };
}

/**
 * Runs `fn` inside an active span. Errors are recorded on the span and rethrown;
 * the span is always ended.
 */
export async function withSpan<T>(
  tracer: Tracer,
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      if (error instanceof Error) span.recordException(error);
      throw error;
    } finally {
      span.end();
    }
  });
}
