import { Context, Effect, Layer } from "effect"
import { TelemetryConfig } from "../config.js"
import { InMemorySpanExporterLive } from "../exporters/InMemorySpanExporter.js"
import { SpanId, TraceId } from "../domain/ids.js"
import { makeResource } from "../domain/Resource.js"
import type { FinishedSpan } from "../domain/Span.js"
import type { SpanContext } from "../domain/SpanContext.js"
import { makeTelemetryLayer, type TelemetryLayerOptions } from "../layers.js"
import { TracerProvider } from "../services/Tracer.js"

export const testResource = makeResource({
  serviceName: "test-service",
  serviceVersion: "1.2.3",
  environment: "test",
  attributes: {}
})

type TelemetryConfigShape = Context.Tag.Service<TelemetryConfig>

// Long schedules keep background loops out of the way; tests flush and
// collect explicitly.
export const baseTestConfig: TelemetryConfigShape = {
  resource: testResource,
  sampleRatio: 1,
  issuedSpanIdCapacity: 1000,
  scheduledDelayMs: 60000,
  maxQueueSize: 100,
  maxExportBatchSize: 50,
  exportTimeoutMs: 1000,
  maxExportRetries: 3,
  retryBaseDelayMs: 1,
  shutdownTimeoutMs: 1000,
  metricsCollectIntervalMs: 60000,
  maxBufferedPoints: 1000,
  temporality: "cumulative",
  backgroundConcurrency: 2
}

export const testConfig = (overrides: Partial<TelemetryConfigShape> = {}) =>
  Layer.succeed(TelemetryConfig, { ...baseTestConfig, ...overrides })

export const makeTestTelemetry = (
  overrides: Partial<TelemetryConfigShape> = {},
  options: TelemetryLayerOptions = {}
) =>
  makeTelemetryLayer(options).pipe(
    Layer.provideMerge(InMemorySpanExporterLive),
    Layer.provideMerge(testConfig(overrides))
  )

export const testTracer = TracerProvider.pipe(
  Effect.flatMap((provider) => provider.getTracer("test"))
)

export const makeContext = (
  trace: string,
  span: string,
  options: { readonly sampled?: boolean; readonly remote?: boolean } = {}
): SpanContext => ({
  traceId: TraceId.make(trace.repeat(32 / trace.length)),
  spanId: SpanId.make(span.repeat(16 / span.length)),
  sampled: options.sampled ?? true,
  remote: options.remote ?? false
})

export const makeFinishedSpan = (name: string, startTime = 0, endTime = 10): FinishedSpan => ({
  context: makeContext("a", "1"),
  name,
  scope: "test",
  startTime,
  endTime,
  attributes: {},
  status: { code: "Ok" },
  events: []
})

export const findSpan = (spans: ReadonlyArray<FinishedSpan>, name: string): FinishedSpan => {
  const span = spans.find((s) => s.name === name)
  if (!span) {
    throw new Error(`span "${name}" was not exported`)
  }
  return span
}
