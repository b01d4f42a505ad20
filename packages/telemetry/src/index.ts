/**
 * Causal telemetry pipeline: fiber-local trace context, scoped spans, a
 * batching span exporter, metric instruments and a pull-based aggregator.
 */

// Domain
export * from "./domain/ids.js"
export * from "./domain/SpanContext.js"
export * from "./domain/Span.js"
export * from "./domain/Resource.js"
export * from "./domain/Metric.js"
export * from "./domain/errors.js"
export { reducePoints } from "./domain/aggregation.js"
export { EXPOSITION_CONTENT_TYPE, renderExposition } from "./domain/exposition.js"

// Configuration
export { TelemetryConfig, TelemetryConfigLive } from "./config.js"

// Services
export { ContextPropagator, type DetachedHandle } from "./services/ContextPropagator.js"
export { ContextPropagatorLive } from "./services/ContextPropagatorLive.js"
export { Diagnostics, type DiagnosticsSnapshot } from "./services/Diagnostics.js"
export { DiagnosticsLive } from "./services/DiagnosticsLive.js"
export { TracerProvider, type Span, type Tracer } from "./services/Tracer.js"
export { TracerProviderLive } from "./services/TracerProviderLive.js"
export { SpanProcessor, type SpanDurationRule } from "./services/SpanProcessor.js"
export { SpanProcessorLive, makeSpanProcessorLayer } from "./services/SpanProcessorLive.js"
export { BatchExporter, type ExporterStats, type FlushResult } from "./services/BatchExporter.js"
export { BatchExporterLive } from "./services/BatchExporterLive.js"
export { SpanExporter, type SpanBatch } from "./services/SpanExporter.js"
export {
  Meter,
  type Counter,
  type Histogram,
  type HistogramOptions,
  type InstrumentOptions
} from "./services/Meter.js"
export { MeterLive } from "./services/MeterLive.js"
export { MetricAggregator, type MetricsSnapshot } from "./services/MetricAggregator.js"
export { MetricAggregatorLive } from "./services/MetricAggregatorLive.js"
export { BackgroundTasks, type BackgroundJob } from "./services/BackgroundTasks.js"
export { BackgroundTasksLive } from "./services/BackgroundTasksLive.js"
export { makeTelemetryLayer, TelemetryLive, type TelemetryLayerOptions } from "./layers.js"

// Exporters
export { InMemorySpanExporter, InMemorySpanExporterLive } from "./exporters/InMemorySpanExporter.js"
export { LoggingSpanExporterLive } from "./exporters/LoggingSpanExporter.js"
export { HttpSpanExporterLive, toRequestBody } from "./exporters/HttpSpanExporter.js"

// HTTP propagation
export { parseTraceparent, formatTraceparent, isSampled } from "./http/traceparent.js"
export { withTraceContext } from "./http/TraceContextMiddleware.js"
export { TracedHttpClientLive } from "./http/TracedHttpClient.js"
