import { Layer } from "effect"
import { BackgroundTasksLive } from "./services/BackgroundTasksLive.js"
import { BatchExporterLive } from "./services/BatchExporterLive.js"
import { ContextPropagatorLive } from "./services/ContextPropagatorLive.js"
import { DiagnosticsLive } from "./services/DiagnosticsLive.js"
import { MeterLive } from "./services/MeterLive.js"
import { MetricAggregatorLive } from "./services/MetricAggregatorLive.js"
import type { SpanDurationRule } from "./services/SpanProcessor.js"
import { makeSpanProcessorLayer } from "./services/SpanProcessorLive.js"
import { TracerProviderLive } from "./services/TracerProviderLive.js"

export interface TelemetryLayerOptions {
  readonly spanDurations?: ReadonlyArray<SpanDurationRule>
}

/**
 * The full pipeline, minus its two inputs: TelemetryConfig and a SpanExporter.
 *
 * Release order on shutdown follows construction in reverse: background jobs
 * drain first, then the tracer, then the batch exporter flushes into the sink.
 */
export const makeTelemetryLayer = (options: TelemetryLayerOptions = {}) => {
  const metrics = MetricAggregatorLive.pipe(Layer.provideMerge(MeterLive))

  const tracing = TracerProviderLive.pipe(
    Layer.provideMerge(makeSpanProcessorLayer(options.spanDurations ?? [])),
    Layer.provideMerge(BatchExporterLive),
    Layer.provideMerge(metrics)
  )

  return BackgroundTasksLive.pipe(
    Layer.provideMerge(tracing),
    Layer.provideMerge(Layer.mergeAll(DiagnosticsLive, ContextPropagatorLive))
  )
}

export const TelemetryLive = makeTelemetryLayer()
