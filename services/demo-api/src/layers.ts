import { NodeHttpClient } from "@effect/platform-node"
import { Config, type ConfigError, Effect, Layer, Option } from "effect"
import {
  HttpSpanExporterLive,
  LoggingSpanExporterLive,
  makeTelemetryLayer,
  SpanExporter,
  type SpanDurationRule,
  TelemetryConfigLive
} from "@causal/telemetry"
import { ITEMS_ROUTE } from "./api/items.js"
import { DemoConfigLive } from "./config.js"
import { RequestMetricsLive } from "./services/RequestMetricsLive.js"
import { WorkloadLive } from "./services/WorkloadLive.js"

// Latency histograms derived from the spans the workload already records
export const SPAN_DURATIONS: ReadonlyArray<SpanDurationRule> = [
  {
    spanName: "handler.get_item",
    histogram: "http.server.request_duration",
    description: "End-to-end request duration measured in handler",
    attributes: () => ({ route: ITEMS_ROUTE })
  },
  {
    spanName: "background.job",
    histogram: "background.job.duration",
    description: "Background job duration",
    attributes: (span) => ({ "task.type": span.attributes["task.type"] ?? "unknown" })
  }
]

// POST spans to TRACE_EXPORT_ENDPOINT when set, otherwise log them
export const SpanExporterLive: Layer.Layer<SpanExporter, ConfigError.ConfigError> = Layer.unwrapEffect(
  Effect.gen(function* () {
    const endpoint = yield* Config.option(Config.string("TRACE_EXPORT_ENDPOINT"))

    return Option.match(endpoint, {
      onNone: (): Layer.Layer<SpanExporter, ConfigError.ConfigError> => LoggingSpanExporterLive,
      onSome: () => HttpSpanExporterLive.pipe(Layer.provide(NodeHttpClient.layer))
    })
  })
)

const TelemetryStack = makeTelemetryLayer({ spanDurations: SPAN_DURATIONS }).pipe(
  Layer.provide(SpanExporterLive),
  Layer.provideMerge(TelemetryConfigLive)
)

// Services depend on the telemetry pipeline and the demo configuration
const ServiceLive = Layer.mergeAll(WorkloadLive, RequestMetricsLive).pipe(
  Layer.provideMerge(DemoConfigLive)
)

// Export composed application layer
export const AppLive = ServiceLive.pipe(Layer.provideMerge(TelemetryStack))
