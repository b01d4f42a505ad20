import { Config, Context, Effect, Layer } from "effect"
import type { Temporality } from "./domain/Metric.js"
import { makeResource, parseResourceAttributes, type Resource } from "./domain/Resource.js"

export class TelemetryConfig extends Context.Tag("TelemetryConfig")<
  TelemetryConfig,
  {
    readonly resource: Resource
    // Probability that a new root trace is sampled
    readonly sampleRatio: number
    // Most recent locally issued span ids remembered for parent validation.
    // Evicted oldest first: a context detached longer ago than this many
    // spans makes its children report UnknownParentSpan, though they still
    // join its trace. Size it above the spans issued over a job's wait.
    readonly issuedSpanIdCapacity: number
    // Batch exporter
    readonly scheduledDelayMs: number
    readonly maxQueueSize: number
    readonly maxExportBatchSize: number
    readonly exportTimeoutMs: number
    readonly maxExportRetries: number
    readonly retryBaseDelayMs: number
    readonly shutdownTimeoutMs: number
    // Metrics
    readonly metricsCollectIntervalMs: number
    readonly maxBufferedPoints: number
    readonly temporality: Temporality
    // Background task bridge
    readonly backgroundConcurrency: number
  }
>() {}

const positiveInteger = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.withDefault(fallback),
    Config.validate({ message: `${name} must be a positive integer`, validation: (n) => n > 0 })
  )

export const TelemetryConfigLive = Layer.effect(
  TelemetryConfig,
  Effect.gen(function* () {
    const resource = makeResource({
      serviceName: yield* Config.string("OTEL_SERVICE_NAME").pipe(
        Config.withDefault("causal-telemetry")
      ),
      serviceVersion: yield* Config.string("SERVICE_VERSION").pipe(
        Config.withDefault("0.1.0")
      ),
      environment: yield* Config.string("DEPLOYMENT_ENVIRONMENT").pipe(
        Config.withDefault("development")
      ),
      attributes: parseResourceAttributes(
        yield* Config.string("OTEL_RESOURCE_ATTRIBUTES").pipe(Config.withDefault(""))
      )
    })

    const maxQueueSize = yield* positiveInteger("OTEL_BSP_MAX_QUEUE_SIZE", 2048)
    const maxExportBatchSize = yield* positiveInteger("OTEL_BSP_MAX_EXPORT_BATCH_SIZE", 512)

    return {
      resource,
      sampleRatio: yield* Config.number("OTEL_TRACES_SAMPLER_ARG").pipe(
        Config.withDefault(1),
        Config.validate({
          message: "OTEL_TRACES_SAMPLER_ARG must be between 0 and 1",
          validation: (ratio) => ratio >= 0 && ratio <= 1
        })
      ),
      issuedSpanIdCapacity: yield* positiveInteger("TELEMETRY_ISSUED_SPAN_ID_CAPACITY", 10000),
      scheduledDelayMs: yield* positiveInteger("OTEL_BSP_SCHEDULE_DELAY", 5000),
      maxQueueSize,
      // A batch can never be larger than the buffer it is drained from
      maxExportBatchSize: Math.min(maxExportBatchSize, maxQueueSize),
      exportTimeoutMs: yield* positiveInteger("OTEL_BSP_EXPORT_TIMEOUT", 30000),
      maxExportRetries: yield* Config.integer("TELEMETRY_EXPORT_MAX_RETRIES").pipe(
        Config.withDefault(3),
        Config.validate({
          message: "TELEMETRY_EXPORT_MAX_RETRIES must not be negative",
          validation: (n) => n >= 0
        })
      ),
      retryBaseDelayMs: yield* positiveInteger("TELEMETRY_EXPORT_RETRY_BASE_DELAY_MS", 100),
      shutdownTimeoutMs: yield* positiveInteger("TELEMETRY_SHUTDOWN_TIMEOUT_MS", 5000),
      metricsCollectIntervalMs: yield* positiveInteger("METRICS_COLLECT_INTERVAL_MS", 10000),
      maxBufferedPoints: yield* positiveInteger("METRICS_MAX_BUFFERED_POINTS", 100000),
      temporality: yield* Config.literal("cumulative", "delta")("METRICS_TEMPORALITY").pipe(
        Config.withDefault("cumulative" as const)
      ),
      backgroundConcurrency: yield* positiveInteger("BACKGROUND_CONCURRENCY", 2)
    }
  })
)
