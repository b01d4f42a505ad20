import { HttpRouter, HttpServerResponse } from "@effect/platform"
import { Effect } from "effect"
import { BackgroundTasks, BatchExporter, Diagnostics, TelemetryConfig } from "@causal/telemetry"
import { RequestMetrics } from "../services/RequestMetrics.js"
import { Workload } from "../services/Workload.js"

// Exported for testing - the core health check logic
export const healthCheck = Effect.gen(function* () {
  const config = yield* TelemetryConfig
  const workload = yield* Workload
  const diagnostics = yield* Diagnostics
  const exporter = yield* BatchExporter
  const tasks = yield* BackgroundTasks
  const metrics = yield* RequestMetrics

  const snapshot = yield* diagnostics.snapshot
  const stats = yield* exporter.stats
  const pendingJobs = yield* tasks.pending

  yield* metrics.countRequest("/health", 200)

  return yield* HttpServerResponse.json({
    status: "healthy",
    service: config.resource.serviceName,
    profile: workload.profile.name,
    pending_jobs: pendingJobs,
    exporter: {
      buffered: stats.buffered,
      exported: stats.exported,
      dropped: stats.dropped,
      failed_batches: stats.failedBatches
    },
    diagnostics: {
      usage_errors: snapshot.usageErrors,
      invalid_observations: snapshot.invalidObservations,
      export_failures: snapshot.exportFailures,
      dropped_spans: snapshot.droppedSpans,
      dropped_metric_points: snapshot.droppedMetricPoints
    }
  })
})

export const HealthRoutes = HttpRouter.empty.pipe(
  HttpRouter.get("/health", healthCheck)
)
