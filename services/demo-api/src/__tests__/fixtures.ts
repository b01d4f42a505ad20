import { ConfigProvider, Duration, Layer } from "effect"
import {
  InMemorySpanExporterLive,
  makeTelemetryLayer,
  TelemetryConfigLive
} from "@causal/telemetry"
import { DemoConfig } from "../config.js"
import { PROFILES, type ProfileName, type WorkloadProfile } from "../domain/WorkloadProfile.js"
import { SPAN_DURATIONS } from "../layers.js"
import { RequestMetricsLive } from "../services/RequestMetricsLive.js"
import { WorkloadLive } from "../services/WorkloadLive.js"

// Long schedules keep the exporter and aggregator loops idle; tests flush
// and collect explicitly.
const telemetryConfig = TelemetryConfigLive.pipe(
  Layer.provide(
    Layer.setConfigProvider(
      ConfigProvider.fromMap(
        new Map([
          ["OTEL_SERVICE_NAME", "demo-api-test"],
          ["OTEL_BSP_SCHEDULE_DELAY", "60000"],
          ["METRICS_COLLECT_INTERVAL_MS", "60000"],
          ["TELEMETRY_EXPORT_RETRY_BASE_DELAY_MS", "1"]
        ])
      )
    )
  )
)

// Real timings, small CPU loop
export const testProfile = (name: ProfileName): WorkloadProfile => ({
  ...PROFILES[name],
  cpuIterations: 1000
})

// No waiting at all, for tests that run on the live clock
export const instantProfile = (name: ProfileName): WorkloadProfile => ({
  ...testProfile(name),
  dbLatency: Duration.zero,
  postProcessing: Duration.zero,
  backgroundJob: Duration.zero
})

export const makeTestApp = (profile: WorkloadProfile) =>
  Layer.mergeAll(WorkloadLive, RequestMetricsLive).pipe(
    Layer.provideMerge(Layer.succeed(DemoConfig, { port: 0, profile })),
    Layer.provideMerge(makeTelemetryLayer({ spanDurations: SPAN_DURATIONS })),
    Layer.provideMerge(InMemorySpanExporterLive),
    Layer.provideMerge(telemetryConfig)
  )

export type TestApp = Layer.Layer.Success<ReturnType<typeof makeTestApp>>
