import { Context, Effect } from "effect"
import type { TelemetryError } from "../domain/errors.js"

export interface DiagnosticsSnapshot {
  readonly usageErrors: number
  readonly invalidObservations: number
  readonly exportFailures: number
  readonly droppedSpans: number
  readonly droppedMetricPoints: number
}

export class Diagnostics extends Context.Tag("Diagnostics")<
  Diagnostics,
  {
    /**
     * Absorb a telemetry error: log it and count it. Never fails.
     */
    readonly report: (error: TelemetryError) => Effect.Effect<void>

    /**
     * Count items lost for a reason other than buffer eviction
     * (exhausted export retries, shutdown timeout, submission after shutdown).
     */
    readonly recordDropped: (
      buffer: "spans" | "metrics",
      count: number,
      reason: string
    ) => Effect.Effect<void>

    readonly snapshot: Effect.Effect<DiagnosticsSnapshot>
  }
>() {}
