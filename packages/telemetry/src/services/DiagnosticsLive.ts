import { Effect, Layer, Match, Ref } from "effect"
import { Diagnostics, type DiagnosticsSnapshot } from "./Diagnostics.js"
import type { TelemetryError } from "../domain/errors.js"

const emptySnapshot: DiagnosticsSnapshot = {
  usageErrors: 0,
  invalidObservations: 0,
  exportFailures: 0,
  droppedSpans: 0,
  droppedMetricPoints: 0
}

const addDropped = (
  snapshot: DiagnosticsSnapshot,
  buffer: "spans" | "metrics",
  count: number
): DiagnosticsSnapshot =>
  buffer === "spans"
    ? { ...snapshot, droppedSpans: snapshot.droppedSpans + count }
    : { ...snapshot, droppedMetricPoints: snapshot.droppedMetricPoints + count }

export const DiagnosticsLive = Layer.effect(
  Diagnostics,
  Effect.gen(function* () {
    const counters = yield* Ref.make(emptySnapshot)

    const report = (error: TelemetryError): Effect.Effect<void> =>
      Match.value(error).pipe(
        Match.tag("UsageError", (e) =>
          Ref.update(counters, (s) => ({ ...s, usageErrors: s.usageErrors + 1 })).pipe(
            Effect.zipRight(Effect.logWarning("Telemetry usage error", { kind: e.kind, message: e.message }))
          )
        ),
        Match.tag("InvalidObservation", (e) =>
          Ref.update(counters, (s) => ({ ...s, invalidObservations: s.invalidObservations + 1 })).pipe(
            Effect.zipRight(Effect.logWarning("Invalid metric observation rejected", {
              instrument: e.instrument,
              value: e.value,
              reason: e.reason
            }))
          )
        ),
        Match.tag("ExportFailure", (e) =>
          Ref.update(counters, (s) => ({ ...s, exportFailures: s.exportFailures + 1 })).pipe(
            Effect.zipRight(Effect.logError("Span export failed", {
              exporter: e.exporter,
              reason: e.reason,
              statusCode: e.statusCode
            }))
          )
        ),
        Match.tag("BufferOverflow", (e) =>
          Ref.update(counters, (s) => addDropped(s, e.buffer, e.dropped)).pipe(
            Effect.zipRight(Effect.logWarning("Telemetry buffer full, oldest entries evicted", {
              buffer: e.buffer,
              dropped: e.dropped
            }))
          )
        ),
        Match.exhaustive
      )

    const recordDropped = (buffer: "spans" | "metrics", count: number, reason: string) =>
      count <= 0
        ? Effect.void
        : Ref.update(counters, (s) => addDropped(s, buffer, count)).pipe(
            Effect.zipRight(Effect.logWarning("Telemetry data dropped", { buffer, count, reason }))
          )

    return {
      report,
      recordDropped,
      snapshot: Ref.get(counters)
    }
  })
)
