import { Chunk, Clock, Duration, Effect, Layer, Ref, Schedule } from "effect"
import { MetricAggregator, type MetricsSnapshot } from "./MetricAggregator.js"
import { Meter } from "./Meter.js"
import { TelemetryConfig } from "../config.js"
import { reducePoints } from "../domain/aggregation.js"
import { renderExposition } from "../domain/exposition.js"
import type { AggregatedMetric } from "../domain/Metric.js"

interface AggregationState {
  readonly series: ReadonlyMap<string, AggregatedMetric>
  readonly snapshot: MetricsSnapshot
}

export const MetricAggregatorLive = Layer.scoped(
  MetricAggregator,
  Effect.gen(function* () {
    const config = yield* TelemetryConfig
    const meter = yield* Meter

    const startedAt = yield* Clock.currentTimeMillis
    const state = yield* Ref.make<AggregationState>({
      series: new Map(),
      snapshot: { windowStart: startedAt, windowEnd: startedAt, metrics: [] }
    })
    // Serializes reduction passes; writers only ever touch the raw buffer
    const passLock = yield* Effect.makeSemaphore(1)

    const collect: Effect.Effect<MetricsSnapshot> = passLock.withPermits(1)(
      Effect.gen(function* () {
        const points = yield* meter.drainObservations
        const current = yield* Ref.get(state)
        if (Chunk.isEmpty(points)) {
          return current.snapshot
        }

        const instruments = yield* meter.instruments
        const now = yield* Clock.currentTimeMillis
        const window = {
          start: config.temporality === "cumulative" ? startedAt : current.snapshot.windowEnd,
          end: Math.max(now, current.snapshot.windowEnd)
        }
        const previous = config.temporality === "cumulative" ? current.series : new Map<string, AggregatedMetric>()
        const series = reducePoints(previous, points, instruments, window)
        const snapshot: MetricsSnapshot = {
          windowStart: window.start,
          windowEnd: window.end,
          metrics: [...series.values()]
        }

        yield* Ref.set(state, { series, snapshot })
        yield* Effect.logDebug("Metrics aggregated", {
          points: Chunk.size(points),
          series: snapshot.metrics.length
        })
        return snapshot
      })
    )

    const latest = Ref.get(state).pipe(Effect.map((s) => s.snapshot))

    yield* collect.pipe(
      Effect.repeat(Schedule.spaced(Duration.millis(config.metricsCollectIntervalMs))),
      Effect.delay(Duration.millis(config.metricsCollectIntervalMs)),
      Effect.forkScoped
    )

    return {
      collect,
      latest,
      exposition: latest.pipe(
        Effect.map((snapshot) => renderExposition(snapshot.metrics, config.resource))
      )
    }
  })
)
