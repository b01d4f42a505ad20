import { Context, Effect } from "effect"
import type { AggregatedMetric } from "../domain/Metric.js"

/**
 * Aggregates published by one reduction pass.
 */
export interface MetricsSnapshot {
  readonly windowStart: number
  readonly windowEnd: number
  readonly metrics: ReadonlyArray<AggregatedMetric>
}

export class MetricAggregator extends Context.Tag("MetricAggregator")<
  MetricAggregator,
  {
    /**
     * Run a reduction pass over the observations recorded since the previous
     * pass and publish the result. Without new observations the previous
     * snapshot is returned unchanged.
     */
    readonly collect: Effect.Effect<MetricsSnapshot>

    /**
     * The last completed snapshot. Never reflects a pass in progress.
     */
    readonly latest: Effect.Effect<MetricsSnapshot>

    /**
     * Prometheus text rendering of `latest`.
     */
    readonly exposition: Effect.Effect<string>
  }
>() {}
