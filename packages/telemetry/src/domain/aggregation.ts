import type { AggregatedMetric, InstrumentDescriptor, MetricPoint } from "./Metric.js"
import { bucketIndex, seriesKey } from "./Metric.js"

/**
 * Reduce raw points into per-series aggregates, starting from `previous`.
 * Pure: `previous` is never mutated and points for instruments missing from
 * `instruments` (or observed with another kind) are skipped.
 */
export const reducePoints = (
  previous: ReadonlyMap<string, AggregatedMetric>,
  points: Iterable<MetricPoint>,
  instruments: ReadonlyMap<string, InstrumentDescriptor>,
  window: { readonly start: number; readonly end: number }
): ReadonlyMap<string, AggregatedMetric> => {
  const next = new Map<string, AggregatedMetric>()
  for (const [key, metric] of previous) {
    next.set(key, { ...metric, windowStart: window.start, windowEnd: window.end })
  }

  for (const point of points) {
    const instrument = instruments.get(point.instrument)
    if (!instrument || instrument.kind !== point.kind) {
      continue
    }
    const key = seriesKey(point.instrument, point.attributes)
    const current = next.get(key)

    if (instrument.kind === "Counter") {
      next.set(key, {
        _tag: "Sum",
        instrument,
        attributes: point.attributes,
        value: (current?._tag === "Sum" ? current.value : 0) + point.value,
        windowStart: window.start,
        windowEnd: window.end
      })
      continue
    }

    const bucketCounts =
      current?._tag === "Histogram"
        ? [...current.bucketCounts]
        : new Array<number>(instrument.boundaries.length + 1).fill(0)
    bucketCounts[bucketIndex(instrument.boundaries, point.value)] += 1

    next.set(key, {
      _tag: "Histogram",
      instrument,
      attributes: point.attributes,
      bucketCounts,
      count: (current?._tag === "Histogram" ? current.count : 0) + 1,
      sum: (current?._tag === "Histogram" ? current.sum : 0) + point.value,
      min: current?._tag === "Histogram" ? Math.min(current.min, point.value) : point.value,
      max: current?._tag === "Histogram" ? Math.max(current.max, point.value) : point.value,
      windowStart: window.start,
      windowEnd: window.end
    })
  }

  return next
}
