import { Schema } from "effect"
import type { Attributes } from "./Span.js"

export const InstrumentKind = Schema.Literal("Counter", "Histogram")
export type InstrumentKind = typeof InstrumentKind.Type

export const Temporality = Schema.Literal("cumulative", "delta")
export type Temporality = typeof Temporality.Type

export interface InstrumentDescriptor {
  readonly name: string
  readonly kind: InstrumentKind
  readonly unit: string
  readonly description: string
  // Histogram bucket upper bounds; empty for counters
  readonly boundaries: ReadonlyArray<number>
}

/**
 * One raw observation, held only until the next aggregation pass.
 */
export interface MetricPoint {
  readonly instrument: string
  readonly kind: InstrumentKind
  readonly value: number
  readonly attributes: Attributes
  readonly timestamp: number
}

export interface AggregatedSum {
  readonly _tag: "Sum"
  readonly instrument: InstrumentDescriptor
  readonly attributes: Attributes
  readonly value: number
  readonly windowStart: number
  readonly windowEnd: number
}

export interface AggregatedHistogram {
  readonly _tag: "Histogram"
  readonly instrument: InstrumentDescriptor
  readonly attributes: Attributes
  // bucketCounts[i] counts values in (boundaries[i-1], boundaries[i]];
  // the last entry counts values above the final boundary
  readonly bucketCounts: ReadonlyArray<number>
  readonly count: number
  readonly sum: number
  readonly min: number
  readonly max: number
  readonly windowStart: number
  readonly windowEnd: number
}

export type AggregatedMetric = AggregatedSum | AggregatedHistogram

export const DEFAULT_HISTOGRAM_BOUNDARIES: ReadonlyArray<number> = [
  0, 5, 10, 25, 50, 75, 100, 250, 500, 750, 1000, 2500, 5000, 7500, 10000
]

/**
 * Canonical identity of an attribute set: the exact key/value mapping,
 * independent of insertion order. `{n: 1}` and `{n: "1"}` differ.
 */
export const attributesKey = (attributes: Attributes): string =>
  JSON.stringify(
    Object.keys(attributes)
      .sort()
      .map((key) => [key, attributes[key]])
  )

export const seriesKey = (instrument: string, attributes: Attributes): string =>
  `${instrument}|${attributesKey(attributes)}`

export const areValidBoundaries = (boundaries: ReadonlyArray<number>): boolean =>
  boundaries.every(
    (bound, index) =>
      Number.isFinite(bound) && (index === 0 || bound > boundaries[index - 1])
  )

/**
 * Index of the bucket a value falls into (upper bounds are inclusive).
 */
export const bucketIndex = (boundaries: ReadonlyArray<number>, value: number): number => {
  const index = boundaries.findIndex((bound) => value <= bound)
  return index === -1 ? boundaries.length : index
}
