import { Chunk, Context, Effect } from "effect"
import type { InvalidObservation } from "../domain/errors.js"
import type { InstrumentDescriptor, MetricPoint } from "../domain/Metric.js"
import type { Attributes } from "../domain/Span.js"

export interface Counter {
  readonly descriptor: InstrumentDescriptor
  /**
   * Add a non-negative delta for the given attribute set.
   */
  readonly add: (value: number, attributes?: Attributes) => Effect.Effect<void, InvalidObservation>
}

export interface Histogram {
  readonly descriptor: InstrumentDescriptor
  readonly record: (value: number, attributes?: Attributes) => Effect.Effect<void, InvalidObservation>
}

export interface InstrumentOptions {
  readonly unit?: string
  readonly description?: string
}

export interface HistogramOptions extends InstrumentOptions {
  readonly boundaries?: ReadonlyArray<number>
}

export class Meter extends Context.Tag("Meter")<
  Meter,
  {
    /**
     * Register a counter, or return the instrument already registered under
     * `name`. Registration never fails; misuse is reported to Diagnostics.
     */
    readonly counter: (name: string, options?: InstrumentOptions) => Effect.Effect<Counter>

    readonly histogram: (name: string, options?: HistogramOptions) => Effect.Effect<Histogram>

    readonly instruments: Effect.Effect<ReadonlyMap<string, InstrumentDescriptor>>

    /**
     * Swap the raw observation buffer for an empty one and return what it held.
     */
    readonly drainObservations: Effect.Effect<Chunk.Chunk<MetricPoint>>
  }
>() {}
