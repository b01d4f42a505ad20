import { Chunk, Clock, Effect, Layer, Ref } from "effect"
import { Meter, type Counter, type Histogram, type HistogramOptions, type InstrumentOptions } from "./Meter.js"
import { Diagnostics } from "./Diagnostics.js"
import { TelemetryConfig } from "../config.js"
import { BufferOverflow, InvalidObservation, UsageError } from "../domain/errors.js"
import {
  areValidBoundaries,
  DEFAULT_HISTOGRAM_BOUNDARIES,
  type InstrumentDescriptor,
  type InstrumentKind,
  type MetricPoint
} from "../domain/Metric.js"
import type { Attributes } from "../domain/Span.js"

const sameBoundaries = (a: ReadonlyArray<number>, b: ReadonlyArray<number>): boolean =>
  a.length === b.length && a.every((bound, index) => bound === b[index])

export const MeterLive = Layer.effect(
  Meter,
  Effect.gen(function* () {
    const config = yield* TelemetryConfig
    const diagnostics = yield* Diagnostics

    const registry = yield* Ref.make<ReadonlyMap<string, InstrumentDescriptor>>(new Map())
    const observations = yield* Ref.make(Chunk.empty<MetricPoint>())

    // Compare-and-insert: the first registration of a name wins
    const register = (requested: InstrumentDescriptor): Effect.Effect<InstrumentDescriptor> =>
      Effect.gen(function* () {
        const existing = yield* Ref.modify(
          registry,
          (instruments): readonly [InstrumentDescriptor | undefined, ReadonlyMap<string, InstrumentDescriptor>] => {
            const found = instruments.get(requested.name)
            if (found) {
              return [found, instruments]
            }
            return [undefined, new Map(instruments).set(requested.name, requested)]
          }
        )

        if (!existing) {
          return requested
        }
        if (existing.kind !== requested.kind) {
          yield* diagnostics.report(new UsageError({
            kind: "InstrumentKindMismatch",
            message: `Instrument "${requested.name}" is a ${existing.kind}, requested as ${requested.kind}`
          }))
        } else if (
          requested.kind === "Histogram" &&
          !sameBoundaries(existing.boundaries, requested.boundaries)
        ) {
          yield* diagnostics.report(new UsageError({
            kind: "InstrumentRedefinition",
            message: `Histogram "${requested.name}" keeps the boundaries from its first registration`
          }))
        }
        return existing
      })

    const validate = (
      descriptor: InstrumentDescriptor,
      value: number
    ): Effect.Effect<void, InvalidObservation> => {
      const reason = !Number.isFinite(value)
        ? "value must be a finite number"
        : descriptor.kind === "Counter" && value < 0
          ? "counter delta must not be negative"
          : undefined
      if (reason === undefined) {
        return Effect.void
      }
      const error = new InvalidObservation({ instrument: descriptor.name, value, reason })
      return diagnostics.report(error).pipe(Effect.zipRight(Effect.fail(error)))
    }

    const observe = (
      kind: InstrumentKind,
      descriptor: InstrumentDescriptor,
      value: number,
      attributes: Attributes
    ): Effect.Effect<void, InvalidObservation> =>
      Effect.gen(function* () {
        // A handle obtained through a kind-mismatched registration
        if (descriptor.kind !== kind) {
          return yield* diagnostics.report(new UsageError({
            kind: "InstrumentKindMismatch",
            message: `Cannot record a ${kind} observation on ${descriptor.kind} "${descriptor.name}"`
          }))
        }
        yield* validate(descriptor, value)

        const timestamp = yield* Clock.currentTimeMillis
        const point: MetricPoint = {
          instrument: descriptor.name,
          kind,
          value,
          attributes: { ...attributes },
          timestamp
        }
        const evicted = yield* Ref.modify(observations, (points) => {
          const appended = Chunk.append(points, point)
          const overflow = Math.max(0, Chunk.size(appended) - config.maxBufferedPoints)
          return [overflow, overflow > 0 ? Chunk.drop(appended, overflow) : appended] as const
        })
        if (evicted > 0) {
          yield* diagnostics.report(new BufferOverflow({ buffer: "metrics", dropped: evicted }))
        }
      })

    const counter = (name: string, options: InstrumentOptions = {}): Effect.Effect<Counter> =>
      register({
        name,
        kind: "Counter",
        unit: options.unit ?? "1",
        description: options.description ?? "",
        boundaries: []
      }).pipe(
        Effect.map((descriptor) => ({
          descriptor,
          add: (value: number, attributes: Attributes = {}) =>
            observe("Counter", descriptor, value, attributes)
        }))
      )

    const histogram = (name: string, options: HistogramOptions = {}): Effect.Effect<Histogram> =>
      Effect.gen(function* () {
        let boundaries = options.boundaries ?? DEFAULT_HISTOGRAM_BOUNDARIES
        if (!areValidBoundaries(boundaries)) {
          yield* diagnostics.report(new UsageError({
            kind: "InvalidBucketBoundaries",
            message: `Histogram "${name}" boundaries must be finite and strictly increasing; using defaults`
          }))
          boundaries = DEFAULT_HISTOGRAM_BOUNDARIES
        }
        const descriptor = yield* register({
          name,
          kind: "Histogram",
          unit: options.unit ?? "1",
          description: options.description ?? "",
          boundaries: [...boundaries]
        })
        return {
          descriptor,
          record: (value: number, attributes: Attributes = {}) =>
            observe("Histogram", descriptor, value, attributes)
        }
      })

    return {
      counter,
      histogram,
      instruments: Ref.get(registry),
      drainObservations: Ref.getAndSet(observations, Chunk.empty<MetricPoint>())
    }
  })
)
