import { Context, Effect, Layer, Ref } from "effect"
import { SpanExporter, type SpanBatch } from "../services/SpanExporter.js"
import type { FinishedSpan } from "../domain/Span.js"

/**
 * Read access to everything an in-memory exporter has received.
 */
export class InMemorySpanExporter extends Context.Tag("InMemorySpanExporter")<
  InMemorySpanExporter,
  {
    readonly batches: Effect.Effect<ReadonlyArray<SpanBatch>>
    readonly spans: Effect.Effect<ReadonlyArray<FinishedSpan>>
    readonly reset: Effect.Effect<void>
  }
>() {}

// Provides both the SpanExporter sink and the InMemorySpanExporter reader
export const InMemorySpanExporterLive: Layer.Layer<SpanExporter | InMemorySpanExporter> =
  Layer.effectContext(
    Effect.gen(function* () {
      const received = yield* Ref.make<ReadonlyArray<SpanBatch>>([])

      const exporter = SpanExporter.of({
        name: "in-memory",
        export: (batch: SpanBatch) => Ref.update(received, (batches) => [...batches, batch]),
        shutdown: Effect.void
      })

      const reader = InMemorySpanExporter.of({
        batches: Ref.get(received),
        spans: Ref.get(received).pipe(
          Effect.map((batches) => batches.flatMap((batch) => batch.spans))
        ),
        reset: Ref.set(received, [])
      })

      return Context.make(SpanExporter, exporter).pipe(
        Context.add(InMemorySpanExporter, reader)
      )
    })
  )
