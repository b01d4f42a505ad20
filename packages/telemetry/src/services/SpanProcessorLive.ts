import { Effect, Layer } from "effect"
import { BatchExporter } from "./BatchExporter.js"
import { Meter } from "./Meter.js"
import { SpanProcessor, type SpanDurationRule } from "./SpanProcessor.js"
import { spanDurationMs, type FinishedSpan } from "../domain/Span.js"

export const makeSpanProcessorLayer = (rules: ReadonlyArray<SpanDurationRule>) =>
  Layer.effect(
    SpanProcessor,
    Effect.gen(function* () {
      const exporter = yield* BatchExporter
      const meter = yield* Meter

      const derived = yield* Effect.forEach(rules, (rule) =>
        meter.histogram(rule.histogram, {
          unit: rule.unit ?? "ms",
          description: rule.description ?? `Duration of ${rule.spanName} spans`,
          boundaries: rule.boundaries
        }).pipe(Effect.map((histogram) => ({ rule, histogram })))
      )

      const onEnd = (span: FinishedSpan): Effect.Effect<void> =>
        Effect.gen(function* () {
          if (span.context.sampled) {
            yield* exporter.submit(span)
          }
          for (const { rule, histogram } of derived) {
            if (rule.spanName !== span.name) continue
            // Rejections are already counted by the meter
            yield* histogram.record(spanDurationMs(span), rule.attributes?.(span) ?? {}).pipe(
              Effect.catchTag("InvalidObservation", () => Effect.void)
            )
          }
        })

      return { onEnd }
    })
  )

export const SpanProcessorLive = makeSpanProcessorLayer([])
