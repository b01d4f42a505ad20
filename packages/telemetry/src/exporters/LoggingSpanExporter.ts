import { Effect, Layer } from "effect"
import { SpanExporter, type SpanBatch } from "../services/SpanExporter.js"
import { spanToRecord, spanToSummary } from "../domain/Span.js"

/**
 * Writes every exported span to the Effect logger. Used when no remote
 * sink is configured.
 */
export const LoggingSpanExporterLive = Layer.succeed(
  SpanExporter,
  SpanExporter.of({
    name: "logging",
    export: (batch: SpanBatch) =>
      Effect.forEach(
        batch.spans,
        (span) => Effect.logInfo(spanToSummary(span), spanToRecord(span)),
        { discard: true }
      ).pipe(Effect.annotateLogs({ "service.name": batch.resource.serviceName })),
    shutdown: Effect.void
  })
)
