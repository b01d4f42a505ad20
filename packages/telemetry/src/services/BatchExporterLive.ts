import { Chunk, Duration, Effect, Layer, Option, Queue, Ref, Schedule } from "effect"
import { BatchExporter, type ExporterStats, type FlushResult } from "./BatchExporter.js"
import { Diagnostics } from "./Diagnostics.js"
import { SpanExporter } from "./SpanExporter.js"
import { TelemetryConfig } from "../config.js"
import { BufferOverflow, ExportFailure } from "../domain/errors.js"
import type { FinishedSpan } from "../domain/Span.js"

export const BatchExporterLive = Layer.scoped(
  BatchExporter,
  Effect.gen(function* () {
    const config = yield* TelemetryConfig
    const exporter = yield* SpanExporter
    const diagnostics = yield* Diagnostics

    const buffer = yield* Ref.make(Chunk.empty<FinishedSpan>())
    const counters = yield* Ref.make({ exported: 0, dropped: 0, failedBatches: 0 })
    const accepting = yield* Ref.make(true)
    // Capacity 1: repeated threshold signals collapse into one pending wakeup
    const wakeup = yield* Queue.sliding<void>(1)
    // One export in flight at a time; only the exporter path ever waits on it
    const exportLock = yield* Effect.makeSemaphore(1)

    const countDropped = (count: number, reason: string) =>
      Ref.update(counters, (c) => ({ ...c, dropped: c.dropped + count })).pipe(
        Effect.zipRight(diagnostics.recordDropped("spans", count, reason))
      )

    const submit = (span: FinishedSpan): Effect.Effect<void> =>
      Effect.gen(function* () {
        if (!(yield* Ref.get(accepting))) {
          return yield* countDropped(1, "exporter is shut down")
        }

        const [evicted, size] = yield* Ref.modify(buffer, (spans) => {
          const appended = Chunk.append(spans, span)
          const overflow = Math.max(0, Chunk.size(appended) - config.maxQueueSize)
          const next = overflow > 0 ? Chunk.drop(appended, overflow) : appended
          return [[overflow, Chunk.size(next)] as const, next] as const
        })

        if (evicted > 0) {
          yield* Ref.update(counters, (c) => ({ ...c, dropped: c.dropped + evicted }))
          yield* diagnostics.report(new BufferOverflow({ buffer: "spans", dropped: evicted }))
        }
        if (size >= config.maxExportBatchSize) {
          yield* Queue.offer(wakeup, undefined)
        }
      })

    const exportWithRetry = (spans: ReadonlyArray<FinishedSpan>): Effect.Effect<void, ExportFailure> =>
      exporter.export({ resource: config.resource, spans }).pipe(
        Effect.timeoutFail({
          duration: Duration.millis(config.exportTimeoutMs),
          onTimeout: () => new ExportFailure({
            exporter: exporter.name,
            reason: "export timed out",
            isRetryable: true
          })
        }),
        Effect.tapError((failure) =>
          Effect.logDebug("Span export attempt failed", {
            exporter: failure.exporter,
            reason: failure.reason,
            isRetryable: failure.isRetryable
          })
        ),
        Effect.retry({
          schedule: Schedule.exponential(Duration.millis(config.retryBaseDelayMs)),
          times: config.maxExportRetries,
          while: (failure) => failure.isRetryable
        })
      )

    // Take at most one batch off the front of the buffer and export it
    const exportNext: Effect.Effect<void> = exportLock.withPermits(1)(
      Effect.gen(function* () {
        const batch = yield* Ref.modify(buffer, (spans) =>
          Chunk.splitAt(spans, config.maxExportBatchSize)
        )
        if (Chunk.isEmpty(batch)) {
          return
        }
        const spans = Chunk.toReadonlyArray(batch)

        yield* exportWithRetry(spans).pipe(
          Effect.matchEffect({
            onSuccess: () =>
              Ref.update(counters, (c) => ({ ...c, exported: c.exported + spans.length })),
            onFailure: (failure) =>
              Ref.update(counters, (c) => ({ ...c, failedBatches: c.failedBatches + 1 })).pipe(
                Effect.zipRight(diagnostics.report(failure)),
                Effect.zipRight(countDropped(spans.length, `export failed: ${failure.reason}`))
              )
          }),
          Effect.onInterrupt(() => countDropped(spans.length, "export interrupted"))
        )
      })
    )

    const drainAll: Effect.Effect<void> = Effect.gen(function* () {
      while (Chunk.isNonEmpty(yield* Ref.get(buffer))) {
        yield* exportNext
      }
    })

    const flushWithin = (timeoutMs: number): Effect.Effect<FlushResult> =>
      Effect.interruptible(drainAll).pipe(
        Effect.timeoutOption(Duration.millis(timeoutMs)),
        Effect.flatMap((finished) =>
          Ref.get(buffer).pipe(
            Effect.map((remaining) => ({
              complete: Option.isSome(finished),
              remaining: Chunk.size(remaining)
            }))
          )
        )
      )

    const shutdown: Effect.Effect<void> = Effect.gen(function* () {
      const wasAccepting = yield* Ref.getAndSet(accepting, false)
      if (!wasAccepting) {
        return
      }
      const result = yield* flushWithin(config.shutdownTimeoutMs)
      if (!result.complete) {
        const leftover = yield* Ref.getAndSet(buffer, Chunk.empty<FinishedSpan>())
        yield* countDropped(Chunk.size(leftover), "shutdown timeout elapsed")
      }
      yield* exporter.shutdown
      yield* Effect.logDebug("Batch exporter shut down", { complete: result.complete })
    })

    const stats: Effect.Effect<ExporterStats> = Effect.all([Ref.get(buffer), Ref.get(counters)]).pipe(
      Effect.map(([spans, c]) => ({ buffered: Chunk.size(spans), ...c }))
    )

    // Drain on whichever comes first: the schedule delay or a full batch
    yield* Queue.take(wakeup).pipe(
      Effect.timeoutOption(Duration.millis(config.scheduledDelayMs)),
      Effect.zipRight(drainAll),
      Effect.forever,
      Effect.forkScoped
    )
    yield* Effect.addFinalizer(() => shutdown)

    return {
      submit,
      flush: flushWithin(config.exportTimeoutMs),
      shutdown,
      stats
    }
  })
)
