import { describe, it, expect } from "vitest"
import { Context, Duration, Effect, Fiber, Layer, Ref, Schedule, TestClock, TestContext } from "effect"
import { ExportFailure } from "../domain/errors.js"
import type { FinishedSpan } from "../domain/Span.js"
import { BatchExporter } from "../services/BatchExporter.js"
import { BatchExporterLive } from "../services/BatchExporterLive.js"
import { Diagnostics } from "../services/Diagnostics.js"
import { DiagnosticsLive } from "../services/DiagnosticsLive.js"
import { SpanExporter, type SpanBatch } from "../services/SpanExporter.js"
import { baseTestConfig, makeFinishedSpan, testConfig } from "./fixtures.js"

// Sink that fails its first `failures` export attempts
const makeMockExporter = (failures: number, isRetryable: boolean) =>
  Effect.gen(function* () {
    const attempts = yield* Ref.make(0)
    const batches = yield* Ref.make<ReadonlyArray<SpanBatch>>([])
    const shutdowns = yield* Ref.make(0)

    const exporter: Context.Tag.Service<SpanExporter> = {
      name: "mock",
      export: (batch) =>
        Ref.updateAndGet(attempts, (n) => n + 1).pipe(
          Effect.flatMap((attempt) =>
            attempt <= failures
              ? Effect.fail(new ExportFailure({
                exporter: "mock",
                reason: `attempt ${attempt} failed`,
                isRetryable
              }))
              : Ref.update(batches, (received) => [...received, batch])
          )
        ),
      shutdown: Ref.update(shutdowns, (n) => n + 1)
    }

    return { exporter, attempts, batches, shutdowns }
  })

type MockExporter = Effect.Effect.Success<ReturnType<typeof makeMockExporter>>

// Sink whose first `hangs` attempts never complete
const makeHangingExporter = (hangs: number) =>
  Effect.gen(function* () {
    const attempts = yield* Ref.make(0)
    const batches = yield* Ref.make<ReadonlyArray<SpanBatch>>([])
    const shutdowns = yield* Ref.make(0)

    const exporter: Context.Tag.Service<SpanExporter> = {
      name: "hanging",
      export: (batch) =>
        Ref.updateAndGet(attempts, (n) => n + 1).pipe(
          Effect.flatMap((attempt) =>
            attempt <= hangs ? Effect.never : Ref.update(batches, (received) => [...received, batch])
          )
        ),
      shutdown: Ref.update(shutdowns, (n) => n + 1)
    }

    return { exporter, attempts, batches, shutdowns }
  })

// Sink that takes `delay` per batch
const makeSlowExporter = (delay: Duration.DurationInput) =>
  Effect.gen(function* () {
    const attempts = yield* Ref.make(0)
    const batches = yield* Ref.make<ReadonlyArray<SpanBatch>>([])
    const shutdowns = yield* Ref.make(0)

    const exporter: Context.Tag.Service<SpanExporter> = {
      name: "slow",
      export: (batch) =>
        Ref.update(attempts, (n) => n + 1).pipe(
          Effect.zipRight(Effect.sleep(delay)),
          Effect.zipRight(Ref.update(batches, (received) => [...received, batch]))
        ),
      shutdown: Ref.update(shutdowns, (n) => n + 1)
    }

    return { exporter, attempts, batches, shutdowns }
  })

const runWith = <A, E>(
  mock: MockExporter,
  overrides: Partial<typeof baseTestConfig>,
  program: Effect.Effect<A, E, BatchExporter | Diagnostics>
) =>
  program.pipe(
    Effect.provide(
      BatchExporterLive.pipe(
        Layer.provideMerge(Layer.mergeAll(
          DiagnosticsLive,
          Layer.succeed(SpanExporter, mock.exporter),
          testConfig(overrides)
        ))
      )
    )
  )

const exportedNames = (mock: MockExporter) =>
  Ref.get(mock.batches).pipe(
    Effect.map((batches) => batches.flatMap((batch) => batch.spans.map((span: FinishedSpan) => span.name)))
  )

const submitAll = (names: ReadonlyArray<string>) =>
  BatchExporter.pipe(
    Effect.flatMap((exporter) => Effect.forEach(names, (name) => exporter.submit(makeFinishedSpan(name)), { discard: true }))
  )

describe("BatchExporter", () => {
  it("should export buffered spans on flush with the configured resource", async () => {
    const result = await Effect.gen(function* () {
      const mock = yield* makeMockExporter(0, true)
      return yield* runWith(mock, {}, Effect.gen(function* () {
        const exporter = yield* BatchExporter
        yield* submitAll(["a", "b", "c"])
        const flushed = yield* exporter.flush
        const batches = yield* Ref.get(mock.batches)
        return { flushed, batches, stats: yield* exporter.stats }
      }))
    }).pipe(Effect.runPromise)

    expect(result.flushed).toEqual({ complete: true, remaining: 0 })
    expect(result.batches).toHaveLength(1)
    expect(result.batches[0].resource.serviceName).toBe("test-service")
    expect(result.batches[0].spans.map((span) => span.name)).toEqual(["a", "b", "c"])
    expect(result.stats).toEqual({ buffered: 0, exported: 3, dropped: 0, failedBatches: 0 })
  })

  it("should export without a flush once a full batch is buffered", async () => {
    const exported = await Effect.gen(function* () {
      const mock = yield* makeMockExporter(0, true)
      return yield* runWith(mock, { maxExportBatchSize: 2 }, Effect.gen(function* () {
        const exporter = yield* BatchExporter
        yield* submitAll(["a", "b"])
        const stats = yield* exporter.stats.pipe(
          Effect.repeat({
            schedule: Schedule.spaced("5 millis"),
            until: (s) => s.exported === 2
          }),
          Effect.timeout("2 seconds")
        )
        return stats.exported
      }))
    }).pipe(Effect.runPromise)

    expect(exported).toBe(2)
  })

  it("should never export more than the batch size at once", async () => {
    const batchSizes = await Effect.gen(function* () {
      const mock = yield* makeMockExporter(0, true)
      return yield* runWith(mock, { maxExportBatchSize: 2 }, Effect.gen(function* () {
        const exporter = yield* BatchExporter
        yield* submitAll(["a", "b", "c", "d", "e"])
        yield* exporter.flush
        const batches = yield* Ref.get(mock.batches)
        return batches.map((batch) => batch.spans.length)
      }))
    }).pipe(Effect.runPromise)

    expect(batchSizes.every((size) => size <= 2)).toBe(true)
    expect(batchSizes.reduce((total, size) => total + size, 0)).toBe(5)
  })

  it("should evict the oldest spans when the buffer is full", async () => {
    const result = await Effect.gen(function* () {
      const mock = yield* makeMockExporter(0, true)
      return yield* runWith(mock, { maxQueueSize: 3, maxExportBatchSize: 10 }, Effect.gen(function* () {
        const exporter = yield* BatchExporter
        const diagnostics = yield* Diagnostics
        yield* submitAll(["s1", "s2", "s3", "s4", "s5"])
        yield* exporter.flush
        return {
          names: yield* exportedNames(mock),
          stats: yield* exporter.stats,
          droppedSpans: (yield* diagnostics.snapshot).droppedSpans
        }
      }))
    }).pipe(Effect.runPromise)

    expect(result.names).toEqual(["s3", "s4", "s5"])
    expect(result.stats).toEqual({ buffered: 0, exported: 3, dropped: 2, failedBatches: 0 })
    expect(result.droppedSpans).toBe(2)
  })

  it("should retry retryable failures with backoff and then succeed", async () => {
    const result = await Effect.gen(function* () {
      const mock = yield* makeMockExporter(2, true)
      return yield* runWith(mock, { maxExportRetries: 3 }, Effect.gen(function* () {
        const exporter = yield* BatchExporter
        const diagnostics = yield* Diagnostics
        yield* submitAll(["retried"])
        yield* exporter.flush
        return {
          attempts: yield* Ref.get(mock.attempts),
          names: yield* exportedNames(mock),
          exportFailures: (yield* diagnostics.snapshot).exportFailures
        }
      }))
    }).pipe(Effect.runPromise)

    expect(result).toEqual({ attempts: 3, names: ["retried"], exportFailures: 0 })
  })

  it("should drop a batch once retries are exhausted", async () => {
    const result = await Effect.gen(function* () {
      const mock = yield* makeMockExporter(100, true)
      return yield* runWith(mock, { maxExportRetries: 2 }, Effect.gen(function* () {
        const exporter = yield* BatchExporter
        const diagnostics = yield* Diagnostics
        yield* submitAll(["x", "y"])
        const flushed = yield* exporter.flush
        return {
          flushed,
          attempts: yield* Ref.get(mock.attempts),
          stats: yield* exporter.stats,
          diagnostics: yield* diagnostics.snapshot
        }
      }))
    }).pipe(Effect.runPromise)

    expect(result.flushed).toEqual({ complete: true, remaining: 0 })
    expect(result.attempts).toBe(3)
    expect(result.stats).toEqual({ buffered: 0, exported: 0, dropped: 2, failedBatches: 1 })
    expect(result.diagnostics.exportFailures).toBe(1)
    expect(result.diagnostics.droppedSpans).toBe(2)
  })

  it("should not retry a non-retryable failure", async () => {
    const attempts = await Effect.gen(function* () {
      const mock = yield* makeMockExporter(1, false)
      return yield* runWith(mock, { maxExportRetries: 3 }, Effect.gen(function* () {
        const exporter = yield* BatchExporter
        yield* submitAll(["rejected"])
        yield* exporter.flush
        return yield* Ref.get(mock.attempts)
      }))
    }).pipe(Effect.runPromise)

    expect(attempts).toBe(1)
  })

  it("should report an empty flush as complete", async () => {
    const flushed = await Effect.gen(function* () {
      const mock = yield* makeMockExporter(0, true)
      return yield* runWith(mock, {}, BatchExporter.pipe(Effect.flatMap((exporter) => exporter.flush)))
    }).pipe(Effect.runPromise)

    expect(flushed).toEqual({ complete: true, remaining: 0 })
  })

  describe("timing", () => {
    it("should drain on the schedule delay without a flush", async () => {
      const result = await Effect.gen(function* () {
        const mock = yield* makeMockExporter(0, true)
        return yield* runWith(mock, { scheduledDelayMs: 500 }, Effect.gen(function* () {
          yield* submitAll(["tick"])
          yield* TestClock.adjust("499 millis")
          const early = yield* exportedNames(mock)
          yield* TestClock.adjust("1 millis")
          yield* TestClock.adjust("10 millis")
          return { early, late: yield* exportedNames(mock) }
        }))
      }).pipe(Effect.provide(TestContext.TestContext), Effect.runPromise)

      expect(result).toEqual({ early: [], late: ["tick"] })
    })

    it("should time out a hanging export attempt and retry it", async () => {
      const result = await Effect.gen(function* () {
        const mock = yield* makeHangingExporter(1)
        const config = { scheduledDelayMs: 100, exportTimeoutMs: 200, maxExportRetries: 2, retryBaseDelayMs: 10 }
        return yield* runWith(mock, config, Effect.gen(function* () {
          const exporter = yield* BatchExporter
          yield* submitAll(["stuck"])
          // Drain at 100, first attempt times out at 300, retry at 310
          yield* TestClock.adjust("400 millis")
          yield* TestClock.adjust("10 millis")
          return {
            names: yield* exportedNames(mock),
            attempts: yield* Ref.get(mock.attempts),
            stats: yield* exporter.stats
          }
        }))
      }).pipe(Effect.provide(TestContext.TestContext), Effect.runPromise)

      expect(result.names).toEqual(["stuck"])
      expect(result.attempts).toBe(2)
      expect(result.stats).toEqual({ buffered: 0, exported: 1, dropped: 0, failedBatches: 0 })
    })

    it("should report an incomplete flush when its timeout elapses first", async () => {
      const result = await Effect.gen(function* () {
        const mock = yield* makeSlowExporter("400 millis")
        const config = { maxExportBatchSize: 1, exportTimeoutMs: 1000, scheduledDelayMs: 500, maxExportRetries: 0 }
        return yield* runWith(mock, config, Effect.gen(function* () {
          const exporter = yield* BatchExporter
          yield* submitAll(["s1", "s2", "s3", "s4", "s5"])
          const fiber = yield* Effect.fork(exporter.flush)
          // Batches finish at 400 and 800; the third is in flight at 1000
          yield* TestClock.adjust("1000 millis")
          const flushed = yield* Fiber.join(fiber)
          // Let the interval drain empty the buffer before release
          yield* TestClock.adjust("5 seconds")
          return { flushed, buffered: (yield* exporter.stats).buffered }
        }))
      }).pipe(Effect.provide(TestContext.TestContext), Effect.runPromise)

      expect(result.flushed).toEqual({ complete: false, remaining: 2 })
      expect(result.buffered).toBe(0)
    })
  })

  describe("shutdown", () => {
    it("should flush, shut the sink down once and drop later submissions", async () => {
      const result = await Effect.gen(function* () {
        const mock = yield* makeMockExporter(0, true)
        const inside = yield* runWith(mock, {}, Effect.gen(function* () {
          const exporter = yield* BatchExporter
          yield* submitAll(["before"])
          yield* exporter.shutdown
          yield* exporter.shutdown
          yield* submitAll(["after"])
          return yield* exporter.stats
        }))
        return {
          inside,
          names: yield* exportedNames(mock),
          shutdowns: yield* Ref.get(mock.shutdowns)
        }
      }).pipe(Effect.runPromise)

      expect(result.inside).toEqual({ buffered: 0, exported: 1, dropped: 1, failedBatches: 0 })
      expect(result.names).toEqual(["before"])
      expect(result.shutdowns).toBe(1)
    })

    it("should drop the in-flight batch when the shutdown timeout elapses", async () => {
      const result = await Effect.gen(function* () {
        const mock = yield* makeHangingExporter(Number.POSITIVE_INFINITY)
        const config = { shutdownTimeoutMs: 300, exportTimeoutMs: 1000, maxExportRetries: 0 }
        return yield* runWith(mock, config, Effect.gen(function* () {
          const exporter = yield* BatchExporter
          const diagnostics = yield* Diagnostics
          yield* submitAll(Array.from({ length: 10 }, (_, i) => `span-${i}`))
          const fiber = yield* Effect.fork(exporter.shutdown)
          yield* TestClock.adjust("300 millis")
          yield* Fiber.join(fiber)
          return {
            stats: yield* exporter.stats,
            droppedSpans: (yield* diagnostics.snapshot).droppedSpans,
            shutdowns: yield* Ref.get(mock.shutdowns)
          }
        }))
      }).pipe(Effect.provide(TestContext.TestContext), Effect.runPromise)

      expect(result.stats).toEqual({ buffered: 0, exported: 0, dropped: 10, failedBatches: 0 })
      expect(result.droppedSpans).toBe(10)
      expect(result.shutdowns).toBe(1)
    })

    it("should flush pending spans when the layer is released", async () => {
      const result = await Effect.gen(function* () {
        const mock = yield* makeMockExporter(0, true)
        yield* runWith(mock, {}, submitAll(["pending"]))
        return {
          names: yield* exportedNames(mock),
          shutdowns: yield* Ref.get(mock.shutdowns)
        }
      }).pipe(Effect.runPromise)

      expect(result).toEqual({ names: ["pending"], shutdowns: 1 })
    })
  })
})
