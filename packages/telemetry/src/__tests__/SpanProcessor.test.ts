import { describe, it, expect } from "vitest"
import { Effect, Fiber, Layer, TestClock, TestContext } from "effect"
import { InMemorySpanExporter } from "../exporters/InMemorySpanExporter.js"
import { BatchExporter } from "../services/BatchExporter.js"
import { Meter } from "../services/Meter.js"
import { MetricAggregator } from "../services/MetricAggregator.js"
import type { SpanDurationRule } from "../services/SpanProcessor.js"
import { makeTestTelemetry, testTracer } from "./fixtures.js"

const rules: ReadonlyArray<SpanDurationRule> = [
  {
    spanName: "background.job",
    histogram: "background.job.duration",
    boundaries: [100, 1000],
    attributes: (span) => ({ "task.type": String(span.attributes["task.type"]) })
  }
]

type TestServices = Layer.Layer.Success<ReturnType<typeof makeTestTelemetry>>

const runTimed = <A, E>(program: Effect.Effect<A, E, TestServices>, sampleRatio = 1) =>
  program.pipe(
    Effect.provide(makeTestTelemetry({ sampleRatio }, { spanDurations: rules })),
    Effect.provide(TestContext.TestContext),
    Effect.runPromise
  )

const job = (taskType: string, millis: number) =>
  testTracer.pipe(
    Effect.flatMap((tracer) =>
      tracer.withSpan("background.job", () => Effect.sleep(`${millis} millis`), { "task.type": taskType })
    )
  )

describe("SpanProcessor", () => {
  it("should derive duration histograms from span timestamps", async () => {
    const text = await runTimed(
      Effect.gen(function* () {
        const fiber = yield* Effect.fork(
          Effect.all([job("slow", 1200), job("fast", 200), job("fast", 200)], { concurrency: "unbounded" })
        )
        yield* TestClock.adjust("1200 millis")
        yield* Fiber.join(fiber)
        const aggregator = yield* MetricAggregator
        yield* aggregator.collect
        return yield* aggregator.exposition
      })
    )

    expect(text.split("\n").filter((line) => line.startsWith("background_job_duration_milliseconds"))).toEqual([
      "background_job_duration_milliseconds_bucket{task_type=\"fast\",le=\"100\"} 0",
      "background_job_duration_milliseconds_bucket{task_type=\"fast\",le=\"1000\"} 2",
      "background_job_duration_milliseconds_bucket{task_type=\"fast\",le=\"+Inf\"} 2",
      "background_job_duration_milliseconds_sum{task_type=\"fast\"} 400",
      "background_job_duration_milliseconds_count{task_type=\"fast\"} 2",
      "background_job_duration_milliseconds_bucket{task_type=\"slow\",le=\"100\"} 0",
      "background_job_duration_milliseconds_bucket{task_type=\"slow\",le=\"1000\"} 0",
      "background_job_duration_milliseconds_bucket{task_type=\"slow\",le=\"+Inf\"} 1",
      "background_job_duration_milliseconds_sum{task_type=\"slow\"} 1200",
      "background_job_duration_milliseconds_count{task_type=\"slow\"} 1"
    ])
  })

  it("should register rule histograms when the layer is built", async () => {
    const descriptor = await runTimed(
      Meter.pipe(
        Effect.flatMap((meter) => meter.instruments),
        Effect.map((instruments) => instruments.get("background.job.duration"))
      )
    )

    expect(descriptor).toEqual({
      name: "background.job.duration",
      kind: "Histogram",
      unit: "ms",
      description: "Duration of background.job spans",
      boundaries: [100, 1000]
    })
  })

  it("should feed duration metrics from unsampled spans without exporting them", async () => {
    const result = await runTimed(
      Effect.gen(function* () {
        const fiber = yield* Effect.fork(job("fast", 200))
        yield* TestClock.adjust("200 millis")
        yield* Fiber.join(fiber)
        const exporter = yield* BatchExporter
        yield* exporter.flush
        const memory = yield* InMemorySpanExporter
        const aggregator = yield* MetricAggregator
        const snapshot = yield* aggregator.collect
        return { exported: (yield* memory.spans).length, series: snapshot.metrics.length }
      }),
      0
    )

    expect(result).toEqual({ exported: 0, series: 1 })
  })
})
