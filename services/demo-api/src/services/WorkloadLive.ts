import { Effect, Layer } from "effect"
import { BackgroundTasks, ContextPropagator, TracerProvider } from "@causal/telemetry"
import { DemoConfig } from "../config.js"
import { sumInChunks, sumRange } from "../domain/cpuWork.js"
import { Workload } from "./Workload.js"

export const TRACER_NAME = "demo-api"

export const WorkloadLive = Layer.effect(
  Workload,
  Effect.gen(function* () {
    const { profile } = yield* DemoConfig
    const provider = yield* TracerProvider
    const tracer = yield* provider.getTracer(TRACER_NAME)
    const propagator = yield* ContextPropagator
    const tasks = yield* BackgroundTasks

    const dbQuery = tracer.withSpan(
      "db.query",
      () => Effect.sleep(profile.dbLatency),
      { "db.system": "simulated" }
    )

    const cpuWork = profile.offloadCpu
      ? tracer.withSpan("cpu.work.offloaded", () =>
          tracer.withSpan("cpu.work", () => sumInChunks(profile.cpuIterations), {
            "cpu.iterations": profile.cpuIterations
          })
        )
      : tracer.withSpan(
          "cpu.work.blocking",
          () => Effect.sync(() => sumRange(0, profile.cpuIterations)),
          { "cpu.iterations": profile.cpuIterations }
        )

    const postProcessing = tracer.withSpan("post.processing", () => Effect.sleep(profile.postProcessing))

    const getItem = (itemId: number) =>
      tracer.withSpan(
        "handler.get_item",
        () => dbQuery.pipe(Effect.zipRight(cpuWork), Effect.zipRight(postProcessing)),
        { "item.id": itemId }
      ).pipe(Effect.asVoid)

    const backgroundJob = (taskId: string) =>
      tracer.withSpan(
        "background.job",
        () =>
          Effect.sleep(profile.backgroundJob).pipe(
            Effect.zipRight(Effect.logInfo("Background job finished", { taskId }))
          ),
        { "task.id": taskId, "task.type": profile.taskType }
      )

    const processTask = (taskId: string) =>
      tracer.withSpan(
        "handler.process",
        () =>
          Effect.gen(function* () {
            const handle = yield* propagator.detach()
            yield* tasks.enqueue(handle, {
              name: `background.job ${taskId}`,
              run: backgroundJob(taskId)
            })
          }),
        { "task.id": taskId }
      )

    return Workload.of({ profile, getItem, process: processTask })
  })
)
