import { HttpRouter, HttpServerResponse } from "@effect/platform"
import { Effect, type ParseResult } from "effect"
import { withTraceContext } from "@causal/telemetry"
import { TaskIdParams } from "../domain/WorkloadProfile.js"
import { RequestMetrics } from "../services/RequestMetrics.js"
import { Workload } from "../services/Workload.js"

export const PROCESS_ROUTE = "/process/{task_id}"

export const handleProcess = (taskId: string) =>
  Effect.gen(function* () {
    const workload = yield* Workload
    const metrics = yield* RequestMetrics

    yield* workload.process(taskId)
    yield* metrics.countRequest(PROCESS_ROUTE, 202)

    return yield* HttpServerResponse.json(
      {
        status: "queued",
        task_id: taskId,
        mode: workload.profile.mode
      },
      { status: 202 }
    )
  })

const invalidTaskId = (error: ParseResult.ParseError) =>
  Effect.gen(function* () {
    const metrics = yield* RequestMetrics
    yield* metrics.countRequest(PROCESS_ROUTE, 422)

    return yield* HttpServerResponse.json(
      { error: "validation_error", message: "Invalid task_id", details: error.message },
      { status: 422 }
    )
  })

// POST /process/:task_id - returns as soon as the job is queued
export const processTask = HttpRouter.schemaPathParams(TaskIdParams).pipe(
  Effect.flatMap(({ task_id }) => handleProcess(task_id)),
  Effect.catchTag("ParseError", invalidTaskId),
  withTraceContext
)

export const ProcessRoutes = HttpRouter.empty.pipe(
  HttpRouter.post("/process/:task_id", processTask)
)
