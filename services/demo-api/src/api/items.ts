import { HttpRouter, HttpServerResponse } from "@effect/platform"
import { Effect, type ParseResult } from "effect"
import { withTraceContext } from "@causal/telemetry"
import { ItemIdParams } from "../domain/WorkloadProfile.js"
import { RequestMetrics } from "../services/RequestMetrics.js"
import { Workload } from "../services/Workload.js"

export const ITEMS_ROUTE = "/items/{item_id}"

// Exported for testing - the handler once the path is parsed
export const handleGetItem = (itemId: number) =>
  Effect.gen(function* () {
    const workload = yield* Workload
    const metrics = yield* RequestMetrics

    yield* workload.getItem(itemId)
    yield* metrics.countRequest(ITEMS_ROUTE, 200)

    return yield* HttpServerResponse.json({
      item_id: itemId,
      status: "ok",
      mode: workload.profile.mode
    })
  })

export const invalidItemId = (error: ParseResult.ParseError) =>
  Effect.gen(function* () {
    const metrics = yield* RequestMetrics
    yield* metrics.countRequest(ITEMS_ROUTE, 422)

    return yield* HttpServerResponse.json(
      {
        error: "validation_error",
        message: "item_id must be an integer",
        details: error.message
      },
      { status: 422 }
    )
  })

// GET /items/:item_id
export const getItem = HttpRouter.schemaPathParams(ItemIdParams).pipe(
  Effect.flatMap(({ item_id }) => handleGetItem(item_id)),
  Effect.catchTag("ParseError", invalidItemId),
  withTraceContext
)

export const ItemRoutes = HttpRouter.empty.pipe(
  HttpRouter.get("/items/:item_id", getItem)
)
