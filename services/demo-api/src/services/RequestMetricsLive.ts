import { Effect, Layer } from "effect"
import { Meter } from "@causal/telemetry"
import { RequestMetrics } from "./RequestMetrics.js"

export const REQUESTS_COUNTER = "http.server.requests"

export const RequestMetricsLive = Layer.effect(
  RequestMetrics,
  Effect.gen(function* () {
    const meter = yield* Meter
    const requests = yield* meter.counter(REQUESTS_COUNTER, {
      unit: "1",
      description: "Handled HTTP requests"
    })

    return RequestMetrics.of({
      countRequest: (route, status) =>
        requests.add(1, { route, status }).pipe(
          Effect.catchTag("InvalidObservation", (error) =>
            Effect.logWarning("Request not counted", { route, reason: error.reason })
          )
        )
    })
  })
)
