import { HttpRouter, HttpServerResponse } from "@effect/platform"
import { Effect } from "effect"
import { EXPOSITION_CONTENT_TYPE, MetricAggregator } from "@causal/telemetry"
import { RequestMetrics } from "../services/RequestMetrics.js"

// Pull endpoint: aggregate what has been recorded so far, then render it
export const scrapeMetrics = Effect.gen(function* () {
  const aggregator = yield* MetricAggregator
  const metrics = yield* RequestMetrics

  // Counted before collecting so the scrape sees itself
  yield* metrics.countRequest("/metrics", 200)
  yield* aggregator.collect
  const body = yield* aggregator.exposition

  return HttpServerResponse.text(body, { contentType: EXPOSITION_CONTENT_TYPE })
})

export const MetricsRoutes = HttpRouter.empty.pipe(
  HttpRouter.get("/metrics", scrapeMetrics)
)
