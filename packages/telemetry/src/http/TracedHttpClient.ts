/**
 * Injects the current span context into outgoing requests as a W3C
 * traceparent header.
 */

import { HttpClient, HttpClientRequest } from "@effect/platform"
import { Effect, Layer, Option } from "effect"
import { ContextPropagator } from "../services/ContextPropagator.js"
import { formatTraceparent } from "./traceparent.js"

/**
 * Decorates the HttpClient already in context. Requests made outside any
 * span are sent unchanged.
 */
export const TracedHttpClientLive: Layer.Layer<
  HttpClient.HttpClient,
  never,
  HttpClient.HttpClient | ContextPropagator
> = Layer.effect(
  HttpClient.HttpClient,
  Effect.gen(function* () {
    const baseClient = yield* HttpClient.HttpClient
    const propagator = yield* ContextPropagator

    return HttpClient.mapRequestEffect(baseClient, (request) =>
      propagator.current.pipe(
        Effect.map(Option.match({
          onNone: () => request,
          onSome: (context) =>
            HttpClientRequest.setHeader(request, "traceparent", formatTraceparent(context))
        }))
      )
    )
  })
)
