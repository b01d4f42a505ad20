/**
 * Extracts the W3C traceparent header from incoming HTTP requests so that
 * spans opened by the handler continue the upstream trace.
 */

import { HttpServerRequest } from "@effect/platform"
import { Effect, Option } from "effect"
import { ContextPropagator } from "../services/ContextPropagator.js"
import { parseTraceparent } from "./traceparent.js"

/**
 * Wraps a handler so it runs under the remote parent context carried by the
 * request. Without a valid header the handler runs unchanged and its first
 * span starts a new trace.
 *
 * @example
 * ```ts
 * const getItem = withTraceContext(
 *   tracer.withSpan("handler.get_item", (span) => loadItem(span))
 * )
 * ```
 */
export const withTraceContext = <A, E, R>(
  handler: Effect.Effect<A, E, R>
): Effect.Effect<A, E, R | HttpServerRequest.HttpServerRequest | ContextPropagator> =>
  Effect.gen(function* () {
    const request = yield* HttpServerRequest.HttpServerRequest
    const remote = parseTraceparent(request.headers["traceparent"])

    if (remote) {
      const propagator = yield* ContextPropagator
      return yield* propagator.withContext(Option.some(remote), handler)
    }

    return yield* handler
  })
