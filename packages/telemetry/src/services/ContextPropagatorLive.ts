import { Effect, FiberRef, Layer, Option } from "effect"
import { ContextPropagator, type DetachedHandle } from "./ContextPropagator.js"
import type { SpanContext } from "../domain/SpanContext.js"

// The current context lives in a FiberRef: each fiber carries its own value
// across suspension points, and forked fibers start from a copy of their
// parent's value.
export const ContextPropagatorLive = Layer.scoped(
  ContextPropagator,
  Effect.gen(function* () {
    const currentRef = yield* FiberRef.make<Option.Option<SpanContext>>(Option.none())

    const detach = (context?: SpanContext): Effect.Effect<DetachedHandle> =>
      (context ? Effect.succeed(Option.some(context)) : FiberRef.get(currentRef)).pipe(
        Effect.map((captured) => ({ _tag: "DetachedHandle" as const, context: captured }))
      )

    const withContext = <A, E, R>(
      context: Option.Option<SpanContext>,
      self: Effect.Effect<A, E, R>
    ): Effect.Effect<A, E, R> => Effect.locally(self, currentRef, context)

    const enterScoped = (context: SpanContext) =>
      Effect.locallyScoped(currentRef, Option.some(context))

    return {
      current: FiberRef.get(currentRef),
      withContext,
      enterScoped,
      detach
    }
  })
)
