import { Context, Effect, Option, Scope } from "effect"
import type { SpanContext } from "../domain/SpanContext.js"

/**
 * A captured span context handed to work that runs on a different schedule.
 * This is the only way trace identity crosses a scheduling boundary.
 */
export interface DetachedHandle {
  readonly _tag: "DetachedHandle"
  readonly context: Option.Option<SpanContext>
}

export class ContextPropagator extends Context.Tag("ContextPropagator")<
  ContextPropagator,
  {
    /**
     * The span context of the running fiber, if any.
     */
    readonly current: Effect.Effect<Option.Option<SpanContext>>

    /**
     * Run `self` with `context` as current. The previous context is restored
     * on every exit path: success, failure and interruption.
     */
    readonly withContext: <A, E, R>(
      context: Option.Option<SpanContext>,
      self: Effect.Effect<A, E, R>
    ) => Effect.Effect<A, E, R>

    /**
     * Make `context` current until the enclosing scope closes.
     */
    readonly enterScoped: (context: SpanContext) => Effect.Effect<void, never, Scope.Scope>

    /**
     * Capture `context`, or the current context when omitted.
     */
    readonly detach: (context?: SpanContext) => Effect.Effect<DetachedHandle>
  }
>() {}
