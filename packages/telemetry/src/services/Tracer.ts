import { Context, Effect, Option, Scope } from "effect"
import type { Resource } from "../domain/Resource.js"
import type { AttributeValue, Attributes, FinishedSpan, SpanStatus } from "../domain/Span.js"
import type { SpanContext } from "../domain/SpanContext.js"

/**
 * Handle to a span that is still being recorded.
 *
 * Mutations after `end` are not applied; they are reported to Diagnostics as
 * usage errors instead of failing the caller.
 */
export interface Span {
  readonly name: string
  readonly context: SpanContext
  readonly setAttribute: (key: string, value: AttributeValue) => Effect.Effect<void>
  readonly setAttributes: (attributes: Attributes) => Effect.Effect<void>
  readonly addEvent: (name: string, attributes?: Attributes) => Effect.Effect<void>
  /**
   * Attach `exception.*` attributes and an `exception` event. An unended span
   * with a recorded error defaults to status `Error`.
   */
  readonly recordError: (error: unknown) => Effect.Effect<void>
  /**
   * Close the span and hand it to the span processor. Returns `None` when the
   * span had already ended.
   */
  readonly end: (status?: SpanStatus) => Effect.Effect<Option.Option<FinishedSpan>>
  readonly isEnded: Effect.Effect<boolean>
}

export interface Tracer {
  readonly name: string
  readonly resource: Resource

  /**
   * Open a span as a child of the current context (or as a new root) and make
   * it current until the scope closes. Closing the scope ends the span.
   */
  readonly startSpan: (
    name: string,
    attributes?: Attributes
  ) => Effect.Effect<Span, never, Scope.Scope>

  readonly withSpan: <A, E, R>(
    name: string,
    f: (span: Span) => Effect.Effect<A, E, R>,
    attributes?: Attributes
  ) => Effect.Effect<A, E, Exclude<R, Scope.Scope>>
}

export class TracerProvider extends Context.Tag("TracerProvider")<
  TracerProvider,
  {
    readonly resource: Resource
    // One tracer per component name, created on first use
    readonly getTracer: (name: string) => Effect.Effect<Tracer>
  }
>() {}
