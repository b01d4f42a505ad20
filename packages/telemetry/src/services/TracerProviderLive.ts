import { Cause, Clock, Effect, Exit, Layer, Option, Random, Ref, Scope } from "effect"
import { ContextPropagator } from "./ContextPropagator.js"
import { Diagnostics } from "./Diagnostics.js"
import { SpanProcessor } from "./SpanProcessor.js"
import { type Span, type Tracer, TracerProvider } from "./Tracer.js"
import { TelemetryConfig } from "../config.js"
import { UsageError } from "../domain/errors.js"
import { generateSpanId, generateTraceId, type SpanId } from "../domain/ids.js"
import {
  describeError,
  type AttributeValue,
  type Attributes,
  type FinishedSpan,
  type SpanEvent,
  type SpanStatus
} from "../domain/Span.js"
import type { SpanContext } from "../domain/SpanContext.js"

interface OpenSpan {
  readonly _tag: "Open"
  readonly attributes: Attributes
  readonly events: ReadonlyArray<SpanEvent>
  readonly error: Option.Option<string>
}

interface EndedSpan {
  readonly _tag: "Ended"
  readonly finished: FinishedSpan
}

type SpanState = OpenSpan | EndedSpan

export const TracerProviderLive = Layer.effect(
  TracerProvider,
  Effect.gen(function* () {
    const config = yield* TelemetryConfig
    const propagator = yield* ContextPropagator
    const processor = yield* SpanProcessor
    const diagnostics = yield* Diagnostics

    // Sliding window of span ids issued here, oldest first. Only touched
    // inside Effect.sync, so every update is a single step.
    const issued = new Set<SpanId>()
    const tracers = new Map<string, Tracer>()

    const rememberIssued = (spanId: SpanId) =>
      Effect.sync(() => {
        issued.add(spanId)
        if (issued.size > config.issuedSpanIdCapacity) {
          const oldest = issued.values().next()
          if (!oldest.done) {
            issued.delete(oldest.value)
          }
        }
      })

    const childContext = (parent: SpanContext): Effect.Effect<SpanContext> =>
      Effect.gen(function* () {
        if (!parent.remote && !issued.has(parent.spanId)) {
          yield* diagnostics.report(new UsageError({
            kind: "UnknownParentSpan",
            message: `Parent span ${parent.spanId} was not issued by this provider`
          }))
        }
        return {
          traceId: parent.traceId,
          spanId: yield* Effect.sync(generateSpanId),
          parentSpanId: parent.spanId,
          sampled: parent.sampled,
          remote: false
        }
      })

    const rootContext: Effect.Effect<SpanContext> = Effect.gen(function* () {
      const draw = yield* Random.next
      return {
        traceId: yield* Effect.sync(generateTraceId),
        spanId: yield* Effect.sync(generateSpanId),
        sampled: draw < config.sampleRatio,
        remote: false
      }
    })

    const makeSpan = (
      scope: string,
      name: string,
      context: SpanContext,
      startTime: number,
      state: Ref.Ref<SpanState>
    ): Span => {
      const mutate = (operation: string, f: (open: OpenSpan) => OpenSpan): Effect.Effect<void> =>
        Ref.modify(state, (current): readonly [boolean, SpanState] =>
          current._tag === "Open" ? [true, f(current)] : [false, current]
        ).pipe(
          Effect.flatMap((applied) =>
            applied
              ? Effect.void
              : diagnostics.report(new UsageError({
                kind: "SpanMutationAfterEnd",
                message: `${operation} on ended span "${name}" was ignored`
              }))
          )
        )

      const setAttributes = (attributes: Attributes) =>
        mutate("setAttributes", (open) => ({
          ...open,
          attributes: { ...open.attributes, ...attributes }
        }))

      const addEvent = (eventName: string, attributes: Attributes = {}) =>
        Clock.currentTimeMillis.pipe(
          Effect.flatMap((time) =>
            mutate("addEvent", (open) => ({
              ...open,
              events: [...open.events, { name: eventName, time, attributes }]
            }))
          )
        )

      const recordError = (error: unknown) =>
        Clock.currentTimeMillis.pipe(
          Effect.flatMap((time) => {
            const { type, message } = describeError(error)
            const details = { "exception.type": type, "exception.message": message }
            return mutate("recordError", (open) => ({
              ...open,
              attributes: { ...open.attributes, ...details },
              events: [...open.events, { name: "exception", time, attributes: details }],
              error: Option.some(message)
            }))
          })
        )

      const end = (status?: SpanStatus): Effect.Effect<Option.Option<FinishedSpan>> =>
        Effect.gen(function* () {
          const now = yield* Clock.currentTimeMillis
          const finished = yield* Ref.modify(
            state,
            (current): readonly [Option.Option<FinishedSpan>, SpanState] => {
              if (current._tag === "Ended") {
                return [Option.none(), current]
              }
              const resolved: SpanStatus = status ?? Option.match(current.error, {
                onNone: (): SpanStatus => ({ code: "Ok" }),
                onSome: (message): SpanStatus => ({ code: "Error", message })
              })
              const span: FinishedSpan = {
                context,
                name,
                scope,
                startTime,
                endTime: Math.max(now, startTime),
                attributes: current.attributes,
                status: resolved,
                events: current.events
              }
              return [Option.some(span), { _tag: "Ended", finished: span }]
            }
          )

          if (Option.isNone(finished)) {
            yield* diagnostics.report(new UsageError({
              kind: "SpanAlreadyEnded",
              message: `Span "${name}" was ended more than once`
            }))
            return finished
          }
          yield* processor.onEnd(finished.value)
          return finished
        })

      return {
        name,
        context,
        setAttribute: (key: string, value: AttributeValue) => setAttributes({ [key]: value }),
        setAttributes,
        addEvent,
        recordError,
        end,
        isEnded: Ref.get(state).pipe(Effect.map((current) => current._tag === "Ended"))
      }
    }

    // Closes a span left open by its scope, whatever the exit path
    const endOnExit = (span: Span, exit: Exit.Exit<unknown, unknown>): Effect.Effect<void> =>
      Effect.gen(function* () {
        if (yield* span.isEnded) {
          return
        }
        if (Exit.isFailure(exit)) {
          if (Cause.isInterruptedOnly(exit.cause)) {
            yield* span.setAttribute("cancelled", true)
            yield* span.end({ code: "Error", message: "cancelled" })
            return
          }
          yield* span.recordError(Cause.squash(exit.cause))
        }
        yield* span.end()
      })

    const makeTracer = (scope: string): Tracer => {
      const startSpan = (
        name: string,
        attributes: Attributes = {}
      ): Effect.Effect<Span, never, Scope.Scope> =>
        Effect.gen(function* () {
          const parent = yield* propagator.current
          const context = yield* Option.match(parent, {
            onNone: () => rootContext,
            onSome: childContext
          })
          yield* rememberIssued(context.spanId)

          const startTime = yield* Clock.currentTimeMillis
          const state = yield* Ref.make<SpanState>({
            _tag: "Open",
            // Copied so the caller keeps no handle on the span's attributes
            attributes: { ...attributes },
            events: [],
            error: Option.none()
          })
          const span = makeSpan(scope, name, context, startTime, state)

          yield* propagator.enterScoped(context)
          yield* Effect.addFinalizer((exit) => endOnExit(span, exit))
          return span
        })

      const withSpan = <A, E, R>(
        name: string,
        f: (span: Span) => Effect.Effect<A, E, R>,
        attributes?: Attributes
      ): Effect.Effect<A, E, Exclude<R, Scope.Scope>> =>
        Effect.scoped(
          startSpan(name, attributes).pipe(
            Effect.flatMap((span) =>
              f(span).pipe(
                Effect.annotateLogs({
                  trace_id: span.context.traceId,
                  span_id: span.context.spanId
                })
              )
            )
          )
        )

      return { name: scope, resource: config.resource, startSpan, withSpan }
    }

    const getTracer = (name: string): Effect.Effect<Tracer> =>
      Effect.sync(() => {
        const cached = tracers.get(name)
        if (cached) {
          return cached
        }
        const tracer = makeTracer(name)
        tracers.set(name, tracer)
        return tracer
      })

    return { resource: config.resource, getTracer }
  })
)
