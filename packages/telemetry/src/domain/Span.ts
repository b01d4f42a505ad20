import { Predicate, Schema } from "effect"
import type { SpanContext } from "./SpanContext.js"

export type AttributeValue = string | number | boolean
export type Attributes = Readonly<Record<string, AttributeValue>>

export const SpanStatusCode = Schema.Literal("Unset", "Ok", "Error")
export type SpanStatusCode = typeof SpanStatusCode.Type

export interface SpanStatus {
  readonly code: SpanStatusCode
  readonly message?: string
}

export interface SpanEvent {
  readonly name: string
  readonly time: number
  readonly attributes: Attributes
}

/**
 * A closed span. Immutable once produced by `Span.end`; from then on it is
 * owned by the exporter pipeline.
 */
export interface FinishedSpan {
  readonly context: SpanContext
  readonly name: string
  // Name of the tracer that created the span
  readonly scope: string
  readonly startTime: number
  readonly endTime: number
  readonly attributes: Attributes
  readonly status: SpanStatus
  readonly events: ReadonlyArray<SpanEvent>
}

export const spanDurationMs = (span: FinishedSpan): number =>
  span.endTime - span.startTime

/**
 * Describe an arbitrary failure value as `exception.*` attributes.
 */
export const describeError = (error: unknown): { readonly type: string; readonly message: string } => {
  const tag = Predicate.hasProperty(error, "_tag") ? error._tag : undefined
  if (typeof tag === "string") {
    const message = error instanceof Error && error.message.length > 0 ? error.message : tag
    return { type: tag, message }
  }
  if (error instanceof Error) {
    return { type: error.name, message: error.message }
  }
  return { type: typeof error, message: String(error) }
}

/**
 * One-line summary for logs: `[<trace8>] ✓ name (12ms)`.
 */
export const spanToSummary = (span: FinishedSpan): string => {
  const marker = span.status.code === "Error" ? "✗" : span.status.code === "Ok" ? "✓" : "○"
  const error = span.status.message ? ` - ${span.status.message}` : ""
  return `[${span.context.traceId.slice(0, 8)}] ${marker} ${span.name} (${spanDurationMs(span)}ms)${error}`
}

/**
 * Flat structured form used by the logging exporter and the HTTP sink.
 */
export const spanToRecord = (span: FinishedSpan) => ({
  trace_id: span.context.traceId,
  span_id: span.context.spanId,
  parent_span_id: span.context.parentSpanId ?? null,
  sampled: span.context.sampled,
  name: span.name,
  scope: span.scope,
  start_time: new Date(span.startTime).toISOString(),
  end_time: new Date(span.endTime).toISOString(),
  duration_ms: spanDurationMs(span),
  status: span.status.code,
  status_message: span.status.message ?? null,
  attributes: span.attributes,
  events: span.events.map((event) => ({
    name: event.name,
    time: new Date(event.time).toISOString(),
    attributes: event.attributes
  }))
})
