import type { SpanId, TraceId } from "./ids.js"

/**
 * The identity propagated across suspension points and scheduling boundaries.
 * Treated as a value: copied, never mutated.
 */
export interface SpanContext {
  readonly traceId: TraceId
  readonly spanId: SpanId
  readonly parentSpanId?: SpanId
  readonly sampled: boolean
  // Parsed from an upstream traceparent header rather than issued locally
  readonly remote: boolean
}
