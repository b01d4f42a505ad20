import { randomBytes } from "node:crypto"
import { Schema } from "effect"

// Branded identifiers, lowercase hex as carried in W3C traceparent headers
export const TraceId = Schema.String.pipe(
  Schema.pattern(/^[0-9a-f]{32}$/),
  Schema.brand("TraceId")
)
export type TraceId = typeof TraceId.Type

export const SpanId = Schema.String.pipe(
  Schema.pattern(/^[0-9a-f]{16}$/),
  Schema.brand("SpanId")
)
export type SpanId = typeof SpanId.Type

export const INVALID_TRACE_ID = "00000000000000000000000000000000"
export const INVALID_SPAN_ID = "0000000000000000"

const randomHex = (bytes: number, invalid: string): string => {
  for (;;) {
    const hex = randomBytes(bytes).toString("hex")
    if (hex !== invalid) {
      return hex
    }
  }
}

/**
 * 128-bit random trace id. Collisions across unrelated roots are not
 * tracked; the id space makes them negligible.
 */
export const generateTraceId = (): TraceId =>
  TraceId.make(randomHex(16, INVALID_TRACE_ID))

/**
 * 64-bit random span id.
 */
export const generateSpanId = (): SpanId =>
  SpanId.make(randomHex(8, INVALID_SPAN_ID))
