/**
 * W3C Trace Context traceparent header parsing and formatting
 * Format: {version}-{trace-id}-{parent-id}-{trace-flags}
 * Example: 00-80e1afed08e019fc1110464cfa66635c-7a085853722dc6d2-01
 */

import { INVALID_SPAN_ID, INVALID_TRACE_ID, SpanId, TraceId } from "../domain/ids.js"
import type { SpanContext } from "../domain/SpanContext.js"

// version: 2 hex digits (currently "00")
// traceId: 32 hex digits (16 bytes)
// spanId: 16 hex digits (8 bytes)
// traceFlags: 2 hex digits (1 byte)
const TRACEPARENT_REGEX = /^([0-9a-f]{2})-([0-9a-f]{32})-([0-9a-f]{16})-([0-9a-f]{2})$/i

const SAMPLED_FLAG = 0x01

/**
 * Parse a traceparent header into a remote SpanContext.
 * Returns undefined if the header is invalid or missing.
 */
export const parseTraceparent = (header: string | undefined): SpanContext | undefined => {
  if (!header) {
    return undefined
  }

  const match = TRACEPARENT_REGEX.exec(header.trim())
  if (!match) {
    return undefined
  }

  const [, version, traceId, spanId, flags] = match

  // Only version 00 is defined
  if (version !== "00") {
    return undefined
  }

  if (traceId === INVALID_TRACE_ID || spanId === INVALID_SPAN_ID) {
    return undefined
  }

  return {
    traceId: TraceId.make(traceId.toLowerCase()),
    spanId: SpanId.make(spanId.toLowerCase()),
    sampled: isSampled(parseInt(flags, 16)),
    remote: true
  }
}

/**
 * Format a SpanContext as a traceparent header for outgoing calls
 */
export const formatTraceparent = (ctx: SpanContext): string => {
  const flags = (ctx.sampled ? SAMPLED_FLAG : 0).toString(16).padStart(2, "0")
  return `00-${ctx.traceId}-${ctx.spanId}-${flags}`
}

export const isSampled = (traceFlags: number): boolean =>
  (traceFlags & SAMPLED_FLAG) === SAMPLED_FLAG
