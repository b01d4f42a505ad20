import { Data } from "effect"

// ═══════════════════════════════════════════════════════════════════════════
// Telemetry errors
//
// None of these ever reach request-handling code as a failure, except
// InvalidObservation, which is returned to the caller of Counter.add /
// Histogram.record. Everything is counted by Diagnostics.
// ═══════════════════════════════════════════════════════════════════════════

export type UsageErrorKind =
  | "SpanAlreadyEnded"
  | "SpanMutationAfterEnd"
  | "UnknownParentSpan"
  | "InstrumentKindMismatch"
  | "InvalidBucketBoundaries"
  | "InstrumentRedefinition"

/**
 * API misuse. Reported as a diagnostic; execution continues.
 */
export class UsageError extends Data.TaggedError("UsageError")<{
  readonly kind: UsageErrorKind
  readonly message: string
}> {}

/**
 * A metric value that violates its instrument's constraints.
 */
export class InvalidObservation extends Data.TaggedError("InvalidObservation")<{
  readonly instrument: string
  readonly value: number
  readonly reason: string
}> {}

/**
 * The exporter sink rejected or could not receive a batch
 */
export class ExportFailure extends Data.TaggedError("ExportFailure")<{
  readonly exporter: string
  readonly reason: string
  readonly statusCode?: number
  readonly isRetryable: boolean
}> {}

/**
 * A bounded buffer evicted its oldest entries
 */
export class BufferOverflow extends Data.TaggedError("BufferOverflow")<{
  readonly buffer: "spans" | "metrics"
  readonly dropped: number
}> {}

export type TelemetryError =
  | UsageError
  | InvalidObservation
  | ExportFailure
  | BufferOverflow
