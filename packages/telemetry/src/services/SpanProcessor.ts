import { Context, Effect } from "effect"
import type { Attributes, FinishedSpan } from "../domain/Span.js"

/**
 * Derive a histogram observation from every ended span with a given name.
 * The recorded value is the span's duration in milliseconds.
 */
export interface SpanDurationRule {
  readonly spanName: string
  readonly histogram: string
  readonly unit?: string
  readonly description?: string
  readonly boundaries?: ReadonlyArray<number>
  readonly attributes?: (span: FinishedSpan) => Attributes
}

export class SpanProcessor extends Context.Tag("SpanProcessor")<
  SpanProcessor,
  {
    /**
     * Called exactly once per span, when it ends.
     */
    readonly onEnd: (span: FinishedSpan) => Effect.Effect<void>
  }
>() {}
