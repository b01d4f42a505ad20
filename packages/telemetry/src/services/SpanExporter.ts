import { Context, Effect } from "effect"
import type { ExportFailure } from "../domain/errors.js"
import type { Resource } from "../domain/Resource.js"
import type { FinishedSpan } from "../domain/Span.js"

/**
 * A batch handed to the sink. Order inside a batch carries no meaning; every
 * span is self-describing through its trace, span and parent ids.
 */
export interface SpanBatch {
  readonly resource: Resource
  readonly spans: ReadonlyArray<FinishedSpan>
}

/**
 * External collaborator that moves finished spans to a backend.
 * A failure rejects the whole batch.
 */
export class SpanExporter extends Context.Tag("SpanExporter")<
  SpanExporter,
  {
    readonly name: string
    readonly export: (batch: SpanBatch) => Effect.Effect<void, ExportFailure>
    readonly shutdown: Effect.Effect<void>
  }
>() {}
