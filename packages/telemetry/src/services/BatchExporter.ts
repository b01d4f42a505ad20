import { Context, Effect } from "effect"
import type { FinishedSpan } from "../domain/Span.js"

export interface ExporterStats {
  readonly buffered: number
  readonly exported: number
  readonly dropped: number
  readonly failedBatches: number
}

export interface FlushResult {
  // False when the timeout elapsed before the buffer was empty
  readonly complete: boolean
  readonly remaining: number
}

export class BatchExporter extends Context.Tag("BatchExporter")<
  BatchExporter,
  {
    /**
     * Enqueue a finished span. Never blocks and never fails: when the buffer
     * is full the oldest spans are evicted and counted.
     */
    readonly submit: (span: FinishedSpan) => Effect.Effect<void>

    /**
     * Export everything currently buffered, bounded by the export timeout.
     */
    readonly flush: Effect.Effect<FlushResult>

    /**
     * Stop accepting spans, flush within the shutdown timeout and shut the
     * sink down. Also runs when the layer's scope closes.
     */
    readonly shutdown: Effect.Effect<void>

    readonly stats: Effect.Effect<ExporterStats>
  }
>() {}
