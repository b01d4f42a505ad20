import { Config, Duration, Effect, Layer } from "effect"
import { HttpClient, HttpClientRequest } from "@effect/platform"
import { SpanExporter, type SpanBatch } from "../services/SpanExporter.js"
import { ExportFailure } from "../domain/errors.js"
import { resourceAttributes } from "../domain/Resource.js"
import { spanToRecord } from "../domain/Span.js"

const EXPORTER_NAME = "http-json"

// Too-many-requests and server errors are worth retrying; other 4xx are not
const isRetryableStatus = (status: number): boolean =>
  status === 408 || status === 429 || status >= 500

export const toRequestBody = (batch: SpanBatch) => ({
  resource: resourceAttributes(batch.resource),
  spans: batch.spans.map(spanToRecord)
})

/**
 * POSTs each batch as JSON to TRACE_EXPORT_ENDPOINT.
 */
export const HttpSpanExporterLive = Layer.effect(
  SpanExporter,
  Effect.gen(function* () {
    const endpoint = yield* Config.string("TRACE_EXPORT_ENDPOINT")
    const requestTimeoutMs = yield* Config.integer("TRACE_EXPORT_REQUEST_TIMEOUT_MS").pipe(
      Config.withDefault(10000)
    )
    const client = yield* HttpClient.HttpClient

    const handleConnectionError = (error: unknown) =>
      Effect.fail(new ExportFailure({
        exporter: EXPORTER_NAME,
        reason: error instanceof Error ? error.message : String(error),
        isRetryable: true
      }))

    const exportBatch = (batch: SpanBatch): Effect.Effect<void, ExportFailure> =>
      Effect.gen(function* () {
        const request = HttpClientRequest.post(endpoint).pipe(
          HttpClientRequest.bodyUnsafeJson(toRequestBody(batch))
        )

        const response = yield* client.execute(request).pipe(
          Effect.timeout(Duration.millis(requestTimeoutMs)),
          Effect.catchTag("TimeoutException", handleConnectionError),
          Effect.catchTag("RequestError", handleConnectionError),
          Effect.catchTag("ResponseError", handleConnectionError)
        )

        if (response.status >= 200 && response.status < 300) {
          yield* Effect.logDebug("Span batch exported", {
            endpoint,
            spans: batch.spans.length
          })
          return
        }

        return yield* Effect.fail(new ExportFailure({
          exporter: EXPORTER_NAME,
          reason: `Sink responded with status ${response.status}`,
          statusCode: response.status,
          isRetryable: isRetryableStatus(response.status)
        }))
      })

    return SpanExporter.of({
      name: EXPORTER_NAME,
      export: exportBatch,
      shutdown: Effect.logDebug("HTTP span exporter stopped", { endpoint })
    })
  })
)
