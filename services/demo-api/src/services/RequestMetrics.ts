import { Context, Effect } from "effect"

export class RequestMetrics extends Context.Tag("RequestMetrics")<
  RequestMetrics,
  {
    // Count one handled request on `route` with its response status
    readonly countRequest: (route: string, status: number) => Effect.Effect<void>
  }
>() {}
