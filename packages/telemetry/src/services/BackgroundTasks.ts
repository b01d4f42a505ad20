import { Context, Effect } from "effect"
import type { DetachedHandle } from "./ContextPropagator.js"

export interface BackgroundJob {
  readonly name: string
  readonly run: Effect.Effect<void, unknown>
}

export class BackgroundTasks extends Context.Tag("BackgroundTasks")<
  BackgroundTasks,
  {
    /**
     * Queue `job` and return immediately. The job later runs on a worker
     * fiber with `handle`'s context current. Its failures are logged, never
     * returned to the caller.
     */
    readonly enqueue: (handle: DetachedHandle, job: BackgroundJob) => Effect.Effect<void>

    // Jobs queued or running
    readonly pending: Effect.Effect<number>

    /**
     * Wait until no job is queued or running.
     */
    readonly drain: Effect.Effect<void>
  }
>() {}
