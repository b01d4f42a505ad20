import { Context, Effect } from "effect"
import type { WorkloadProfile } from "../domain/WorkloadProfile.js"

export class Workload extends Context.Tag("Workload")<
  Workload,
  {
    readonly profile: WorkloadProfile

    /**
     * Simulated item lookup: a database call, CPU work and post-processing,
     * each under its own child span of `handler.get_item`.
     */
    readonly getItem: (itemId: number) => Effect.Effect<void>

    /**
     * Queue a background job for `taskId` and return without waiting for it.
     * The job's span is a child of `handler.process` in the same trace.
     */
    readonly process: (taskId: string) => Effect.Effect<void>
  }
>() {}
