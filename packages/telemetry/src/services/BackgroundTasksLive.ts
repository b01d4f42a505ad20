import { Cause, Duration, Effect, Layer, Option, Queue, Ref, Stream, SubscriptionRef } from "effect"
import { type BackgroundJob, BackgroundTasks } from "./BackgroundTasks.js"
import { ContextPropagator, type DetachedHandle } from "./ContextPropagator.js"
import { TelemetryConfig } from "../config.js"

interface QueuedJob {
  readonly handle: DetachedHandle
  readonly job: BackgroundJob
}

export const BackgroundTasksLive = Layer.scoped(
  BackgroundTasks,
  Effect.gen(function* () {
    const config = yield* TelemetryConfig
    const propagator = yield* ContextPropagator

    const queue = yield* Queue.unbounded<QueuedJob>()
    const pending = yield* SubscriptionRef.make(0)
    // Cleared once the shutdown drain is over; later jobs have no worker
    const accepting = yield* Ref.make(true)

    const runJob = ({ handle, job }: QueuedJob): Effect.Effect<void> =>
      propagator.withContext(handle.context, job.run).pipe(
        Effect.catchAllCause((cause) =>
          Effect.logError("Background job failed", { job: job.name, cause: Cause.pretty(cause) })
        ),
        Effect.annotateLogs("job", job.name),
        Effect.ensuring(SubscriptionRef.update(pending, (n) => n - 1))
      )

    const worker = Queue.take(queue).pipe(Effect.flatMap(runJob), Effect.forever)
    for (let i = 0; i < config.backgroundConcurrency; i++) {
      yield* Effect.forkScoped(worker)
    }

    const enqueue = (handle: DetachedHandle, job: BackgroundJob): Effect.Effect<void> =>
      Effect.gen(function* () {
        if (!(yield* Ref.get(accepting))) {
          return yield* Effect.logWarning("Background job rejected after shutdown", { job: job.name })
        }
        yield* SubscriptionRef.update(pending, (n) => n + 1)
        yield* Queue.offer(queue, { handle, job })
      })

    const drain: Effect.Effect<void> = pending.changes.pipe(
      Stream.filter((n) => n === 0),
      Stream.take(1),
      Stream.runDrain
    )

    // Registered after the workers, so it runs before they are interrupted
    yield* Effect.addFinalizer(() =>
      Effect.interruptible(drain).pipe(
        Effect.timeoutOption(Duration.millis(config.shutdownTimeoutMs)),
        Effect.flatMap((drained) =>
          Option.isSome(drained)
            ? Effect.void
            : SubscriptionRef.get(pending).pipe(
              Effect.flatMap((remaining) =>
                Effect.logWarning("Background jobs abandoned at shutdown", { remaining })
              )
            )
        ),
        Effect.ensuring(Ref.set(accepting, false))
      )
    )

    return {
      enqueue,
      pending: SubscriptionRef.get(pending),
      drain
    }
  })
)
