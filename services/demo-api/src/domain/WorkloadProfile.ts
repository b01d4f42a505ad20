import { Duration, Schema } from "effect"

export const ProfileName = Schema.Literal("bottleneck", "optimized")
export type ProfileName = typeof ProfileName.Type

/**
 * Timings and shape of the simulated work behind each route.
 */
export interface WorkloadProfile {
  readonly name: ProfileName
  // Reported as `mode` in responses
  readonly mode: string
  readonly dbLatency: Duration.Duration
  readonly cpuIterations: number
  // Run CPU work in cooperative chunks instead of one uninterrupted loop
  readonly offloadCpu: boolean
  readonly postProcessing: Duration.Duration
  readonly backgroundJob: Duration.Duration
  readonly taskType: string
}

export const PROFILES: Readonly<Record<ProfileName, WorkloadProfile>> = {
  bottleneck: {
    name: "bottleneck",
    mode: "bottlenecks",
    dbLatency: Duration.millis(400),
    cpuIterations: 7_000_000,
    offloadCpu: false,
    postProcessing: Duration.millis(100),
    backgroundJob: Duration.millis(1200),
    taskType: "slow"
  },
  optimized: {
    name: "optimized",
    mode: "optimized",
    dbLatency: Duration.millis(80),
    cpuIterations: 7_000_000,
    offloadCpu: true,
    postProcessing: Duration.millis(20),
    backgroundJob: Duration.millis(200),
    taskType: "fast"
  }
}

// Path parameters
export const ItemIdParams = Schema.Struct({
  item_id: Schema.NumberFromString.pipe(Schema.int())
})

export const TaskIdParams = Schema.Struct({
  task_id: Schema.String.pipe(
    Schema.minLength(1, { message: () => "task_id cannot be empty" }),
    Schema.maxLength(128, { message: () => "task_id cannot exceed 128 characters" })
  )
})
