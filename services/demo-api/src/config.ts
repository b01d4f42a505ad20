import { Config, Context, Effect, Layer } from "effect"
import { PROFILES, type WorkloadProfile } from "./domain/WorkloadProfile.js"

export class DemoConfig extends Context.Tag("DemoConfig")<
  DemoConfig,
  {
    readonly port: number
    readonly profile: WorkloadProfile
  }
>() {}

export const DemoConfigLive = Layer.effect(
  DemoConfig,
  Effect.gen(function* () {
    const profileName = yield* Config.literal("bottleneck", "optimized")("DEMO_PROFILE").pipe(
      Config.withDefault("bottleneck" as const)
    )

    return {
      port: yield* Config.integer("PORT").pipe(Config.withDefault(8000)),
      profile: PROFILES[profileName]
    }
  })
)
