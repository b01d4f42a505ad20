import { Config, Effect, Layer, Logger, LogLevel } from "effect"

/**
 * Log format and minimum level from LOG_FORMAT (logfmt | json | pretty)
 * and LOG_LEVEL.
 */
export const LoggerLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const format = yield* Config.literal("logfmt", "json", "pretty")("LOG_FORMAT").pipe(
      Config.withDefault("logfmt" as const)
    )
    const level = yield* Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info))

    const logger = format === "json" ? Logger.json : format === "pretty" ? Logger.pretty : Logger.logFmt
    return Layer.merge(logger, Logger.minimumLogLevel(level))
  })
)
