import { HttpRouter, HttpServer, HttpServerResponse } from "@effect/platform"
import { NodeHttpServer, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer } from "effect"
import { createServer } from "node:http"
import { HealthRoutes } from "./api/health.js"
import { ItemRoutes } from "./api/items.js"
import { MetricsRoutes } from "./api/metrics.js"
import { ProcessRoutes } from "./api/process.js"
import { DemoConfig } from "./config.js"
import { AppLive } from "./layers.js"
import { LoggerLive } from "./logging.js"

const router = HttpRouter.empty.pipe(
  HttpRouter.get(
    "/",
    Effect.succeed(HttpServerResponse.text("Causal telemetry demo API"))
  ),
  HttpRouter.concat(HealthRoutes),
  HttpRouter.concat(MetricsRoutes),
  HttpRouter.concat(ItemRoutes),
  HttpRouter.concat(ProcessRoutes)
)

const HttpLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const { port, profile } = yield* DemoConfig
    yield* Effect.logInfo("Starting demo API", { port, profile: profile.name })

    return router.pipe(
      HttpServer.serve(),
      HttpServer.withLogAddress,
      Layer.provide(NodeHttpServer.layer(createServer, { port }))
    )
  })
).pipe(Layer.provide(AppLive))

Layer.launch(HttpLive).pipe(Effect.provide(LoggerLive), NodeRuntime.runMain)
