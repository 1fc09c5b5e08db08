import type { AuthGatewayClient } from "@pixelforge/auth-gateway"
import type { Logger } from "@pixelforge/logger"
import { toErrorBody, ValidationError } from "@pixelforge/shared"
import { Hono } from "hono"
import { bodyLimit } from "hono/body-limit"
import { logger as accessLogger } from "hono/logger"
import type { Orchestrator } from "./orchestrator.js"
import { createAuthRoutes } from "./routes/auth.js"
import { createHealthRoutes, type HealthChecks } from "./routes/health.js"
import { createImageRoutes } from "./routes/images.js"

export interface AppDeps {
  orchestrator: Orchestrator
  gateway: AuthGatewayClient
  health: HealthChecks
  logger: Logger
  maxUploadBytes: number
  /** Hono access log; off in tests */
  accessLog?: boolean
}

// Multipart framing on top of the largest accepted image
const MULTIPART_OVERHEAD_BYTES = 64 * 1024

export function createApp(deps: AppDeps) {
  const app = new Hono()

  if (deps.accessLog) {
    app.use("*", accessLogger(message => deps.logger.info(message)))
  }

  app.use(
    "/images/*",
    bodyLimit({
      maxSize: deps.maxUploadBytes + MULTIPART_OVERHEAD_BYTES,
      onError: () => {
        throw new ValidationError(
          `File too large. Maximum size: ${(deps.maxUploadBytes / (1024 * 1024)).toFixed(1)}MB`,
          "validation:size",
          413,
        )
      },
    }),
  )

  app.route("/", createHealthRoutes(deps.health))
  app.route("/images", createImageRoutes(deps.orchestrator))
  app.route("/auth", createAuthRoutes(deps.gateway))

  app.notFound(c => {
    return c.json({ message: "Not found", code: "route:not-found", category: "caller" }, 404)
  })

  app.onError((err, c) => {
    const { status, body } = toErrorBody(err)
    if (status >= 500) {
      deps.logger.error("Request failed", err, { path: c.req.path, code: body.code })
    } else {
      deps.logger.debug("Request rejected", { path: c.req.path, code: body.code })
    }
    return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } })
  })

  return app
}
