/**
 * Pixelforge API Server
 *
 * Image transformation service with a fingerprint-keyed result cache, a
 * version ledger and a resilient client for the authorization service.
 */

import { type ServerType, serve } from "@hono/node-server"
import { loadConfig, loadEnvFile } from "@pixelforge/env"
import { createLogger, type Logger } from "@pixelforge/logger"
import { formatUncaughtError } from "@pixelforge/shared"
import { createApp } from "./app.js"
import { createServices, type Services } from "./services.js"

let server: ServerType | null = null
let services: Services | null = null
let shuttingDown = false

async function shutdown(signal: string, logger: Logger, exitCode = 0) {
  if (shuttingDown) return
  shuttingDown = true
  logger.info(`Received ${signal}, starting graceful shutdown`)

  // Stop accepting new connections
  await new Promise<void>(resolve => {
    if (server) {
      server.close(() => resolve())
    } else {
      resolve()
    }
  })

  try {
    await services?.close()
  } catch (err) {
    logger.error("Error while closing stores", err)
    exitCode = 1
  }

  logger.info("Shutdown complete")
  process.exit(exitCode)
}

async function main() {
  loadEnvFile()
  const config = loadConfig()
  const logger = createLogger({ component: "api", level: config.logLevel })

  services = await createServices(config, logger)
  const app = createApp(services)

  server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, info => {
    logger.info(`Server started on ${info.address}:${info.port}`)
  })

  process.on("SIGTERM", () => void shutdown("SIGTERM", logger))
  process.on("SIGINT", () => void shutdown("SIGINT", logger))

  process.on("uncaughtException", err => {
    logger.error("Uncaught exception", formatUncaughtError(err))
    void shutdown("uncaughtException", logger, 1)
  })

  // Log and keep serving
  process.on("unhandledRejection", reason => {
    logger.error("Unhandled rejection", formatUncaughtError(reason))
  })
}

main().catch(err => {
  console.error("[API] Failed to start:", formatUncaughtError(err))
  process.exit(1)
})
