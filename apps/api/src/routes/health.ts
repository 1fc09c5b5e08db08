/**
 * Health Route
 *
 * GET /health - store reachability; "degraded" while the service still answers
 */

import { Hono } from "hono"

export interface HealthChecks {
  cache: () => Promise<boolean>
  ledger: () => Promise<boolean>
}

export function createHealthRoutes(checks: HealthChecks) {
  const app = new Hono()

  app.get("/health", async c => {
    const [cache, ledger] = await Promise.all([checks.cache(), checks.ledger()])

    return c.json({
      status: cache && ledger ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: {
        cache: cache ? "ok" : "unavailable",
        ledger: ledger ? "ok" : "unavailable",
      },
    })
  })

  return app
}
