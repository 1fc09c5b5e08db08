/**
 * Auth Routes
 *
 * Relays /auth/me, /auth/login, /auth/refresh and /auth/logout to the
 * authorization service with the gateway's timeout and retry bounds.
 */

import type { AuthGatewayClient, UpstreamResponse } from "@pixelforge/auth-gateway"
import { type Context, Hono } from "hono"

// Malformed bodies are forwarded as {} and left for the service to reject
async function jsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json()
  } catch {
    return {}
  }
}

const NULL_BODY_STATUSES = new Set([204, 205, 304])

function relay(upstream: UpstreamResponse): Response {
  if (NULL_BODY_STATUSES.has(upstream.status)) {
    return new Response(null, { status: upstream.status })
  }
  const body = typeof upstream.body === "string" ? { message: upstream.body } : (upstream.body ?? {})
  return new Response(JSON.stringify(body), {
    status: upstream.status,
    headers: { "Content-Type": "application/json" },
  })
}

export function createAuthRoutes(gateway: AuthGatewayClient) {
  const app = new Hono()

  app.get("/me", async c => relay(await gateway.me(c.req.header("Authorization"))))
  app.post("/login", async c => relay(await gateway.login(await jsonBody(c))))
  app.post("/refresh", async c => relay(await gateway.refresh(await jsonBody(c))))
  app.post("/logout", async c => relay(await gateway.logout(c.req.header("Authorization"), await jsonBody(c))))

  return app
}
