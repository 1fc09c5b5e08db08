import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { Transformer } from "@napi-rs/image"
import { AuthGatewayClient, type FallbackMode, type FetchLike } from "@pixelforge/auth-gateway"
import { MemoryVersionLedger, type VersionLedger } from "@pixelforge/database"
import { FilesystemBlobStore, TransformEngine } from "@pixelforge/images"
import { createLogger, createMemorySink } from "@pixelforge/logger"
import { MemoryResultCache, type ResultCache } from "@pixelforge/redis"
import { vi } from "vitest"
import { createApp } from "../app.js"
import type { FetchLike as ImageFetch } from "../intake.js"
import { Orchestrator } from "../orchestrator.js"

export const TOKEN = "test-token"
export const AUTH = { Authorization: `Bearer ${TOKEN}` }

export function pngOf(width: number, height: number, rgba: readonly [number, number, number, number]): Promise<Buffer> {
  const data = new Uint8Array(width * height * 4)
  for (let i = 0; i < width * height; i += 1) data.set(rgba, i * 4)
  return Transformer.fromRgbaPixels(data, width, height).png()
}

/**
 * Authorization service stand-in: accepts TOKEN, rejects everything else,
 * and answers the relayed endpoints.
 */
export const authService = vi.fn<FetchLike>(async (input, init) => {
  const path = new URL(input).pathname
  const authorization = new Headers(init.headers).get("Authorization")
  const json = (status: number, body: unknown) =>
    new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } })

  if (path === "/auth/me") {
    return authorization === `Bearer ${TOKEN}`
      ? json(200, { user_id: 7, email: "user@example.test" })
      : json(401, { message: "invalid token" })
  }
  if (path === "/auth/login") return json(200, { access_token: TOKEN })
  if (path === "/auth/refresh") return json(200, { access_token: TOKEN })
  if (path === "/auth/logout") return new Response(null, { status: 204 })
  return json(404, { message: "unknown" })
})

export const unreachableAuthService = vi.fn<FetchLike>(() => Promise.reject(new TypeError("fetch failed")))

export interface HarnessOptions {
  authFetch?: FetchLike
  fallbackMode?: FallbackMode
  cache?: ResultCache
  ledger?: VersionLedger
  imageFetch?: ImageFetch
  nearDuplicate?: { maxDistance: number }
}

export async function createHarness(options: HarnessOptions = {}) {
  const dir = await mkdtemp(join(tmpdir(), "pixelforge-api-"))
  const sink = createMemorySink()
  const logger = createLogger({ component: "test", level: "debug", sink })

  const cache = options.cache ?? new MemoryResultCache()
  const ledger = options.ledger ?? new MemoryVersionLedger()
  const engine = new TransformEngine()
  const gateway = new AuthGatewayClient({
    baseUrl: "http://auth.test",
    timeoutMs: 50,
    maxRetries: 1,
    fallbackMode: options.fallbackMode ?? "restrictive",
    fetch: options.authFetch ?? authService,
    logger: logger.child("auth-gateway"),
  })
  const orchestrator = new Orchestrator({
    auth: gateway,
    cache,
    ledger,
    blobs: new FilesystemBlobStore({ basePath: dir }),
    engine,
    logger: logger.child("orchestrator"),
    cacheTtlSeconds: 3600,
    intake: {
      maxUploadBytes: 1024 * 1024,
      urlFetchTimeoutMs: 200,
      urlFetchAttempts: 2,
      fetch: options.imageFetch,
    },
    nearDuplicate: options.nearDuplicate,
  })
  const app = createApp({
    orchestrator,
    gateway,
    health: { cache: () => cache.ping(), ledger: () => ledger.ping() },
    logger,
    maxUploadBytes: 1024 * 1024,
  })

  return {
    app,
    orchestrator,
    engine,
    cache,
    ledger,
    sink,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  }
}

export function imageForm(image: Buffer, transformations?: unknown): FormData {
  const form = new FormData()
  form.append("image", new Blob([new Uint8Array(image)], { type: "image/png" }), "image.png")
  if (transformations !== undefined) form.append("transformations", JSON.stringify(transformations))
  return form
}
