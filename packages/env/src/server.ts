/**
 * Server-side environment validation
 *
 * @example
 * ```typescript
 * import { loadConfig, loadEnvFile } from "@pixelforge/env"
 *
 * loadEnvFile() // optional, once at app entry
 * const config = loadConfig()
 * ```
 */

import { existsSync } from "node:fs"
import { join } from "node:path"
import { createEnv } from "@t3-oss/env-core"
import { config as loadDotenv } from "dotenv"
import { serverSchema } from "./schema.js"

export type AuthFallbackMode = "permissive" | "restrictive"

export interface AppConfig {
  port: number
  host: string
  nodeEnv: "development" | "test" | "production"
  logLevel: "debug" | "info" | "warn" | "error"
  auth: {
    serviceUrl: string
    timeoutMs: number
    maxRetries: number
    fallbackMode: AuthFallbackMode
  }
  cache: {
    redisUrl: string | null
    ttlSeconds: number
  }
  ledger: {
    databaseUrl: string | null
  }
  storage: {
    basePath: string
  }
  intake: {
    maxUploadBytes: number
    urlFetchTimeoutMs: number
    urlFetchAttempts: number
  }
  /** Null when near-duplicate cache reuse is off */
  nearDuplicate: {
    maxDistance: number
  } | null
}

/**
 * Explicitly load environment file
 *
 * Not called automatically on import (no side effects).
 *
 * @returns true if file was loaded, false if not found
 */
export function loadEnvFile(nodeEnv?: string): boolean {
  const envName = nodeEnv || process.env.NODE_ENV || "development"
  const envFile = join(process.cwd(), `.env.${envName}`)

  if (existsSync(envFile)) {
    loadDotenv({ path: envFile, override: true })
    return true
  }

  return false
}

/**
 * Validate the given environment and shape it into {@link AppConfig}.
 * Throws on invalid values; missing optional stores mean standalone mode.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = createEnv({
    server: serverSchema,
    clientPrefix: "PUBLIC_",
    client: {},
    runtimeEnv: source,
    isServer: true,
    emptyStringAsUndefined: true,
    onValidationError: error => {
      console.error("[Env] Invalid environment variables:")
      console.error(error.flatten().fieldErrors)
      throw new Error("Invalid environment variables")
    },
  })

  return {
    port: env.PORT,
    host: env.HOST,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    auth: {
      serviceUrl: env.AUTH_SERVICE_URL.replace(/\/+$/, ""),
      timeoutMs: env.AUTH_TIMEOUT_MS,
      maxRetries: env.AUTH_MAX_RETRIES,
      fallbackMode: env.AUTH_FALLBACK_MODE,
    },
    cache: {
      redisUrl: env.REDIS_URL ?? null,
      ttlSeconds: env.CACHE_TTL_SECONDS,
    },
    ledger: {
      databaseUrl: env.DATABASE_URL ?? null,
    },
    storage: {
      basePath: env.IMAGES_STORAGE_PATH,
    },
    intake: {
      maxUploadBytes: env.MAX_UPLOAD_BYTES,
      urlFetchTimeoutMs: env.URL_FETCH_TIMEOUT_MS,
      urlFetchAttempts: env.URL_FETCH_RETRIES,
    },
    nearDuplicate:
      env.NEAR_DUPLICATE_MAX_DISTANCE === undefined ? null : { maxDistance: env.NEAR_DUPLICATE_MAX_DISTANCE },
  }
}
