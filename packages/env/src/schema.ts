/**
 * Pure Zod schemas for environment variable validation
 *
 * This file contains ONLY schema definitions - no runtime code, no side effects.
 * Safe to import anywhere (server, tests).
 */

import { z } from "zod"

/**
 * Custom validators for common patterns
 */
export const httpUrl = z
  .string()
  .url()
  .regex(/^https?:\/\//, "Must be an http(s) URL")

export const redisUrl = z.string().regex(/^rediss?:\/\//, "Must be a valid Redis URL (redis:// or rediss://)")

export const postgresUrl = z.string().regex(/^postgres(ql)?:\/\//, "Must be a valid PostgreSQL URL")

const positiveInt = z.coerce.number().int().positive()
const nonNegativeInt = z.coerce.number().int().min(0)

export const AUTH_FALLBACK_MODES = ["permissive", "restrictive"] as const

/**
 * Server environment variables schema
 */
export const serverSchema = {
  // HTTP listener
  PORT: z.coerce.number().int().min(1).max(65_535).default(5001),
  HOST: z.string().default("0.0.0.0"),

  // Authorization service
  AUTH_SERVICE_URL: httpUrl.default("http://localhost:5002"),
  AUTH_TIMEOUT_MS: positiveInt.default(3000),
  AUTH_MAX_RETRIES: nonNegativeInt.max(10).default(3),
  AUTH_FALLBACK_MODE: z.enum(AUTH_FALLBACK_MODES).default("restrictive"),

  // Result cache. Unset means in-memory (standalone mode)
  REDIS_URL: redisUrl.optional(),
  CACHE_TTL_SECONDS: positiveInt.default(86_400),

  // Version ledger. Unset means in-memory (standalone mode)
  DATABASE_URL: postgresUrl.optional(),

  // Images
  IMAGES_STORAGE_PATH: z.string().default("./data/images"),
  MAX_UPLOAD_BYTES: positiveInt.default(10 * 1024 * 1024),
  URL_FETCH_TIMEOUT_MS: positiveInt.default(10_000),
  URL_FETCH_RETRIES: positiveInt.max(5).default(2),
  // Bits of perceptual-hash distance still served from a similar source's cache. Unset disables
  NEAR_DUPLICATE_MAX_DISTANCE: nonNegativeInt.max(64).optional(),

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
} as const
