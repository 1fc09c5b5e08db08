/**
 * @pixelforge/env
 *
 * Centralized environment variable validation using @t3-oss/env-core.
 *
 * - `schema.ts` - schema definitions only, no side effects
 * - `server.ts` - dotenv loading and {@link loadConfig}
 */

export { AUTH_FALLBACK_MODES, httpUrl, postgresUrl, redisUrl, serverSchema } from "./schema.js"
export { type AppConfig, type AuthFallbackMode, loadConfig, loadEnvFile } from "./server.js"
