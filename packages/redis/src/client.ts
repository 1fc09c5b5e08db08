import { Redis } from "ioredis"

/**
 * Auth-related error codes that should NOT be retried
 */
const AUTH_ERROR_CODES = ["WRONGPASS", "NOAUTH", "ERR invalid password"]

const MAX_AUTH_ERRORS = 3

export interface RedisClientLogger {
  info(message: string): void
  error(message: string, err?: unknown): void
}

const consoleLogger: RedisClientLogger = {
  info: message => console.log(`[Redis] ${message}`),
  error: (message, err) => console.error(`[Redis] ${message}`, err ?? ""),
}

/**
 * Creates a Redis client with automatic reconnection and error handling.
 *
 * @param connectionUrl - Redis connection URL, or null when the service runs
 *                        without Redis (in-memory cache)
 * @returns Configured client, or null if connectionUrl is null
 *
 * @example
 * ```typescript
 * const redis = createRedisClient(config.cache.redisUrl, logger)
 * const cache = redis ? new RedisResultCache(redis) : new MemoryResultCache()
 * ```
 */
export const createRedisClient = (
  connectionUrl: string | null,
  logger: RedisClientLogger = consoleLogger,
): Redis | null => {
  if (connectionUrl === null) {
    return null
  }

  let authErrorCount = 0

  const client = new Redis(connectionUrl, {
    // Fail fast: a slow cache must never hold up a request
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    enableReadyCheck: false,
    lazyConnect: false,
    retryStrategy(times) {
      // If we've hit too many auth errors, stop retrying
      if (authErrorCount >= MAX_AUTH_ERRORS) {
        logger.error(`Authentication failed ${MAX_AUTH_ERRORS} times; stopping retry attempts. Check REDIS_URL.`)
        return null
      }
      return Math.min(times * 50, 2000)
    },
  })

  client.on("error", (err: Error) => {
    const isAuthError = AUTH_ERROR_CODES.some(code => err.message.includes(code))

    if (isAuthError) {
      authErrorCount++
      logger.error(`Authentication error (${authErrorCount}/${MAX_AUTH_ERRORS})`, err)

      if (authErrorCount >= MAX_AUTH_ERRORS) {
        // Disconnect to prevent endless retry loop
        client.disconnect()
      }
    } else {
      logger.error("Client error", err)
    }
  })

  client.on("connect", () => {
    logger.info("Client connected")
  })

  client.on("ready", () => {
    logger.info("Client ready")
    authErrorCount = 0
  })

  return client
}

// Export the type for reuse in apps
export type RedisClient = Redis
