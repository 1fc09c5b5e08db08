import { AuthGatewayClient } from "@pixelforge/auth-gateway"
import {
  applyMigrations,
  closeConnection,
  createDrizzleClient,
  DrizzleVersionLedger,
  MemoryVersionLedger,
  type VersionLedger,
} from "@pixelforge/database"
import type { AppConfig } from "@pixelforge/env"
import { FilesystemBlobStore, TransformEngine } from "@pixelforge/images"
import type { Logger } from "@pixelforge/logger"
import { createRedisClient, MemoryResultCache, RedisResultCache, type ResultCache } from "@pixelforge/redis"
import { Orchestrator } from "./orchestrator.js"
import type { AppDeps } from "./app.js"

export interface Services extends AppDeps {
  close(): Promise<void>
}

/**
 * Build the object graph from configuration. Without REDIS_URL or
 * DATABASE_URL the service runs standalone on in-memory stores.
 */
export async function createServices(config: AppConfig, logger: Logger): Promise<Services> {
  const redis = createRedisClient(config.cache.redisUrl, logger.child("redis"))
  const cache: ResultCache = redis ? new RedisResultCache(redis) : new MemoryResultCache()

  let ledger: VersionLedger
  if (config.ledger.databaseUrl) {
    const db = createDrizzleClient({
      connectionString: config.ledger.databaseUrl,
      logging: config.logLevel === "debug",
      onPoolError: err => logger.child("database").error("Unexpected pool error", err),
    })
    await applyMigrations(db)
    ledger = new DrizzleVersionLedger(db, { onClose: () => closeConnection(db) })
  } else {
    ledger = new MemoryVersionLedger()
  }

  logger.info("Stores ready", {
    cache: redis ? "redis" : "memory",
    ledger: config.ledger.databaseUrl ? "postgres" : "memory",
  })

  const gateway = new AuthGatewayClient({
    baseUrl: config.auth.serviceUrl,
    timeoutMs: config.auth.timeoutMs,
    maxRetries: config.auth.maxRetries,
    fallbackMode: config.auth.fallbackMode,
    logger: logger.child("auth-gateway"),
  })

  const blobs = new FilesystemBlobStore({ basePath: config.storage.basePath })

  const orchestrator = new Orchestrator({
    auth: gateway,
    cache,
    ledger,
    blobs,
    engine: new TransformEngine(),
    logger: logger.child("orchestrator"),
    cacheTtlSeconds: config.cache.ttlSeconds,
    intake: config.intake,
    nearDuplicate: config.nearDuplicate,
  })

  return {
    orchestrator,
    gateway,
    health: {
      cache: () => cache.ping(),
      ledger: () => ledger.ping(),
    },
    logger,
    maxUploadBytes: config.intake.maxUploadBytes,
    accessLog: true,
    async close() {
      await ledger.close()
      if (redis) await redis.quit()
    },
  }
}
