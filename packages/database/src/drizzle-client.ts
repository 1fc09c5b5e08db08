/**
 * Drizzle Database Client
 *
 * Provides type-safe access to the pixelforge schema on any PostgreSQL
 * database.
 *
 * Usage:
 * ```typescript
 * import { createDrizzleClient } from '@pixelforge/database'
 *
 * const db = createDrizzleClient({ connectionString: config.ledger.databaseUrl })
 * const rows = await db.select().from(schema.processedVersions)
 * ```
 */

import { readFile } from "node:fs/promises"
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres"
import { Pool, type PoolConfig } from "pg"
import * as schema from "./schema/index.js"

// ============================================================================
// Types
// ============================================================================

export type DrizzleClient = NodePgDatabase<typeof schema> & { $client: Pool }

export interface DrizzleClientConfig {
  /** PostgreSQL connection string */
  connectionString: string
  /** Pool configuration options */
  poolConfig?: PoolConfig
  /** Enable query logging */
  logging?: boolean
  onPoolError?: (err: Error) => void
}

// ============================================================================
// Client Factory
// ============================================================================

/**
 * Create a Drizzle database client
 */
export function createDrizzleClient(config: DrizzleClientConfig): DrizzleClient {
  const { connectionString, poolConfig = {}, logging = process.env.NODE_ENV === "development" } = config

  const pool = new Pool({
    connectionString,
    max: process.env.NODE_ENV === "development" ? 8 : 20,
    idleTimeoutMillis: process.env.NODE_ENV === "development" ? 5000 : 30000,
    connectionTimeoutMillis: 10000,
    allowExitOnIdle: true,
    ...poolConfig,
  })

  // An idle client erroring must not crash the process
  pool.on("error", err => {
    if (config.onPoolError) {
      config.onPoolError(err)
    } else {
      console.error("[Database] Unexpected pool error:", err)
    }
  })

  return drizzle(pool, {
    schema,
    logger: logging,
  })
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Close the database connection pool
 * Call this during graceful shutdown
 */
export async function closeConnection(db: DrizzleClient): Promise<void> {
  await db.$client.end()
}

export const MIGRATION_FILE = new URL("../migrations/0001_init.sql", import.meta.url)

export function readMigrationSql(): Promise<string> {
  return readFile(MIGRATION_FILE, "utf-8")
}

/**
 * Apply the bundled schema migration. Every statement is idempotent.
 */
export async function applyMigrations(db: DrizzleClient): Promise<void> {
  await db.$client.query(await readMigrationSql())
}
