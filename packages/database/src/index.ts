export type { DrizzleClient, DrizzleClientConfig } from "./drizzle-client.js"
export {
  applyMigrations,
  closeConnection,
  createDrizzleClient,
  MIGRATION_FILE,
  readMigrationSql,
} from "./drizzle-client.js"
export type { DrizzleVersionLedgerOptions } from "./ledger/drizzle.js"
export { DrizzleVersionLedger } from "./ledger/drizzle.js"
export type { MemoryVersionLedgerOptions } from "./ledger/memory.js"
export { MemoryVersionLedger } from "./ledger/memory.js"
export * as schema from "./schema/index.js"
export type {
  ProcessedVersion,
  RecordVersionInput,
  RegisterSourceInput,
  SimilarSource,
  SourceImage,
  SourceType,
  VersionHistoryEntry,
  VersionHistoryQuery,
  VersionLedger,
} from "./types.js"
