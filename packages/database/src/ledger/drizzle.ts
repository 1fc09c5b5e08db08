import { isAppError, StorageError } from "@pixelforge/shared"
import { and, asc, desc, eq, gt, lte, or, type SQL, sql } from "drizzle-orm"
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core"
import type * as schema from "../schema/index.js"
import { processedVersions, sourceImages } from "../schema/index.js"
import type {
  ProcessedVersion,
  RecordVersionInput,
  RegisterSourceInput,
  SimilarSource,
  SourceImage,
  VersionHistoryEntry,
  VersionHistoryQuery,
  VersionLedger,
} from "../types.js"

type VersionRow = typeof processedVersions.$inferSelect

export interface DrizzleVersionLedgerOptions {
  /** Rows fetched per keyset page while iterating */
  pageSize?: number
  /** Releases the underlying connection; the ledger does not own it otherwise */
  onClose?: () => Promise<void>
}

function toVersion(row: VersionRow): ProcessedVersion {
  return {
    id: row.id,
    sourceId: row.sourceId,
    fingerprint: row.fingerprint,
    operations: row.operations,
    locator: row.locator,
    outputHash: row.outputHash,
    mimeType: row.mimeType,
    createdAt: row.createdAt,
  }
}

async function guard<T>(action: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (err) {
    if (isAppError(err)) throw err
    throw new StorageError(`Version ledger ${action} failed`, "storage:ledger", { cause: err })
  }
}

/**
 * Postgres-backed ledger. Inserts use ON CONFLICT DO NOTHING on the natural
 * key and fall back to reading the winner, so concurrent writers of the same
 * fingerprint all get the one stored row.
 */
export class DrizzleVersionLedger<TQueryResult extends PgQueryResultHKT> implements VersionLedger {
  private readonly pageSize: number
  private readonly onClose: (() => Promise<void>) | undefined

  constructor(
    private readonly db: PgDatabase<TQueryResult, typeof schema>,
    options: DrizzleVersionLedgerOptions = {},
  ) {
    this.pageSize = Math.max(1, options.pageSize ?? 100)
    this.onClose = options.onClose
  }

  registerSource(input: RegisterSourceInput): Promise<SourceImage> {
    return guard("registerSource", async () => {
      const inserted = await this.db
        .insert(sourceImages)
        .values(input)
        .onConflictDoNothing({ target: sourceImages.contentHash })
        .returning()
      const row = inserted.at(0) ?? (await this.findSource(input.contentHash))
      if (!row) {
        throw new StorageError(`Source image ${input.contentHash} vanished after insert`, "storage:ledger")
      }
      return row
    })
  }

  getSource(contentHash: string): Promise<SourceImage | null> {
    return guard("getSource", async () => (await this.findSource(contentHash)) ?? null)
  }

  recordVersion(input: RecordVersionInput): Promise<ProcessedVersion> {
    return guard("recordVersion", async () => {
      const inserted = await this.db
        .insert(processedVersions)
        .values(input)
        .onConflictDoNothing({ target: processedVersions.fingerprint })
        .returning()
      const row = inserted.at(0) ?? (await this.findVersion(input.fingerprint))
      if (!row) {
        throw new StorageError(`Version ${input.fingerprint} vanished after insert`, "storage:ledger")
      }
      return toVersion(row)
    })
  }

  getVersion(fingerprint: string): Promise<ProcessedVersion | null> {
    return guard("getVersion", async () => {
      const row = await this.findVersion(fingerprint)
      return row ? toVersion(row) : null
    })
  }

  listVersions(sourceId: string): AsyncIterable<ProcessedVersion> {
    return {
      [Symbol.asyncIterator]: () => this.pages(sourceId),
    }
  }

  private async *pages(sourceId: string): AsyncGenerator<ProcessedVersion> {
    let cursor: { createdAt: Date; seq: number } | null = null
    while (true) {
      const after = cursor
      const rows: VersionRow[] = await guard("listVersions", () =>
        this.db
          .select()
          .from(processedVersions)
          .where(
            after
              ? and(
                  eq(processedVersions.sourceId, sourceId),
                  or(
                    gt(processedVersions.createdAt, after.createdAt),
                    and(eq(processedVersions.createdAt, after.createdAt), gt(processedVersions.seq, after.seq)),
                  ),
                )
              : eq(processedVersions.sourceId, sourceId),
          )
          .orderBy(asc(processedVersions.createdAt), asc(processedVersions.seq))
          .limit(this.pageSize),
      )

      for (const row of rows) {
        yield toVersion(row)
      }
      const last = rows.at(-1)
      if (!last || rows.length < this.pageSize) return
      cursor = { createdAt: last.createdAt, seq: last.seq }
    }
  }

  findSimilarSources(perceptualHash: string, maxDistance: number, limit: number): Promise<SimilarSource[]> {
    // popcount of the XOR of both 64-bit hashes
    const distance = sql<number>`length(replace(((('x' || ${sourceImages.perceptualHash})::bit(64)) # (('x' || ${perceptualHash})::bit(64)))::text, '0', ''))`.mapWith(
      Number,
    )
    return guard("findSimilarSources", () =>
      this.db
        .select({ source: sourceImages, distance })
        .from(sourceImages)
        .where(and(sql`length(${sourceImages.perceptualHash}) = 16`, lte(distance, maxDistance)))
        .orderBy(asc(distance), asc(sourceImages.createdAt))
        .limit(limit),
    )
  }

  listRecentVersions(query: VersionHistoryQuery): Promise<VersionHistoryEntry[]> {
    const filters: SQL[] = []
    if (query.operation) {
      filters.push(sql`${processedVersions.operations} @> ${JSON.stringify([{ name: query.operation }])}::jsonb`)
    }
    if (query.sourceType) {
      filters.push(eq(sourceImages.sourceType, query.sourceType))
    }
    return guard("listRecentVersions", async () => {
      const rows = await this.db
        .select({ version: processedVersions, sourceType: sourceImages.sourceType, sourceUrl: sourceImages.sourceUrl })
        .from(processedVersions)
        .innerJoin(sourceImages, eq(processedVersions.sourceId, sourceImages.contentHash))
        .where(and(...filters))
        .orderBy(desc(processedVersions.createdAt), desc(processedVersions.seq))
        .limit(query.limit)
      return rows.map(row => ({ ...toVersion(row.version), sourceType: row.sourceType, sourceUrl: row.sourceUrl }))
    })
  }

  async ping(): Promise<boolean> {
    try {
      await this.db.execute(sql`SELECT 1`)
      return true
    } catch {
      return false
    }
  }

  async close(): Promise<void> {
    await this.onClose?.()
  }

  private async findVersion(fingerprint: string): Promise<VersionRow | undefined> {
    const rows = await this.db
      .select()
      .from(processedVersions)
      .where(eq(processedVersions.fingerprint, fingerprint))
      .limit(1)
    return rows.at(0)
  }

  private async findSource(contentHash: string): Promise<SourceImage | undefined> {
    const rows = await this.db.select().from(sourceImages).where(eq(sourceImages.contentHash, contentHash)).limit(1)
    return rows.at(0)
  }
}
