import crypto from "node:crypto"
import { hammingDistance } from "@pixelforge/images"
import { StorageError } from "@pixelforge/shared"
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

export interface MemoryVersionLedgerOptions {
  now?: () => Date
  /** Versions fetched per page while iterating */
  pageSize?: number
}

interface StoredVersion {
  seq: number
  version: ProcessedVersion
}

// Creation time ascending, insertion order on ties
function compareStored(a: StoredVersion, b: StoredVersion): number {
  return a.version.createdAt.getTime() - b.version.createdAt.getTime() || a.seq - b.seq
}

/**
 * In-process ledger for standalone mode and tests. Each write runs without
 * an intervening await, so concurrent callers never observe a half-applied
 * insert.
 */
export class MemoryVersionLedger implements VersionLedger {
  private readonly sources = new Map<string, SourceImage>()
  private readonly versions = new Map<string, StoredVersion>()
  private readonly now: () => Date
  private readonly pageSize: number
  private seq = 0

  constructor(options: MemoryVersionLedgerOptions = {}) {
    this.now = options.now ?? (() => new Date())
    this.pageSize = Math.max(1, options.pageSize ?? 100)
  }

  async registerSource(input: RegisterSourceInput): Promise<SourceImage> {
    const existing = this.sources.get(input.contentHash)
    if (existing) return existing

    const source: SourceImage = { ...input, id: crypto.randomUUID(), createdAt: this.now() }
    this.sources.set(input.contentHash, source)
    return source
  }

  async getSource(contentHash: string): Promise<SourceImage | null> {
    return this.sources.get(contentHash) ?? null
  }

  async recordVersion(input: RecordVersionInput): Promise<ProcessedVersion> {
    const existing = this.versions.get(input.fingerprint)
    if (existing) return existing.version

    if (!this.sources.has(input.sourceId)) {
      throw new StorageError(`Unknown source image: ${input.sourceId}`, "storage:ledger")
    }

    this.seq += 1
    const version: ProcessedVersion = { ...input, id: crypto.randomUUID(), createdAt: this.now() }
    this.versions.set(input.fingerprint, { seq: this.seq, version })
    return version
  }

  async getVersion(fingerprint: string): Promise<ProcessedVersion | null> {
    return this.versions.get(fingerprint)?.version ?? null
  }

  listVersions(sourceId: string): AsyncIterable<ProcessedVersion> {
    return {
      [Symbol.asyncIterator]: () => this.pages(sourceId),
    }
  }

  private async *pages(sourceId: string): AsyncGenerator<ProcessedVersion> {
    let cursor: StoredVersion | null = null
    while (true) {
      const after: StoredVersion | null = cursor
      const page = [...this.versions.values()]
        .filter(entry => entry.version.sourceId === sourceId && (!after || compareStored(entry, after) > 0))
        .sort(compareStored)
        .slice(0, this.pageSize)

      for (const entry of page) {
        yield entry.version
      }
      const last = page.at(-1)
      if (!last || page.length < this.pageSize) return
      cursor = last
    }
  }

  async findSimilarSources(perceptualHash: string, maxDistance: number, limit: number): Promise<SimilarSource[]> {
    const matches: SimilarSource[] = []
    for (const source of this.sources.values()) {
      if (source.perceptualHash.length !== perceptualHash.length) continue
      const distance = hammingDistance(source.perceptualHash, perceptualHash)
      if (distance <= maxDistance) matches.push({ source, distance })
    }
    return matches
      .sort((a, b) => a.distance - b.distance || a.source.createdAt.getTime() - b.source.createdAt.getTime())
      .slice(0, limit)
  }

  async listRecentVersions(query: VersionHistoryQuery): Promise<VersionHistoryEntry[]> {
    const entries: VersionHistoryEntry[] = []
    for (const entry of [...this.versions.values()].sort(compareStored).reverse()) {
      const source = this.sources.get(entry.version.sourceId)
      if (!source) continue
      if (query.sourceType && source.sourceType !== query.sourceType) continue
      if (query.operation && !entry.version.operations.some(op => op.name === query.operation)) continue
      entries.push({ ...entry.version, sourceType: source.sourceType, sourceUrl: source.sourceUrl })
      if (entries.length >= query.limit) break
    }
    return entries
  }

  async ping(): Promise<boolean> {
    return true
  }

  async close(): Promise<void> {
    this.sources.clear()
    this.versions.clear()
  }
}
