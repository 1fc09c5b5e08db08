import type { OperationName, OperationSet } from "@pixelforge/images"

export type SourceType = "upload" | "url"

export interface SourceImage {
  id: string
  contentHash: string
  perceptualHash: string
  mimeType: string
  width: number
  height: number
  byteSize: number
  sourceType: SourceType
  sourceUrl: string | null
  locator: string
  createdAt: Date
}

export type RegisterSourceInput = Omit<SourceImage, "id" | "createdAt">

export interface ProcessedVersion {
  id: string
  /** Content hash of the source image */
  sourceId: string
  fingerprint: string
  operations: OperationSet
  locator: string
  outputHash: string
  mimeType: string
  createdAt: Date
}

export type RecordVersionInput = Omit<ProcessedVersion, "id" | "createdAt">

export interface SimilarSource {
  source: SourceImage
  /** Hamming distance between the perceptual hashes, 0-64 */
  distance: number
}

export interface VersionHistoryQuery {
  limit: number
  /** Only versions whose operation set contains this operation */
  operation?: OperationName
  sourceType?: SourceType
}

export interface VersionHistoryEntry extends ProcessedVersion {
  sourceType: SourceType
  sourceUrl: string | null
}

/**
 * Append-only record of source images and their processed variants.
 *
 * Writes are idempotent: registering a known content hash or recording a
 * known fingerprint returns the stored record unchanged. Failures surface as
 * StorageError.
 */
export interface VersionLedger {
  registerSource(input: RegisterSourceInput): Promise<SourceImage>
  getSource(contentHash: string): Promise<SourceImage | null>
  recordVersion(input: RecordVersionInput): Promise<ProcessedVersion>
  getVersion(fingerprint: string): Promise<ProcessedVersion | null>
  /**
   * Versions of a source, oldest first. Every iteration starts a fresh
   * cursor, so the returned iterable can be walked more than once.
   */
  listVersions(sourceId: string): AsyncIterable<ProcessedVersion>
  /**
   * Sources whose perceptual hash is at most `maxDistance` bits away,
   * closest first, then oldest first.
   */
  findSimilarSources(perceptualHash: string, maxDistance: number, limit: number): Promise<SimilarSource[]>
  /** Most recent versions first */
  listRecentVersions(query: VersionHistoryQuery): Promise<VersionHistoryEntry[]>
  ping(): Promise<boolean>
  close(): Promise<void>
}
