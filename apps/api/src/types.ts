import type { AuthDecision } from "@pixelforge/auth-gateway"
import type { ProcessedVersion, SimilarSource, SourceImage } from "@pixelforge/database"
import type { OperationName, OperationSet, OutputMimeType } from "@pixelforge/images"

export type ImageSource = { kind: "upload"; bytes: Buffer } | { kind: "url"; url: string }

export interface TransformRequest {
  source: ImageSource
  operations: OperationSet
  authorization: string | null | undefined
  /** Aborted when the caller disconnects */
  signal?: AbortSignal
}

export interface TransformOutcome {
  output: Buffer
  mimeType: OutputMimeType
  fingerprint: string
  cache: "HIT" | "MISS"
  auth: AuthDecision
  /** Ledger record, or null when the ledger could not be written */
  version: ProcessedVersion | null
  appliedOps: OperationName[]
  notice: string | null
  /** Content hash of the perceptually matching source whose result was served */
  nearDuplicateOf: string | null
  /** False when the caller went away before the result was ready */
  delivered: boolean
}

export interface UploadRequest {
  bytes: Buffer
  authorization: string | null | undefined
}

export interface UploadOutcome {
  source: SourceImage
  created: boolean
  auth: AuthDecision
}

export interface VersionListing {
  sourceId: string
  versions: ProcessedVersion[]
}

export interface SimilarityQuery {
  maxDistance: number
  limit: number
}

export interface SimilarListing {
  source: SourceImage
  similar: SimilarSource[]
}
