import type { AuthDecision } from "@pixelforge/auth-gateway"
import type {
  ProcessedVersion,
  SimilarSource,
  SourceImage,
  VersionHistoryEntry,
  VersionHistoryQuery,
  VersionLedger,
} from "@pixelforge/database"
import {
  type BlobStore,
  computePerceptualHash,
  extensionFor,
  fingerprint,
  generateContentHash,
  includesOperation,
  isContentHash,
  type OperationSet,
  type OutputMimeType,
  parseStorageKey,
  readDimensions,
  type SupportedMimeType,
  type TransformFailure,
  type TransformResult,
  type HResponse,
  validateImageBuffer,
} from "@pixelforge/images"
import type { Logger } from "@pixelforge/logger"
import type { ResultCache } from "@pixelforge/redis"
import { AuthorizationDeniedError, StorageError, TransformError, ValidationError } from "@pixelforge/shared"
import { fetchRemoteImage, type FetchLike, parseImageUrl } from "./intake.js"
import type {
  ImageSource,
  SimilarityQuery,
  SimilarListing,
  TransformOutcome,
  TransformRequest,
  UploadOutcome,
  UploadRequest,
  VersionListing,
} from "./types.js"

export const BACKGROUND_REMOVAL_NOTICE =
  "Background removal estimates the backdrop from the image border; busy backgrounds may be partially kept."

export interface Authorizer {
  authorize(authorizationHeader: string | null | undefined): Promise<AuthDecision>
}

export interface ImageTransformer {
  apply(source: Buffer, operations: OperationSet): HResponse<TransformResult, TransformFailure>
}

export interface OrchestratorDeps {
  auth: Authorizer
  cache: ResultCache
  ledger: VersionLedger
  blobs: BlobStore
  engine: ImageTransformer
  logger: Logger
  cacheTtlSeconds: number
  intake: {
    maxUploadBytes: number
    urlFetchTimeoutMs: number
    urlFetchAttempts: number
    fetch?: FetchLike
  }
  /** Serve a cached result of a perceptually matching source on an exact miss */
  nearDuplicate?: { maxDistance: number } | null
}

type CachedResult = { output: Buffer; mimeType: OutputMimeType }

// Candidate sources checked for a cached result per near-duplicate lookup
const NEAR_DUPLICATE_CANDIDATES = 5

interface ResolvedSource {
  bytes: Buffer
  mimeType: SupportedMimeType
  contentHash: string
  sourceType: "upload" | "url"
  sourceUrl: string | null
}

function mimeForLocator(locator: string): OutputMimeType {
  return parseStorageKey(locator)?.extension === "jpg" ? "image/jpeg" : "image/png"
}

function outputExtension(mimeType: OutputMimeType): "jpg" | "png" {
  return mimeType === "image/jpeg" ? "jpg" : "png"
}

/**
 * Drives a request through validation, authorization, fingerprinting, the
 * result cache, the transform engine and the version ledger.
 *
 * Cache and ledger trouble never fails a transform that produced an image:
 * a cache error degrades to a miss, a ledger error to `version: null`.
 */
export class Orchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async transform(request: TransformRequest): Promise<TransformOutcome> {
    const { logger } = this.deps

    const auth = await this.authorizeFor(request.source, request.authorization)
    const source = await this.resolveSource(request.source)
    const fp = fingerprint(source.contentHash, request.operations)
    const notice = includesOperation(request.operations, "remove_background") ? BACKGROUND_REMOVAL_NOTICE : null
    const log = { fingerprint: fp }

    const hit = await this.lookup(fp)
    if (hit) {
      logger.info("Cache hit", log)
      return {
        output: hit.output,
        mimeType: hit.mimeType,
        fingerprint: fp,
        cache: "HIT",
        auth,
        version: await this.existingVersion(fp),
        appliedOps: request.operations.map(op => op.name),
        notice,
        nearDuplicateOf: null,
        delivered: !request.signal?.aborted,
      }
    }

    const near = await this.nearDuplicate(source, request.operations)
    if (near) {
      logger.info("Near-duplicate cache hit", {
        ...log,
        servedFingerprint: near.fingerprint,
        nearDuplicateOf: near.sourceId,
      })
      return {
        output: near.hit.output,
        mimeType: near.hit.mimeType,
        fingerprint: near.fingerprint,
        cache: "HIT",
        auth,
        version: await this.existingVersion(near.fingerprint),
        appliedOps: request.operations.map(op => op.name),
        notice,
        nearDuplicateOf: near.sourceId,
        delivered: !request.signal?.aborted,
      }
    }

    const result = await this.deps.engine.apply(source.bytes, request.operations)
    if (result.error) {
      const { operation, step, message } = result.error
      logger.warn("Transform failed", message, { ...log, operation, step })
      throw new TransformError(operation, step, message)
    }

    const transformed = result.data
    const version = await this.persist(fp, source, request.operations, transformed)
    const delivered = !request.signal?.aborted
    if (!delivered) {
      logger.info("Caller disconnected before the result was ready; stores populated", log)
    }

    return {
      output: transformed.output,
      mimeType: transformed.mimeType,
      fingerprint: fp,
      cache: "MISS",
      auth,
      version,
      appliedOps: transformed.appliedOps,
      notice,
      nearDuplicateOf: null,
      delivered,
    }
  }

  async upload(request: UploadRequest): Promise<UploadOutcome> {
    const mimeType = validateImageBuffer(request.bytes, this.deps.intake.maxUploadBytes)
    const auth = await this.authorize(request.authorization)
    const contentHash = generateContentHash(request.bytes)

    const existing = await this.deps.ledger.getSource(contentHash)
    if (existing) {
      return { source: existing, created: false, auth }
    }

    const source = await this.registerSource({
      bytes: request.bytes,
      mimeType,
      contentHash,
      sourceType: "upload",
      sourceUrl: null,
    })
    this.deps.logger.info("Source image registered", { contentHash, mimeType })
    return { source, created: true, auth }
  }

  async listVersions(sourceId: string, authorization: string | null | undefined): Promise<VersionListing> {
    if (!isContentHash(sourceId)) {
      throw new ValidationError("Source id must be a SHA-256 hex digest", "validation:source")
    }
    await this.authorize(authorization)

    const versions: ProcessedVersion[] = []
    for await (const version of this.deps.ledger.listVersions(sourceId)) {
      versions.push(version)
    }
    return { sourceId, versions }
  }

  async findSimilar(
    sourceId: string,
    authorization: string | null | undefined,
    query: SimilarityQuery,
  ): Promise<SimilarListing> {
    if (!isContentHash(sourceId)) {
      throw new ValidationError("Source id must be a SHA-256 hex digest", "validation:source")
    }
    await this.authorize(authorization)

    const source = await this.deps.ledger.getSource(sourceId)
    if (!source) {
      throw new ValidationError("Unknown source image", "validation:source-unknown", 404)
    }
    // one extra row so the source itself can be dropped without shortening the page
    const matches = await this.deps.ledger.findSimilarSources(source.perceptualHash, query.maxDistance, query.limit + 1)
    return {
      source,
      similar: matches.filter(m => m.source.contentHash !== sourceId).slice(0, query.limit),
    }
  }

  async history(authorization: string | null | undefined, query: VersionHistoryQuery): Promise<VersionHistoryEntry[]> {
    await this.authorize(authorization)
    return this.deps.ledger.listRecentVersions(query)
  }

  private async authorize(authorization: string | null | undefined): Promise<AuthDecision> {
    const decision = await this.deps.auth.authorize(authorization)
    if (!decision.allowed) {
      throw new AuthorizationDeniedError(decision.reason === "denied" ? "denied" : "fallback-restrictive")
    }
    if (decision.reason === "fallback-permissive") {
      this.deps.logger.warn("Request admitted by permissive fallback", undefined, { attempts: decision.attempts })
    }
    return decision
  }

  // Uploaded bytes are checked before authorization; remote URLs are fetched
  // only for authorized callers.
  private async authorizeFor(source: ImageSource, authorization: string | null | undefined): Promise<AuthDecision> {
    if (source.kind === "upload") {
      validateImageBuffer(source.bytes, this.deps.intake.maxUploadBytes)
    } else {
      parseImageUrl(source.url)
    }
    return this.authorize(authorization)
  }

  private async resolveSource(source: ImageSource): Promise<ResolvedSource> {
    if (source.kind === "upload") {
      return {
        bytes: source.bytes,
        mimeType: validateImageBuffer(source.bytes, this.deps.intake.maxUploadBytes),
        contentHash: generateContentHash(source.bytes),
        sourceType: "upload",
        sourceUrl: null,
      }
    }

    const { intake, logger } = this.deps
    const remote = await fetchRemoteImage(source.url, {
      timeoutMs: intake.urlFetchTimeoutMs,
      attempts: intake.urlFetchAttempts,
      maxBytes: intake.maxUploadBytes,
      fetch: intake.fetch,
      onRetry: info => logger.warn("Retrying image download", info.err, { url: source.url, attempt: info.attempt }),
    })
    return {
      bytes: remote.bytes,
      mimeType: remote.mimeType,
      contentHash: generateContentHash(remote.bytes),
      sourceType: "url",
      sourceUrl: remote.url,
    }
  }

  /**
   * Look for a cached result of the same operations on a source whose
   * perceptual hash is within the configured distance. Never writes.
   */
  private async nearDuplicate(
    source: ResolvedSource,
    operations: OperationSet,
  ): Promise<{ hit: CachedResult; fingerprint: string; sourceId: string } | null> {
    const { nearDuplicate, ledger, logger } = this.deps
    if (!nearDuplicate) return null

    let candidates: SimilarSource[]
    try {
      const perceptualHash = await computePerceptualHash(source.bytes)
      candidates = await ledger.findSimilarSources(perceptualHash, nearDuplicate.maxDistance, NEAR_DUPLICATE_CANDIDATES)
    } catch (err) {
      logger.warn("Near-duplicate lookup skipped", err, { contentHash: source.contentHash })
      return null
    }

    for (const candidate of candidates) {
      if (candidate.source.contentHash === source.contentHash) continue
      const fp = fingerprint(candidate.source.contentHash, operations)
      const hit = await this.lookup(fp)
      if (hit) return { hit, fingerprint: fp, sourceId: candidate.source.contentHash }
    }
    return null
  }

  private async lookup(fp: string): Promise<CachedResult | null> {
    const { cache, blobs, logger } = this.deps

    let locator: string | null
    try {
      locator = await cache.get(fp)
    } catch (err) {
      logger.warn("Result cache unavailable, treating as miss", err, { fingerprint: fp })
      return null
    }
    if (!locator) return null

    const blob = await blobs.get(locator)
    if (blob.error) {
      logger.warn("Cached blob unreadable, treating as miss", blob.error.message, { fingerprint: fp, locator })
      return null
    }
    if (!blob.data) {
      logger.info("Cached blob missing, treating as miss", { fingerprint: fp, locator })
      return null
    }
    return { output: blob.data, mimeType: mimeForLocator(locator) }
  }

  private async existingVersion(fp: string): Promise<ProcessedVersion | null> {
    try {
      return await this.deps.ledger.getVersion(fp)
    } catch (err) {
      this.deps.logger.warn("Version ledger unavailable", err, { fingerprint: fp })
      return null
    }
  }

  /**
   * Store the output blob, then write through to the cache and the ledger.
   */
  private async persist(
    fp: string,
    source: ResolvedSource,
    operations: OperationSet,
    transformed: TransformResult,
  ): Promise<ProcessedVersion | null> {
    const { blobs, cache, ledger, logger, cacheTtlSeconds } = this.deps

    const stored = await blobs.put("outputs", fp, outputExtension(transformed.mimeType), transformed.output)
    if (stored.error) {
      logger.error("Output blob could not be stored; skipping cache and ledger", stored.error.message, {
        fingerprint: fp,
      })
      return null
    }
    const locator = stored.data

    try {
      await cache.put(fp, locator, cacheTtlSeconds)
    } catch (err) {
      logger.warn("Result cache write failed", err, { fingerprint: fp })
    }

    try {
      await this.ensureSource(source)
      return await ledger.recordVersion({
        sourceId: source.contentHash,
        fingerprint: fp,
        operations,
        locator,
        outputHash: generateContentHash(transformed.output),
        mimeType: transformed.mimeType,
      })
    } catch (err) {
      logger.error("Version ledger write failed", err, { fingerprint: fp })
      return null
    }
  }

  private async ensureSource(source: ResolvedSource): Promise<SourceImage> {
    return (await this.deps.ledger.getSource(source.contentHash)) ?? this.registerSource(source)
  }

  private async registerSource(source: ResolvedSource): Promise<SourceImage> {
    let dimensions: { width: number; height: number }
    let perceptualHash: string
    try {
      dimensions = await readDimensions(source.bytes)
      perceptualHash = await computePerceptualHash(source.bytes)
    } catch (err) {
      this.deps.logger.debug("Source image failed to decode", { contentHash: source.contentHash, reason: String(err) })
      throw new ValidationError("Image could not be decoded", "validation:decode")
    }

    const stored = await this.deps.blobs.put(
      "sources",
      source.contentHash,
      extensionFor(source.mimeType),
      source.bytes,
    )
    if (stored.error) {
      throw new StorageError(`Source image could not be stored: ${stored.error.message}`, "storage:blob")
    }

    return this.deps.ledger.registerSource({
      contentHash: source.contentHash,
      perceptualHash,
      mimeType: source.mimeType,
      width: dimensions.width,
      height: dimensions.height,
      byteSize: source.bytes.length,
      sourceType: source.sourceType,
      sourceUrl: source.sourceUrl,
      locator: stored.data,
    })
  }
}
