/**
 * Image Routes
 *
 * POST /images/upload         - register a source image
 * POST /images/transform      - multipart image + transformations document
 * POST /images/transform-url  - JSON { url, ...transformations }
 * GET  /images/:sourceId/versions
 * GET  /images/:sourceId/similar - sources with a nearby perceptual hash
 * GET  /images/history           - most recent versions across all sources
 */

import { OPERATION_NAMES, parseTransformationsDocument } from "@pixelforge/images"
import { ValidationError } from "@pixelforge/shared"
import { type Context, Hono } from "hono"
import { z } from "zod"
import type { Orchestrator } from "../orchestrator.js"
import type { TransformOutcome } from "../types.js"

// Nginx convention for "client closed request"
const CLIENT_CLOSED_REQUEST = 499

const TransformUrlBodySchema = z
  .object({
    url: z.string({ required_error: "No URL provided", invalid_type_error: "url must be a string" }),
    transformations: z.union([z.string(), z.record(z.unknown())]).optional(),
  })
  .passthrough()

const SimilarQuerySchema = z.object({
  max_distance: z.coerce.number().int().min(0).max(64).default(10),
  limit: z.coerce.number().int().min(1).max(100).default(20),
})

const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
  operation: z.enum(OPERATION_NAMES).optional(),
  source_type: z.enum(["upload", "url"]).optional(),
})

function parseQuery<T extends z.ZodTypeAny>(schema: T, c: Context): z.output<T> {
  const parsed = schema.safeParse(c.req.query())
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ValidationError(`${issue.path.join(".")}: ${issue.message}`, "validation:query")
  }
  return parsed.data
}

async function readForm(c: Context) {
  const contentType = c.req.header("Content-Type") ?? ""
  if (!contentType.toLowerCase().startsWith("multipart/form-data")) {
    throw new ValidationError("Request must be multipart/form-data", "validation:shape")
  }
  return c.req.parseBody()
}

async function imageBytes(field: unknown): Promise<Buffer> {
  if (!(field instanceof File)) {
    throw new ValidationError("No image part in the request", "validation:missing")
  }
  if (field.size === 0) {
    throw new ValidationError("No file selected", "validation:missing")
  }
  return Buffer.from(await field.arrayBuffer())
}

function sendTransformed(c: Context, outcome: TransformOutcome): Response {
  if (!outcome.delivered) {
    return new Response(null, { status: CLIENT_CLOSED_REQUEST })
  }

  c.header("Content-Type", outcome.mimeType)
  c.header("X-Fingerprint", outcome.fingerprint)
  c.header("X-Cache", outcome.cache)
  c.header("X-Auth-Decision", outcome.auth.reason)
  if (outcome.version) c.header("X-Version-Id", outcome.version.id)
  if (outcome.notice) c.header("X-Processing-Notice", outcome.notice)
  if (outcome.nearDuplicateOf) c.header("X-Near-Duplicate-Of", outcome.nearDuplicateOf)
  return c.body(new Uint8Array(outcome.output), 200)
}

export function createImageRoutes(orchestrator: Orchestrator) {
  const app = new Hono()

  app.post("/upload", async c => {
    const form = await readForm(c)
    const bytes = await imageBytes(form.image)
    const { source, created } = await orchestrator.upload({ bytes, authorization: c.req.header("Authorization") })

    return c.json(
      {
        metadata_id: source.id,
        content_hash: source.contentHash,
        perceptual_hash: source.perceptualHash,
        mime_type: source.mimeType,
        width: source.width,
        height: source.height,
        size: source.byteSize,
        locator: source.locator,
        created,
      },
      201,
    )
  })

  app.post("/transform", async c => {
    const form = await readForm(c)
    const bytes = await imageBytes(form.image)
    const document = form.transformations
    if (typeof document !== "string") {
      throw new ValidationError("No transformations provided", "validation:missing")
    }
    const operations = parseTransformationsDocument(document)

    const outcome = await orchestrator.transform({
      source: { kind: "upload", bytes },
      operations,
      authorization: c.req.header("Authorization"),
      signal: c.req.raw.signal,
    })
    return sendTransformed(c, outcome)
  })

  app.post("/transform-url", async c => {
    let raw: unknown
    try {
      raw = await c.req.json()
    } catch {
      throw new ValidationError("Request body must be JSON", "validation:json")
    }

    const parsed = TransformUrlBodySchema.safeParse(raw)
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues[0].message, "validation:url")
    }
    const { url, transformations, ...inline } = parsed.data
    const operations = parseTransformationsDocument(transformations ?? inline)

    const outcome = await orchestrator.transform({
      source: { kind: "url", url },
      operations,
      authorization: c.req.header("Authorization"),
      signal: c.req.raw.signal,
    })
    return sendTransformed(c, outcome)
  })

  app.get("/history", async c => {
    const query = parseQuery(HistoryQuerySchema, c)
    const entries = await orchestrator.history(c.req.header("Authorization"), {
      limit: query.limit,
      operation: query.operation,
      sourceType: query.source_type,
    })

    return c.json({
      versions: entries.map(v => ({
        id: v.id,
        source_id: v.sourceId,
        source_type: v.sourceType,
        source_url: v.sourceUrl,
        fingerprint: v.fingerprint,
        operations: v.operations,
        locator: v.locator,
        mime_type: v.mimeType,
        created_at: v.createdAt.toISOString(),
      })),
    })
  })

  app.get("/:sourceId/similar", async c => {
    const query = parseQuery(SimilarQuerySchema, c)
    const listing = await orchestrator.findSimilar(c.req.param("sourceId"), c.req.header("Authorization"), {
      maxDistance: query.max_distance,
      limit: query.limit,
    })

    return c.json({
      source_id: listing.source.contentHash,
      perceptual_hash: listing.source.perceptualHash,
      similar: listing.similar.map(({ source, distance }) => ({
        content_hash: source.contentHash,
        perceptual_hash: source.perceptualHash,
        distance,
        similarity: 1 - distance / 64,
        mime_type: source.mimeType,
        width: source.width,
        height: source.height,
        locator: source.locator,
      })),
    })
  })

  app.get("/:sourceId/versions", async c => {
    const listing = await orchestrator.listVersions(c.req.param("sourceId"), c.req.header("Authorization"))

    return c.json({
      source_id: listing.sourceId,
      versions: listing.versions.map(v => ({
        id: v.id,
        fingerprint: v.fingerprint,
        operations: v.operations,
        locator: v.locator,
        output_hash: v.outputHash,
        mime_type: v.mimeType,
        created_at: v.createdAt.toISOString(),
      })),
    })
  })

  return app
}
