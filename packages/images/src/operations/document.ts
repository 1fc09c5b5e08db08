import { ValidationError } from "@pixelforge/shared"
import { z } from "zod"
import { type OperationSet, type OperationSpec, RESIZE_MODES, type ResizeOp, validateOperationSet } from "./schema.js"

/**
 * Wire shape of the `transformations` document accepted by the HTTP API:
 *
 * ```json
 * {
 *   "grayscale": true,
 *   "blur": { "apply": true, "radius": 5 },
 *   "rotate": { "apply": true, "angle": 90 },
 *   "resize": { "apply": true, "width": 800, "height": 0, "type": "maintain_aspect_ratio" },
 *   "remove_background": false
 * }
 * ```
 *
 * Values may arrive as strings from multipart forms, so numbers and booleans
 * are coerced. Operation order is the key order of the document.
 */

const numberish = z.preprocess(value => {
  if (typeof value === "string" && value.trim() !== "") {
    return Number(value.trim())
  }
  return value
}, z.number({ invalid_type_error: "must be a number" }))

const boolish = z.preprocess(value => {
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase()
    if (normalized === "true" || normalized === "1" || normalized === "on") return true
    if (normalized === "false" || normalized === "0" || normalized === "off" || normalized === "") return false
  }
  if (value === 1) return true
  if (value === 0) return false
  return value
}, z.boolean({ invalid_type_error: "must be a boolean" }))

export const TransformationsDocumentSchema = z
  .object({
    grayscale: boolish.optional(),
    blur: z
      .object({
        apply: boolish.default(false),
        radius: numberish.optional(),
      })
      .strict()
      .optional(),
    rotate: z
      .object({
        apply: boolish.default(false),
        angle: numberish.optional(),
      })
      .strict()
      .optional(),
    resize: z
      .object({
        apply: boolish.default(false),
        width: numberish.optional().nullable(),
        height: numberish.optional().nullable(),
        type: z.enum(RESIZE_MODES).default("maintain_aspect_ratio"),
      })
      .strict()
      .optional(),
    remove_background: boolish.optional(),
  })
  .strict()

export type TransformationsDocument = z.input<typeof TransformationsDocumentSchema>

type ParsedDocument = z.output<typeof TransformationsDocumentSchema>
type DocumentKey = keyof ParsedDocument

function isDocumentKey(key: string): key is DocumentKey {
  return Object.hasOwn(TransformationsDocumentSchema.shape, key)
}

// A zero dimension means "not given"; in maintain mode it is the dimension to derive
function dimensionOrUndefined(value: number | null | undefined): number | undefined {
  return value === null || value === undefined || value === 0 ? undefined : value
}

function toOperation(key: DocumentKey, doc: ParsedDocument): OperationSpec | null {
  switch (key) {
    case "grayscale":
      return doc.grayscale ? { name: "grayscale" } : null
    case "remove_background":
      return doc.remove_background ? { name: "remove_background" } : null
    case "blur": {
      if (!doc.blur?.apply) return null
      if (doc.blur.radius === undefined) throw new ValidationError("blur radius is required", "validation:parameter")
      return { name: "blur", radius: doc.blur.radius }
    }
    case "rotate": {
      if (!doc.rotate?.apply) return null
      const angle = doc.rotate.angle
      if (angle !== 90 && angle !== 180 && angle !== 270) {
        throw new ValidationError("rotate angle must be one of 90, 180, 270", "validation:parameter")
      }
      return { name: "rotate", angle }
    }
    case "resize": {
      if (!doc.resize?.apply) return null
      const op: ResizeOp = { name: "resize", mode: doc.resize.type }
      const width = dimensionOrUndefined(doc.resize.width)
      const height = dimensionOrUndefined(doc.resize.height)
      if (width !== undefined) op.width = width
      if (height !== undefined) op.height = height
      return op
    }
  }
}

/**
 * Parse a transformations document into an ordered, validated OperationSet.
 */
export function parseTransformationsDocument(raw: unknown): OperationSet {
  if (typeof raw === "string") {
    try {
      return parseTransformationsDocument(JSON.parse(raw))
    } catch (err) {
      if (err instanceof ValidationError) throw err
      throw new ValidationError("transformations must be valid JSON", "validation:json")
    }
  }
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ValidationError("transformations must be an object", "validation:shape")
  }

  const result = TransformationsDocumentSchema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      throw new ValidationError(`Unknown operation(s): ${issue.keys.join(", ")}`, "validation:operation")
    }
    const where = issue.path.join(".")
    throw new ValidationError(where ? `${where} ${issue.message}` : issue.message, "validation:parameter")
  }

  // zod rebuilds objects in schema order, so walk the caller's keys instead
  const operations: OperationSpec[] = []
  for (const key of Object.keys(raw)) {
    if (!isDocumentKey(key)) continue
    const op = toOperation(key, result.data)
    if (op) operations.push(op)
  }

  return validateOperationSet(operations)
}
