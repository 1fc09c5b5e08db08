import { ValidationError } from "@pixelforge/shared"
import { z } from "zod"

export const OPERATION_NAMES = ["grayscale", "blur", "rotate", "resize", "remove_background"] as const
export type OperationName = (typeof OPERATION_NAMES)[number]

export const BLUR_RADIUS = { min: 1, max: 50 } as const
export const RESIZE_DIMENSION = { min: 1, max: 5000 } as const
export const ROTATE_ANGLES = [90, 180, 270] as const
export const RESIZE_MODES = ["maintain_aspect_ratio", "free"] as const

export type RotateAngle = (typeof ROTATE_ANGLES)[number]
export type ResizeMode = (typeof RESIZE_MODES)[number]

export interface GrayscaleOp {
  name: "grayscale"
}

export interface BlurOp {
  name: "blur"
  radius: number
}

export interface RotateOp {
  name: "rotate"
  angle: RotateAngle
}

/**
 * In `maintain_aspect_ratio` mode the width drives the result whenever it is
 * set; the height is only used when no width is given. `free` needs both.
 */
export interface ResizeOp {
  name: "resize"
  mode: ResizeMode
  width?: number
  height?: number
}

export interface RemoveBackgroundOp {
  name: "remove_background"
}

export type OperationSpec = GrayscaleOp | BlurOp | RotateOp | ResizeOp | RemoveBackgroundOp

/** Ordered; operations do not commute. */
export type OperationSet = readonly OperationSpec[]

const dimension = (label: string) =>
  z
    .number({ invalid_type_error: `resize ${label} must be a number` })
    .int(`resize ${label} must be an integer`)
    .min(RESIZE_DIMENSION.min, `resize ${label} must be between ${RESIZE_DIMENSION.min} and ${RESIZE_DIMENSION.max}`)
    .max(RESIZE_DIMENSION.max, `resize ${label} must be between ${RESIZE_DIMENSION.min} and ${RESIZE_DIMENSION.max}`)

const grayscaleSchema = z.object({ name: z.literal("grayscale") }).strict()

const blurSchema = z
  .object({
    name: z.literal("blur"),
    radius: z
      .number({ required_error: "blur radius is required", invalid_type_error: "blur radius must be a number" })
      .int("blur radius must be an integer")
      .min(BLUR_RADIUS.min, `blur radius must be between ${BLUR_RADIUS.min} and ${BLUR_RADIUS.max}`)
      .max(BLUR_RADIUS.max, `blur radius must be between ${BLUR_RADIUS.min} and ${BLUR_RADIUS.max}`),
  })
  .strict()

const rotateSchema = z
  .object({
    name: z.literal("rotate"),
    angle: z.union([z.literal(90), z.literal(180), z.literal(270)], {
      errorMap: () => ({ message: `rotate angle must be one of ${ROTATE_ANGLES.join(", ")}` }),
    }),
  })
  .strict()

const resizeSchema = z
  .object({
    name: z.literal("resize"),
    mode: z.enum(RESIZE_MODES, {
      errorMap: () => ({ message: `resize type must be one of ${RESIZE_MODES.join(", ")}` }),
    }),
    width: dimension("width").optional(),
    height: dimension("height").optional(),
  })
  .strict()

const removeBackgroundSchema = z.object({ name: z.literal("remove_background") }).strict()

export const operationSpecSchema = z.discriminatedUnion("name", [
  grayscaleSchema,
  blurSchema,
  rotateSchema,
  resizeSchema,
  removeBackgroundSchema,
])

export const operationSetSchema = z
  .array(operationSpecSchema)
  .min(1, "No transformations selected")
  .superRefine((ops, ctx) => {
    ops.forEach((op, index) => {
      if (op.name !== "resize") return
      if (op.mode === "free" && (op.width === undefined || op.height === undefined)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index],
          message: "resize type free needs both width and height",
        })
      }
      if (op.mode === "maintain_aspect_ratio" && op.width === undefined && op.height === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index],
          message: "resize needs a width or a height",
        })
      }
    })
  })

function issueCode(issue: z.ZodIssue): string {
  if (issue.code === z.ZodIssueCode.invalid_union_discriminator) return "validation:operation"
  if (issue.code === z.ZodIssueCode.too_small && issue.path.length === 0) return "validation:empty"
  return "validation:parameter"
}

function describeIssue(issue: z.ZodIssue): string {
  if (issue.code === z.ZodIssueCode.invalid_union_discriminator) {
    return `Unknown operation. Supported operations: ${OPERATION_NAMES.join(", ")}`
  }
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    return `Unknown parameter(s): ${issue.keys.join(", ")}`
  }
  return issue.message
}

/**
 * Validate an operation set at the boundary of the fingerprint and transform
 * engines. Unknown operations and out-of-range parameters are caller errors.
 */
export function validateOperationSet(input: unknown): OperationSet {
  const result = operationSetSchema.safeParse(input)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new ValidationError(describeIssue(issue), issueCode(issue))
  }
  return result.data
}

export function includesOperation(operations: OperationSet, name: OperationName): boolean {
  return operations.some(op => op.name === name)
}
