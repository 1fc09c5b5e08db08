import type { ResizeOp } from "../operations/schema.js"
import type { Dimensions } from "./codec.js"

/**
 * Target box for a resize.
 *
 * `maintain_aspect_ratio` derives the missing dimension from the source
 * ratio. When both are given the width wins and the height is ignored.
 */
export function resolveResizeDimensions(source: Dimensions, op: ResizeOp): Dimensions {
  if (op.mode === "free") {
    return { width: op.width ?? source.width, height: op.height ?? source.height }
  }
  if (op.width !== undefined) {
    return { width: op.width, height: Math.max(1, Math.round((op.width * source.height) / source.width)) }
  }
  if (op.height !== undefined) {
    return { width: Math.max(1, Math.round((op.height * source.width) / source.height)), height: op.height }
  }
  return source
}
