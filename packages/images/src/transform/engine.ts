import { Transformer } from "@napi-rs/image"
import { type OperationName, type OperationSet, type OperationSpec, validateOperationSet } from "../operations/schema.js"
import type { ErrorShape, HResponse } from "../types/response.js"
import { Rs } from "../types/response.js"
import { validateImageType } from "../validation/magic-numbers.js"
import {
  decodeRgba,
  encodeOutput,
  encodeRgbaPng,
  type OutputMimeType,
  orientationFor,
  outputMimeFor,
  RESIZE_FIT_FILL,
  readDimensions,
} from "./codec.js"
import { resolveResizeDimensions } from "./resize.js"
import { applyAlphaMask, type BackgroundSegmenter, BorderFloodSegmenter } from "./segmentation.js"

export interface TransformResult {
  output: Buffer
  mimeType: OutputMimeType
  width: number
  height: number
  appliedOps: OperationName[]
}

/** Failures outside a named operation use `decode` (step -1) or `encode` */
export interface TransformFailure extends ErrorShape {
  operation: OperationName | "decode" | "encode"
  step: number
}

export interface TransformEngineOptions {
  segmenter?: BackgroundSegmenter
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Applies an ordered operation set to an image.
 *
 * Each operation is a separate decode, apply, encode pass over a lossless PNG
 * intermediate, so operations compose in exactly the order given. The whole
 * set either succeeds or yields a single failure naming the operation.
 */
export class TransformEngine {
  private readonly segmenter: BackgroundSegmenter

  constructor(options: TransformEngineOptions = {}) {
    this.segmenter = options.segmenter ?? new BorderFloodSegmenter()
  }

  async apply(source: Buffer, operations: OperationSet): HResponse<TransformResult, TransformFailure> {
    const validated = validateOperationSet(operations)

    const inputMime = validateImageType(source)
    if (!inputMime) {
      return Rs.failure<TransformFailure>({
        message: "Source is not a JPEG, PNG or GIF image",
        code: "transform:decode",
        operation: "decode",
        step: -1,
      })
    }

    let current: Buffer
    try {
      current = await new Transformer(source).png()
    } catch (err) {
      return Rs.failure<TransformFailure>({ message: reasonOf(err), code: "transform:decode", operation: "decode", step: -1 })
    }

    const appliedOps: OperationName[] = []
    for (const [step, op] of validated.entries()) {
      try {
        current = await this.run(op, current)
      } catch (err) {
        return Rs.failure<TransformFailure>({ message: reasonOf(err), code: `transform:${op.name}`, operation: op.name, step })
      }
      appliedOps.push(op.name)
    }

    const needsAlpha = appliedOps.includes("remove_background")
    const mimeType = outputMimeFor(inputMime, needsAlpha)
    try {
      const output = await encodeOutput(current, mimeType)
      const { width, height } = await readDimensions(output)
      return Rs.data({ output, mimeType, width, height, appliedOps })
    } catch (err) {
      return Rs.failure<TransformFailure>({
        message: reasonOf(err),
        code: "transform:encode",
        operation: "encode",
        step: validated.length,
      })
    }
  }

  private async run(op: OperationSpec, input: Buffer): Promise<Buffer> {
    switch (op.name) {
      case "grayscale":
        return new Transformer(input).grayscale().png()
      case "blur":
        return new Transformer(input).blur(op.radius).png()
      case "rotate":
        return new Transformer(input).rotate(orientationFor(op.angle)).png()
      case "resize": {
        const target = resolveResizeDimensions(await readDimensions(input), op)
        return new Transformer(input).resize({ width: target.width, height: target.height, fit: RESIZE_FIT_FILL }).png()
      }
      case "remove_background": {
        const image = await decodeRgba(input)
        const mask = await this.segmenter.segment(image)
        return encodeRgbaPng(applyAlphaMask(image, mask))
      }
    }
  }
}
