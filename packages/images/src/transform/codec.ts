import { type JsColorType, type Orientation, type ResizeFit, Transformer } from "@napi-rs/image"
import type { RotateAngle } from "../operations/schema.js"
import type { SupportedMimeType } from "../validation/magic-numbers.js"

export type OutputMimeType = "image/jpeg" | "image/png"

export interface Dimensions {
  width: number
  height: number
}

export interface RgbaImage extends Dimensions {
  /** Tightly packed RGBA8 pixels, row-major */
  data: Uint8Array
}

// EXIF orientation values used by @napi-rs/image
const ORIENTATION_FOR_ANGLE: Record<RotateAngle, Orientation> = {
  90: 6,
  180: 3,
  270: 8,
}

// Stretch to the exact box; aspect handling happens before the call
export const RESIZE_FIT_FILL: ResizeFit = 1

export const JPEG_QUALITY = 90

export function orientationFor(angle: RotateAngle): Orientation {
  return ORIENTATION_FOR_ANGLE[angle]
}

export async function readDimensions(input: Buffer): Promise<Dimensions> {
  const metadata = await new Transformer(input).metadata()
  return { width: metadata.width, height: metadata.height }
}

interface PixelLayout {
  channels: 1 | 2 | 3 | 4
  sample: "u8" | "u16" | "f32"
}

// Keyed by JsColorType
const PIXEL_LAYOUTS: Record<number, PixelLayout> = {
  0: { channels: 1, sample: "u8" }, // L8
  1: { channels: 2, sample: "u8" }, // La8
  2: { channels: 3, sample: "u8" }, // Rgb8
  3: { channels: 4, sample: "u8" }, // Rgba8
  4: { channels: 1, sample: "u16" }, // L16
  5: { channels: 2, sample: "u16" }, // La16
  6: { channels: 3, sample: "u16" }, // Rgb16
  7: { channels: 4, sample: "u16" }, // Rgba16
  8: { channels: 3, sample: "f32" }, // Rgb32F
  9: { channels: 4, sample: "f32" }, // Rgba32F
}

const BYTES_PER_SAMPLE = { u8: 1, u16: 2, f32: 4 } as const

export const RGBA8: JsColorType = 3

/**
 * Samples scaled to 8 bits. `rawPixels()` hands out 16-bit and float samples
 * in native byte order; 16-bit samples keep their high byte.
 */
function samplesAs8Bit(pixels: Uint8Array, sample: PixelLayout["sample"]): Uint8Array {
  if (sample === "u8") return pixels

  const width = BYTES_PER_SAMPLE[sample]
  // typed-array views need an aligned offset
  const aligned = pixels.byteOffset % width === 0 ? pixels : new Uint8Array(pixels)
  const count = aligned.length / width
  const out = new Uint8Array(count)
  if (sample === "u16") {
    const view = new Uint16Array(aligned.buffer, aligned.byteOffset, count)
    for (let i = 0; i < count; i += 1) out[i] = view[i] >> 8
  } else {
    const view = new Float32Array(aligned.buffer, aligned.byteOffset, count)
    for (let i = 0; i < count; i += 1) out[i] = Math.round(Math.min(1, Math.max(0, view[i])) * 255)
  }
  return out
}

/**
 * Convert raw pixels of the given colour type to RGBA8.
 */
export function toRgba(pixels: Uint8Array, width: number, height: number, colorType: JsColorType): Uint8Array {
  const layout = PIXEL_LAYOUTS[colorType]
  if (!layout) {
    throw new Error(`unsupported colour type ${colorType}`)
  }
  const count = width * height
  const expected = count * layout.channels * BYTES_PER_SAMPLE[layout.sample]
  if (pixels.length !== expected) {
    throw new Error(`expected ${expected} bytes for ${width}x${height} colour type ${colorType}, got ${pixels.length}`)
  }

  const samples = samplesAs8Bit(pixels, layout.sample)
  const { channels } = layout
  if (channels === 4) return samples

  const rgba = new Uint8Array(count * 4)
  for (let i = 0; i < count; i += 1) {
    const src = i * channels
    const dst = i * 4
    if (channels === 3) {
      rgba[dst] = samples[src]
      rgba[dst + 1] = samples[src + 1]
      rgba[dst + 2] = samples[src + 2]
      rgba[dst + 3] = 255
    } else {
      rgba[dst] = samples[src]
      rgba[dst + 1] = samples[src]
      rgba[dst + 2] = samples[src]
      rgba[dst + 3] = channels === 2 ? samples[src + 1] : 255
    }
  }
  return rgba
}

export async function decodeRgba(input: Buffer): Promise<RgbaImage> {
  const { width, height, colorType } = await new Transformer(input).metadata()
  const pixels = await new Transformer(input).rawPixels()
  return { width, height, data: toRgba(pixels, width, height, colorType) }
}

export function encodeRgbaPng(image: RgbaImage): Promise<Buffer> {
  return Transformer.fromRgbaPixels(image.data, image.width, image.height).png()
}

/**
 * Pick the output format: the input format is kept unless an operation needs
 * alpha, and GIF (which the encoder cannot write) becomes PNG.
 */
export function outputMimeFor(input: SupportedMimeType, needsAlpha: boolean): OutputMimeType {
  if (needsAlpha) return "image/png"
  return input === "image/jpeg" ? "image/jpeg" : "image/png"
}

/**
 * Encode a lossless intermediate into the final output format.
 */
export async function encodeOutput(intermediatePng: Buffer, mimeType: OutputMimeType): Promise<Buffer> {
  if (mimeType === "image/png") return intermediatePng
  return new Transformer(intermediatePng).jpeg(JPEG_QUALITY)
}
