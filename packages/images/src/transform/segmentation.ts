import { setImmediate as yieldToEventLoop } from "node:timers/promises"
import type { RgbaImage } from "./codec.js"

/**
 * Produces a per-pixel alpha mask: 0 for background, 255 for foreground.
 */
export interface BackgroundSegmenter {
  readonly name: string
  segment(image: RgbaImage): Promise<Uint8Array>
}

export interface BorderFloodSegmenterOptions {
  /** Max Euclidean RGB distance from the border colour still counted as background */
  tolerance?: number
  /** Pixels processed between yields to the event loop */
  chunkSize?: number
}

const DEFAULT_TOLERANCE = 48
const DEFAULT_CHUNK_SIZE = 16_384

function median(values: number[]): number {
  if (values.length === 0) return 0
  const sorted = [...values].sort((a, b) => a - b)
  return sorted[Math.floor(sorted.length / 2)]
}

/**
 * Flood-fills from every border pixel over pixels close to the median border
 * colour. Fully transparent pixels always count as background.
 *
 * Works on product-style photos with a plain backdrop; a busy background
 * leaks into or stops short of the subject.
 */
export class BorderFloodSegmenter implements BackgroundSegmenter {
  readonly name = "border-flood"
  private readonly toleranceSq: number
  private readonly chunkSize: number

  constructor(options: BorderFloodSegmenterOptions = {}) {
    const tolerance = options.tolerance ?? DEFAULT_TOLERANCE
    this.toleranceSq = tolerance * tolerance
    this.chunkSize = Math.max(1, options.chunkSize ?? DEFAULT_CHUNK_SIZE)
  }

  async segment(image: RgbaImage): Promise<Uint8Array> {
    const { width, height, data } = image
    const total = width * height
    const mask = new Uint8Array(total).fill(255)
    if (total === 0) return mask

    const border = borderIndices(width, height)
    const reds: number[] = []
    const greens: number[] = []
    const blues: number[] = []
    for (const index of border) {
      const o = index * 4
      if (data[o + 3] === 0) continue
      reds.push(data[o])
      greens.push(data[o + 1])
      blues.push(data[o + 2])
    }
    const background = [median(reds), median(greens), median(blues)] as const

    const isBackground = (index: number): boolean => {
      const o = index * 4
      if (data[o + 3] === 0) return true
      const dr = data[o] - background[0]
      const dg = data[o + 1] - background[1]
      const db = data[o + 2] - background[2]
      return dr * dr + dg * dg + db * db <= this.toleranceSq
    }

    // Int32Array queue; each pixel is enqueued at most once
    const queue = new Int32Array(total)
    let head = 0
    let tail = 0
    const visit = (index: number) => {
      if (mask[index] === 0 || !isBackground(index)) return
      mask[index] = 0
      queue[tail] = index
      tail += 1
    }

    for (const index of border) visit(index)

    let processed = 0
    while (head < tail) {
      const index = queue[head]
      head += 1
      const x = index % width
      if (x > 0) visit(index - 1)
      if (x < width - 1) visit(index + 1)
      if (index >= width) visit(index - width)
      if (index + width < total) visit(index + width)

      processed += 1
      if (processed % this.chunkSize === 0) {
        await yieldToEventLoop()
      }
    }

    return mask
  }
}

function borderIndices(width: number, height: number): number[] {
  const indices = new Set<number>()
  for (let x = 0; x < width; x += 1) {
    indices.add(x)
    indices.add((height - 1) * width + x)
  }
  for (let y = 0; y < height; y += 1) {
    indices.add(y * width)
    indices.add(y * width + width - 1)
  }
  return [...indices]
}

/**
 * Copy of the image with the mask multiplied into its alpha channel.
 */
export function applyAlphaMask(image: RgbaImage, mask: Uint8Array): RgbaImage {
  const pixelCount = image.width * image.height
  if (mask.length !== pixelCount) {
    throw new Error(`mask has ${mask.length} entries for ${pixelCount} pixels`)
  }
  const data = new Uint8Array(image.data)
  for (let i = 0; i < pixelCount; i += 1) {
    data[i * 4 + 3] = Math.round((data[i * 4 + 3] * mask[i]) / 255)
  }
  return { width: image.width, height: image.height, data }
}
