import { Transformer } from "@napi-rs/image"
import { decodeRgba, RESIZE_FIT_FILL, RGBA8, toRgba } from "../transform/codec.js"

const HASH_WIDTH = 9
const HASH_HEIGHT = 8

/**
 * 64-bit difference hash of the decoded image, as 16 hex chars.
 *
 * The image is squashed to 9x8, converted to luminance, and each bit records
 * whether a pixel is brighter than its right-hand neighbour. Visually similar
 * images land a small Hamming distance apart. Metadata only; it never feeds
 * the fingerprint.
 */
export async function computePerceptualHash(buffer: Buffer): Promise<string> {
  // Normalised to RGBA8 first so 16-bit sources hash like their 8-bit twins
  const source = await decodeRgba(buffer)
  const pixels = await Transformer.fromRgbaPixels(source.data, source.width, source.height)
    .resize({ width: HASH_WIDTH, height: HASH_HEIGHT, fit: RESIZE_FIT_FILL })
    .rawPixels()
  const rgba = toRgba(pixels, HASH_WIDTH, HASH_HEIGHT, RGBA8)

  const luma = new Array<number>(HASH_WIDTH * HASH_HEIGHT)
  for (let i = 0; i < luma.length; i += 1) {
    const o = i * 4
    luma[i] = 0.299 * rgba[o] + 0.587 * rgba[o + 1] + 0.114 * rgba[o + 2]
  }

  let hex = ""
  let nibble = 0
  let bits = 0
  for (let y = 0; y < HASH_HEIGHT; y += 1) {
    for (let x = 0; x < HASH_WIDTH - 1; x += 1) {
      const left = luma[y * HASH_WIDTH + x]
      const right = luma[y * HASH_WIDTH + x + 1]
      nibble = (nibble << 1) | (left > right ? 1 : 0)
      bits += 1
      if (bits === 4) {
        hex += nibble.toString(16)
        nibble = 0
        bits = 0
      }
    }
  }
  return hex
}

/**
 * Number of differing bits between two perceptual hashes.
 */
export function hammingDistance(a: string, b: string): number {
  if (a.length !== b.length) {
    throw new Error("perceptual hashes must have the same length")
  }
  let distance = 0
  for (let i = 0; i < a.length; i += 1) {
    let diff = Number.parseInt(a[i], 16) ^ Number.parseInt(b[i], 16)
    while (diff) {
      distance += diff & 1
      diff >>= 1
    }
  }
  return distance
}
