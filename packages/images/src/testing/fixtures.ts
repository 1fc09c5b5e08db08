import { deflateSync } from "node:zlib"
import { Transformer } from "@napi-rs/image"

export type Rgba = readonly [number, number, number, number]

/**
 * Solid-colour PNG, optionally with a centred square of another colour.
 */
export function solidPng(
  width: number,
  height: number,
  background: Rgba,
  square?: { size: number; color: Rgba },
): Promise<Buffer> {
  const data = new Uint8Array(width * height * 4)
  const x0 = square ? Math.floor((width - square.size) / 2) : 0
  const y0 = square ? Math.floor((height - square.size) / 2) : 0
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const inSquare = square !== undefined && x >= x0 && x < x0 + square.size && y >= y0 && y < y0 + square.size
      const color = inSquare && square ? square.color : background
      data.set(color, (y * width + x) * 4)
    }
  }
  return Transformer.fromRgbaPixels(data, width, height).png()
}

/**
 * Horizontal gradient; handy where blur or grayscale must change the pixels.
 */
export function gradientPng(width: number, height: number): Promise<Buffer> {
  const data = new Uint8Array(width * height * 4)
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const o = (y * width + x) * 4
      const v = Math.round((x / Math.max(1, width - 1)) * 255)
      data[o] = v
      data[o + 1] = 255 - v
      data[o + 2] = (y * 7) % 256
      data[o + 3] = 255
    }
  }
  return Transformer.fromRgbaPixels(data, width, height).png()
}

const CRC_TABLE = Array.from({ length: 256 }, (_, n) => {
  let c = n
  for (let k = 0; k < 8; k += 1) c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1
  return c >>> 0
})

function crc32(bytes: Uint8Array): number {
  let c = 0xffffffff
  for (const byte of bytes) c = CRC_TABLE[(c ^ byte) & 0xff] ^ (c >>> 8)
  return (c ^ 0xffffffff) >>> 0
}

function chunk(type: string, data: Uint8Array): Buffer {
  const body = Buffer.concat([Buffer.from(type, "ascii"), data])
  const out = Buffer.alloc(body.length + 8)
  out.writeUInt32BE(data.length, 0)
  body.copy(out, 4)
  out.writeUInt32BE(crc32(body), body.length + 4)
  return out
}

export type Sample16 = readonly number[]

/**
 * 16-bit PNG (colour type 0 for gray, 2 for RGB). `pixel` returns one
 * 16-bit sample per channel. The encoder only writes 8-bit, so the chunks are
 * assembled by hand.
 */
export function png16(
  width: number,
  height: number,
  kind: "gray" | "rgb",
  pixel: (x: number, y: number) => Sample16,
): Buffer {
  const channels = kind === "gray" ? 1 : 3
  const stride = width * channels * 2 + 1
  const raw = Buffer.alloc(stride * height)
  for (let y = 0; y < height; y += 1) {
    raw[y * stride] = 0 // filter: none
    for (let x = 0; x < width; x += 1) {
      const samples = pixel(x, y)
      for (let c = 0; c < channels; c += 1) {
        raw.writeUInt16BE(samples[c], y * stride + 1 + (x * channels + c) * 2)
      }
    }
  }

  const header = Buffer.alloc(13)
  header.writeUInt32BE(width, 0)
  header.writeUInt32BE(height, 4)
  header[8] = 16
  header[9] = kind === "gray" ? 0 : 2

  return Buffer.concat([
    Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
    chunk("IHDR", header),
    chunk("IDAT", deflateSync(raw)),
    chunk("IEND", new Uint8Array(0)),
  ])
}

/**
 * 16x16 16-bit image: white backdrop with a 4x4 centre square of `square`.
 */
export function squarePng16(kind: "gray" | "rgb", square: Sample16): Buffer {
  const white = kind === "gray" ? [0xffff] : [0xffff, 0xffff, 0xffff]
  return png16(16, 16, kind, (x, y) => (x >= 6 && x < 10 && y >= 6 && y < 10 ? square : white))
}
