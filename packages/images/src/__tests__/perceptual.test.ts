import { describe, expect, it } from "vitest"
import { computePerceptualHash, hammingDistance } from "../core/perceptual.js"
import { gradientPng, solidPng, squarePng16 } from "../testing/fixtures.js"

describe("computePerceptualHash", () => {
  it("should be all zeros for a flat image", async () => {
    expect(await computePerceptualHash(await solidPng(32, 32, [90, 120, 200, 255]))).toBe("0000000000000000")
  })

  it("should set every bit when brightness falls left to right", async () => {
    // red rises while the heavier green channel falls, so luminance drops
    expect(await computePerceptualHash(await gradientPng(90, 16))).toBe("ffffffffffffffff")
  })

  it("should hash a 16-bit gray image like its 8-bit twin", async () => {
    const eightBit = await solidPng(16, 16, [255, 255, 255, 255], { size: 4, color: [32, 32, 32, 255] })

    expect(await computePerceptualHash(squarePng16("gray", [0x2000]))).toBe(await computePerceptualHash(eightBit))
  })

  it("should hash a 16-bit RGB image like its 8-bit twin", async () => {
    const eightBit = await solidPng(16, 16, [255, 255, 255, 255], { size: 4, color: [220, 20, 20, 255] })

    expect(await computePerceptualHash(squarePng16("rgb", [0xdc00, 0x1400, 0x1400]))).toBe(
      await computePerceptualHash(eightBit),
    )
  })

  it("should be stable for the same pixels", async () => {
    const png = await gradientPng(40, 30)
    expect(await computePerceptualHash(png)).toBe(await computePerceptualHash(Buffer.from(png)))
  })
})

describe("hammingDistance", () => {
  it("should count differing bits", () => {
    expect(hammingDistance("0000000000000000", "000000000000000f")).toBe(4)
    expect(hammingDistance("ffffffffffffffff", "ffffffffffffffff")).toBe(0)
  })

  it("should reject hashes of different lengths", () => {
    expect(() => hammingDistance("00", "000")).toThrow("perceptual hashes must have the same length")
  })
})
