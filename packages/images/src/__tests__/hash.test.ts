import { describe, expect, it } from "vitest"
import { generateContentHash, isContentHash } from "../core/hash.js"

describe("Content Hashing", () => {
  it("should generate consistent hashes for same content", () => {
    const buffer = Buffer.from("test content")

    expect(generateContentHash(buffer)).toBe(generateContentHash(Buffer.from("test content")))
  })

  it("should generate different hashes for different content", () => {
    expect(generateContentHash(Buffer.from("test content 1"))).not.toBe(
      generateContentHash(Buffer.from("test content 2")),
    )
  })

  it("should produce the full SHA-256 hex digest", () => {
    expect(generateContentHash(Buffer.from("test content"))).toBe(
      "6ae8a75555209fd6c44157c0aed8016e763ff435a19cf186f76863140143ff72",
    )
  })

  it("should handle empty buffers", () => {
    expect(generateContentHash(Buffer.from(""))).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    )
  })

  it("should recognise content hashes", () => {
    expect(isContentHash(generateContentHash(Buffer.from("x")))).toBe(true)
    expect(isContentHash("abc")).toBe(false)
    expect(isContentHash("G".repeat(64))).toBe(false)
  })
})
