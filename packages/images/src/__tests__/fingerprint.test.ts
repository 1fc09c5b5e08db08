import { ValidationError } from "@pixelforge/shared"
import { describe, expect, it } from "vitest"
import { canonicalizeOperations } from "../core/canonical.js"
import { fingerprint } from "../core/fingerprint.js"
import type { OperationSet } from "../operations/schema.js"

const SOURCE = "a".repeat(64)

describe("canonicalizeOperations", () => {
  it("should serialize names with sorted parameters", () => {
    expect(canonicalizeOperations([{ name: "resize", mode: "free", width: 10, height: 20 }])).toBe(
      '[["resize",[["height",20],["mode","free"],["width",10]]]]',
    )
  })

  it("should drop the ignored height when the width drives the resize", () => {
    const withHeight = canonicalizeOperations([{ name: "resize", mode: "maintain_aspect_ratio", width: 800, height: 1 }])
    const widthOnly = canonicalizeOperations([{ name: "resize", mode: "maintain_aspect_ratio", width: 800 }])
    expect(withHeight).toBe(widthOnly)
  })
})

describe("fingerprint", () => {
  const ops: OperationSet = [{ name: "grayscale" }, { name: "blur", radius: 5 }]

  it("should hash the namespaced canonical form", () => {
    expect(fingerprint(SOURCE, ops)).toBe("f8a90a1806a97178bcb64aa6adad388d476356760609d4a223115ca0ba92ed93")
  })

  it("should be stable across calls", () => {
    expect(fingerprint(SOURCE, ops)).toBe(fingerprint(SOURCE, [{ name: "grayscale" }, { name: "blur", radius: 5 }]))
  })

  it("should depend on operation order", () => {
    expect(fingerprint(SOURCE, ops)).not.toBe(fingerprint(SOURCE, [...ops].reverse()))
  })

  it("should depend on the source", () => {
    expect(fingerprint(SOURCE, ops)).not.toBe(fingerprint("b".repeat(64), ops))
  })

  it("should reject invalid parameters", () => {
    expect(() => fingerprint(SOURCE, [{ name: "blur", radius: 0 }])).toThrow(ValidationError)
  })

  it("should reject a malformed source hash", () => {
    expect(() => fingerprint("abc", ops)).toThrow("Source content hash must be a SHA-256 hex digest")
  })
})
