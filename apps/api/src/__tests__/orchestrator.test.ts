import { generateContentHash, type OperationSet } from "@pixelforge/images"
import { StorageError, TransformError } from "@pixelforge/shared"
import { afterEach, describe, expect, it, vi } from "vitest"
import { AUTH, createHarness, pngOf } from "./helpers.js"

const BLUE = [20, 40, 220, 255] as const

type Harness = Awaited<ReturnType<typeof createHarness>>

let harness: Harness | null = null

afterEach(async () => {
  await harness?.cleanup()
  harness = null
})

describe("Orchestrator.transform", () => {
  it("should populate the stores even when the caller has gone away", async () => {
    harness = await createHarness()
    const { orchestrator, engine } = harness
    const applySpy = vi.spyOn(engine, "apply")
    const bytes = await pngOf(6, 4, BLUE)
    const controller = new AbortController()
    controller.abort()

    const abandoned = await orchestrator.transform({
      source: { kind: "upload", bytes },
      operations: [{ name: "rotate", angle: 90 }],
      authorization: AUTH.Authorization,
      signal: controller.signal,
    })
    expect(abandoned.delivered).toBe(false)
    expect(abandoned.cache).toBe("MISS")

    const replay = await orchestrator.transform({
      source: { kind: "upload", bytes },
      operations: [{ name: "rotate", angle: 90 }],
      authorization: AUTH.Authorization,
    })
    expect(replay).toMatchObject({ delivered: true, cache: "HIT", mimeType: "image/png" })
    expect(replay.version?.id).toBe(abandoned.version?.id)
    expect(applySpy).toHaveBeenCalledTimes(1)
  })

  it("should register the source with its dimensions on first transform", async () => {
    harness = await createHarness()
    const { orchestrator, ledger } = harness
    const bytes = await pngOf(6, 4, BLUE)

    await orchestrator.transform({
      source: { kind: "upload", bytes },
      operations: [{ name: "grayscale" }],
      authorization: AUTH.Authorization,
    })

    expect(await ledger.getSource(generateContentHash(bytes))).toMatchObject({
      width: 6,
      height: 4,
      mimeType: "image/png",
      sourceType: "upload",
      sourceUrl: null,
    })
  })

  it("should surface engine failures as TransformError with the failing step", async () => {
    harness = await createHarness()
    const { orchestrator, engine } = harness
    vi.spyOn(engine, "apply").mockResolvedValue({
      data: null,
      error: { message: "kernel exploded", code: "transform:blur", operation: "blur", step: 1 },
    })
    const bytes = await pngOf(6, 4, BLUE)

    const attempt = orchestrator.transform({
      source: { kind: "upload", bytes },
      operations: [{ name: "grayscale" }, { name: "blur", radius: 3 }],
      authorization: AUTH.Authorization,
    })

    await expect(attempt).rejects.toThrow(TransformError)
    await expect(attempt).rejects.toMatchObject({
      message: 'Operation "blur" (step 2) failed: kernel exploded',
      code: "transform:blur",
      status: 422,
    })
  })
})

describe("Orchestrator near-duplicate reuse", () => {
  it("should fall through to the transform when the similarity lookup fails", async () => {
    harness = await createHarness({ nearDuplicate: { maxDistance: 1 } })
    const { orchestrator, ledger, engine, sink } = harness
    vi.spyOn(ledger, "findSimilarSources").mockRejectedValue(new StorageError("ledger down", "storage:ledger"))
    const applySpy = vi.spyOn(engine, "apply")

    const outcome = await orchestrator.transform({
      source: { kind: "upload", bytes: await pngOf(6, 4, BLUE) },
      operations: [{ name: "grayscale" }],
      authorization: AUTH.Authorization,
    })

    expect(outcome).toMatchObject({ cache: "MISS", nearDuplicateOf: null, delivered: true })
    expect(applySpy).toHaveBeenCalledTimes(1)
    expect(sink.entries.some(e => e.message === "Near-duplicate lookup skipped")).toBe(true)
  })

  it("should only reuse a similar source's result for the same operations", async () => {
    harness = await createHarness({ nearDuplicate: { maxDistance: 64 } })
    const { orchestrator, engine } = harness
    const applySpy = vi.spyOn(engine, "apply")
    const first = await pngOf(6, 4, BLUE)
    const second = await pngOf(6, 4, [200, 40, 20, 255])
    const transform = (bytes: Buffer, operations: OperationSet) =>
      orchestrator.transform({ source: { kind: "upload", bytes }, operations, authorization: AUTH.Authorization })

    await transform(first, [{ name: "grayscale" }])
    const rotated = await transform(second, [{ name: "rotate", angle: 90 }])
    const grayscale = await transform(second, [{ name: "grayscale" }])

    expect(rotated).toMatchObject({ cache: "MISS", nearDuplicateOf: null })
    expect(grayscale).toMatchObject({ cache: "HIT", nearDuplicateOf: generateContentHash(first) })
    expect(applySpy).toHaveBeenCalledTimes(2)
  })
})
