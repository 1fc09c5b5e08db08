import { StorageError } from "@pixelforge/shared"
import { beforeEach, describe, expect, it } from "vitest"
import { MemoryVersionLedger } from "../ledger/memory.js"
import type { ProcessedVersion, RecordVersionInput, RegisterSourceInput } from "../types.js"

const SOURCE_HASH = "a".repeat(64)

const source: RegisterSourceInput = {
  contentHash: SOURCE_HASH,
  perceptualHash: "0f0f0f0f0f0f0f0f",
  mimeType: "image/png",
  width: 800,
  height: 600,
  byteSize: 1234,
  sourceType: "upload",
  sourceUrl: null,
  locator: `sources/aa/${SOURCE_HASH}.png`,
}

function version(fingerprint: string): RecordVersionInput {
  return {
    sourceId: SOURCE_HASH,
    fingerprint,
    operations: [{ name: "grayscale" }],
    locator: `outputs/${fingerprint.slice(0, 2)}/${fingerprint}.png`,
    outputHash: "b".repeat(64),
    mimeType: "image/png",
  }
}

async function collect(iterable: AsyncIterable<ProcessedVersion>): Promise<string[]> {
  const fingerprints: string[] = []
  for await (const v of iterable) fingerprints.push(v.fingerprint)
  return fingerprints
}

describe("MemoryVersionLedger", () => {
  let clock: number
  let ledger: MemoryVersionLedger

  beforeEach(async () => {
    clock = Date.UTC(2024, 0, 1)
    ledger = new MemoryVersionLedger({ now: () => new Date(clock), pageSize: 2 })
    await ledger.registerSource(source)
  })

  describe("registerSource", () => {
    it("should return the existing record for a known content hash", async () => {
      const first = await ledger.getSource(SOURCE_HASH)
      const again = await ledger.registerSource({ ...source, locator: "elsewhere" })

      expect(again).toBe(first)
      expect(again.locator).toBe(source.locator)
    })

    it("should return null for an unknown source", async () => {
      expect(await ledger.getSource("c".repeat(64))).toBeNull()
    })
  })

  describe("getVersion", () => {
    it("should look a version up by fingerprint", async () => {
      const recorded = await ledger.recordVersion(version("1".repeat(64)))

      expect(await ledger.getVersion("1".repeat(64))).toBe(recorded)
      expect(await ledger.getVersion("2".repeat(64))).toBeNull()
    })
  })

  describe("recordVersion", () => {
    it("should be idempotent on fingerprint", async () => {
      const first = await ledger.recordVersion(version("f1"))
      clock += 1000
      const second = await ledger.recordVersion({ ...version("f1"), locator: "other" })

      expect(second).toEqual(first)
      expect(await collect(ledger.listVersions(SOURCE_HASH))).toEqual(["f1"])
    })

    it("should keep one record under concurrent writes", async () => {
      const results = await Promise.all(Array.from({ length: 20 }, () => ledger.recordVersion(version("same"))))

      expect(new Set(results.map(r => r.id)).size).toBe(1)
      expect(await collect(ledger.listVersions(SOURCE_HASH))).toEqual(["same"])
    })

    it("should reject versions of unregistered sources", async () => {
      await expect(ledger.recordVersion({ ...version("f1"), sourceId: "c".repeat(64) })).rejects.toBeInstanceOf(
        StorageError,
      )
    })
  })

  describe("listVersions", () => {
    it("should order by creation time, then insertion", async () => {
      clock += 5000
      await ledger.recordVersion(version("late"))
      clock -= 3000
      await ledger.recordVersion(version("early-1"))
      await ledger.recordVersion(version("early-2"))

      expect(await collect(ledger.listVersions(SOURCE_HASH))).toEqual(["early-1", "early-2", "late"])
    })

    it("should page through more versions than fit on one page", async () => {
      for (const fp of ["v1", "v2", "v3", "v4", "v5"]) {
        clock += 1
        await ledger.recordVersion(version(fp))
      }

      expect(await collect(ledger.listVersions(SOURCE_HASH))).toEqual(["v1", "v2", "v3", "v4", "v5"])
    })

    it("should restart from the beginning on each iteration", async () => {
      await ledger.recordVersion(version("v1"))
      const listing = ledger.listVersions(SOURCE_HASH)

      expect(await collect(listing)).toEqual(["v1"])
      clock += 1
      await ledger.recordVersion(version("v2"))
      expect(await collect(listing)).toEqual(["v1", "v2"])
    })

    it("should be empty for a source without versions", async () => {
      expect(await collect(ledger.listVersions("c".repeat(64)))).toEqual([])
    })
  })

  describe("findSimilarSources", () => {
    function sourceWith(contentHash: string, perceptualHash: string): RegisterSourceInput {
      return { ...source, contentHash, perceptualHash, locator: `sources/${contentHash.slice(0, 2)}/${contentHash}.png` }
    }

    it("should rank sources by hash distance, then age", async () => {
      clock += 1
      await ledger.registerSource(sourceWith("b".repeat(64), "0f0f0f0f0f0f0f0e"))
      clock += 1
      await ledger.registerSource(sourceWith("c".repeat(64), "0f0f0f0f0f0f0f00"))
      clock += 1
      await ledger.registerSource(sourceWith("d".repeat(64), "0f0f0f0f0f0f0f0e"))
      await ledger.registerSource(sourceWith("e".repeat(64), "f0f0f0f0f0f0f0f0"))

      const matches = await ledger.findSimilarSources("0f0f0f0f0f0f0f0f", 4, 10)

      expect(matches.map(m => [m.source.contentHash.charAt(0), m.distance])).toEqual([
        ["a", 0],
        ["b", 1],
        ["d", 1],
        ["c", 4],
      ])
    })

    it("should honour the distance threshold and limit", async () => {
      await ledger.registerSource(sourceWith("b".repeat(64), "0f0f0f0f0f0f0f0e"))
      await ledger.registerSource(sourceWith("c".repeat(64), "0f0f0f0f0f0f0f00"))

      expect((await ledger.findSimilarSources("0f0f0f0f0f0f0f0f", 1, 10)).map(m => m.distance)).toEqual([0, 1])
      expect(await ledger.findSimilarSources("0f0f0f0f0f0f0f0f", 64, 1)).toHaveLength(1)
    })
  })

  describe("listRecentVersions", () => {
    beforeEach(async () => {
      await ledger.registerSource({
        ...source,
        contentHash: "d".repeat(64),
        sourceType: "url",
        sourceUrl: "https://example.test/cat.png",
      })
      clock += 1
      await ledger.recordVersion(version("gray"))
      clock += 1
      await ledger.recordVersion({ ...version("blur"), operations: [{ name: "blur", radius: 2 }] })
      clock += 1
      await ledger.recordVersion({
        ...version("url-gray"),
        sourceId: "d".repeat(64),
        operations: [{ name: "rotate", angle: 90 }, { name: "grayscale" }],
      })
    })

    it("should list the newest versions first", async () => {
      const entries = await ledger.listRecentVersions({ limit: 2 })

      expect(entries.map(e => e.fingerprint)).toEqual(["url-gray", "blur"])
      expect(entries[0]).toMatchObject({ sourceType: "url", sourceUrl: "https://example.test/cat.png" })
    })

    it("should filter by operation and source type", async () => {
      const grayscale = await ledger.listRecentVersions({ limit: 10, operation: "grayscale" })
      const uploads = await ledger.listRecentVersions({ limit: 10, sourceType: "upload" })
      const both = await ledger.listRecentVersions({ limit: 10, operation: "grayscale", sourceType: "upload" })

      expect(grayscale.map(e => e.fingerprint)).toEqual(["url-gray", "gray"])
      expect(uploads.map(e => e.fingerprint)).toEqual(["blur", "gray"])
      expect(both.map(e => e.fingerprint)).toEqual(["gray"])
    })
  })
})
