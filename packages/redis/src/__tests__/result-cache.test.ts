import { StorageError } from "@pixelforge/shared"
import { describe, expect, it, vi } from "vitest"
import { MemoryResultCache, RedisResultCache, type ResultCacheCommands } from "../result-cache.js"

function fakeRedis(overrides: Partial<ResultCacheCommands> = {}) {
  const store = new Map<string, string>()
  const commands = {
    get: vi.fn(async (key: string) => store.get(key) ?? null),
    set: vi.fn(async (key: string, value: string, _token: "EX", _seconds: number) => {
      store.set(key, value)
      return "OK"
    }),
    ping: vi.fn(async () => "PONG"),
    ...overrides,
  }
  return { commands, store }
}

describe("RedisResultCache", () => {
  it("should write with the key prefix and an expiry", async () => {
    const { commands } = fakeRedis()
    const cache = new RedisResultCache(commands)

    await cache.put("fp1", "outputs/ab/x.png", 60)

    expect(commands.set).toHaveBeenCalledWith("pixelforge:result:fp1", "outputs/ab/x.png", "EX", 60)
    expect(await cache.get("fp1")).toBe("outputs/ab/x.png")
  })

  it("should return null on a miss", async () => {
    const cache = new RedisResultCache(fakeRedis().commands)

    expect(await cache.get("unknown")).toBeNull()
  })

  it("should wrap command failures in StorageError", async () => {
    const { commands } = fakeRedis({ get: () => Promise.reject(new Error("connection closed")) })
    const cache = new RedisResultCache(commands)

    const error = await cache.get("fp1").catch((err: unknown) => err)
    expect(error).toBeInstanceOf(StorageError)
    expect(error).toMatchObject({ code: "storage:cache", message: "Result cache read failed" })
  })

  it("should report an unreachable server as not healthy", async () => {
    const { commands } = fakeRedis({ ping: () => Promise.reject(new Error("offline")) })

    expect(await new RedisResultCache(commands).ping()).toBe(false)
  })

  it("should reject a non-positive ttl", async () => {
    const cache = new RedisResultCache(fakeRedis().commands)

    await expect(cache.put("fp1", "loc", 0)).rejects.toThrow("ttlSeconds must be a positive integer, got 0")
  })
})

describe("MemoryResultCache", () => {
  it("should expire entries after the ttl", async () => {
    let now = 1_000_000
    const cache = new MemoryResultCache({ now: () => now })

    await cache.put("fp1", "loc", 10)
    now += 9_999
    expect(await cache.get("fp1")).toBe("loc")
    now += 1
    expect(await cache.get("fp1")).toBeNull()
    expect(cache.size).toBe(0)
  })

  it("should overwrite on repeated puts", async () => {
    const cache = new MemoryResultCache()

    await cache.put("fp1", "first", 60)
    await cache.put("fp1", "second", 60)

    expect(await cache.get("fp1")).toBe("second")
    expect(cache.size).toBe(1)
  })
})
