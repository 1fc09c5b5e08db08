import { StorageError } from "@pixelforge/shared"

/**
 * Fingerprint → blob locator. Never the source of truth: entries expire
 * silently and writes are idempotent overwrites.
 */
export interface ResultCache {
  get(fingerprint: string): Promise<string | null>
  put(fingerprint: string, locator: string, ttlSeconds: number): Promise<void>
  ping(): Promise<boolean>
}

export const RESULT_KEY_PREFIX = "pixelforge:result:"

export function resultKey(fingerprint: string): string {
  return `${RESULT_KEY_PREFIX}${fingerprint}`
}

function assertTtl(ttlSeconds: number): void {
  if (!Number.isInteger(ttlSeconds) || ttlSeconds < 1) {
    throw new RangeError(`ttlSeconds must be a positive integer, got ${ttlSeconds}`)
  }
}

/**
 * The subset of ioredis the cache needs.
 */
export interface ResultCacheCommands {
  get(key: string): Promise<string | null>
  set(key: string, value: string, secondsToken: "EX", seconds: number): Promise<unknown>
  ping(): Promise<string>
}

export class RedisResultCache implements ResultCache {
  constructor(private readonly redis: ResultCacheCommands) {}

  async get(fingerprint: string): Promise<string | null> {
    try {
      return await this.redis.get(resultKey(fingerprint))
    } catch (err) {
      throw new StorageError("Result cache read failed", "storage:cache", { cause: err })
    }
  }

  async put(fingerprint: string, locator: string, ttlSeconds: number): Promise<void> {
    assertTtl(ttlSeconds)
    try {
      await this.redis.set(resultKey(fingerprint), locator, "EX", ttlSeconds)
    } catch (err) {
      throw new StorageError("Result cache write failed", "storage:cache", { cause: err })
    }
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === "PONG"
    } catch {
      return false
    }
  }
}

export interface MemoryResultCacheOptions {
  /** Milliseconds since epoch */
  now?: () => number
}

/**
 * In-process cache for standalone mode and tests.
 */
export class MemoryResultCache implements ResultCache {
  private readonly entries = new Map<string, { locator: string; expiresAt: number }>()
  private readonly now: () => number

  constructor(options: MemoryResultCacheOptions = {}) {
    this.now = options.now ?? Date.now
  }

  async get(fingerprint: string): Promise<string | null> {
    const entry = this.entries.get(fingerprint)
    if (!entry) return null
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(fingerprint)
      return null
    }
    return entry.locator
  }

  async put(fingerprint: string, locator: string, ttlSeconds: number): Promise<void> {
    assertTtl(ttlSeconds)
    this.entries.set(fingerprint, { locator, expiresAt: this.now() + ttlSeconds * 1000 })
  }

  async ping(): Promise<boolean> {
    return true
  }

  get size(): number {
    return this.entries.size
  }
}
