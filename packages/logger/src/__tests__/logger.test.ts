import { afterEach, describe, expect, it, vi } from "vitest"
import { createLogger, createMemorySink, isLogLevel } from "../index.js"

describe("createLogger", () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it("should write structured entries to the sink", () => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2026-01-02T03:04:05.000Z"))
    const sink = createMemorySink()
    const logger = createLogger({ component: "orchestrator", sink })

    logger.info("cache hit", { fingerprint: "abc" })

    expect(sink.entries).toEqual([
      {
        level: "info",
        component: "orchestrator",
        message: "cache hit",
        context: { fingerprint: "abc" },
        timestamp: "2026-01-02T03:04:05.000Z",
      },
    ])
  })

  it("should drop entries below the threshold", () => {
    const sink = createMemorySink()
    const logger = createLogger({ component: "api", level: "warn", sink })

    logger.debug("noise")
    logger.info("still noise")
    logger.warn("kept")

    expect(sink.entries.map(e => e.message)).toEqual(["kept"])
  })

  it("should describe attached errors", () => {
    const sink = createMemorySink()
    const logger = createLogger({ component: "cache", sink })

    logger.error("redis unavailable", new TypeError("boom"))
    logger.warn("odd value", 42)

    expect(sink.entries[0].error).toBe("TypeError: boom")
    expect(sink.entries[1].error).toBe("42")
  })

  it("should omit empty context", () => {
    const sink = createMemorySink()
    createLogger({ component: "x", sink }).info("hello", {})
    expect(sink.entries[0]).not.toHaveProperty("context")
  })

  it("should prefix child components", () => {
    const sink = createMemorySink()
    createLogger({ component: "api", sink }).child("auth").info("validated")
    expect(sink.entries[0].component).toBe("api:auth")
  })
})

describe("isLogLevel", () => {
  it("should accept known levels only", () => {
    expect(isLogLevel("debug")).toBe(true)
    expect(isLogLevel("verbose")).toBe(false)
  })
})
