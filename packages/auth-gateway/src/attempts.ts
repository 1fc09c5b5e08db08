import { isAbortError } from "@pixelforge/shared"
import type { FetchLike } from "./types.js"

/**
 * Result of one request to the authorization service.
 */
export type AttemptResult =
  | { kind: "response"; status: number; body: unknown }
  | { kind: "timeout" }
  | { kind: "network-error"; error: unknown }

/**
 * - `accept`: 2xx
 * - `reject`: a definitive answer (401, 403, any other non-retryable status)
 * - `retry`: transient failure with attempts left
 * - `give-up`: transient failure with no attempts left
 */
export type AttemptVerdict = "accept" | "reject" | "retry" | "give-up"

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500
}

/**
 * Transition of the attempt state machine. `attempt` is 1-based; `maxAttempts`
 * is one more than the configured retries.
 */
export function nextVerdict(result: AttemptResult, attempt: number, maxAttempts: number): AttemptVerdict {
  if (result.kind === "response") {
    const { status } = result
    if (status >= 200 && status < 300) return "accept"
    if (!isRetryableStatus(status)) return "reject"
  }
  return attempt < maxAttempts ? "retry" : "give-up"
}

export interface AttemptPolicy {
  timeoutMs: number
  maxRetries: number
}

export type AttemptOutcome =
  | { settled: true; status: number; body: unknown; attempts: number }
  | { settled: false; last: AttemptResult; attempts: number }

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text()
  if (!text) return null
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}

/**
 * One request with a hard timeout covering both headers and body. Never
 * throws: every failure becomes an AttemptResult.
 */
export async function attemptOnce(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<AttemptResult> {
  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
  try {
    const response = await fetchImpl(url, { ...init, signal: controller.signal })
    return { kind: "response", status: response.status, body: await readBody(response) }
  } catch (error) {
    if (controller.signal.aborted || isAbortError(error)) {
      return { kind: "timeout" }
    }
    return { kind: "network-error", error }
  } finally {
    clearTimeout(timeoutId)
  }
}

/**
 * Run attempts until one settles (accept or reject) or the budget runs out.
 * No backoff between attempts, so the worst case is
 * `timeoutMs * (1 + maxRetries)`.
 */
export async function runAttempts(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  policy: AttemptPolicy,
  onRetry?: (attempt: number, result: AttemptResult) => void,
): Promise<AttemptOutcome> {
  const maxAttempts = 1 + Math.max(0, policy.maxRetries)
  for (let attempt = 1; ; attempt += 1) {
    const result = await attemptOnce(fetchImpl, url, init, policy.timeoutMs)
    const verdict = nextVerdict(result, attempt, maxAttempts)

    if (result.kind === "response" && (verdict === "accept" || verdict === "reject")) {
      return { settled: true, status: result.status, body: result.body, attempts: attempt }
    }
    if (verdict === "give-up") {
      return { settled: false, last: result, attempts: attempt }
    }
    onRetry?.(attempt, result)
  }
}

export function describeAttempt(result: AttemptResult): string {
  switch (result.kind) {
    case "response":
      return `HTTP ${result.status}`
    case "timeout":
      return "timed out"
    case "network-error":
      return result.error instanceof Error ? result.error.message : String(result.error)
  }
}
