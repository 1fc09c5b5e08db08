import {
  isAbortError,
  isTransientNetworkError,
  retryAsync,
  type RetryInfo,
  ValidationError,
} from "@pixelforge/shared"
import { type SupportedMimeType, validateImageBuffer } from "@pixelforge/images"

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>

export interface RemoteFetchOptions {
  timeoutMs: number
  /** Total attempts, including the first */
  attempts: number
  maxBytes: number
  fetch?: FetchLike
  onRetry?: (info: RetryInfo) => void
}

export interface RemoteImage {
  bytes: Buffer
  mimeType: SupportedMimeType
  url: string
}

class RetryableStatusError extends Error {
  constructor(readonly status: number) {
    super(`Remote server answered HTTP ${status}`)
    this.name = "RetryableStatusError"
  }
}

/**
 * Only absolute http(s) URLs are fetched.
 */
export function parseImageUrl(raw: string): URL {
  let url: URL
  try {
    url = new URL(raw.trim())
  } catch {
    throw new ValidationError("Invalid image URL", "validation:url")
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ValidationError("Image URL must use http or https", "validation:url")
  }
  return url
}

async function fetchOnce(url: URL, options: RemoteFetchOptions, fetchImpl: FetchLike): Promise<RemoteImage> {
  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs)
  try {
    const response = await fetchImpl(url.toString(), { method: "GET", redirect: "follow", signal: controller.signal })

    if (!response.ok) {
      if (response.status === 408 || response.status === 429 || response.status >= 500) {
        throw new RetryableStatusError(response.status)
      }
      throw new ValidationError(`Could not download image: HTTP ${response.status}`, "validation:url-fetch")
    }

    const contentType = response.headers.get("content-type")
    if (contentType && !contentType.toLowerCase().startsWith("image/")) {
      throw new ValidationError("URL does not point to an image", "validation:type")
    }

    const declaredLength = Number(response.headers.get("content-length"))
    if (Number.isFinite(declaredLength) && declaredLength > options.maxBytes) {
      throw new ValidationError(
        `File too large. Maximum size: ${(options.maxBytes / (1024 * 1024)).toFixed(1)}MB`,
        "validation:size",
        413,
      )
    }

    const bytes = Buffer.from(await response.arrayBuffer())
    const mimeType = validateImageBuffer(bytes, options.maxBytes)
    return { bytes, mimeType, url: url.toString() }
  } finally {
    clearTimeout(timeoutId)
  }
}

/**
 * Download an image server-side. Timeouts, transient network errors and
 * 408/429/5xx answers are retried with backoff; everything else fails at once.
 */
export async function fetchRemoteImage(rawUrl: string, options: RemoteFetchOptions): Promise<RemoteImage> {
  const url = parseImageUrl(rawUrl)
  const fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))

  try {
    return await retryAsync(() => fetchOnce(url, options, fetchImpl), {
      attempts: options.attempts,
      minDelayMs: 200,
      maxDelayMs: 2_000,
      jitter: 0.2,
      label: "remote-image",
      shouldRetry: err => err instanceof RetryableStatusError || isAbortError(err) || isTransientNetworkError(err),
      onRetry: options.onRetry,
    })
  } catch (err) {
    if (err instanceof ValidationError) throw err
    const detail = isAbortError(err) ? `timed out after ${options.timeoutMs}ms` : err instanceof Error ? err.message : String(err)
    throw new ValidationError(`Could not download image from URL: ${detail}`, "validation:url-fetch")
  }
}
