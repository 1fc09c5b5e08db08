/**
 * Error taxonomy and classification helpers.
 *
 * Every failure surfaced to a caller is an {@link AppError} carrying a
 * category, so responses can tell caller-fixable input apart from transient
 * infrastructure trouble and from permanent failures on a specific input.
 */

export type ErrorCategory = "caller" | "transient" | "permanent"

export interface ErrorBody {
  message: string
  code: string
  category: ErrorCategory
}

export abstract class AppError extends Error {
  abstract readonly category: ErrorCategory
  abstract readonly status: number

  constructor(
    message: string,
    readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = new.target.name
  }

  toJSON(): ErrorBody {
    return { message: this.message, code: this.code, category: this.category }
  }
}

/**
 * Bad input shape, type, size, unknown operation or out-of-range parameter.
 * Never retried.
 */
export class ValidationError extends AppError {
  readonly category = "caller"
  readonly status: number

  constructor(message: string, code = "validation:invalid", status = 400) {
    super(message, code)
    this.status = status
  }
}

/**
 * The authorization service could not produce a definitive answer.
 */
export class UpstreamAuthError extends AppError {
  readonly category = "transient"
  readonly status = 503

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "auth:unavailable", options)
  }
}

/**
 * The request was not authorized. A definitive denial is the caller's to fix;
 * a restrictive fallback is transient since the service may come back.
 */
export class AuthorizationDeniedError extends AppError {
  readonly category: ErrorCategory
  readonly status: number

  constructor(readonly reason: "denied" | "fallback-restrictive") {
    super(
      reason === "denied"
        ? "Authentication required: token is missing, invalid or expired"
        : "Authorization service unavailable; request rejected by fallback policy",
      `auth:${reason}`,
    )
    this.category = reason === "denied" ? "caller" : "transient"
    this.status = reason === "denied" ? 401 : 503
  }
}

/**
 * A named operation failed on the given bytes. Retrying without changing the
 * input reproduces the failure.
 */
export class TransformError extends AppError {
  readonly category = "permanent"
  readonly status = 422

  constructor(
    readonly operation: string,
    readonly step: number,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Operation "${operation}" (step ${step + 1}) failed: ${reason}`, `transform:${operation}`, options)
  }
}

/**
 * Cache, ledger or blob store unavailable.
 */
export class StorageError extends AppError {
  readonly category = "transient"
  readonly status = 503

  constructor(message: string, code = "storage:unavailable", options?: { cause?: unknown }) {
    super(message, code, options)
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError
}

/**
 * Map any thrown value to the structured body returned to callers.
 */
export function toErrorBody(err: unknown): { status: number; body: ErrorBody } {
  if (isAppError(err)) {
    return { status: err.status, body: err.toJSON() }
  }
  return {
    status: 500,
    body: { message: "Internal server error", code: "internal:error", category: "transient" },
  }
}

// ---------------------------------------------------------------------------
// Network error classification
// ---------------------------------------------------------------------------

/**
 * Transient network error codes that indicate temporary failures.
 */
const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ENOTFOUND",
  "ETIMEDOUT",
  "ESOCKETTIMEDOUT",
  "ECONNABORTED",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EAI_AGAIN",
  // Undici (Node's native fetch)
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_DNS_RESOLVE_FAILED",
  "UND_ERR_CONNECT",
  "UND_ERR_SOCKET",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
])

/**
 * Extract a Node.js style `code` from an error object.
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object" || !("code" in err)) {
    return undefined
  }
  return typeof err.code === "string" ? err.code : undefined
}

function getErrorCause(err: unknown): unknown {
  if (!err || typeof err !== "object" || !("cause" in err)) {
    return undefined
  }
  return err.cause
}

/**
 * Checks if an error is an AbortError (intentional cancellation or a timeout
 * enforced through an AbortSignal).
 */
export function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== "object") {
    return false
  }
  const name = "name" in err ? String(err.name) : ""
  if (name === "AbortError" || name === "TimeoutError") {
    return true
  }
  const message = "message" in err && typeof err.message === "string" ? err.message : ""
  return message === "This operation was aborted"
}

/**
 * Checks if an error is a transient network error, walking the cause chain.
 */
export function isTransientNetworkError(err: unknown): boolean {
  if (!err) {
    return false
  }

  const code = extractErrorCode(err)
  if (code && TRANSIENT_NETWORK_CODES.has(code)) {
    return true
  }

  // "fetch failed" TypeError from undici
  if (err instanceof TypeError && err.message === "fetch failed") {
    const cause = getErrorCause(err)
    return cause ? isTransientNetworkError(cause) : true
  }

  const cause = getErrorCause(err)
  if (cause && cause !== err) {
    return isTransientNetworkError(cause)
  }

  if (err instanceof AggregateError && err.errors.length) {
    return err.errors.some(e => isTransientNetworkError(e))
  }

  return false
}

/**
 * Format an error for logging.
 */
export function formatUncaughtError(err: unknown): string {
  if (err instanceof Error) {
    return err.stack ?? err.message
  }
  if (typeof err === "string") {
    return err
  }
  try {
    return JSON.stringify(err)
  } catch {
    return String(err)
  }
}
