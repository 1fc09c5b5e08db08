import { createLogger, type Logger } from "@pixelforge/logger"
import { UpstreamAuthError } from "@pixelforge/shared"
import { type AttemptOutcome, describeAttempt, runAttempts } from "./attempts.js"
import { type AuthDecision, type FallbackMode, type FetchLike, PrincipalSchema } from "./types.js"

export interface AuthGatewayConfig {
  /** Base URL of the authorization service, without trailing slash */
  baseUrl: string
  /** Per-attempt timeout */
  timeoutMs: number
  /** Attempts after the first on timeout, network error, 408, 429 or 5xx */
  maxRetries: number
  fallbackMode: FallbackMode
  fetch?: FetchLike
  logger?: Logger
}

/**
 * Status and body relayed from the authorization service.
 */
export interface UpstreamResponse {
  status: number
  body: unknown
}

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i

/**
 * Extract the token from an `Authorization: Bearer <token>` header.
 */
export function parseBearerToken(header: string | null | undefined): string | null {
  if (!header) return null
  const match = header.trim().match(BEARER_PATTERN)
  return match ? match[1] : null
}

/**
 * Client for the external authorization service.
 *
 * `authorize` never throws: when the service cannot give an answer within
 * the retry budget, the configured fallback policy decides. A definitive
 * denial is never overridden by the fallback.
 */
export class AuthGatewayClient {
  private readonly fetchImpl: FetchLike
  private readonly logger: Logger

  constructor(private readonly config: AuthGatewayConfig) {
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init))
    this.logger = config.logger ?? createLogger({ component: "auth-gateway" })
  }

  get fallbackMode(): FallbackMode {
    return this.config.fallbackMode
  }

  async authorize(authorizationHeader: string | null | undefined): Promise<AuthDecision> {
    const token = parseBearerToken(authorizationHeader)
    if (!token) {
      return { allowed: false, reason: "denied", attempts: 0 }
    }

    const outcome = await this.send("/auth/me", { method: "GET", headers: { Authorization: `Bearer ${token}` } })

    if (!outcome.settled) {
      const allowed = this.config.fallbackMode === "permissive"
      this.logger.warn("Authorization service unreachable, applying fallback policy", undefined, {
        attempts: outcome.attempts,
        last: describeAttempt(outcome.last),
        fallbackMode: this.config.fallbackMode,
      })
      return {
        allowed,
        reason: allowed ? "fallback-permissive" : "fallback-restrictive",
        attempts: outcome.attempts,
      }
    }

    if (outcome.status < 200 || outcome.status >= 300) {
      return { allowed: false, reason: "denied", attempts: outcome.attempts }
    }

    const principal = PrincipalSchema.safeParse(outcome.body)
    if (!principal.success) {
      // A 2xx without an identity is not a validation
      this.logger.warn("Authorization service returned no principal", undefined, { status: outcome.status })
      return { allowed: false, reason: "denied", attempts: outcome.attempts }
    }
    return { allowed: true, reason: "validated", attempts: outcome.attempts, principal: principal.data }
  }

  me(authorizationHeader: string | null | undefined): Promise<UpstreamResponse> {
    const headers: Record<string, string> = {}
    if (authorizationHeader) headers.Authorization = authorizationHeader
    return this.relay("/auth/me", { method: "GET", headers })
  }

  login(body: unknown): Promise<UpstreamResponse> {
    return this.relay("/auth/login", jsonPost(body))
  }

  refresh(body: unknown): Promise<UpstreamResponse> {
    return this.relay("/auth/refresh", jsonPost(body))
  }

  logout(authorizationHeader: string | null | undefined, body: unknown): Promise<UpstreamResponse> {
    const init = jsonPost(body)
    if (authorizationHeader) init.headers = { ...init.headers, Authorization: authorizationHeader }
    return this.relay("/auth/logout", init)
  }

  private async relay(path: string, init: Omit<RequestInit, "headers"> & { headers: Record<string, string> }): Promise<UpstreamResponse> {
    const outcome = await this.send(path, init)
    if (!outcome.settled) {
      throw new UpstreamAuthError(
        `Authorization service unavailable after ${outcome.attempts} attempt(s): ${describeAttempt(outcome.last)}`,
      )
    }
    return { status: outcome.status, body: outcome.body }
  }

  private send(path: string, init: RequestInit): Promise<AttemptOutcome> {
    return runAttempts(
      this.fetchImpl,
      `${this.config.baseUrl}${path}`,
      init,
      { timeoutMs: this.config.timeoutMs, maxRetries: this.config.maxRetries },
      (attempt, result) => {
        this.logger.debug("Retrying authorization service", { path, attempt, last: describeAttempt(result) })
      },
    )
  }
}

function jsonPost(body: unknown): Omit<RequestInit, "headers"> & { headers: Record<string, string> } {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body ?? {}),
  }
}
