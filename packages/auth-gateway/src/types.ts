import { z } from "zod"

export type FallbackMode = "permissive" | "restrictive"

export type AuthReason = "validated" | "fallback-permissive" | "fallback-restrictive" | "denied"

/**
 * Identity returned by `GET /auth/me`. Only `user_id` is required; anything
 * else the service sends is kept.
 */
export const PrincipalSchema = z
  .object({
    user_id: z.union([z.string(), z.number()]).transform(String),
    email: z.string().optional(),
    roles: z.array(z.string()).optional(),
  })
  .passthrough()

export type Principal = z.infer<typeof PrincipalSchema>

/**
 * Outcome of authorizing a single request. Computed per request, never
 * cached.
 */
export interface AuthDecision {
  allowed: boolean
  reason: AuthReason
  /** Requests actually sent to the authorization service */
  attempts: number
  principal?: Principal
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>
