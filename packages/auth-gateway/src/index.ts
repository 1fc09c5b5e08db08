export type { AttemptOutcome, AttemptPolicy, AttemptResult, AttemptVerdict } from "./attempts.js"
export { attemptOnce, isRetryableStatus, nextVerdict, runAttempts } from "./attempts.js"
export type { AuthGatewayConfig, UpstreamResponse } from "./client.js"
export { AuthGatewayClient, parseBearerToken } from "./client.js"
export type { AuthDecision, AuthReason, FallbackMode, FetchLike, Principal } from "./types.js"
export { PrincipalSchema } from "./types.js"
