/**
 * @pixelforge/shared
 *
 * Error taxonomy and retry helpers used across the monorepo.
 */

export {
  AppError,
  AuthorizationDeniedError,
  type ErrorBody,
  type ErrorCategory,
  extractErrorCode,
  formatUncaughtError,
  isAbortError,
  isAppError,
  isTransientNetworkError,
  StorageError,
  toErrorBody,
  TransformError,
  UpstreamAuthError,
  ValidationError,
} from "./errors.js"
export { type RetryConfig, type RetryInfo, type RetryOptions, resolveRetryConfig, retryAsync, sleepWithAbort } from "./retry.js"
