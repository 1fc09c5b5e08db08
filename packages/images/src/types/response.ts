/**
 * HResponse pattern for type-safe error handling
 * Inspired by Rust's Result type
 */
export interface ErrorShape {
  message: string
  code: string
}

export type Result<T, E extends ErrorShape = ErrorShape> = { data: T; error: null } | { data: null; error: E }

export type HResponse<T, E extends ErrorShape = ErrorShape> = Promise<Result<T, E>>

/**
 * Response builders
 */
export class Rs {
  static data<T>(data: T): { data: T; error: null } {
    return { data, error: null }
  }

  static error(message: string, code: string): { data: null; error: ErrorShape } {
    return {
      data: null,
      error: { message, code },
    }
  }

  static failure<E extends ErrorShape>(error: E): { data: null; error: E } {
    return { data: null, error }
  }

  static fromError(error: unknown, code: string): { data: null; error: ErrorShape } {
    const message = error instanceof Error ? error.message : String(error)
    return Rs.error(message, code)
  }
}
