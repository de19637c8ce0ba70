export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (keys, lengths, offsets) so callers
 * never have to parse messages.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /** `true` if retrying might succeed */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (`true`) versus programmer error (`false`).
   *
   * @remarks
   * - Operational: malformed client input, unknown command, bad configuration.
   * - Non-operational: broken invariant inside the codec or the store.
   *
   * A connection may keep serving after an operational error.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON.stringify-safe error shape for logs and diagnostics.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
