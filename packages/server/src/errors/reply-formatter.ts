import { error, type Value } from "@respire/codec"
import { type AppError, type ErrorCode, ErrorCodes, isAppError } from "@respire/errors"

export type ReplyMapping = {
  /**
   * Reply text sent to the client.
   *
   * @remarks
   * Omit it to send the error's own message, for errors whose message is
   * already written for clients (command errors).
   */
  message?: string
}

export interface ReplyMappingsConfig {
  /** Error code to reply text. */
  mappings: Partial<Record<ErrorCode, ReplyMapping>>

  /** Reply for unmapped codes and for values that are not AppErrors. */
  fallback?: string
}

export type ReplyFormatter = (error: unknown) => Value

export const INTERNAL_ERROR_REPLY = "ERR internal error"

export const DEFAULT_REPLY_MAPPINGS: ReplyMappingsConfig = {
  mappings: {
    [ErrorCodes.EmptyCommand]: {},
    [ErrorCodes.UnknownCommand]: {},
    [ErrorCodes.WrongArity]: {},
    [ErrorCodes.LockAborted]: { message: "ERR server busy" },
  },
  fallback: INTERNAL_ERROR_REPLY,
}

/**
 * Turn a failure into an `error` reply.
 *
 * @remarks
 * - Mapped `AppError`s use their configured text, or their message
 * - Everything else gets the fallback
 */
export function createReplyFormatter(
  config: ReplyMappingsConfig = DEFAULT_REPLY_MAPPINGS,
): ReplyFormatter {
  const fallback = config.fallback ?? INTERNAL_ERROR_REPLY

  return (err: unknown): Value => {
    if (isAppError(err)) {
      const mapping = config.mappings[err.code]

      if (mapping) return error(singleLine(mapping.message ?? err.message))
    }

    return error(singleLine(fallback))
  }
}

export function isMappedError(config: ReplyMappingsConfig, err: unknown): err is AppError {
  return isAppError(err) && config.mappings[err.code] !== undefined
}

function singleLine(text: string): string {
  return text.replace(/[\r\n]+/g, " ")
}
