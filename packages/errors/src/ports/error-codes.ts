/**
 * Codes raised across the respire packages. Adapters may add their own,
 * but these are the ones other packages branch on.
 */
export const ErrorCodes = {
  Unknown: "unknown",
  InvalidValue: "invalid_value",
  ProtocolError: "protocol_error",
  FrameTooLarge: "frame_too_large",
  EmptyCommand: "empty_command",
  UnknownCommand: "unknown_command",
  WrongArity: "wrong_arity",
  InvalidConfig: "invalid_config",
  LockAborted: "lock_aborted",
  ServerAlreadyStarted: "server_already_started",
  StartupFailed: "startup_failed",
} as const

export type KnownErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]
