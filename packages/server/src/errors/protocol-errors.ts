import { BaseError, ErrorCodes } from "@respire/errors"

/** The client sent bytes that can never become a valid request. */
export class ProtocolError extends BaseError<typeof ErrorCodes.ProtocolError> {
  constructor(bufferedBytes: number) {
    super("Malformed request frame", {
      code: ErrorCodes.ProtocolError,
      context: { bufferedBytes },
    })
  }
}

/** A request frame grew past the configured limit before it completed. */
export class FrameTooLargeError extends BaseError<typeof ErrorCodes.FrameTooLarge> {
  constructor(bufferedBytes: number, maxFrameBytes: number) {
    super(`Request frame exceeds ${maxFrameBytes} bytes`, {
      code: ErrorCodes.FrameTooLarge,
      context: { bufferedBytes, maxFrameBytes },
    })
  }
}

export class ServerAlreadyStartedError extends BaseError<typeof ErrorCodes.ServerAlreadyStarted> {
  constructor() {
    super("Server already started", { code: ErrorCodes.ServerAlreadyStarted })
  }
}

export class StartupFailedError extends BaseError<typeof ErrorCodes.StartupFailed> {
  constructor(failedHooks: string[], timedOut: boolean, cause?: unknown) {
    super(timedOut ? "Startup timed out" : "Startup hook failed", {
      code: ErrorCodes.StartupFailed,
      context: { failedHooks, timedOut },
      cause,
      isOperational: false,
    })
  }
}
