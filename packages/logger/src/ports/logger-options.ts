import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior: which log levels are emitted
 * and whether output is rendered for humans or machines.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Example: "info" will suppress "trace" and "debug" logs.
   */
  level: LogLevelName

  /**
   * Pretty-print log output for local development.
   * Production deployments should keep structured (JSON) output.
   */
  prettify?: boolean
}
