export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels (higher = more severe).
 */
export const LogLevels = {
  Trace: 10,
  Debug: 20,
  Info: 30,
  Warn: 40,
  Error: 50,
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

export function isLogLevelName(value: string): value is LogLevelName {
  return logLevelNames.some((name) => name === value)
}

const levelByNumber = new Map<number, LogLevelName>([
  [LogLevels.Trace, "trace"],
  [LogLevels.Debug, "debug"],
  [LogLevels.Info, "info"],
  [LogLevels.Warn, "warn"],
  [LogLevels.Error, "error"],
  [LogLevels.Fatal, "fatal"],
])

export function levelNameOf(level: number): LogLevelName | undefined {
  return levelByNumber.get(level)
}
