export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels, matching pino's numbering (higher = more severe).
 */
export const LogLevels = {
  /** Finest-grained diagnostic information. */
  Trace: 10,
  /** Cache hits, writes and deletes. */
  Debug: 20,
  /** Sessions opened and closed, remote fetches. */
  Info: 30,
  /** Swallowed teardown failures, stale lock takeovers. */
  Warn: 40,
  /** Errors that fail the current operation. */
  Error: 50,
  /** Severe errors after which the process may be unable to continue. */
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

const namesBySeverity: Readonly<Record<number, LogLevelName>> = {
  [LogLevels.Trace]: "trace",
  [LogLevels.Debug]: "debug",
  [LogLevels.Info]: "info",
  [LogLevels.Warn]: "warn",
  [LogLevels.Error]: "error",
  [LogLevels.Fatal]: "fatal",
}

export function levelName(severity: number): LogLevelName | undefined {
  return namesBySeverity[severity]
}
