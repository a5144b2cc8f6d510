export const logLevelNames = ["debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

export type LogLevel = Readonly<{
  key: LogLevelName

  /** Display name used in rendered output. */
  name: string

  /** SGR color code used for the level in colored output. */
  ansiColor: number

  /**
   * Severity rank used for ordering and filtering (higher = more severe).
   * Levels are compared by this value only.
   */
  importance: number

  /** Whether console output for this level defaults to stderr. */
  useStderr: boolean
}>

/**
 * The closed set of severity levels.
 */
export const LogLevels: Readonly<Record<LogLevelName, LogLevel>> = Object.freeze({
  /** Information not important to the normal user. Hidden by default. */
  debug: Object.freeze({
    key: "debug",
    name: "Debug",
    ansiColor: 90,
    importance: 0,
    useStderr: false,
  }),
  /** Certain, non-important events. */
  info: Object.freeze({
    key: "info",
    name: "Info",
    ansiColor: 94,
    importance: 1,
    useStderr: false,
  }),
  /** Events that do not affect the experience in any severe way. */
  warn: Object.freeze({
    key: "warn",
    name: "Warn",
    ansiColor: 93,
    importance: 2,
    useStderr: false,
  }),
  /** Failures that hinder certain features but not the product as a whole. */
  error: Object.freeze({
    key: "error",
    name: "Error",
    ansiColor: 91,
    importance: 3,
    useStderr: true,
  }),
  /** Severe failures that drastically limit the application. */
  fatal: Object.freeze({
    key: "fatal",
    name: "Fatal",
    ansiColor: 91,
    importance: 4,
    useStderr: true,
  }),
})

export function isLogLevelName(value: unknown): value is LogLevelName {
  return logLevelNames.some((name) => name === value)
}

export function resolveLogLevel(level: LogLevelName | LogLevel): LogLevel {
  return typeof level === "string" ? LogLevels[level] : level
}

/** Whether `level` is at least as severe as `min`. */
export function isAtLeast(level: LogLevel, min: LogLevel): boolean {
  return level.importance >= min.importance
}
