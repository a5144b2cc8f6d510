import type { LogFilter } from "./filter"
import type { LogHandler } from "./handler"
import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Events below this level are dropped before filters run.
   *
   * @default "info"
   */
  level: LogLevelName

  /**
   * Whether continuation lines (descriptions, errors, stacks) align under
   * the timestamp column. Disable for narrow consoles.
   *
   * @default true
   */
  indentation: boolean

  /**
   * Render timestamps in UTC (`+0000`) regardless of the host time zone.
   * Fixed for the lifetime of the logger.
   *
   * @default false
   */
  forceUtc: boolean

  /** Handlers attached, in order, at construction. */
  handlers: readonly LogHandler[]

  /** Filters evaluated, in order, for every event. */
  filters: readonly LogFilter[]
}
