import type { LogEvent } from "./log-event"

/**
 * Decides, before delivery, whether an event is kept. Returning `false`
 * drops the event: no later filter runs, no handler sees it and it is not
 * recorded in the logger's history.
 *
 * @example
 * ```ts
 * const happyOnly = createFilter((event) => event.body.includes("happy"))
 * ```
 */
export interface LogFilter {
  handle(event: LogEvent): boolean
}
