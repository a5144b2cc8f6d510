import type { LogFilter } from "../ports/filter"
import type { LogHandler } from "../ports/handler"
import type { LogEvent } from "../ports/log-event"

/**
 * Wraps a callback as a handler. `dispose`, when given, runs at most once.
 *
 * @example
 * ```ts
 * logger.attach(createHandler((event) => lines.push(event.generatedMessage)))
 * ```
 */
export function createHandler(
  handle: (event: LogEvent) => void,
  dispose?: () => void,
): LogHandler {
  if (!dispose) return { handle }

  let disposed = false

  return {
    handle,
    dispose() {
      if (disposed) return
      disposed = true
      dispose()
    },
  }
}

export function createFilter(predicate: (event: LogEvent) => boolean): LogFilter {
  return { handle: predicate }
}
