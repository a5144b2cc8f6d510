import type { LogEvent } from "./log-event"

/**
 * A unit of delivery for accepted log events.
 *
 * @remarks
 * A handler instance belongs to at most one logger at a time. `dispose` is
 * called when the handler is detached or its logger is disposed and must be
 * idempotent.
 *
 * @example
 * ```ts
 * class BodyPrinter implements LogHandler {
 *   handle(event: LogEvent): void {
 *     console.log(event.body)
 *   }
 * }
 *
 * const logger = createLogger("example", { handlers: [new BodyPrinter()] })
 * ```
 */
export interface LogHandler {
  handle(event: LogEvent): void
  dispose?(): void
}
