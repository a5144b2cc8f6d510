import type { LogHandler } from "../../ports/handler"
import type { LogEvent } from "../../ports/log-event"
import type { ConsoleWriter } from "./console-handler"

/**
 * Bare `level> body` lines. Meant for quick scripts and examples, not for
 * production output.
 */
export class SimpleConsoleHandler implements LogHandler {
  constructor(private readonly deps: { console?: ConsoleWriter } = {}) {}

  handle(event: LogEvent): void {
    const writer = this.deps.console ?? globalThis.console

    writer.log(`${event.level.name.toLowerCase().padEnd(5)}> ${event.body}`)
  }
}
