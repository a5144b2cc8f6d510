import type { LogEvent, LogTimestamp, StackInput } from "../ports/log-event"
import type { LogLevel } from "../ports/log-level"
import { renderColored, stripAnsi } from "./render/render"
import { Trace } from "./stack/trace"

export type LogEventInit = Readonly<{
  section: string
  level: LogLevel
  timestamp: LogTimestamp
  body: string
  description?: string | undefined
  error?: unknown
  stack?: StackInput | undefined
  indentation: boolean
}>

class FrozenLogEvent implements LogEvent {
  readonly section: string
  readonly level: LogLevel
  readonly timestamp: LogTimestamp
  readonly body: string
  readonly description: string | undefined
  readonly error: unknown
  readonly stack: Trace | undefined
  readonly indentation: boolean

  constructor(init: LogEventInit) {
    this.section = init.section
    this.level = init.level
    this.timestamp = Object.freeze({
      instant: new Date(init.timestamp.instant.getTime()),
      utcOffsetMinutes: init.timestamp.utcOffsetMinutes,
    })
    this.body = init.body.trim()
    this.description = init.description?.trim()
    this.error = init.error
    this.stack = toTrace(init.stack)
    this.indentation = init.indentation

    Object.freeze(this)
  }

  get generatedMessageColored(): string {
    return renderColored(this)
  }

  get generatedMessage(): string {
    return stripAnsi(this.generatedMessageColored)
  }
}

/**
 * Builds an immutable event. The body and description are trimmed and a
 * stack string is parsed into a {@link Trace}.
 */
export function createLogEvent(init: LogEventInit): LogEvent {
  return new FrozenLogEvent(init)
}

function toTrace(stack: StackInput | undefined): Trace | undefined {
  if (stack === undefined) return undefined

  return typeof stack === "string" ? Trace.from(stack) : stack
}
