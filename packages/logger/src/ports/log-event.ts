import type { OffsetMinutes } from "@sectionlog/clock"
import type { Trace } from "../core/stack/trace"
import type { LogLevel } from "./log-level"

export type LogTimestamp = Readonly<{
  instant: Date

  /** Offset the timestamp is rendered in; `0` for loggers forcing UTC. */
  utcOffsetMinutes: OffsetMinutes
}>

/**
 * One log occurrence. Created once per accepted call and never mutated.
 */
export interface LogEvent {
  /** Name of the logger section the event was created in. */
  readonly section: string
  readonly level: LogLevel
  readonly timestamp: LogTimestamp

  /** A brief, trimmed summary. */
  readonly body: string

  /** Optional trimmed, possibly multi-line detail. */
  readonly description: string | undefined

  /**
   * Value attached as the error. Not a standardized type: anything that
   * was thrown may end up here.
   */
  readonly error: unknown

  readonly stack: Trace | undefined

  /**
   * Whether continuation lines align under the timestamp column.
   * Copied from the logger when the event is created.
   */
  readonly indentation: boolean

  /** Rendered output with ANSI color codes. */
  readonly generatedMessageColored: string

  /** {@link generatedMessageColored} with every color code removed. */
  readonly generatedMessage: string
}

/** A stack either already parsed or as produced by `Error.prototype.stack`. */
export type StackInput = Trace | string

export type DescriptionAttachments = {
  description?: string | undefined
}

export type ErrorAttachments = DescriptionAttachments & {
  error?: unknown
  stack?: StackInput | undefined
}
