import { type Clock, SystemClock } from "@sectionlog/clock"
import type { LogFilter } from "../ports/filter"
import type { LogHandler } from "../ports/handler"
import type { DescriptionAttachments, ErrorAttachments, LogEvent } from "../ports/log-event"
import {
  isAtLeast,
  type LogLevel,
  type LogLevelName,
  LogLevels,
  resolveLogLevel,
} from "../ports/log-level"
import type { LoggerOptions } from "../ports/logger-options"
import { createHandler } from "./callbacks"
import { FilterChain } from "./filter-chain"
import { HandlerRegistry } from "./handler-registry"
import { createLogEvent } from "./log-event"
import { parseSection } from "./section"

export type LoggerDeps = {
  /** Source of timestamps and UTC offsets. Defaults to the system clock. */
  clock?: Clock
}

export type LoggerState = "active" | "disposed"

/**
 * A named logging session.
 *
 * Every call builds an event, drops it when it is below {@link level} or a
 * filter rejects it, and otherwise records it in {@link logs} and the
 * {@link transcript} before delivering it to each handler in order.
 *
 * @example
 * ```ts
 * const logger = createLogger("billing", {
 *   level: "debug",
 *   handlers: [new ConsoleHandler()],
 * })
 *
 * logger.info("Invoice sent", { description: "id: 42" })
 * logger.error("Payment failed", { error: err, stack: err.stack })
 * logger.dispose()
 * ```
 *
 * @remarks
 * `debug` and `info` take a description only. Untyped callers passing an
 * error or stack to them have those fields ignored.
 */
export class Logger {
  /** Validated, trimmed section name. */
  readonly section: string

  /** Minimum level; applies to calls made after it is changed. */
  level: LogLevelName

  /** Copied into each new event; applies to calls made after it is changed. */
  indentation: boolean

  readonly forceUtc: boolean

  private readonly clock: Clock
  private readonly filterChain: FilterChain
  private readonly registry = new HandlerRegistry()
  private readonly history: LogEvent[] = []
  private generated = ""
  private disposed = false

  /**
   * @throws ConfigurationError for an invalid section or a handler that is
   * already attached elsewhere
   */
  constructor(section: string, opts: Partial<LoggerOptions> = {}, deps: LoggerDeps = {}) {
    this.section = parseSection(section)
    this.level = opts.level ?? "info"
    this.indentation = opts.indentation ?? true
    this.forceUtc = opts.forceUtc ?? false
    this.clock = deps.clock ?? new SystemClock()
    this.filterChain = new FilterChain(opts.filters ?? [])

    this.registry.attachAll(opts.handlers ?? [])
  }

  get state(): LoggerState {
    return this.disposed ? "disposed" : "active"
  }

  /** Every event accepted in this session, in order. */
  get logs(): readonly LogEvent[] {
    return [...this.history]
  }

  /** Plain rendering of {@link logs}, each followed by a newline. */
  get transcript(): string {
    return this.generated
  }

  get handlers(): readonly LogHandler[] {
    return this.registry.handlers
  }

  get filters(): readonly LogFilter[] {
    return this.filterChain.list()
  }

  /**
   * @throws ConfigurationError if the handler is attached anywhere already,
   * or the logger is disposed
   */
  attach(handler: LogHandler): void {
    this.registry.attach(handler)
  }

  /** Detaches and disposes `handler`; `false` if it was not attached. */
  detach(handler: LogHandler): boolean {
    return this.registry.detach(handler)
  }

  /** Detaches and disposes the handler at `index`; out of range is ignored. */
  detachAt(index: number): boolean {
    return this.registry.detachAt(index)
  }

  /**
   * Subscribes a callback to accepted events. Detach the returned handler
   * to unsubscribe.
   */
  listen(callback: (event: LogEvent) => void): LogHandler {
    const handler = createHandler(callback)
    this.attach(handler)
    return handler
  }

  addFilter(filter: LogFilter): void {
    this.filterChain.add(filter)
  }

  removeFilter(filter: LogFilter): boolean {
    return this.filterChain.remove(filter)
  }

  /**
   * Shared path of the level methods. Prefer {@link debug}, {@link info},
   * {@link warn}, {@link error} or {@link fatal}.
   *
   * @throws DeliveryError when a handler throws; the event is already
   * recorded and every other handler has received it
   */
  log(level: LogLevelName | LogLevel, body: string, attachments: ErrorAttachments = {}): void {
    if (this.disposed) return

    const resolved = resolveLogLevel(level)
    const instant = this.clock.now()

    const event = createLogEvent({
      section: this.section,
      level: resolved,
      timestamp: {
        instant,
        utcOffsetMinutes: this.forceUtc ? 0 : this.clock.utcOffsetMinutes(instant),
      },
      body,
      description: attachments.description,
      error: attachments.error,
      stack: attachments.stack,
      indentation: this.indentation,
    })

    if (!isAtLeast(resolved, LogLevels[this.level])) return
    if (!this.filterChain.evaluate(event)) return

    const line = event.generatedMessage

    this.history.push(event)
    this.generated += `${line}\n`

    this.registry.dispatch(event)
  }

  /** Information not important to the normal user. */
  debug(body: string, attachments: DescriptionAttachments = {}): void {
    this.log("debug", body, { description: attachments.description })
  }

  /** Certain, non-important events. */
  info(body: string, attachments: DescriptionAttachments = {}): void {
    this.log("info", body, { description: attachments.description })
  }

  /** Events that do not affect the experience in any severe way. */
  warn(body: string, attachments: ErrorAttachments = {}): void {
    this.log("warn", body, attachments)
  }

  /** Failures that hinder certain features but not the product as a whole. */
  error(body: string, attachments: ErrorAttachments = {}): void {
    this.log("error", body, attachments)
  }

  /** Severe failures that drastically limit the application. */
  fatal(body: string, attachments: ErrorAttachments = {}): void {
    this.log("fatal", body, attachments)
  }

  /**
   * Disposes and detaches every handler. Later log calls are ignored.
   * Idempotent.
   */
  dispose(): void {
    if (this.disposed) return
    this.disposed = true

    this.registry.disposeAll()
  }
}

export function createLogger(
  section: string,
  opts: Partial<LoggerOptions> = {},
  deps: LoggerDeps = {},
): Logger {
  return new Logger(section, opts, deps)
}
