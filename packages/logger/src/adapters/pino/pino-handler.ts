import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import { renderStack } from "../../core/render/render"
import type { LogHandler } from "../../ports/handler"
import type { LogEvent } from "../../ports/log-event"

export type PinoHandlerDeps = {
  /**
   * Existing pino logger to forward to (inherits its config).
   * When provided, `destination` and options are ignored.
   */
  base?: PinoLoggerBase

  /** Destination stream for a pino logger created by the handler. */
  destination?: DestinationStream
}

export type PinoHandlerOptions = {
  /**
   * Pretty-print through `pino-pretty` instead of emitting JSON lines.
   * Only applies when the handler creates its own pino logger without a
   * destination.
   */
  prettify?: boolean
}

/**
 * Forwards events to pino as structured records: the body as `msg`, plus
 * `section`, `description`, `err` and `stack` when present.
 */
export class PinoHandler implements LogHandler {
  protected readonly logger: PinoLoggerBase

  constructor(deps: PinoHandlerDeps = {}, opts: PinoHandlerOptions = {}) {
    this.logger = deps.base ?? createBase(deps.destination, opts)
  }

  handle(event: LogEvent): void {
    this.logger[event.level.key](toPinoPayload(event), event.body)
  }

  dispose(): void {
    this.logger.flush()
  }
}

function createBase(
  destination: DestinationStream | undefined,
  opts: PinoHandlerOptions,
): PinoLoggerBase {
  const pinoOpts: PinoOptions = {
    level: "debug",
    serializers: { err: errWithCause },
    ...(opts.prettify &&
      !destination && {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:yyyy-mm-dd HH:MM:ss o",
            ignore: "hostname,pid",
          },
        },
      }),
  }

  return destination ? pino(pinoOpts, destination) : pino(pinoOpts)
}

function toPinoPayload(event: LogEvent): Record<string, unknown> {
  const stack = event.stack ? renderStack(event.stack) : ""

  return {
    section: event.section,
    ...(event.description !== undefined &&
      event.description.length > 0 && { description: event.description }),
    ...(event.error !== undefined && event.error !== null && { err: event.error }),
    ...(stack.length > 0 && { stack }),
  }
}

export function createPinoHandler(
  deps: PinoHandlerDeps = {},
  opts: PinoHandlerOptions = {},
): LogHandler {
  return new PinoHandler(deps, opts)
}
