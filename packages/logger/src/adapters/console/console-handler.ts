import type { LogHandler } from "../../ports/handler"
import type { LogEvent } from "../../ports/log-event"

export type ConsoleWriter = Pick<Console, "log">

export type StreamWriter = {
  write(chunk: string): unknown
}

export type ConsoleHandlerDeps = {
  console?: ConsoleWriter
  stdout?: StreamWriter
  stderr?: StreamWriter
}

export type ConsoleHandlerOptions = {
  /**
   * Write the colored rendering instead of the plain one.
   *
   * @default true
   */
  useColors?: boolean

  /**
   * Write to stdout/stderr directly, choosing the stream from the level's
   * `useStderr` flag. Otherwise every line goes through `console.log`.
   *
   * @default false
   */
  useStderr?: boolean
}

export class ConsoleHandler implements LogHandler {
  private readonly useColors: boolean
  private readonly useStderr: boolean

  constructor(
    private readonly deps: ConsoleHandlerDeps = {},
    opts: ConsoleHandlerOptions = {},
  ) {
    this.useColors = opts.useColors ?? true
    this.useStderr = opts.useStderr ?? false
  }

  handle(event: LogEvent): void {
    const text = this.useColors ? event.generatedMessageColored : event.generatedMessage

    if (!this.useStderr) {
      ;(this.deps.console ?? globalThis.console).log(text)
      return
    }

    const stream = event.level.useStderr
      ? (this.deps.stderr ?? process.stderr)
      : (this.deps.stdout ?? process.stdout)

    stream.write(`${text}\n`)
  }
}

export function createConsoleHandler(
  deps: ConsoleHandlerDeps = {},
  opts: ConsoleHandlerOptions = {},
): LogHandler {
  return new ConsoleHandler(deps, opts)
}
