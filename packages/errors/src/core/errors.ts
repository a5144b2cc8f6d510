import { BaseError, type BaseErrorOptions } from "./base-error"
import { toDisplayString } from "./to-display-string"

export type KindErrorOptions = Omit<BaseErrorOptions, "code">

/**
 * Raised for invalid setup: a malformed section name, a handler attached
 * twice, conflicting handler options, or a configuration source that fails
 * validation.
 */
export class ConfigurationError extends BaseError<"configuration_invalid"> {
  constructor(message: string, options: KindErrorOptions = {}) {
    super(message, { isOperational: false, ...options, code: "configuration_invalid" })
  }
}

/**
 * Raised when a backing resource (a log file, its lock) cannot be opened,
 * locked or written.
 */
export class ResourceError extends BaseError<"resource_unavailable"> {
  constructor(message: string, options: KindErrorOptions = {}) {
    super(message, { ...options, code: "resource_unavailable" })
  }
}

export type DeliveryFailure = Readonly<{
  /** Position of the failing handler in attachment order at dispatch time. */
  handlerIndex: number
  error: unknown
}>

/**
 * Raised after a dispatch in which one or more handlers threw.
 *
 * Every handler still received the event; `cause` is the first failure.
 */
export class DeliveryError extends BaseError<"delivery_failed"> {
  readonly failures: readonly DeliveryFailure[]

  constructor(failures: readonly DeliveryFailure[], options: KindErrorOptions = {}) {
    const [first] = failures

    super(describeFailures(failures), {
      ...options,
      code: "delivery_failed",
      cause: first?.error,
      context: {
        ...options.context,
        handlerIndexes: failures.map((f) => f.handlerIndex),
      },
    })

    this.failures = Object.freeze([...failures])
  }
}

function describeFailures(failures: readonly DeliveryFailure[]): string {
  const [first] = failures

  if (failures.length === 1 && first) {
    return `Log handler at index ${first.handlerIndex} failed: ${messageOf(first.error)}`
  }

  return `${failures.length} log handlers failed while handling an event`
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : toDisplayString(err)
}
