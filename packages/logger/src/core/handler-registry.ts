import {
  ConfigurationError,
  DeliveryError,
  type DeliveryFailure,
  ResourceError,
} from "@sectionlog/errors"
import type { LogHandler } from "../ports/handler"
import type { LogEvent } from "../ports/log-event"

// Single-owner invariant: a handler belongs to at most one registry at a time.
const owners = new WeakMap<LogHandler, HandlerRegistry>()

/**
 * Ordered collection of handlers receiving every accepted event.
 *
 * @remarks
 * Delivery is synchronous and follows attachment order. Each dispatch works
 * on a snapshot of the registry: handlers detached while an event is in
 * flight still receive that event, and handlers attached meanwhile do not.
 *
 * Once {@link disposeAll} has run the registry is closed: `dispatch` becomes
 * a no-op and `attach` throws.
 */
export class HandlerRegistry {
  private readonly entries: LogHandler[] = []
  private closed = false

  get handlers(): readonly LogHandler[] {
    return [...this.entries]
  }

  get size(): number {
    return this.entries.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * @throws ConfigurationError if the handler is already attached anywhere,
   * or the registry is closed
   */
  attach(handler: LogHandler): void {
    this.assertAttachable(handler)

    owners.set(handler, this)
    this.entries.push(handler)
  }

  /**
   * Attaches several handlers, all or none.
   */
  attachAll(handlers: readonly LogHandler[]): void {
    const pending = new Set<LogHandler>()

    for (const handler of handlers) {
      this.assertAttachable(handler)

      if (pending.has(handler)) {
        throw new ConfigurationError("The same handler is listed more than once", {
          context: { index: handlers.indexOf(handler) },
        })
      }

      pending.add(handler)
    }

    for (const handler of handlers) this.attach(handler)
  }

  /** Detaches and disposes `handler`. Returns `false` if it was not attached here. */
  detach(handler: LogHandler): boolean {
    const index = this.entries.indexOf(handler)
    if (index === -1) return false

    return this.detachAt(index)
  }

  /**
   * Detaches and disposes the handler at `index`. Out-of-range indexes are
   * ignored and return `false`.
   *
   * @remarks
   * The handler leaves the registry before its `dispose` runs, so a throwing
   * `dispose` propagates without leaving the handler half attached.
   */
  detachAt(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) return false

    const [handler] = this.entries.splice(index, 1)
    if (!handler) return false

    owners.delete(handler)
    handler.dispose?.()

    return true
  }

  /**
   * Delivers `event` to every handler in order.
   *
   * @throws DeliveryError after all handlers ran, if any of them threw
   */
  dispatch(event: LogEvent): void {
    if (this.closed) return

    const failures: DeliveryFailure[] = []

    this.entries.slice().forEach((handler, handlerIndex) => {
      try {
        handler.handle(event)
      } catch (error) {
        failures.push({ handlerIndex, error })
      }
    })

    if (failures.length > 0) {
      throw new DeliveryError(failures, { context: { section: event.section } })
    }
  }

  /**
   * Detaches and disposes every handler, then closes the registry.
   * Idempotent.
   *
   * @throws ResourceError if any handler's `dispose` threw; every handler is
   * still detached
   */
  disposeAll(): void {
    if (this.closed) return
    this.closed = true

    const failures: unknown[] = []

    while (this.entries.length > 0) {
      try {
        this.detachAt(0)
      } catch (error) {
        failures.push(error)
      }
    }

    if (failures.length > 0) {
      throw new ResourceError(`${failures.length} log handler(s) failed to dispose`, {
        cause: failures[0],
        context: { failures: failures.length },
      })
    }
  }

  private assertAttachable(handler: LogHandler): void {
    if (this.closed) {
      throw new ConfigurationError("Cannot attach a handler to a disposed logger")
    }

    const owner = owners.get(handler)
    if (owner === this) {
      throw new ConfigurationError("Handler is already attached to this logger")
    }
    if (owner) {
      throw new ConfigurationError("Handler is already attached to another logger")
    }
  }
}
