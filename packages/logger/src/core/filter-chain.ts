import type { LogEvent } from "../ports/log-event"
import type { LogFilter } from "../ports/filter"

/**
 * Ordered filters evaluated before delivery. The first rejection stops the
 * chain; an empty chain accepts everything.
 */
export class FilterChain {
  private readonly filters: LogFilter[]

  constructor(filters: Iterable<LogFilter> = []) {
    this.filters = [...filters]
  }

  get size(): number {
    return this.filters.length
  }

  list(): readonly LogFilter[] {
    return [...this.filters]
  }

  add(filter: LogFilter): void {
    this.filters.push(filter)
  }

  remove(filter: LogFilter): boolean {
    const index = this.filters.indexOf(filter)
    if (index === -1) return false

    this.filters.splice(index, 1)
    return true
  }

  evaluate(event: LogEvent): boolean {
    for (const filter of [...this.filters]) {
      if (!filter.handle(event)) return false
    }

    return true
  }
}
