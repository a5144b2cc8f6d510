import type { Clock } from "../ports/clock"
import type { Milliseconds, OffsetMinutes } from "../ports/time"

/** Manually driven clock pinned to a fixed UTC offset. */
export class FakeClock implements Clock {
  private time: Milliseconds
  private offset: OffsetMinutes

  constructor(start: Milliseconds = 0, offset: OffsetMinutes = 0) {
    this.time = start
    this.offset = offset
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  utcOffsetMinutes(_at: Date): OffsetMinutes {
    return this.offset
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }

  setOffset(offset: OffsetMinutes): void {
    this.offset = offset
  }
}
