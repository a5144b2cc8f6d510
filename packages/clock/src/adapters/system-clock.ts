import type { Clock } from "../ports/clock"
import type { Milliseconds, OffsetMinutes } from "../ports/time"

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): Milliseconds {
    return Date.now()
  }

  utcOffsetMinutes(at: Date): OffsetMinutes {
    // getTimezoneOffset() is UTC minus local; subtracting from 0 avoids -0.
    return 0 - Math.trunc(at.getTimezoneOffset())
  }
}
