import type { Milliseconds, OffsetMinutes } from "./time"

export interface Clock {
  /** Current time as a Date object. */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds

  /**
   * Offset of the local wall clock from UTC at the given instant.
   *
   * @remarks
   * Offsets change across daylight-saving transitions, so callers pass the
   * instant they are about to format rather than caching a single value.
   */
  utcOffsetMinutes(at: Date): OffsetMinutes
}
