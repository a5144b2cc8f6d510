import type { OffsetMinutes } from "@sectionlog/clock"
import type { LogTimestamp } from "../../ports/log-event"

const MS_PER_MINUTE = 60_000

/**
 * `yyyy-MM-dd HH:mm:ss ±HHMM`, read in the timestamp's own offset.
 */
export function formatTimestamp(ts: LogTimestamp): string {
  const wall = wallClock(ts)
  const time = [wall.getUTCHours(), wall.getUTCMinutes(), wall.getUTCSeconds()]
    .map(pad2)
    .join(":")

  return `${formatDate(wall)} ${time} ${formatUtcOffset(ts.utcOffsetMinutes)}`
}

/** `yyyy-MM-dd` of the timestamp's local calendar day. */
export function formatLogDate(ts: LogTimestamp): string {
  return formatDate(wallClock(ts))
}

export function formatUtcOffset(offset: OffsetMinutes): string {
  const sign = offset < 0 ? "-" : "+"
  const abs = Math.abs(offset)

  return `${sign}${pad2(Math.floor(abs / 60))}${pad2(abs % 60)}`
}

// A Date whose UTC fields read as the wall clock of the timestamp's offset.
function wallClock(ts: LogTimestamp): Date {
  return new Date(ts.instant.getTime() + ts.utcOffsetMinutes * MS_PER_MINUTE)
}

function formatDate(wall: Date): string {
  const year = String(wall.getUTCFullYear()).padStart(4, "0")

  return `${year}-${pad2(wall.getUTCMonth() + 1)}-${pad2(wall.getUTCDate())}`
}

function pad2(n: number): string {
  return String(n).padStart(2, "0")
}
