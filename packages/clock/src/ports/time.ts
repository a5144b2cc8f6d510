/** Milliseconds since the Unix epoch, or a duration in milliseconds. */
export type Milliseconds = number

/**
 * Signed distance of a local wall clock from UTC, in minutes.
 * East of Greenwich is positive: UTC+02:00 is `120`, UTC-05:30 is `-330`.
 */
export type OffsetMinutes = number
