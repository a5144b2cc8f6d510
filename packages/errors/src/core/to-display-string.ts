/**
 * Text form of a thrown or attached value.
 *
 * Values without a usable string conversion (a null prototype, a throwing
 * `toString`) fall back to their `[object Tag]` form.
 */
export function toDisplayString(value: unknown): string {
  try {
    return String(value)
  } catch {
    // Whatever the conversion threw belongs to the value, not to the caller.
    return Object.prototype.toString.call(value)
  }
}
