/**
 * A source of logger settings.
 *
 * A ConfigSource is responsible only for *loading* raw values. Validation,
 * coercion and merging happen in `loadLoggerConfig`, which also normalizes
 * keys, so a source may return `LEVEL`, `force-utc` or `forceUtc`.
 *
 * Sources are evaluated in order; later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "env", "dotenv:.env.defaults", "json:logging.json"
   */
  readonly name: string

  /**
   * Load raw values.
   *
   * - Env/dotenv sources return flat string values
   * - JSON and object sources may return booleans as well
   * - Returning undefined for a key means "value not provided"
   */
  load(): Promise<Record<string, unknown>>
}
