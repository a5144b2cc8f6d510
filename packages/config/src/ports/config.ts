import type { LoggerSettings, LoggerSettingsKey } from "../core/schema"

/**
 * Validated logger settings together with where each of them came from.
 *
 * @example
 * ```typescript
 * const config = await loadLoggerConfig({
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * const logger = createLogger("billing", {
 *   ...config.value,
 *   handlers: [new ConsoleHandler()],
 * })
 *
 * config.explain("level") // "env"
 * ```
 */
export interface LoggerConfig {
  /** Settings ready to spread into `LoggerOptions`. */
  readonly value: LoggerSettings

  get<K extends LoggerSettingsKey>(key: K): LoggerSettings[K]

  /**
   * Explains which source provided the final value for a key.
   *
   * @returns The source name (e.g. "env", "dotenv:.env"), or "default" when
   * no source set it.
   */
  explain(key: LoggerSettingsKey): string

  /**
   * Returns the distinct names of the sources that provided the final value
   * of at least one setting.
   */
  sourcesUsed(): string[]

  /**
   * Returns normalized keys present in sources but not known as settings.
   *
   * Useful for detecting typos such as `LOG_LEVLE`.
   */
  unknownKeys(): string[]
}
