import { normalizeKey } from "../../core/normalize-key"
import type { ConfigSource } from "../../ports/source"

export const DEFAULT_ENV_PREFIX = "LOG_"

export type EnvSourceOptions = {
  /**
   * Only variables starting with this prefix are read; the prefix is
   * stripped. An empty prefix reads every variable.
   *
   * @default "LOG_"
   */
  prefix?: string
  env?: Record<string, string | undefined>
}

/**
 * Reads logger settings from environment variables.
 *
 * `LOG_FORCE_UTC=true` yields `{ forceUtc: "true" }`. Blank variables count
 * as unset, so `LOG_LEVEL=` falls back to the next source or the default.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? DEFAULT_ENV_PREFIX
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, string>> {
    const settings: Record<string, string> = {}

    for (const [variable, value] of Object.entries(this.env)) {
      if (!variable.startsWith(this.prefix)) continue
      if (value === undefined || value.trim() === "") continue

      const key = normalizeKey(variable.slice(this.prefix.length))
      if (key) settings[key] = value
    }

    return settings
  }
}
