import { ConfigurationError, isAppError } from "@sectionlog/errors"
import { z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { LoggerConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config, type Provenance } from "./config"
import { normalizeKey } from "./normalize-key"
import { loggerSettingsKeys, loggerSettingsSchema } from "./schema"

export type LoadLoggerConfigOptions = {
  /**
   * Sources applied in order; later ones win.
   *
   * @default [new EnvSource()]
   */
  sources?: readonly ConfigSource[]
}

/**
 * Loads, merges and validates logger settings.
 *
 * @throws ConfigurationError when a source fails to load or the merged
 * values are invalid
 */
export async function loadLoggerConfig({
  sources,
}: LoadLoggerConfigOptions = {}): Promise<LoggerConfig> {
  const merged: Record<string, unknown> = {}
  const provenance: Provenance = {}
  const providedKeys: string[] = []
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await loadSource(source)

    for (const [rawKey, value] of Object.entries(values)) {
      if (value === undefined) continue

      const key = normalizeKey(rawKey)
      merged[key] = value
      providedKeys.push(key)

      const setting = loggerSettingsKeys.find((k) => k === key)
      if (setting) provenance[setting] = source.name
    }
  }

  const result = loggerSettingsSchema.safeParse(merged)

  if (!result.success) {
    throw new ConfigurationError(
      `Logger configuration validation failed:\n${z.prettifyError(result.error)}`,
      { context: { sources: resolvedSources.map((s) => s.name) } },
    )
  }

  return new Config(result.data, provenance, providedKeys)
}

async function loadSource(source: ConfigSource): Promise<Record<string, unknown>> {
  try {
    return await source.load()
  } catch (err) {
    if (isAppError(err)) throw err

    throw new ConfigurationError(`Unable to load logger configuration from ${source.name}`, {
      cause: err,
      context: { source: source.name },
    })
  }
}
