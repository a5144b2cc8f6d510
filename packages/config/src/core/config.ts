import type { LoggerConfig } from "../ports/config"
import { type LoggerSettings, type LoggerSettingsKey, loggerSettingsKeys } from "./schema"

export type Provenance = Partial<Record<LoggerSettingsKey, string>>

export class Config implements LoggerConfig {
  private readonly data: Readonly<LoggerSettings>

  constructor(
    data: LoggerSettings,
    private readonly provenance: Provenance,
    private readonly providedKeys: readonly string[],
  ) {
    this.data = Object.freeze({ ...data })
  }

  get value(): LoggerSettings {
    return this.data
  }

  get<K extends LoggerSettingsKey>(key: K): LoggerSettings[K] {
    return this.data[key]
  }

  explain(key: LoggerSettingsKey): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    const sources = loggerSettingsKeys.flatMap((key) => this.provenance[key] ?? [])

    return [...new Set(sources)]
  }

  unknownKeys(): string[] {
    const known = new Set<string>(loggerSettingsKeys)

    return [...new Set(this.providedKeys)].filter((key) => !known.has(key))
  }
}
