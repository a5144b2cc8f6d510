export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { DEFAULT_ENV_PREFIX, EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { ObjectSource } from "./adapters/object/object-source"
export { Config } from "./core/config"
export { type LoadLoggerConfigOptions, loadLoggerConfig } from "./core/load"
export { normalizeKey } from "./core/normalize-key"
export {
  type LoggerSettings,
  type LoggerSettingsKey,
  loggerSettingsKeys,
  loggerSettingsSchema,
} from "./core/schema"
export type { LoggerConfig } from "./ports/config"
export type { ConfigSource } from "./ports/source"
