export {
  type ConsoleHandlerDeps,
  type ConsoleHandlerOptions,
  ConsoleHandler,
  type ConsoleWriter,
  createConsoleHandler,
  type StreamWriter,
} from "./adapters/console/console-handler"
export { SimpleConsoleHandler } from "./adapters/console/simple-console-handler"
export {
  DirectoryFileHandler,
  type DirectoryFileHandlerOptions,
} from "./adapters/file/directory-file-handler"
export { FileHandler, type FileHandlerOptions } from "./adapters/file/file-handler"
export { FileLock } from "./adapters/file/file-lock"
export { MemoryHandler } from "./adapters/memory/memory-handler"
export {
  createPinoHandler,
  PinoHandler,
  type PinoHandlerDeps,
  type PinoHandlerOptions,
} from "./adapters/pino/pino-handler"
export { createFilter, createHandler } from "./core/callbacks"
export { FilterChain } from "./core/filter-chain"
export { HandlerRegistry } from "./core/handler-registry"
export { createLogEvent, type LogEventInit } from "./core/log-event"
export { createLogger, Logger, type LoggerDeps, type LoggerState } from "./core/logger"
export {
  centerLevelName,
  LEVEL_NAME_WIDTH,
  type RenderableEvent,
  renderColored,
  renderPlain,
  renderStack,
  stripAnsi,
} from "./core/render/render"
export { formatLogDate, formatTimestamp, formatUtcOffset } from "./core/render/timestamp"
export { parseSection, SECTION_PATTERN } from "./core/section"
export { type FoldOptions, type Frame, Trace } from "./core/stack/trace"
export type { LogFilter } from "./ports/filter"
export type { LogHandler } from "./ports/handler"
export type {
  DescriptionAttachments,
  ErrorAttachments,
  LogEvent,
  LogTimestamp,
  StackInput,
} from "./ports/log-event"
export {
  isAtLeast,
  isLogLevelName,
  type LogLevel,
  type LogLevelName,
  LogLevels,
  logLevelNames,
  resolveLogLevel,
} from "./ports/log-level"
export type { LoggerOptions } from "./ports/logger-options"
