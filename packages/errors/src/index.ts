export { BaseError, type BaseErrorOptions } from "./core/base-error"
export {
  ConfigurationError,
  DeliveryError,
  type DeliveryFailure,
  type KindErrorOptions,
  ResourceError,
} from "./core/errors"
export { hasErrorCode } from "./core/error-code"
export { isAppError } from "./core/is-app-error"
export { toDisplayString } from "./core/to-display-string"
export type { AppError, ErrorCode, ErrorContext } from "./ports/error"
