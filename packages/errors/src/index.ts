export { BaseError, type BaseErrorOptions, serializeError } from "./core/base-error"
export { errnoCode, isNotFoundError } from "./core/errno"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
