/**
 * Middleware exports
 */

export {
  AppError,
  type ErrorResponse,
  globalErrorHandler,
  notFoundHandler,
  toAppError,
} from "./error-handler.ts";
