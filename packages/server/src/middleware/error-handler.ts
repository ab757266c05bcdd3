/**
 * Error handling for the PRD Chat server
 *
 * Turns errors thrown during request handling into consistent JSON error
 * responses. Core errors are mapped to their HTTP status and error code.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import {
  InvalidMessageIndexError,
  ParseError,
  SessionNotFoundError,
  UnknownTaskIdError,
  ValidationError,
} from "@prdchat/core";

/**
 * Standard error response shape
 */
export interface ErrorResponse {
  error: string;
  message: string;
  status: number;
  timestamp: string;
  /** 1-based line of a PARSE_ERROR, when known */
  line?: number;
}

/**
 * Application error with HTTP status code
 */
export class AppError extends Error {
  constructor(
    message: string,
    public status: ContentfulStatusCode = 500,
    public code = "INTERNAL_ERROR"
  ) {
    super(message);
    this.name = "AppError";
  }
}

/**
 * Creates an error response object
 */
function createErrorResponse(
  status: number,
  code: string,
  message: string
): ErrorResponse {
  return {
    error: code,
    message,
    status,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Maps a thrown core error to its AppError, or null for anything else
 */
export function toAppError(err: unknown): AppError | null {
  if (err instanceof AppError) {
    return err;
  }
  if (err instanceof ParseError) {
    return new AppError(err.message, 400, "PARSE_ERROR");
  }
  if (err instanceof SessionNotFoundError) {
    return new AppError(err.message, 404, "SESSION_NOT_FOUND");
  }
  if (err instanceof InvalidMessageIndexError) {
    return new AppError(err.message, 400, "INVALID_MESSAGE_INDEX");
  }
  if (err instanceof UnknownTaskIdError) {
    return new AppError(err.message, 400, "UNKNOWN_TASK_ID");
  }
  if (err instanceof ValidationError) {
    return new AppError(err.message, 400, "VALIDATION_ERROR");
  }
  return null;
}

/**
 * Global error handler for `app.onError`
 *
 * Logs every error and returns the JSON error shape. Unknown errors become
 * INTERNAL_ERROR with status 500.
 */
export function globalErrorHandler(err: Error, c: Context): Response {
  const appError = toAppError(err);
  if (appError) {
    console.error(`[AppError] ${appError.code}: ${appError.message}`);
    const body = createErrorResponse(appError.status, appError.code, appError.message);
    if (err instanceof ParseError && err.line !== undefined) {
      body.line = err.line;
    }
    return c.json(body, appError.status);
  }

  console.error(`[Error] ${err.name}: ${err.message}`);
  console.error(err.stack);
  return c.json(createErrorResponse(500, "INTERNAL_ERROR", err.message), 500);
}

/**
 * Not found handler for unmatched routes
 */
export function notFoundHandler(c: Context): Response {
  return c.json(
    createErrorResponse(404, "NOT_FOUND", `Route not found: ${c.req.method} ${c.req.path}`),
    404
  );
}
