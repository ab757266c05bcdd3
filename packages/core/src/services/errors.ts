/**
 * Custom error classes for PRD Chat services
 *
 * Every error here is scoped to one session or one request; none of them
 * is fatal to the process.
 */

/**
 * Error thrown when pasted PRD text cannot be imported
 */
export class ParseError extends Error {
  /** 1-based line number of the offending line, when there is one */
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `Line ${line}: ${message}`);
    this.name = "ParseError";
    this.line = line;
  }
}

/**
 * Error thrown when an operation names a task that is not in the document
 */
export class UnknownTaskIdError extends Error {
  readonly taskId: string;

  constructor(taskId: string, message?: string) {
    super(message ?? `Unknown task id: ${taskId}`);
    this.name = "UnknownTaskIdError";
    this.taskId = taskId;
  }
}

/**
 * Error thrown when a category code is not part of the taxonomy
 */
export class UnknownCategoryError extends Error {
  readonly code: string;

  constructor(code: string, message?: string) {
    super(message ?? `Unknown category code: ${code}`);
    this.name = "UnknownCategoryError";
    this.code = code;
  }
}

/**
 * Error thrown when a message index does not point at a user message
 */
export class InvalidMessageIndexError extends Error {
  readonly index: number;

  constructor(index: number, message?: string) {
    super(message ?? `No user message at index ${index}`);
    this.name = "InvalidMessageIndexError";
    this.index = index;
  }
}

/**
 * Error thrown when a session id is unknown or expired
 */
export class SessionNotFoundError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string, message?: string) {
    super(message ?? `Session not found: ${sessionId}`);
    this.name = "SessionNotFoundError";
    this.sessionId = sessionId;
  }
}

/**
 * Error thrown when data validation fails
 */
export class ValidationError extends Error {
  /** What was being validated */
  readonly source: string;
  /** Detailed validation errors */
  readonly errors: unknown;

  constructor(source: string, errors: unknown, message?: string) {
    super(message ?? `Validation failed for: ${source}`);
    this.name = "ValidationError";
    this.source = source;
    this.errors = errors;
  }
}
