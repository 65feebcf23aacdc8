/**
 * Structured error classes.
 * Every error carries a stable `code` and the HTTP status the gateway answers with.
 */

/**
 * Base application error with structured metadata
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly timestamp: Date = new Date();
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = this.constructor.name;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Invalid input: empty question, bad tool arguments, rejected request.
 */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly statusCode = 400;
  readonly field?: string;
  readonly hint?: string;

  constructor(message: string, options?: { field?: string; hint?: string; cause?: unknown }) {
    super(message, options);
    this.field = options?.field;
    this.hint = options?.hint;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
      hint: this.hint,
    };
  }
}

/**
 * The deployment is missing something it needs (API key, documents folder, a package).
 * `hint` tells the operator how to fix it.
 */
export class ConfigurationError extends AppError {
  readonly code = 'CONFIGURATION_ERROR' as const;
  readonly statusCode = 500;
  readonly hint: string;

  constructor(message: string, hint: string, options?: { cause?: unknown }) {
    super(message, options);
    this.hint = hint;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      hint: this.hint,
    };
  }
}

export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND' as const;
  readonly statusCode = 404;
  readonly resource: string;
  readonly id: string;

  constructor(resource: string, id: string, options?: { cause?: unknown }) {
    super(`${resource} not found: ${id}`, options);
    this.resource = resource;
    this.id = id;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      resource: this.resource,
      id: this.id,
    };
  }
}

export class TimeoutError extends AppError {
  readonly code = 'TIMEOUT' as const;
  readonly statusCode = 408;
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`, options);
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      operation: this.operation,
      timeoutMs: this.timeoutMs,
    };
  }
}

export class RateLimitError extends AppError {
  readonly code = 'RATE_LIMIT' as const;
  readonly statusCode = 429;
  readonly retryAfterMs?: number;

  constructor(
    message: string = 'Rate limit exceeded',
    options?: { retryAfterMs?: number; cause?: unknown }
  ) {
    super(message, options);
    this.retryAfterMs = options?.retryAfterMs;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      retryAfterMs: this.retryAfterMs,
    };
  }
}

/**
 * A second request arrived for a conversation that is still being answered.
 */
export class ConversationBusyError extends AppError {
  readonly code = 'CONVERSATION_BUSY' as const;
  readonly statusCode = 409;
  readonly conversationId: string;

  constructor(conversationId: string) {
    super(`Conversation ${conversationId} is already processing a request`);
    this.conversationId = conversationId;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      conversationId: this.conversationId,
    };
  }
}

export class InternalError extends AppError {
  readonly code = 'INTERNAL_ERROR' as const;
  readonly statusCode = 500;

  constructor(message: string = 'An internal error occurred', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert unknown error to AppError
 */
export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new InternalError(error.message, { cause: error });
  }
  return new InternalError(String(error));
}
