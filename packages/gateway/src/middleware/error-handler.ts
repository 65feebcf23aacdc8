/**
 * Global error handler middleware
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { isAppError } from '@wetlands/core';
import type { ApiResponse } from '../types/index.js';
import { ERROR_CODES, appErrorResponse } from '../routes/helpers.js';
import { getLog } from '../services/log.js';

const log = getLog('ErrorHandler');

function statusToErrorCode(status: number): string {
  switch (status) {
    case 400:
      return ERROR_CODES.BAD_REQUEST;
    case 404:
      return ERROR_CODES.NOT_FOUND;
    case 413:
      return ERROR_CODES.PAYLOAD_TOO_LARGE;
    case 422:
      return ERROR_CODES.VALIDATION_ERROR;
    case 429:
      return ERROR_CODES.RATE_LIMITED;
    case 503:
      return ERROR_CODES.SERVICE_UNAVAILABLE;
    default:
      return ERROR_CODES.INTERNAL_ERROR;
  }
}

function envelope(c: Context, code: string, message: string, details?: Record<string, unknown>): ApiResponse {
  return {
    success: false,
    error: { code, message, ...(details ? { details } : {}) },
    meta: {
      requestId: c.get('requestId') ?? 'unknown',
      timestamp: new Date().toISOString(),
    },
  };
}

export function errorHandler(err: Error, c: Context): Response {
  if (err instanceof HTTPException) {
    return c.json(envelope(c, statusToErrorCode(err.status), err.message), err.status);
  }

  // Malformed request body
  if (err instanceof SyntaxError && err.message.includes('JSON')) {
    return c.json(envelope(c, ERROR_CODES.BAD_REQUEST, 'Invalid JSON in request body'), 400);
  }

  // Thrown by validateBody
  if (err.message.startsWith('Validation failed:')) {
    return c.json(envelope(c, ERROR_CODES.VALIDATION_ERROR, err.message), 400);
  }

  if (isAppError(err)) {
    return appErrorResponse(c, err);
  }

  log.error(`[${c.get('requestId') ?? 'unknown'}] Unexpected error`, { error: err.message, stack: err.stack });

  const details = process.env.NODE_ENV === 'development' ? { message: err.message } : undefined;
  return c.json(envelope(c, ERROR_CODES.INTERNAL_ERROR, 'An unexpected error occurred', details), 500);
}

export function notFoundHandler(c: Context): Response {
  return c.json(
    envelope(c, ERROR_CODES.NOT_FOUND, `Route not found: ${c.req.method} ${c.req.path.replace(/[^\w/.\-~%]/g, '')}`),
    404
  );
}
