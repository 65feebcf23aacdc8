/**
 * Route Helpers
 *
 * Shared utilities for Hono route handlers.
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { AppError } from '@wetlands/core';
import type { ApiResponse } from '../types/index.js';
import { ERROR_CODES, type ErrorCode } from './error-codes.js';

export { ERROR_CODES, type ErrorCode };

function meta(c: Context) {
  return {
    requestId: c.get('requestId') ?? 'unknown',
    timestamp: new Date().toISOString(),
  };
}

/**
 * Success response with the standard meta envelope.
 */
export function apiResponse<T>(c: Context, data: T, status?: ContentfulStatusCode) {
  const response: ApiResponse<T> = { success: true, data, meta: meta(c) };
  return status ? c.json(response, status) : c.json(response);
}

/**
 * Error response with the standard meta envelope.
 *
 * @example
 * return apiError(c, { code: ERROR_CODES.NOT_FOUND, message: 'Conversation not found: abc' }, 404);
 */
export function apiError(
  c: Context,
  error: string | { code: ErrorCode | string; message: string; details?: Record<string, unknown> },
  status: ContentfulStatusCode = 400
) {
  const errorObj = typeof error === 'string' ? { code: ERROR_CODES.ERROR, message: error } : error;
  const response: ApiResponse = { success: false, error: errorObj, meta: meta(c) };
  return c.json(response, status);
}

/**
 * HTTP status for a core error's statusCode.
 */
export function toHttpStatus(statusCode: number): ContentfulStatusCode {
  switch (statusCode) {
    case 400:
      return 400;
    case 404:
      return 404;
    case 408:
      return 408;
    case 409:
      return 409;
    case 429:
      return 429;
    case 503:
      return 503;
    default:
      return 500;
  }
}

/**
 * Error response for a core AppError; its hint, when present, goes in details.
 * A configuration problem (such as a missing API key) is reported as 503.
 */
export function appErrorResponse(c: Context, error: AppError) {
  const hint = 'hint' in error && typeof error.hint === 'string' ? error.hint : undefined;
  const status = error.code === 'CONFIGURATION_ERROR' ? 503 : toHttpStatus(error.statusCode);
  return apiError(
    c,
    {
      code: error.code,
      message: error.message,
      ...(hint ? { details: { hint } } : {}),
    },
    status
  );
}

/**
 * Strip everything but word characters, dots, colons and hyphens; at most 200 chars.
 */
export function sanitizeId(id: string): string {
  return id.replace(/[^\w.:-]/g, '').slice(0, 200);
}

export function notFoundError(c: Context, resourceType: string, id: string) {
  return apiError(c, { code: ERROR_CODES.NOT_FOUND, message: `${resourceType} not found: ${sanitizeId(id)}` }, 404);
}
