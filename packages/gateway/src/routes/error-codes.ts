/**
 * Standardized Error Codes
 *
 * Core AppError codes (VALIDATION_ERROR, CONFIGURATION_ERROR, RATE_LIMIT, ...)
 * pass through unchanged; these cover what the HTTP layer adds.
 */

export const ERROR_CODES = {
  // 400
  BAD_REQUEST: 'BAD_REQUEST',
  INVALID_INPUT: 'INVALID_INPUT',
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // 404
  NOT_FOUND: 'NOT_FOUND',
  NO_DOCUMENTS: 'NO_DOCUMENTS',

  // 409
  CONVERSATION_BUSY: 'CONVERSATION_BUSY',

  // 413
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',

  // 429
  RATE_LIMITED: 'RATE_LIMITED',

  // 500 / 503
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  ERROR: 'ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
