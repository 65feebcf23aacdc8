/**
 * Gateway Default Configuration
 *
 * Named constants for tunable HTTP values.
 */

/** Maximum request body (bytes); override with BODY_SIZE_LIMIT */
export const MAX_BODY_BYTES = 1024 * 1024;

/** CORS preflight cache (seconds) */
export const CORS_MAX_AGE_SECONDS = 86_400;

/** Longest chat message accepted (chars) */
export const MAX_MESSAGE_CHARS = 8_000;

export const MAX_QUERY_CHARS = 2_000;

/** Conversations idle longer than this are pruned (ms) */
export const CONVERSATION_TTL_MS = 6 * 60 * 60 * 1000;

export const CONVERSATION_PRUNE_INTERVAL_MS = 15 * 60 * 1000;

/** Grace period for in-flight requests on shutdown (ms) */
export const SHUTDOWN_TIMEOUT_MS = 10_000;
