/**
 * Default Configuration
 *
 * Named constants for tunable values. Most can be overridden through
 * the environment (see settings.ts).
 */

// ============================================================================
// Gemini
// ============================================================================

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

export const DEFAULT_CHAT_MODEL = 'gemini-1.5-flash';

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-004';

/** Low temperature keeps answers close to the retrieved text */
export const DEFAULT_TEMPERATURE = 0.1;

/** Token budget for conversation context sent with each request */
export const CONTEXT_WINDOW_TOKENS = 32_768;

export const DEFAULT_MAX_OUTPUT_TOKENS = 2_048;

/** Per-attempt request timeout (ms) */
export const GEMINI_TIMEOUT_MS = 30_000;

/** Models checked by `wetlands diagnose` when none are given */
export const DIAGNOSE_CANDIDATE_MODELS = ['gemini-1.5-flash', 'gemini-1.5-pro'] as const;

export const DIAGNOSE_PROMPT = 'Hi, are you working?';

// ============================================================================
// Secrets
// ============================================================================

export const DEFAULT_SECRETS_FILE = '.secrets/secrets.toml';

/** Earlier deployments kept the key here; read when the default file is absent */
export const LEGACY_SECRETS_FILE = '.streamlit/secrets.toml';

export const API_KEY_NAME = 'GOOGLE_API_KEY';

// ============================================================================
// Agent loop
// ============================================================================

export const AGENT_MAX_TURNS = 6;

export const AGENT_MAX_TOOL_CALLS = 12;

/** Tool executions slower than this are reported as failed (ms) */
export const TOOL_TIMEOUT_MS = 60_000;

/** Tool results older than the last exchange are cut to this many chars */
export const MEMORY_TOOL_RESULT_MAX_CHARS = 2_000;

export const MEMORY_MAX_MESSAGES = 200;

/** Rough characters-per-token ratio used for context budgeting */
export const CHARS_PER_TOKEN = 4;

// ============================================================================
// Knowledge base
// ============================================================================

export const DEFAULT_DOCUMENTS_DIR = './documents';

export const CHUNK_MAX_CHARS = 1_200;

export const CHUNK_OVERLAP_CHARS = 150;

/** Paragraph and sentence breaks closer than this to a chunk start are ignored */
export const CHUNK_MIN_CHARS = 80;

export const BM25_K1 = 1.5;

export const BM25_B = 0.75;

/** Reciprocal Rank Fusion constant */
export const RRF_K = 60;

/** Candidates returned by the hybrid retriever per query */
export const RETRIEVER_CANDIDATES = 20;

export const EMBEDDING_BATCH_SIZE = 100;

export const DEFAULT_RELEVANCE_THRESHOLD = 0.2;

// ============================================================================
// Knowledge tools
// ============================================================================

export const RETRIEVE_DEFAULT_TOP_K = 8;

export const RETRIEVE_MAX_TOP_K = 15;

export const SPECIFIC_DEFAULT_TOP_K = 5;
