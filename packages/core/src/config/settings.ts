/**
 * Settings
 *
 * Reads the environment and the secrets file into a validated Settings object.
 * The API key is looked up in the secrets file first, then GOOGLE_API_KEY,
 * then GEMINI_API_KEY. Without SECRETS_FILE the secrets file is
 * .secrets/secrets.toml, or .streamlit/secrets.toml when only that exists.
 * A missing key does not fail loading: the chatbot reports it when a question
 * comes in, and `wetlands diagnose` shows it.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError, ValidationError } from '../types/errors.js';
import type { LogLevel } from '../services/log-service.js';
import {
  API_KEY_NAME,
  CONTEXT_WINDOW_TOKENS,
  DEFAULT_CHAT_MODEL,
  DEFAULT_DOCUMENTS_DIR,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_RELEVANCE_THRESHOLD,
  DEFAULT_SECRETS_FILE,
  DEFAULT_TEMPERATURE,
  GEMINI_BASE_URL,
  GEMINI_TIMEOUT_MS,
  LEGACY_SECRETS_FILE,
} from './defaults.js';

export type ApiKeySource = 'secrets-file' | 'env' | 'none';

export interface Settings {
  apiKey?: string;
  apiKeySource: ApiKeySource;
  /** Absolute path of the secrets file that was consulted */
  secretsPath: string;
  gemini: {
    model: string;
    embeddingModel: string;
    baseUrl: string;
    temperature: number;
    contextWindow: number;
    maxOutputTokens: number;
    timeoutMs: number;
  };
  knowledge: {
    documentsDir: string;
    recursive: boolean;
    embeddingsEnabled: boolean;
    relevanceThreshold: number;
  };
  server: {
    port: number;
    host: string;
    corsOrigins: string[];
  };
  logLevel: LogLevel;
}

export interface LoadSettingsOptions {
  env?: NodeJS.ProcessEnv;
  /** Overrides SECRETS_FILE and the default location */
  secretsPath?: string;
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  GEMINI_MODEL: z.string().min(1).default(DEFAULT_CHAT_MODEL),
  GEMINI_EMBEDDING_MODEL: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
  GEMINI_BASE_URL: z.string().url().default(GEMINI_BASE_URL),
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
  GEMINI_CONTEXT_WINDOW: z.coerce.number().int().min(1_024).max(2_097_152).default(CONTEXT_WINDOW_TOKENS),
  GEMINI_MAX_OUTPUT_TOKENS: z.coerce.number().int().min(1).max(65_536).default(DEFAULT_MAX_OUTPUT_TOKENS),
  GEMINI_TIMEOUT_MS: z.coerce.number().int().min(1_000).default(GEMINI_TIMEOUT_MS),
  DOCUMENTS_DIR: z.string().min(1).default(DEFAULT_DOCUMENTS_DIR),
  DOCUMENTS_RECURSIVE: booleanFlag.default('false'),
  EMBEDDINGS_ENABLED: booleanFlag.default('true'),
  RELEVANCE_THRESHOLD: z.coerce.number().min(0).max(1).default(DEFAULT_RELEVANCE_THRESHOLD),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8080),
  HOST: z.string().min(1).default('127.0.0.1'),
  CORS_ORIGINS: z.string().default(''),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

/**
 * Read KEY = "value" pairs from a secrets file. TOML section headers and
 * comments are ignored. A missing file yields an empty record.
 */
export function readSecretsFile(path: string): Record<string, string> {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigurationError(
      `Secrets file could not be read: ${path}`,
      'Check the file permissions or point SECRETS_FILE at a readable file.',
      { cause: error }
    );
  }
  return parse(content);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function resolveApiKey(
  secrets: Record<string, string>,
  env: NodeJS.ProcessEnv
): { apiKey?: string; source: ApiKeySource } {
  const fromFile = nonEmpty(secrets[API_KEY_NAME]);
  if (fromFile) return { apiKey: fromFile, source: 'secrets-file' };

  const fromEnv = nonEmpty(env[API_KEY_NAME]) ?? nonEmpty(env.GEMINI_API_KEY);
  if (fromEnv) return { apiKey: fromEnv, source: 'env' };

  return { source: 'none' };
}

/**
 * An explicit path is used as given. Otherwise the default file, falling back
 * to the legacy location when only that one exists.
 */
function resolveSecretsPath(cwd: string, explicit: string | undefined): string {
  if (explicit) return resolve(cwd, explicit);

  const defaultPath = resolve(cwd, DEFAULT_SECRETS_FILE);
  const legacyPath = resolve(cwd, LEGACY_SECRETS_FILE);
  return !existsSync(defaultPath) && existsSync(legacyPath) ? legacyPath : defaultPath;
}

/**
 * Load and validate settings. Throws ValidationError naming every bad variable.
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid configuration: ${issues}`);
  }
  const values = parsed.data;

  const secretsPath = resolveSecretsPath(cwd, options.secretsPath ?? nonEmpty(env.SECRETS_FILE));
  const { apiKey, source } = resolveApiKey(readSecretsFile(secretsPath), env);

  return {
    apiKey,
    apiKeySource: source,
    secretsPath,
    gemini: {
      model: values.GEMINI_MODEL,
      embeddingModel: values.GEMINI_EMBEDDING_MODEL,
      baseUrl: values.GEMINI_BASE_URL.replace(/\/+$/, ''),
      temperature: values.GEMINI_TEMPERATURE,
      contextWindow: values.GEMINI_CONTEXT_WINDOW,
      maxOutputTokens: values.GEMINI_MAX_OUTPUT_TOKENS,
      timeoutMs: values.GEMINI_TIMEOUT_MS,
    },
    knowledge: {
      documentsDir: resolve(cwd, values.DOCUMENTS_DIR),
      recursive: values.DOCUMENTS_RECURSIVE,
      embeddingsEnabled: values.EMBEDDINGS_ENABLED,
      relevanceThreshold: values.RELEVANCE_THRESHOLD,
    },
    server: {
      port: values.PORT,
      host: values.HOST,
      corsOrigins: values.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean),
    },
    logLevel: values.LOG_LEVEL,
  };
}

/**
 * The error reported when a question arrives without an API key.
 */
export function missingApiKeyError(secretsPath: string): ConfigurationError {
  return new ConfigurationError(
    'Gemini API key is not configured',
    `Add ${API_KEY_NAME} = "<your key>" to ${secretsPath} or set the ${API_KEY_NAME} environment variable, then restart.`
  );
}
