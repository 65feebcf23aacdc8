/**
 * Settings for a CLI command: the environment plus command-line overrides.
 */

import { isAppError, loadSettings, type Settings } from '@wetlands/core';

export interface SettingsOverrides {
  docs?: string;
  port?: string;
  host?: string;
}

export function resolveSettings(overrides: SettingsOverrides = {}, env: NodeJS.ProcessEnv = process.env): Settings {
  return loadSettings({
    env: {
      ...env,
      ...(overrides.docs ? { DOCUMENTS_DIR: overrides.docs } : {}),
      ...(overrides.port ? { PORT: overrides.port } : {}),
      ...(overrides.host ? { HOST: overrides.host } : {}),
    },
  });
}

/**
 * Print an error (and its hint) and mark the process as failed.
 */
export function reportError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`❌ ${message}`);
  if (isAppError(error) && 'hint' in error && typeof error.hint === 'string') {
    console.error(`   ${error.hint}`);
  }
  process.exitCode = 1;
}
