/**
 * serve: start the HTTP API and chat page
 */

import { startServer } from '@wetlands/gateway';
import { reportError, resolveSettings, type SettingsOverrides } from './settings.js';

export async function serve(options: SettingsOverrides): Promise<void> {
  try {
    const settings = resolveSettings(options);
    await startServer(settings);
  } catch (error) {
    reportError(error);
  }
}
