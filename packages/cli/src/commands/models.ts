/**
 * models: list Gemini models that support generateContent
 */

import { writeFile } from 'node:fs/promises';
import { createGoogleProvider, missingApiKeyError, type ModelInfo } from '@wetlands/core';
import { reportError, resolveSettings } from './settings.js';

export interface ModelsCommandOptions {
  output?: string;
}

export function formatModel(model: ModelInfo): string {
  const limits =
    model.inputTokenLimit !== undefined ? ` (in ${model.inputTokenLimit}, out ${model.outputTokenLimit ?? '?'})` : '';
  return `${model.id} - ${model.displayName}${limits}`;
}

export async function models(options: ModelsCommandOptions = {}): Promise<void> {
  try {
    const settings = resolveSettings();
    const provider = createGoogleProvider(settings);
    if (!provider.isReady()) {
      reportError(missingApiKeyError(settings.secretsPath));
      return;
    }

    const result = await provider.listModels();
    if (!result.ok) {
      reportError(result.error);
      return;
    }

    const lines = result.value.map(formatModel);
    console.log(`\nModels supporting generateContent (${lines.length}):`);
    for (const line of lines) console.log(`  ${line}`);

    if (options.output) {
      await writeFile(options.output, lines.join('\n') + '\n', 'utf-8');
      console.log(`\nSaved to ${options.output}`);
    }
  } catch (error) {
    reportError(error);
  }
}
