/**
 * diagnose: check the API key, the model list and a round trip per model
 */

import {
  createGoogleProvider,
  DIAGNOSE_CANDIDATE_MODELS,
  DIAGNOSE_PROMPT,
  type ChatProvider,
  type Settings,
} from '@wetlands/core';
import { reportError, resolveSettings } from './settings.js';

export interface DiagnoseCommandOptions {
  model?: string[];
}

export interface ModelCheck {
  model: string;
  ok: boolean;
  /** First 50 chars of the reply, or the error message */
  detail: string;
}

export async function checkModel(provider: ChatProvider, model: string): Promise<ModelCheck> {
  const result = await provider.complete({
    messages: [{ role: 'user', content: DIAGNOSE_PROMPT }],
    model: { model, maxTokens: 64 },
  });
  if (!result.ok) return { model, ok: false, detail: result.error.message };
  return { model, ok: true, detail: result.value.content.slice(0, 50) };
}

function describeKey(settings: Settings): string {
  switch (settings.apiKeySource) {
    case 'secrets-file':
      return `found in ${settings.secretsPath}`;
    case 'env':
      return 'found in the environment';
    case 'none':
      return 'not found';
  }
}

export async function diagnose(options: DiagnoseCommandOptions = {}): Promise<void> {
  try {
    const settings = resolveSettings();
    console.log('\n🔍 Gemini diagnostics');
    console.log('─'.repeat(70));
    console.log(`  API key: ${describeKey(settings)}`);
    console.log(`  Base URL: ${settings.gemini.baseUrl}`);

    const provider = createGoogleProvider(settings);
    if (!provider.isReady()) {
      console.log(`\n❌ Add GOOGLE_API_KEY to ${settings.secretsPath} or the environment.\n`);
      process.exitCode = 1;
      return;
    }

    const listed = await provider.listModels();
    if (listed.ok) {
      console.log(`\n  Available models (${listed.value.length}):`);
      for (const model of listed.value) console.log(`    - ${model.id}`);
    } else {
      console.log(`\n❌ Listing models failed: ${listed.error.message}`);
    }

    const candidates = options.model?.length ? options.model : [...DIAGNOSE_CANDIDATE_MODELS];
    console.log('\n  Testing models:');
    let failures = 0;
    for (const model of candidates) {
      const check = await checkModel(provider, model);
      if (!check.ok) failures++;
      console.log(`    ${check.ok ? '✅' : '❌'} ${check.model}: ${check.detail}`);
    }
    console.log();
    if (failures === candidates.length) process.exitCode = 1;
  } catch (error) {
    reportError(error);
  }
}
