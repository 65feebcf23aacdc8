import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadSettings } from '../config/settings.js';
import type { Settings } from '../config/settings.js';
import { KnowledgeBase } from '../knowledge/knowledge-base.js';
import { createLetterEmbedder, createScriptedProvider, textResponse } from '../test-helpers.js';
import { createGoogleProvider, createKnowledgeBase, createRagChatbot } from './factory.js';

vi.mock('../services/get-log.js', async () => {
  const { createMockLog } = await import('../test-helpers.js');
  return { getLog: () => createMockLog() };
});

describe('chatbot factory', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'factory-'));
    await writeFile(join(dir, 'bogs.txt'), 'Peat bogs store carbon.');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function settings(env: Record<string, string> = {}): Settings {
    return loadSettings({
      env: { DOCUMENTS_DIR: dir, ...env },
      secretsPath: join(dir, 'missing-secrets.toml'),
    });
  }

  function providerWithEmbedder(ready: boolean) {
    const embedder = createLetterEmbedder();
    return { provider: { ...createScriptedProvider([textResponse('ok')], ready), embed: embedder.embed }, embedder };
  }

  it('creates a Gemini provider that is ready only with a key', () => {
    expect(createGoogleProvider(settings()).isReady()).toBe(false);
    expect(createGoogleProvider(settings({ GOOGLE_API_KEY: 'test-key' })).isReady()).toBe(true);
  });

  it('embeds chunks when an embedder is given', async () => {
    const embedder = createLetterEmbedder();

    const kb = await createKnowledgeBase(settings(), embedder);

    expect(kb.ok && kb.value.stats()).toEqual({ documents: 1, chunks: 1, embeddings: true });
    expect(embedder.calls).toEqual([{ count: 1, task: 'RETRIEVAL_DOCUMENT' }]);
  });

  it('skips embeddings when they are disabled', async () => {
    const embedder = createLetterEmbedder();

    const kb = await createKnowledgeBase(settings({ EMBEDDINGS_ENABLED: 'false' }), embedder);

    expect(kb.ok && kb.value.stats().embeddings).toBe(false);
    expect(embedder.calls).toEqual([]);
  });

  it('builds the chatbot over the documents directory', async () => {
    const { provider, embedder } = providerWithEmbedder(true);

    const chatbot = await createRagChatbot(settings(), { provider });

    expect(chatbot.ok).toBe(true);
    if (!chatbot.ok) return;
    expect(chatbot.value.isReady()).toBe(true);
    expect(chatbot.value.model).toBe('gemini-1.5-flash');
    expect(chatbot.value.knowledge.listDocuments().map((d) => d.name)).toEqual(['bogs.txt']);
    expect(embedder.calls).toHaveLength(1);
  });

  it('indexes for keyword retrieval only when the provider has no key', async () => {
    const { provider, embedder } = providerWithEmbedder(false);

    const chatbot = await createRagChatbot(settings(), { provider });

    expect(chatbot.ok && chatbot.value.knowledge.stats().embeddings).toBe(false);
    expect(embedder.calls).toEqual([]);
  });

  it('uses a knowledge base that is passed in', async () => {
    const knowledge = await KnowledgeBase.fromPages([{ source: 'fens.md', page: 1, text: 'Fens are fed by groundwater.' }]);
    const { provider } = providerWithEmbedder(true);

    const chatbot = await createRagChatbot(settings(), { provider, knowledge });

    expect(chatbot.ok && chatbot.value.knowledge).toBe(knowledge);
  });
});
