import { describe, it, expect, vi, beforeAll } from 'vitest';

vi.mock('../services/get-log.js', async () => {
  const { createMockLog } = await import('../test-helpers.js');
  return { getLog: () => createMockLog() };
});

import { RagChatbot } from './rag-chatbot.js';
import type { ChatEvent } from './rag-chatbot.js';
import { EMPTY_ANSWER_FALLBACK } from './prompts.js';
import { KnowledgeBase } from '../knowledge/knowledge-base.js';
import { createScriptedProvider, textResponse, toolCallResponse } from '../test-helpers.js';
import type { ScriptedProvider } from '../test-helpers.js';
import type { CompletionResponse } from '../agent/types.js';
import { err } from '../types/result.js';
import { RateLimitError } from '../types/errors.js';

const POLICY = 'National Wetland Policy.pdf';
const SECRETS = '/srv/wetlands/.secrets/secrets.toml';

let knowledge: KnowledgeBase;

beforeAll(async () => {
  knowledge = await KnowledgeBase.fromPages([
    { source: POLICY, page: 1, text: 'The policy protects wetlands and mangroves.' },
    { source: POLICY, page: 2, text: 'Mangroves shelter fish nurseries.' },
  ]);
});

function chatbot(provider: ScriptedProvider): RagChatbot {
  return new RagChatbot({
    provider,
    knowledge,
    model: { model: 'gemini-1.5-flash', temperature: 0.1, maxTokens: 2048 },
    contextWindowTokens: 32_768,
    secretsPath: SECRETS,
  });
}

const retrieveThenAnswer: CompletionResponse[] = [
  toolCallResponse([{ name: 'retrieve_documents', args: { query: 'mangroves' } }]),
  textResponse('Mangroves shelter fish. (Source: National Wetland Policy.pdf, Page: 2)'),
];

describe('RagChatbot', () => {
  it('answers with citations, tool calls and summed usage', async () => {
    const provider = createScriptedProvider(retrieveThenAnswer);

    const result = await chatbot(provider).ask('What do mangroves do?');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      conversationId: expect.any(String),
      answer: 'Mangroves shelter fish. (Source: National Wetland Policy.pdf, Page: 2)',
      citations: [
        { source: POLICY, page: 1, type: 'text' },
        { source: POLICY, page: 2, type: 'text' },
      ],
      toolCalls: [
        { name: 'retrieve_documents', arguments: { query: 'mangroves' }, isError: false, durationMs: expect.any(Number) },
      ],
      usage: { promptTokens: 18, completionTokens: 7, totalTokens: 25 },
      model: 'gemini-1.5-flash',
    });
  });

  it('sends the knowledge tools with the configured model settings', async () => {
    const provider = createScriptedProvider(retrieveThenAnswer);

    await chatbot(provider).ask('What do mangroves do?');

    const first = provider.requests[0];
    expect(first?.tools?.map((tool) => tool.name)).toEqual([
      'retrieve_documents',
      'search_specific_document',
      'get_document_list',
    ]);
    expect(first?.model).toEqual({ model: 'gemini-1.5-flash', temperature: 0.1, maxTokens: 2048 });
    expect(first?.messages[0]?.role).toBe('system');
    expect(first?.messages[0]?.content).toContain(`- ${POLICY} (2 pages)`);
  });

  it('reports tool activity through onEvent', async () => {
    const events: ChatEvent[] = [];

    await chatbot(createScriptedProvider(retrieveThenAnswer)).ask('What do mangroves do?', {
      onEvent: (event) => events.push(event),
    });

    expect(events.map((event) => event.type)).toEqual(['tool_start', 'tool_end', 'done']);
    expect(events[0]).toEqual({ type: 'tool_start', name: 'retrieve_documents', arguments: { query: 'mangroves' } });
    expect(events[1]).toMatchObject({ type: 'tool_end', name: 'retrieve_documents', isError: false, documents: 2 });
  });

  it('streams deltas between tool events and done', async () => {
    const bot = chatbot(
      createScriptedProvider([
        toolCallResponse([{ name: 'retrieve_documents', args: { query: 'mangroves' } }]),
        textResponse('Mangroves shelter fish.'),
      ])
    );

    const events: ChatEvent[] = [];
    for await (const event of bot.stream('What do mangroves do?')) events.push(event);

    expect(events.map((event) => event.type)).toEqual(['tool_start', 'tool_end', 'delta', 'delta', 'delta', 'done']);
    expect(events.filter((e) => e.type === 'delta').map((e) => (e.type === 'delta' ? e.content : ''))).toEqual([
      'Mangroves ',
      'shelter ',
      'fish.',
    ]);
  });

  it('rejects empty questions', async () => {
    const events: ChatEvent[] = [];

    const result = await chatbot(createScriptedProvider(retrieveThenAnswer)).ask('   ', {
      onEvent: (event) => events.push(event),
    });

    expect(!result.ok && result.error.code).toBe('VALIDATION_ERROR');
    expect(events).toEqual([
      { type: 'error', error: { code: 'VALIDATION_ERROR', message: 'Question must not be empty' } },
    ]);
  });

  it('explains a missing API key', async () => {
    const provider = createScriptedProvider(retrieveThenAnswer, false);

    const result = await chatbot(provider).ask('What do mangroves do?');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('CONFIGURATION_ERROR');
    expect(result.error.toJSON().hint).toBe(
      `Add GOOGLE_API_KEY = "<your key>" to ${SECRETS} or set the GOOGLE_API_KEY environment variable, then restart.`
    );
    expect(provider.requests).toEqual([]);
  });

  it('passes provider errors through', async () => {
    const provider = createScriptedProvider(retrieveThenAnswer);
    vi.mocked(provider.complete).mockResolvedValueOnce(err(new RateLimitError('Gemini rate limit exceeded: quota')));

    const result = await chatbot(provider).ask('What do mangroves do?');

    expect(!result.ok && result.error.code).toBe('RATE_LIMIT');
  });

  it('falls back when the model returns no text', async () => {
    const result = await chatbot(createScriptedProvider([textResponse('  ')])).ask('Hello');

    expect(result.ok && result.value.answer).toBe(EMPTY_ANSWER_FALLBACK);
    expect(result.ok && result.value.citations).toEqual([]);
  });

  it('keeps and resets conversations', async () => {
    const bot = chatbot(createScriptedProvider([textResponse('Hi there.')]));

    const result = await bot.ask('Hello', { conversationId: 'conv_test' });

    expect(result.ok && result.value.conversationId).toBe('conv_test');
    expect(bot.getConversation('conv_test')?.messages.map((m) => m.role)).toEqual(['user', 'assistant']);
    expect(bot.resetConversation('conv_test')).toBe(true);
    expect(bot.getConversation('conv_test')?.messages).toEqual([]);
    expect(bot.deleteConversation('conv_test')).toBe(true);
    expect(bot.getConversation('conv_test')).toBeUndefined();
  });

  it('prunes idle conversations', async () => {
    const bot = chatbot(createScriptedProvider([textResponse('Hi there.')]));
    await bot.ask('Hello', { conversationId: 'idle' });
    const lastActivity = bot.getConversation('idle')?.updatedAt ?? new Date(0);

    expect(bot.pruneConversations(60_000, new Date(lastActivity.getTime() + 30_000))).toBe(0);
    expect(bot.pruneConversations(60_000, new Date(lastActivity.getTime() + 120_000))).toBe(1);
    expect(bot.getConversation('idle')).toBeUndefined();
  });

  it('searches documents without the model', async () => {
    const bot = chatbot(createScriptedProvider([textResponse('unused')]));

    const all = await bot.searchDocuments('mangroves', { topK: 1 });
    const scoped = await bot.searchDocuments('mangroves', { document: 'ramsar' });

    expect(all.success && all.message).toBe('Retrieved 1 relevant documents');
    expect(scoped.success && scoped.message).toBe("No content found in 'ramsar' for this query");
    expect((await bot.listDocuments()).success).toBe(true);
  });
});
