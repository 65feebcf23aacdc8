import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const mockCreateGoogleProvider = vi.hoisted(() => vi.fn());

vi.mock('@wetlands/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@wetlands/core')>();
  return { ...actual, createGoogleProvider: mockCreateGoogleProvider };
});

import { err, ok, RateLimitError, type CompletionRequest } from '@wetlands/core';
import { createScriptedProvider, textResponse } from '@wetlands/core/test-helpers';
import { diagnose, checkModel } from './diagnose.js';

const REPLY = 'Yes, I am working and ready to help with wetland questions today!';

describe('checkModel', () => {
  it('returns the first 50 characters of the reply', async () => {
    const provider = createScriptedProvider([textResponse(REPLY)]);

    const check = await checkModel(provider, 'gemini-1.5-flash');

    expect(check).toEqual({
      model: 'gemini-1.5-flash',
      ok: true,
      detail: 'Yes, I am working and ready to help with wetland q',
    });
    expect(provider.requests[0]?.messages).toEqual([{ role: 'user', content: 'Hi, are you working?' }]);
    expect(provider.requests[0]?.model.model).toBe('gemini-1.5-flash');
  });

  it('reports the error message on failure', async () => {
    const provider = createScriptedProvider([textResponse('unused')]);
    provider.complete = async () => err(new RateLimitError('Quota exhausted'));

    expect(await checkModel(provider, 'gemini-1.5-pro')).toEqual({
      model: 'gemini-1.5-pro',
      ok: false,
      detail: 'Quota exhausted',
    });
  });
});

describe('diagnose command', () => {

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('lists models and tests each candidate', async () => {
    const provider = createScriptedProvider([textResponse(REPLY)]);
    provider.complete = async (request: CompletionRequest) =>
      request.model.model === 'gemini-1.5-flash' ? ok(textResponse('Yes')) : err(new RateLimitError('Quota exhausted'));
    mockCreateGoogleProvider.mockReturnValue({
      ...provider,
      listModels: async () => ok([{ id: 'gemini-1.5-flash', displayName: 'Flash', methods: ['generateContent'] }]),
    });

    await diagnose();

    expect(console.log).toHaveBeenCalledWith('    - gemini-1.5-flash');
    expect(console.log).toHaveBeenCalledWith('    ✅ gemini-1.5-flash: Yes');
    expect(console.log).toHaveBeenCalledWith('    ❌ gemini-1.5-pro: Quota exhausted');
    expect(process.exitCode).toBeUndefined();
  });

  it('tests only the requested models', async () => {
    const provider = createScriptedProvider([textResponse('Working')]);
    mockCreateGoogleProvider.mockReturnValue(provider);

    await diagnose({ model: ['gemini-2.0-flash'] });

    expect(provider.requests.map((r) => r.model.model)).toEqual(['gemini-2.0-flash']);
    expect(console.log).toHaveBeenCalledWith('    ✅ gemini-2.0-flash: Working');
  });

  it('stops when no API key is configured', async () => {
    mockCreateGoogleProvider.mockReturnValue(createScriptedProvider([textResponse('unused')], false));

    await diagnose();

    expect(process.exitCode).toBe(1);
  });
});
