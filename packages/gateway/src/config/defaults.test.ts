import { describe, it, expect } from 'vitest';
import { CONVERSATION_PRUNE_INTERVAL_MS, CONVERSATION_TTL_MS, MAX_BODY_BYTES, MAX_MESSAGE_CHARS } from './defaults.js';

describe('gateway defaults', () => {
  it('limits bodies to 1 MB and messages to 8000 chars', () => {
    expect(MAX_BODY_BYTES).toBe(1_048_576);
    expect(MAX_MESSAGE_CHARS).toBe(8_000);
  });

  it('prunes more often than conversations expire', () => {
    expect(CONVERSATION_PRUNE_INTERVAL_MS).toBeLessThan(CONVERSATION_TTL_MS);
  });
});
