import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { chatRequestSchema, documentSearchSchema, validateBody } from './validation.js';

describe('validateBody', () => {
  it('returns parsed data', () => {
    const schema = z.object({ name: z.string() });

    expect(validateBody(schema, { name: 'fen' })).toEqual({ name: 'fen' });
  });

  it('throws with every issue path and message', () => {
    const schema = z.object({ a: z.string(), b: z.number() });

    expect(() => validateBody(schema, { a: 1 })).toThrow(
      'Validation failed: a: Expected string, received number; b: Required'
    );
  });
});

describe('chatRequestSchema', () => {
  it('trims the message', () => {
    expect(chatRequestSchema.parse({ message: '  What is a bog?  ' })).toEqual({ message: 'What is a bog?' });
  });

  it('accepts conversation ids made of safe characters', () => {
    expect(chatRequestSchema.safeParse({ message: 'hi', conversationId: 'web_1:a-b.c' }).success).toBe(true);
    expect(chatRequestSchema.safeParse({ message: 'hi', conversationId: '../etc' }).success).toBe(false);
  });

  it('rejects overly long messages', () => {
    expect(chatRequestSchema.safeParse({ message: 'x'.repeat(8001) }).success).toBe(false);
  });

  it('requires stream to be a boolean', () => {
    expect(chatRequestSchema.safeParse({ message: 'hi', stream: 'yes' }).success).toBe(false);
  });
});

describe('documentSearchSchema', () => {
  it('accepts a query with an optional document and topK', () => {
    expect(documentSearchSchema.parse({ query: 'peat', document: ' policy ', topK: 3 })).toEqual({
      query: 'peat',
      document: 'policy',
      topK: 3,
    });
  });

  it('bounds topK', () => {
    expect(documentSearchSchema.safeParse({ query: 'peat', topK: 16 }).success).toBe(false);
    expect(documentSearchSchema.safeParse({ query: 'peat', topK: 1.5 }).success).toBe(false);
  });
});
