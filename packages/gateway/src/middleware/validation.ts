/**
 * Request validation using Zod
 */

import { z } from 'zod';
import { MAX_MESSAGE_CHARS, MAX_QUERY_CHARS } from '../config/defaults.js';
import { RETRIEVE_MAX_TOP_K } from '@wetlands/core';

// ─── Chat Schemas ────────────────────────────────────────────────

export const chatRequestSchema = z.object({
  message: z.string().trim().min(1, 'Message must not be empty').max(MAX_MESSAGE_CHARS),
  conversationId: z
    .string()
    .regex(/^[\w.:-]{1,200}$/, 'Conversation id may contain letters, digits, _ . : - only')
    .optional(),
  stream: z.boolean().optional(),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

// ─── Document Schemas ────────────────────────────────────────────

export const documentSearchSchema = z.object({
  query: z.string().trim().min(1, 'Query must not be empty').max(MAX_QUERY_CHARS),
  document: z.string().trim().min(1).max(300).optional(),
  topK: z.number().int().min(1).max(RETRIEVE_MAX_TOP_K).optional(),
});

export type DocumentSearchRequest = z.infer<typeof documentSearchSchema>;

/**
 * Validate a request body against a Zod schema.
 * Throws 'Validation failed: ...', which the error handler turns into a 400.
 */
export function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Validation failed: ${issues}`);
  }
  return result.data;
}
