import { randomBytes } from 'node:crypto';

/**
 * Message of an unknown catch value. Non-Error values are stringified
 * unless a fallback is given.
 */
export function getErrorMessage(error: unknown, fallback?: string): string {
  return error instanceof Error ? error.message : (fallback ?? String(error));
}

/**
 * Prefixed unique id: `{prefix}_{timestamp}_{hex}`, e.g. `conv_1760000000000_a3f9b2c1`.
 */
export function generateId(prefix: string, randomLength = 8): string {
  const random = randomBytes(Math.ceil(randomLength / 2)).toString('hex').slice(0, randomLength);
  return `${prefix}_${Date.now()}_${random}`;
}
