import { randomBytes } from 'node:crypto';

/**
 * Generate a URL-safe random ID of the given byte length (default 12 bytes -> 16 chars base64url).
 */
export function generateId(bytes = 12): string {
  return randomBytes(bytes).toString('base64url');
}
