import { createHash, timingSafeEqual } from 'node:crypto';

/**
 * Constant-time string comparison for shared secrets such as API keys.
 * Both sides are hashed first so inputs of different lengths compare in the
 * same time as equal-length ones.
 */
export function safeCompare(a: string, b: string): boolean {
  const digestA = createHash('sha256').update(a).digest();
  const digestB = createHash('sha256').update(b).digest();
  return timingSafeEqual(digestA, digestB) && a.length === b.length;
}
