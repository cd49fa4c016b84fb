import { timingSafeEqual } from 'node:crypto';

/**
 * Exact comparison of a stored credential hash against a presented one.
 * Hashing happens upstream; this only compares, in constant time for equal
 * lengths. A principal with no stored hash never matches.
 */
export function credentialsMatch(stored: string | null, presented: string | null | undefined): boolean {
  if (stored === null || typeof presented !== 'string') return false;
  const expected = Buffer.from(stored, 'utf8');
  const candidate = Buffer.from(presented, 'utf8');
  if (candidate.length !== expected.length) return false;
  return timingSafeEqual(candidate, expected);
}
