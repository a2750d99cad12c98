import { createHash } from 'node:crypto';

/**
 * Ids are `md5(utf8(text)) mod 10^8`. Changing either the hash or the modulus
 * renumbers every discipline, location and lecturer clients have stored.
 */
export const STABLE_ID_MODULUS = 100_000_000n;

/**
 * Derive a numeric id in `[0, 10^8)` from a name. Pure: the same text always
 * yields the same id. Distinct names may collide; callers accept that.
 */
export function stableId(text: string): number {
  const digest = createHash('md5').update(text, 'utf8').digest('hex');
  return Number(BigInt(`0x${digest}`) % STABLE_ID_MODULUS);
}
