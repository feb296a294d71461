import { timingSafeEqual } from 'crypto';
import { bigIntToBytes, byteLength } from './encoding';

/**
 * Constant-time comparison of two non-negative integers.
 * Both sides are encoded to the same fixed width before comparing.
 */
export function constantTimeBigIntEqual(a: bigint, b: bigint): boolean {
  const width = Math.max(byteLength(a), byteLength(b));
  return timingSafeEqual(bigIntToBytes(a, width), bigIntToBytes(b, width));
}
