import { CpAuthValidationError } from './errors';

/** Canonical residue of `a` modulo `m`, in [0, m). */
export function mod(a: bigint, m: bigint): bigint {
  const r = a % m;
  return r < 0n ? r + m : r;
}

/**
 * base^exponent mod modulus.
 *
 * Montgomery ladder: every exponent bit costs one multiply and one square,
 * whichever value the bit has. JS bigint arithmetic is itself variable-time,
 * so this narrows the timing signal rather than removing it.
 */
export function modPow(base: bigint, exponent: bigint, modulus: bigint): bigint {
  if (modulus < 2n) {
    throw new CpAuthValidationError('modulus must be greater than 1', 'modulus');
  }
  if (exponent < 0n) {
    throw new CpAuthValidationError('exponent must be non-negative', 'exponent');
  }
  if (base < 0n) {
    throw new CpAuthValidationError('base must be non-negative', 'base');
  }

  let r0 = 1n;
  let r1 = base % modulus;
  for (let i = exponent.toString(2).length - 1; i >= 0; i--) {
    if (((exponent >> BigInt(i)) & 1n) === 0n) {
      r1 = (r0 * r1) % modulus;
      r0 = (r0 * r0) % modulus;
    } else {
      r0 = (r0 * r1) % modulus;
      r1 = (r1 * r1) % modulus;
    }
  }
  return r0;
}
