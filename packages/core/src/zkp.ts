/**
 * Chaum-Pedersen arithmetic: exponentiation, response solving, verification and
 * the secure random draws the protocol depends on.
 */

import { randomBytes } from 'crypto';
import { CpAuthValidationError } from './errors';
import { GroupParameters } from './params';
import { mod, modPow } from './modular';
import { bytesToBigInt } from './encoding';
import { constantTimeBigIntEqual } from './timing-safe';

/** Shortest attempt token or session id the protocol accepts. */
export const MIN_TOKEN_LENGTH = 12;

/** Length of tokens produced by `randomToken()` unless asked otherwise. */
export const DEFAULT_TOKEN_LENGTH = 24;

/** n^e mod m */
export function exponentiate(n: bigint, e: bigint, m: bigint): bigint {
  return modPow(n, e, m);
}

/**
 * s = (k - c * x) mod q, always returned in [0, q).
 *
 * Inputs are non-negative and c * x may exceed k, so the two cases are kept
 * apart and no negative intermediate is ever reduced.
 */
export function solve(k: bigint, c: bigint, x: bigint, q: bigint): bigint {
  if (q < 1n) {
    throw new CpAuthValidationError('q must be positive', 'q');
  }
  if (k < 0n || c < 0n || x < 0n) {
    throw new CpAuthValidationError('k, c and x must be non-negative');
  }
  const cx = c * x;
  if (k >= cx) {
    return (k - cx) % q;
  }
  const r = (cx - k) % q;
  return r === 0n ? 0n : q - r;
}

/**
 * Uniform integer in [0, bound), by rejection sampling over crypto.randomBytes.
 */
export function randomBelow(bound: bigint): bigint {
  if (bound < 1n) {
    throw new CpAuthValidationError('bound must be positive', 'bound');
  }
  const bits = (bound - 1n).toString(2).length;
  const byteCount = Math.ceil(bits / 8);
  const topMask = 0xff >> (byteCount * 8 - bits);
  for (;;) {
    const bytes = randomBytes(byteCount);
    bytes[0] &= topMask;
    const candidate = bytesToBigInt(bytes);
    if (candidate < bound) {
      return candidate;
    }
  }
}

/** URL-safe random identifier drawn from crypto.randomBytes. */
export function randomToken(length = DEFAULT_TOKEN_LENGTH): string {
  if (!Number.isInteger(length) || length < MIN_TOKEN_LENGTH) {
    throw new CpAuthValidationError(
      `token length must be an integer of at least ${MIN_TOKEN_LENGTH}`,
      'length',
    );
  }
  return randomBytes(Math.ceil((length * 3) / 4))
    .toString('base64url')
    .slice(0, length);
}

/**
 * Chaum-Pedersen engine bound to one set of group parameters.
 */
export class ZkpEngine {
  readonly params: GroupParameters;

  constructor(params: GroupParameters) {
    this.params = params;
  }

  exponentiate(n: bigint, e: bigint): bigint {
    return exponentiate(n, e, this.params.p);
  }

  /** s = k - c * x mod q */
  solve(k: bigint, c: bigint, x: bigint): bigint {
    return solve(k, c, x, this.params.q);
  }

  /**
   * r1 == alpha^s * y1^c (mod p) and r2 == beta^s * y2^c (mod p).
   *
   * Group elements must lie in [1, p) and scalars in [0, q); anything else is
   * rejected before any exponentiation.
   */
  verify(r1: bigint, r2: bigint, y1: bigint, y2: bigint, c: bigint, s: bigint): boolean {
    const { p, q, alpha, beta } = this.params;
    const isElement = (v: bigint) => v >= 1n && v < p;
    const isScalar = (v: bigint) => v >= 0n && v < q;
    if (![r1, r2, y1, y2].every(isElement) || !isScalar(c) || !isScalar(s)) {
      return false;
    }

    const expected1 = mod(modPow(alpha, s, p) * modPow(y1, c, p), p);
    const expected2 = mod(modPow(beta, s, p) * modPow(y2, c, p), p);

    // Both legs are always evaluated.
    const cond1 = constantTimeBigIntEqual(r1, expected1);
    const cond2 = constantTimeBigIntEqual(r2, expected2);
    return cond1 && cond2;
  }

  /** Verifier challenge, uniform in [0, q) */
  randomChallenge(): bigint {
    return randomBelow(this.params.q);
  }

  /** Prover nonce k, uniform in [0, q) */
  randomNonce(): bigint {
    return randomBelow(this.params.q);
  }
}
