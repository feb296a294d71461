/**
 * Prover-side computations.
 *
 * The secret x is always supplied by the caller; nothing here creates or keeps it.
 */

import { CpAuthValidationError } from './errors';
import { GroupParameters } from './params';
import { exponentiate, randomBelow, solve } from './zkp';

/** Public commitment (y1, y2) = (alpha^x, beta^x) published at registration */
export interface Commitment {
  y1: bigint;
  y2: bigint;
}

/** Per-attempt commitment (r1, r2) = (alpha^k, beta^k) together with its nonce k */
export interface ProofCommitment {
  k: bigint;
  r1: bigint;
  r2: bigint;
}

function assertScalar(value: bigint, q: bigint, field: string): void {
  if (value < 0n || value >= q) {
    throw new CpAuthValidationError(`${field} must lie in [0, q)`, field);
  }
}

export function createCommitment(params: GroupParameters, x: bigint): Commitment {
  assertScalar(x, params.q, 'x');
  return {
    y1: exponentiate(params.alpha, x, params.p),
    y2: exponentiate(params.beta, x, params.p),
  };
}

/**
 * Draw a one-time nonce k (or take the one given) and commit to it.
 * A k must never be reused across challenges.
 */
export function createProofCommitment(
  params: GroupParameters,
  k: bigint = randomBelow(params.q),
): ProofCommitment {
  assertScalar(k, params.q, 'k');
  return {
    k,
    r1: exponentiate(params.alpha, k, params.p),
    r2: exponentiate(params.beta, k, params.p),
  };
}

/** Response s = k - c * x mod q to the verifier's challenge c */
export function createResponse(params: GroupParameters, k: bigint, c: bigint, x: bigint): bigint {
  assertScalar(c, params.q, 'c');
  return solve(k, c, x, params.q);
}
