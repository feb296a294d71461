/**
 * Discrete-log group parameters shared out of band by prover and verifier.
 */

import { createHash } from 'crypto';
import { CpAuthConfigError } from './errors';
import { byteLength } from './encoding';
import { modPow } from './modular';

export interface GroupParameters {
  /** Short identifier, reported by the server health check */
  name: string;
  /** Prime modulus */
  p: bigint;
  /** Prime order of the subgroup generated by alpha and beta */
  q: bigint;
  alpha: bigint;
  /** Second generator. Must have no publicly known discrete log to base alpha. */
  beta: bigint;
}

/** Seed from which the second generator of the RFC 5114 group is derived. */
export const BETA_SEED = 'cp-auth/beta';

// RFC 5114 section 2.1: 1024-bit MODP group with 160-bit prime order subgroup.
const RFC5114_P = BigInt(
  '0x' +
    'B10B8F96A080E01DDE92DE5EAE5D54EC52C99FBCFB06A3C6' +
    '9A6A9DCA52D23B616073E28675A23D189838EF1E2EE652C0' +
    '13ECB4AEA906112324975C3CD49B83BFACCBDD7D90C4BD70' +
    '98488E9C219A73724EFFD6FAE5644738FAA31A4FF55BCCC0' +
    'A151AF5F0DC8B4BD45BF37DF365C1A65E68CFDA76D4DA708' +
    'DF1FB2BC2E4A4371',
);

const RFC5114_G = BigInt(
  '0x' +
    'A4D1CBD5C3FD34126765A442EFB99905F8104DD258AC507F' +
    'D6406CFF14266D31266FEA1E5C41564B777E690F5504F213' +
    '160217B4B01B886A5E91547F9E2749F4D7FBD7D3B9A92EE1' +
    '909D0D2263F80A76A6A24C087A091F531DBF0A0169B6A28A' +
    'D662A4D18E73AFA32D779D5918D08BC8858F4DCEF97C2A24' +
    '855E6EEB22B3B2E5',
);

const RFC5114_Q = BigInt('0xF518AA8781A8DF278ABA4E7D64B7CB9D49462353');

const MAX_DERIVATION_COUNTER = 0xffff;

function expandSeed(seed: string, counter: number, length: number): bigint {
  const blocks: Buffer[] = [];
  let produced = 0;
  for (let block = 0; produced < length; block++) {
    const header = Buffer.alloc(8);
    header.writeUInt32BE(counter, 0);
    header.writeUInt32BE(block, 4);
    const digest = createHash('sha256').update(seed, 'utf8').update(header).digest();
    blocks.push(digest);
    produced += digest.length;
  }
  return BigInt('0x' + Buffer.concat(blocks).subarray(0, length).toString('hex'));
}

/**
 * Derive a generator of the order-q subgroup from a public seed.
 *
 * The seed is hashed to an integer h and raised to (p - 1) / q. Nobody knows the
 * discrete log of the result to any other generator, which is the property the
 * second Chaum-Pedersen generator needs.
 */
export function deriveGenerator(p: bigint, q: bigint, seed: string): bigint {
  if ((p - 1n) % q !== 0n) {
    throw new CpAuthConfigError('q must divide p - 1');
  }
  const cofactor = (p - 1n) / q;
  const width = byteLength(p);
  for (let counter = 1; counter <= MAX_DERIVATION_COUNTER; counter++) {
    const h = expandSeed(seed, counter, width) % p;
    const g = modPow(h, cofactor, p);
    if (g > 1n) {
      return g;
    }
  }
  throw new CpAuthConfigError(`could not derive a generator from seed "${seed}"`);
}

export const RFC5114_1024_160: GroupParameters = Object.freeze({
  name: 'rfc5114-1024-160',
  p: RFC5114_P,
  q: RFC5114_Q,
  alpha: RFC5114_G,
  beta: deriveGenerator(RFC5114_P, RFC5114_Q, BETA_SEED),
});

/** Tiny group (p = 23, q = 11) for tests and walkthroughs. Offers no security. */
export const TOY_GROUP: GroupParameters = Object.freeze({
  name: 'toy',
  p: 23n,
  q: 11n,
  alpha: 4n,
  beta: 9n,
});

export const GROUPS = {
  'rfc5114-1024-160': RFC5114_1024_160,
  toy: TOY_GROUP,
} as const;

export type GroupName = keyof typeof GROUPS;

export function isGroupName(value: string): value is GroupName {
  return Object.prototype.hasOwnProperty.call(GROUPS, value);
}

export function resolveGroup(name: string): GroupParameters {
  if (!isGroupName(name)) {
    throw new CpAuthConfigError(
      `unknown group "${name}" (expected one of: ${Object.keys(GROUPS).join(', ')})`,
    );
  }
  return GROUPS[name];
}

/**
 * Structural checks on a parameter set. Primality of p and q, and independence of
 * alpha and beta, are trust assumptions this cannot confirm.
 */
export function validateGroupParameters(params: GroupParameters): void {
  const { p, q, alpha, beta } = params;
  if (p <= 3n) {
    throw new CpAuthConfigError('p must be greater than 3');
  }
  if (q <= 1n) {
    throw new CpAuthConfigError('q must be greater than 1');
  }
  if ((p - 1n) % q !== 0n) {
    throw new CpAuthConfigError('q must divide p - 1');
  }
  for (const [label, g] of [
    ['alpha', alpha],
    ['beta', beta],
  ] as const) {
    if (g <= 1n || g >= p) {
      throw new CpAuthConfigError(`${label} must lie in (1, p)`);
    }
    if (modPow(g, q, p) !== 1n) {
      throw new CpAuthConfigError(`${label} does not generate the order-q subgroup`);
    }
  }
  if (alpha === beta) {
    throw new CpAuthConfigError('alpha and beta must differ');
  }
}
