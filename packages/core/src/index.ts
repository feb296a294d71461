/**
 * @cp-auth/core
 *
 * Chaum-Pedersen zero-knowledge identification primitives: group parameters,
 * the proof arithmetic, prover helpers and the wire codec.
 */

export * from './types';
export * from './errors';
export * from './encoding';
export * from './modular';
export * from './params';
export * from './zkp';
export * from './prover';
export * from './timing-safe';
export * from './validation';
export * from './wire';
