/**
 * @cp-auth/sdk
 *
 * Verifier-side protocol coordination (Node.js) and the prover-side HTTP client
 */

export * from './client';
export * from './coordinator';
export * from './registry';
export * from './challenge-store';
export * from './session-store';
export * from './keyed-mutex';
