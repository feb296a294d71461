/**
 * Input validation utilities.
 *
 * Boundary checks for values that enter the system from external callers.
 * Values produced and consumed inside cp-auth are not re-validated at every hop.
 */

import { CpAuthValidationError } from './errors';
import { MIN_TOKEN_LENGTH } from './zkp';

/** Maximum identity length in characters. */
export const MAX_IDENTITY_LENGTH = 256;

/** Maximum attempt token / session id length in characters. */
export const MAX_TOKEN_LENGTH = 128;

const TOKEN_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Validate a user identity.
 * @throws CpAuthValidationError if empty, too long or not a string
 */
export function validateIdentity(identity: unknown): asserts identity is string {
  if (typeof identity !== 'string' || identity.length === 0) {
    throw new CpAuthValidationError('user must be a non-empty string', 'user');
  }
  if (identity.length > MAX_IDENTITY_LENGTH) {
    throw new CpAuthValidationError(
      `user must be at most ${MAX_IDENTITY_LENGTH} characters`,
      'user',
    );
  }
}

/**
 * Validate an attempt token or session id.
 * @throws CpAuthValidationError on wrong type, length or alphabet
 */
export function validateToken(token: unknown, field = 'authId'): asserts token is string {
  if (typeof token !== 'string') {
    throw new CpAuthValidationError(`${field} must be a string`, field);
  }
  if (token.length < MIN_TOKEN_LENGTH || token.length > MAX_TOKEN_LENGTH) {
    throw new CpAuthValidationError(
      `${field} must be between ${MIN_TOKEN_LENGTH} and ${MAX_TOKEN_LENGTH} characters`,
      field,
    );
  }
  if (!TOKEN_PATTERN.test(token)) {
    throw new CpAuthValidationError(`${field} contains invalid characters`, field);
  }
}

/**
 * Validate a positive integer duration in milliseconds.
 */
export function validatePositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new CpAuthValidationError(`${field} must be a positive integer`, field);
  }
}
