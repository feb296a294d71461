/**
 * Custom error hierarchy for cp-auth
 *
 * Provides typed error classes for programmatic error checking.
 * All errors extend CpAuthError which has a code property for categorization.
 */

/**
 * Base error class for all cp-auth errors
 */
export class CpAuthError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'CpAuthError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Validation error for invalid input or constraints
 */
export class CpAuthValidationError extends CpAuthError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super('VALIDATION_ERROR', message);
    this.name = 'CpAuthValidationError';
    this.field = field;
  }
}

/**
 * Configuration error for invalid setup, options or group parameters
 */
export class CpAuthConfigError extends CpAuthError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
    this.name = 'CpAuthConfigError';
  }
}

/**
 * Outcome kinds of the authentication protocol. The set is closed: the transport
 * layer matches on it exhaustively.
 */
export const AuthErrorKind = {
  NOT_FOUND: 'NOT_FOUND',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  INVALID_PROOF: 'INVALID_PROOF',
  INTERNAL: 'INTERNAL',
} as const;

export type AuthErrorKindType = (typeof AuthErrorKind)[keyof typeof AuthErrorKind];

/**
 * Protocol failure surfaced to the caller of register / createChallenge / verifyAnswer
 */
export class CpAuthProtocolError extends CpAuthError {
  readonly kind: AuthErrorKindType;

  constructor(kind: AuthErrorKindType, message: string) {
    super(kind, message);
    this.name = 'CpAuthProtocolError';
    this.kind = kind;
  }
}

export function isAuthErrorKind(value: unknown): value is AuthErrorKindType {
  return typeof value === 'string' && Object.values<string>(AuthErrorKind).includes(value);
}

/**
 * Error codes for programmatic error checking
 */
export const CpAuthErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
  ...AuthErrorKind,
} as const;

export type CpAuthErrorCodeType = (typeof CpAuthErrorCode)[keyof typeof CpAuthErrorCode];
