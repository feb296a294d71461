/**
 * JSON bodies of the HTTP binding. Integers travel as big-endian hex strings.
 */

import { AuthErrorKindType } from './errors';

export interface RegisterRequestBody {
  user: string;
  y1: string;
  y2: string;
}

export interface ChallengeRequestBody {
  user: string;
  r1: string;
  r2: string;
}

export interface ChallengeResponseBody {
  authId: string;
  c: string;
}

export interface AnswerRequestBody {
  authId: string;
  s: string;
}

export interface AnswerResponseBody {
  sessionId: string;
}

export interface SessionResponseBody {
  user: string;
  issuedAt: string;
  expiresAt: string;
}

export interface ErrorResponseBody {
  error: string;
  code: AuthErrorKindType | 'RATE_LIMITED';
  message: string;
}

/** Read a string property from an untrusted JSON value */
export function readStringField(body: unknown, field: string): string | undefined {
  if (typeof body !== 'object' || body === null || !(field in body)) {
    return undefined;
  }
  const value: unknown = Reflect.get(body, field);
  return typeof value === 'string' ? value : undefined;
}
