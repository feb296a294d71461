/**
 * Client-side SDK for cp-auth
 *
 * Runs the prover side of the exchange against an auth server:
 * - Publishing the commitment (y1, y2) for a caller-held secret
 * - Committing to a one-time nonce, answering the challenge
 * - Returning the session id issued on success
 *
 * The secret x is passed in by the caller for each call and never kept.
 */

import {
  AnswerRequestBody,
  AnswerResponse,
  ChallengeRequestBody,
  ChallengeResponse,
  CpAuthError,
  CpAuthProtocolError,
  GroupParameters,
  RegisterRequestBody,
  bigIntToHex,
  createCommitment,
  createProofCommitment,
  createResponse,
  hexToBoundedInteger,
  isAuthErrorKind,
  readStringField,
  validateToken,
} from '@cp-auth/core';

export interface AuthClientConfig {
  /** Base URL of the auth server, e.g. http://127.0.0.1:5051 */
  baseUrl: string;
  /** Group parameters agreed with the verifier */
  params: GroupParameters;
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

export interface SessionInfo {
  user: string;
  issuedAt: string;
  expiresAt: string;
}

/**
 * Client SDK for authenticating against a cp-auth server
 */
export class AuthClient {
  private config: AuthClientConfig;
  private readonly fetchImpl: typeof fetch;

  constructor(config: AuthClientConfig) {
    this.config = { ...config, baseUrl: config.baseUrl.replace(/\/+$/, '') };
    this.fetchImpl = config.fetch ?? fetch;
  }

  /**
   * Publish the commitment for secret x under `user`. Re-registering overwrites.
   */
  async register(user: string, x: bigint): Promise<void> {
    const { y1, y2 } = createCommitment(this.config.params, x);
    const body: RegisterRequestBody = { user, y1: bigIntToHex(y1), y2: bigIntToHex(y2) };
    await this.post('/register', body);
  }

  /**
   * Open an attempt with commitment (r1, r2).
   */
  async createChallenge(user: string, r1: bigint, r2: bigint): Promise<ChallengeResponse> {
    const body: ChallengeRequestBody = { user, r1: bigIntToHex(r1), r2: bigIntToHex(r2) };
    const result = await this.post('/challenge', body);

    const authId = readStringField(result, 'authId');
    const c = readStringField(result, 'c');
    if (authId === undefined || c === undefined) {
      throw new CpAuthError('BAD_RESPONSE', 'Challenge response is missing authId or c');
    }
    validateToken(authId, 'authId');
    return { authId, c: hexToBoundedInteger(c, this.config.params.q, 'c') };
  }

  /**
   * Send the response s for an open attempt.
   */
  async verifyAnswer(authId: string, s: bigint): Promise<AnswerResponse> {
    const body: AnswerRequestBody = { authId, s: bigIntToHex(s) };
    const result = await this.post('/verify', body);

    const sessionId = readStringField(result, 'sessionId');
    if (sessionId === undefined) {
      throw new CpAuthError('BAD_RESPONSE', 'Verify response is missing sessionId');
    }
    validateToken(sessionId, 'sessionId');
    return { sessionId };
  }

  /**
   * Run the full exchange for secret x and return the session id.
   *
   * @throws CpAuthProtocolError with the server's kind (NOT_FOUND, INVALID_PROOF, ...)
   */
  async login(user: string, x: bigint): Promise<string> {
    const { params } = this.config;
    const { k, r1, r2 } = createProofCommitment(params);
    const { authId, c } = await this.createChallenge(user, r1, r2);
    const s = createResponse(params, k, c, x);
    const { sessionId } = await this.verifyAnswer(authId, s);
    return sessionId;
  }

  /**
   * Look up a session id on the server.
   *
   * @returns session details, or null if the server does not know it
   */
  async getSession(sessionId: string): Promise<SessionInfo | null> {
    const response = await this.fetchImpl(
      `${this.config.baseUrl}/session/${encodeURIComponent(sessionId)}`,
      { method: 'GET', headers: { Accept: 'application/json' } },
    );
    if (response.status === 404) {
      return null;
    }
    const result = await this.readBody(response);

    const user = readStringField(result, 'user');
    const issuedAt = readStringField(result, 'issuedAt');
    const expiresAt = readStringField(result, 'expiresAt');
    if (user === undefined || issuedAt === undefined || expiresAt === undefined) {
      throw new CpAuthError('BAD_RESPONSE', 'Session response is incomplete');
    }
    return { user, issuedAt, expiresAt };
  }

  private async post(path: string, body: object): Promise<unknown> {
    const response = await this.fetchImpl(`${this.config.baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify(body),
    });
    return this.readBody(response);
  }

  private async readBody(response: Response): Promise<unknown> {
    const text = await response.text();
    let parsed: unknown = undefined;
    if (text.length > 0) {
      try {
        parsed = JSON.parse(text);
      } catch {
        throw new CpAuthError(
          'BAD_RESPONSE',
          `Server returned non-JSON body (HTTP ${response.status})`,
        );
      }
    }

    if (!response.ok) {
      const code = readStringField(parsed, 'code');
      const message = readStringField(parsed, 'message') ?? response.statusText;
      if (isAuthErrorKind(code)) {
        throw new CpAuthProtocolError(code, message);
      }
      throw new CpAuthError('HTTP_ERROR', `HTTP ${response.status}: ${message}`);
    }
    return parsed;
  }
}
