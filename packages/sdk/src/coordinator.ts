/**
 * Verifier side of the Chaum-Pedersen identification protocol.
 *
 * An attempt moves Unregistered → Registered(identity) → Challenged(authId) →
 * Verified | Rejected. Each step requires the previous one: a challenge needs a
 * registered identity and an answer needs a live, unconsumed attempt token.
 */

import { EventEmitter } from 'events';
import {
  AnswerResponse,
  AuditEntry,
  AuditLogger,
  AuthErrorKind,
  AuthErrorKindType,
  ChallengeResponse,
  ConsoleAuditLogger,
  CpAuthProtocolError,
  CpAuthValidationError,
  DEFAULT_TOKEN_LENGTH,
  GroupParameters,
  MAX_TOKEN_LENGTH,
  SessionRecord,
  VerificationEvent,
  ZkpEngine,
  randomToken,
  validateIdentity,
  validatePositiveInteger,
  validateToken,
} from '@cp-auth/core';
import { ChallengeStore, InMemoryChallengeStore } from './challenge-store';
import { InMemoryUserRegistry, UserRegistry } from './registry';
import { InMemorySessionStore, SessionStore } from './session-store';
import { KeyedMutex } from './keyed-mutex';

export const DEFAULT_CHALLENGE_TTL_MS = 5 * 60 * 1000;
export const DEFAULT_SESSION_TTL_MS = 60 * 60 * 1000;
const DEFAULT_MAX_TOKEN_ATTEMPTS = 8;

export interface AuthCoordinatorConfig {
  /** Group parameters agreed with provers out of band */
  params: GroupParameters;
  /** Identity → commitment storage (default: in-memory) */
  registry?: UserRegistry;
  /** Live attempt storage (default: in-memory with expiry) */
  challengeStore?: ChallengeStore;
  /** Issued session storage (default: in-memory with expiry) */
  sessionStore?: SessionStore;
  /** Lifetime of an unanswered challenge in ms (default: 5 minutes) */
  challengeTtlMs?: number;
  /** Lifetime of an issued session in ms (default: 1 hour) */
  sessionTtlMs?: number;
  /** Length of attempt tokens and session ids (default: 24) */
  tokenLength?: number;
  /** Token draws before giving up on a collision (default: 8) */
  maxTokenAttempts?: number;
  /** Optional audit logger for protocol events. Defaults to ConsoleAuditLogger. */
  auditLogger?: AuditLogger;
  /** Actor recorded in audit entries (default: "cp-auth-verifier") */
  actor?: string;
  /** Clock (default: Date.now) */
  now?: () => number;
}

/**
 * Orchestrates register / createChallenge / verifyAnswer over the registry, the
 * challenge store and the ZKP engine.
 *
 * Shared state is locked per key: registry access per identity, attempt access per
 * token. Randomness is drawn outside every lock.
 */
export class AuthCoordinator extends EventEmitter {
  readonly params: GroupParameters;
  private readonly zkp: ZkpEngine;
  private readonly registry: UserRegistry;
  private readonly challengeStore: ChallengeStore;
  private readonly sessionStore: SessionStore;
  private readonly challengeTtlMs: number;
  private readonly sessionTtlMs: number;
  private readonly tokenLength: number;
  private readonly maxTokenAttempts: number;
  private readonly auditLogger: AuditLogger;
  private readonly actor: string;
  private readonly now: () => number;
  private readonly identityLocks = new KeyedMutex();
  private readonly tokenLocks = new KeyedMutex();
  private readonly sessionLocks = new KeyedMutex();
  private readonly ownedStores: Array<{ dispose(): void }> = [];

  constructor(config: AuthCoordinatorConfig) {
    super();
    this.params = config.params;
    this.zkp = new ZkpEngine(config.params);
    this.challengeTtlMs = config.challengeTtlMs ?? DEFAULT_CHALLENGE_TTL_MS;
    this.sessionTtlMs = config.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS;
    this.tokenLength = config.tokenLength ?? DEFAULT_TOKEN_LENGTH;
    this.maxTokenAttempts = config.maxTokenAttempts ?? DEFAULT_MAX_TOKEN_ATTEMPTS;
    validatePositiveInteger(this.challengeTtlMs, 'challengeTtlMs');
    validatePositiveInteger(this.sessionTtlMs, 'sessionTtlMs');
    validatePositiveInteger(this.maxTokenAttempts, 'maxTokenAttempts');
    // Rejects lengths below the protocol minimum.
    randomToken(this.tokenLength);
    if (this.tokenLength > MAX_TOKEN_LENGTH) {
      throw new CpAuthValidationError(
        `tokenLength must be at most ${MAX_TOKEN_LENGTH}`,
        'tokenLength',
      );
    }

    this.auditLogger = config.auditLogger ?? new ConsoleAuditLogger();
    this.actor = config.actor ?? 'cp-auth-verifier';
    this.now = config.now ?? Date.now;
    this.registry = config.registry ?? new InMemoryUserRegistry();

    if (config.challengeStore) {
      this.challengeStore = config.challengeStore;
    } else {
      const store = new InMemoryChallengeStore({ now: this.now });
      this.ownedStores.push(store);
      this.challengeStore = store;
    }

    if (config.sessionStore) {
      this.sessionStore = config.sessionStore;
    } else {
      const store = new InMemorySessionStore({ now: this.now });
      this.ownedStores.push(store);
      this.sessionStore = store;
    }
  }

  /**
   * Store (or overwrite) the public commitment (y1, y2) for an identity.
   *
   * @throws CpAuthProtocolError INVALID_ARGUMENT on a bad identity or out-of-range values
   */
  async register(identity: string, y1: bigint, y2: bigint): Promise<void> {
    this.checkArguments(() => {
      validateIdentity(identity);
      this.assertElement(y1, 'y1');
      this.assertElement(y2, 'y2');
    });

    const registeredAt = new Date(this.now()).toISOString();
    await this.identityLocks.runExclusive(identity, () =>
      this.registry.register({ identity, y1, y2, registeredAt }),
    );

    this.audit({ action: 'register', target: identity, success: true });
  }

  /**
   * Open an authentication attempt for a registered identity.
   *
   * @param r1 - prover commitment alpha^k mod p
   * @param r2 - prover commitment beta^k mod p
   * @returns a fresh attempt token and the challenge c drawn uniformly from [0, q)
   * @throws CpAuthProtocolError NOT_FOUND if the identity is not registered
   */
  async createChallenge(identity: string, r1: bigint, r2: bigint): Promise<ChallengeResponse> {
    this.checkArguments(() => {
      validateIdentity(identity);
      this.assertElement(r1, 'r1');
      this.assertElement(r2, 'r2');
    });

    const user = await this.identityLocks.runExclusive(identity, () =>
      this.registry.lookup(identity),
    );
    if (!user) {
      this.audit({ action: 'challenge', target: identity, success: false });
      throw new CpAuthProtocolError(AuthErrorKind.NOT_FOUND, `User: ${identity} not found.`);
    }

    const c = this.zkp.randomChallenge();
    for (let attempt = 0; attempt < this.maxTokenAttempts; attempt++) {
      const authId = randomToken(this.tokenLength);
      const issuedAtMs = this.now();
      const stored = await this.tokenLocks.runExclusive(authId, () =>
        this.challengeStore.issue({
          authId,
          identity,
          r1,
          r2,
          c,
          issuedAtMs,
          expiresAtMs: issuedAtMs + this.challengeTtlMs,
        }),
      );
      if (stored) {
        this.audit({
          action: 'challenge',
          target: identity,
          success: true,
          metadata: { expiresAt: new Date(issuedAtMs + this.challengeTtlMs).toISOString() },
        });
        return { authId, c };
      }
    }

    throw new CpAuthProtocolError(
      AuthErrorKind.INTERNAL,
      'Could not allocate a unique attempt token.',
    );
  }

  /**
   * Answer an attempt with the response s. The attempt is consumed whatever the
   * outcome, so a token can be answered at most once.
   *
   * @returns a fresh session id when the proof verifies
   * @throws CpAuthProtocolError NOT_FOUND for an unknown, consumed or expired token,
   *   INVALID_PROOF when verification fails, INTERNAL when the identity vanished
   */
  async verifyAnswer(authId: string, s: bigint): Promise<AnswerResponse> {
    const startTime = Date.now();
    this.checkArguments(() => {
      validateToken(authId, 'authId');
      this.assertScalar(s, 's');
    });

    const challenge = await this.tokenLocks.runExclusive(authId, () =>
      this.challengeStore.consume(authId),
    );
    if (!challenge) {
      this.emitVerification(startTime, false, undefined, AuthErrorKind.NOT_FOUND);
      throw new CpAuthProtocolError(AuthErrorKind.NOT_FOUND, `Auth ID: ${authId} not found.`);
    }

    const { identity } = challenge;
    const user = await this.identityLocks.runExclusive(identity, () =>
      this.registry.lookup(identity),
    );
    if (!user) {
      this.emitVerification(startTime, false, identity, AuthErrorKind.INTERNAL);
      throw new CpAuthProtocolError(
        AuthErrorKind.INTERNAL,
        `User: ${identity} disappeared while authenticating.`,
      );
    }

    const verified = this.zkp.verify(challenge.r1, challenge.r2, user.y1, user.y2, challenge.c, s);
    if (!verified) {
      this.audit({ action: 'reject', target: identity, success: false });
      this.emitVerification(startTime, false, identity, AuthErrorKind.INVALID_PROOF);
      throw new CpAuthProtocolError(AuthErrorKind.INVALID_PROOF, 'Proof verification failed.');
    }

    const session = await this.issueSession(identity);
    this.audit({ action: 'verify', target: identity, success: true });
    this.emitVerification(startTime, true, identity);
    return { sessionId: session.sessionId };
  }

  /**
   * Look up a session credential issued by verifyAnswer.
   *
   * @returns the live session, or null if unknown or expired
   */
  async resolveSession(sessionId: string): Promise<SessionRecord | null> {
    this.checkArguments(() => validateToken(sessionId, 'sessionId'));
    return this.sessionLocks.runExclusive(sessionId, () => this.sessionStore.resolve(sessionId));
  }

  /**
   * Register a callback for verification events
   */
  onVerification(callback: (event: VerificationEvent) => void): void {
    this.on('verification', callback);
  }

  /** Stop the expiry timers of the stores this coordinator created */
  dispose(): void {
    for (const store of this.ownedStores) {
      store.dispose();
    }
    this.removeAllListeners('verification');
  }

  private async issueSession(identity: string): Promise<SessionRecord> {
    for (let attempt = 0; attempt < this.maxTokenAttempts; attempt++) {
      const issuedAtMs = this.now();
      const record: SessionRecord = {
        sessionId: randomToken(this.tokenLength),
        identity,
        issuedAtMs,
        expiresAtMs: issuedAtMs + this.sessionTtlMs,
      };
      const stored = await this.sessionLocks.runExclusive(record.sessionId, () =>
        this.sessionStore.issue(record),
      );
      if (stored) {
        return record;
      }
    }
    throw new CpAuthProtocolError(AuthErrorKind.INTERNAL, 'Could not allocate a unique session id.');
  }

  private assertElement(value: bigint, field: string): void {
    if (typeof value !== 'bigint' || value < 0n || value >= this.params.p) {
      throw new CpAuthValidationError(`${field} must lie in [0, p)`, field);
    }
  }

  private assertScalar(value: bigint, field: string): void {
    if (typeof value !== 'bigint' || value < 0n || value >= this.params.q) {
      throw new CpAuthValidationError(`${field} must lie in [0, q)`, field);
    }
  }

  /** Run boundary checks, reporting failures as INVALID_ARGUMENT */
  private checkArguments(check: () => void): void {
    try {
      check();
    } catch (error) {
      if (error instanceof CpAuthValidationError) {
        throw new CpAuthProtocolError(AuthErrorKind.INVALID_ARGUMENT, error.message);
      }
      throw error;
    }
  }

  private emitVerification(
    startTime: number,
    verified: boolean,
    identity?: string,
    error?: AuthErrorKindType,
  ): void {
    const event: VerificationEvent = {
      timestamp: new Date().toISOString(),
      identity,
      verified,
      verificationTimeMs: Date.now() - startTime,
      error,
    };
    try {
      this.emit('verification', event);
    } catch (listenerError) {
      // A failing listener never changes a protocol outcome.
      console.warn('[cp-auth] verification listener failed:', listenerError);
    }
  }

  private audit(entry: Omit<AuditEntry, 'timestamp' | 'actor'>): void {
    try {
      this.auditLogger.log({
        timestamp: new Date(this.now()).toISOString(),
        actor: this.actor,
        ...entry,
      });
    } catch (error) {
      // Audit failures never change a protocol outcome.
      console.warn('[cp-auth] audit logger failed:', error);
    }
  }
}
