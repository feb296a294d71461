/**
 * Core type definitions for cp-auth
 */

/**
 * Registered commitment to a secret x. The secret itself is never stored.
 */
export interface UserRecord {
  /** Unique identity key */
  identity: string;
  /** alpha^x mod p */
  y1: bigint;
  /** beta^x mod p */
  y2: bigint;
  /** ISO 8601 timestamp of the latest (re-)registration */
  registeredAt: string;
}

/**
 * One live authentication attempt, keyed by its attempt token.
 */
export interface ChallengeRecord {
  /** Random attempt token (authId) */
  authId: string;
  /** Identity the attempt was opened for */
  identity: string;
  /** Prover commitment alpha^k mod p */
  r1: bigint;
  /** Prover commitment beta^k mod p */
  r2: bigint;
  /** Verifier challenge in [0, q) */
  c: bigint;
  /** Epoch milliseconds at issuance */
  issuedAtMs: number;
  /** Epoch milliseconds after which the attempt is void */
  expiresAtMs: number;
}

/**
 * Session credential issued after a successful proof.
 */
export interface SessionRecord {
  sessionId: string;
  identity: string;
  issuedAtMs: number;
  expiresAtMs: number;
}

/** Result of createChallenge */
export interface ChallengeResponse {
  authId: string;
  c: bigint;
}

/** Result of verifyAnswer */
export interface AnswerResponse {
  sessionId: string;
}

// ---------------------------------------------------------------------------
// Audit logging
// ---------------------------------------------------------------------------

/**
 * Structured audit log entry produced by the verifier.
 */
export interface AuditEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Action that occurred */
  action: 'register' | 'challenge' | 'verify' | 'reject';
  /** Actor (verifier identifier) */
  actor: string;
  /** Target identity */
  target?: string;
  /** Whether the action succeeded */
  success: boolean;
  /** Additional structured metadata. Never holds secrets, nonces or responses. */
  metadata?: Record<string, unknown>;
}

/**
 * Pluggable audit logger interface.
 *
 * Production implementations should write to tamper-evident storage. The default
 * `ConsoleAuditLogger` writes JSON to stdout and is suitable only for development
 * and testing.
 */
export interface AuditLogger {
  /** Record an audit entry */
  log(entry: AuditEntry): void;
}

/**
 * Console-based audit logger (development/testing only).
 */
export class ConsoleAuditLogger implements AuditLogger {
  log(entry: AuditEntry): void {
    console.log('[AUDIT]', JSON.stringify(entry));
  }
}

/**
 * In-memory audit logger that stores entries for inspection (testing).
 */
export class InMemoryAuditLogger implements AuditLogger {
  readonly entries: AuditEntry[] = [];

  constructor() {
    if (typeof process !== 'undefined' && process.env.NODE_ENV === 'production') {
      console.warn(
        '[cp-auth] InMemoryAuditLogger is not suitable for production. ' +
          'Audit entries will be lost on restart.',
      );
    }
  }

  log(entry: AuditEntry): void {
    this.entries.push(entry);
  }

  /** Return entries filtered by action */
  filter(action: AuditEntry['action']): AuditEntry[] {
    return this.entries.filter((e) => e.action === action);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/**
 * Telemetry event emitted after every verifyAnswer that reached the predicate
 * or failed on lookup.
 */
export interface VerificationEvent {
  /** ISO 8601 timestamp */
  timestamp: string;
  identity?: string;
  verified: boolean;
  /** Wall-clock time spent in verifyAnswer */
  verificationTimeMs: number;
  /** Failure kind when verified is false */
  error?: string;
}
