import { ChallengeRecord } from '@cp-auth/core';

/**
 * Live authentication attempts keyed by attempt token.
 */
export interface ChallengeStore {
  /**
   * Store a new attempt. Returns false, storing nothing, if the token is already
   * live, so callers can draw another one.
   */
  issue(record: ChallengeRecord): Promise<boolean>;
  /**
   * Remove the attempt and return it, or null if it is unknown, already consumed
   * or expired. At most one caller ever receives a given record.
   */
  consume(authId: string): Promise<ChallengeRecord | null>;
}

export interface InMemoryChallengeStoreOptions {
  /** Interval between sweeps of expired attempts in ms (default: 60000, 0 disables) */
  pruneIntervalMs?: number;
  /** Clock used for expiry checks (default: Date.now) */
  now?: () => number;
}

/**
 * In-memory challenge store with expiry.
 *
 * Abandoned attempts are dropped by a periodic sweep; the timer is unref'd so it
 * never keeps the process alive.
 */
export class InMemoryChallengeStore implements ChallengeStore {
  private challenges: Map<string, ChallengeRecord> = new Map();
  private pruneTimer?: NodeJS.Timeout;
  private readonly now: () => number;

  constructor(options: InMemoryChallengeStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    const pruneIntervalMs = options.pruneIntervalMs ?? 60 * 1000;
    if (pruneIntervalMs > 0) {
      this.pruneTimer = setInterval(() => this.prune(), pruneIntervalMs);
      this.pruneTimer.unref?.();
    }
  }

  async issue(record: ChallengeRecord): Promise<boolean> {
    const existing = this.challenges.get(record.authId);
    if (existing && this.now() <= existing.expiresAtMs) {
      return false;
    }
    this.challenges.set(record.authId, { ...record });
    return true;
  }

  async consume(authId: string): Promise<ChallengeRecord | null> {
    const entry = this.challenges.get(authId);
    if (!entry) {
      return null;
    }

    this.challenges.delete(authId);
    if (this.now() > entry.expiresAtMs) {
      return null;
    }
    return entry;
  }

  /**
   * Drop expired attempts.
   * @returns number of attempts removed
   */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [authId, entry] of this.challenges.entries()) {
      if (now > entry.expiresAtMs) {
        this.challenges.delete(authId);
        removed++;
      }
    }
    return removed;
  }

  /** Number of stored attempts, expired ones included until the next sweep */
  get size(): number {
    return this.challenges.size;
  }

  /** Stop the sweep timer */
  dispose(): void {
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = undefined;
    }
  }
}
