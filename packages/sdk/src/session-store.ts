import { SessionRecord } from '@cp-auth/core';

/**
 * Session credentials issued after successful proofs.
 */
export interface SessionStore {
  /** Record an issued session. Returns false if the id is already live. */
  issue(record: SessionRecord): Promise<boolean>;
  /** Return the live session for an id, or null if unknown or expired */
  resolve(sessionId: string): Promise<SessionRecord | null>;
}

export interface InMemorySessionStoreOptions {
  /** Interval between sweeps of expired sessions in ms (default: 60000, 0 disables) */
  pruneIntervalMs?: number;
  /** Clock used for expiry checks (default: Date.now) */
  now?: () => number;
}

export class InMemorySessionStore implements SessionStore {
  private sessions: Map<string, SessionRecord> = new Map();
  private pruneTimer?: NodeJS.Timeout;
  private readonly now: () => number;

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    const pruneIntervalMs = options.pruneIntervalMs ?? 60 * 1000;
    if (pruneIntervalMs > 0) {
      this.pruneTimer = setInterval(() => this.prune(), pruneIntervalMs);
      this.pruneTimer.unref?.();
    }
  }

  async issue(record: SessionRecord): Promise<boolean> {
    const existing = this.sessions.get(record.sessionId);
    if (existing && this.now() <= existing.expiresAtMs) {
      return false;
    }
    this.sessions.set(record.sessionId, { ...record });
    return true;
  }

  async resolve(sessionId: string): Promise<SessionRecord | null> {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      return null;
    }
    if (this.now() > entry.expiresAtMs) {
      this.sessions.delete(sessionId);
      return null;
    }
    return { ...entry };
  }

  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [sessionId, entry] of this.sessions.entries()) {
      if (now > entry.expiresAtMs) {
        this.sessions.delete(sessionId);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  dispose(): void {
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = undefined;
    }
  }
}
