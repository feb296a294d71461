import { UserRecord } from '@cp-auth/core';

/**
 * Identity → commitment mapping.
 */
export interface UserRegistry {
  /** Insert or overwrite the record for `record.identity` (last write wins) */
  register(record: UserRecord): Promise<void>;
  /** Look up a record, or null if the identity was never registered */
  lookup(identity: string): Promise<UserRecord | null>;
}

/**
 * Simple in-memory user registry. State lives as long as the process.
 */
export class InMemoryUserRegistry implements UserRegistry {
  private users: Map<string, UserRecord> = new Map();

  async register(record: UserRecord): Promise<void> {
    this.users.set(record.identity, { ...record });
  }

  async lookup(identity: string): Promise<UserRecord | null> {
    const record = this.users.get(identity);
    return record ? { ...record } : null;
  }

  /** Number of registered identities */
  get size(): number {
    return this.users.size;
  }
}
