// node/src/memory/SessionStore.ts

import type { Session } from './sessionState';

/**
 * Session storage behind the coordinator.
 * The only shared mutable state in the system; all writes go through update().
 */
export interface SessionStore {
  /** Returns the session, creating it on first reference. */
  getOrCreate(sessionKey: string): Promise<Session>;

  get(sessionKey: string): Promise<Session | null>;

  /**
   * Atomic read-modify-write for one key. Updates for the same key run one at a
   * time in call order; different keys never wait on each other. The session is
   * created lazily if it does not exist yet.
   */
  update<T>(sessionKey: string, mutate: (session: Session) => T): Promise<T>;

  delete(sessionKey: string): Promise<void>;

  size(): number;

  /** Drop idle sessions past their TTL; returns how many were removed. */
  sweep(now?: number, keep?: string): number;

  destroy(): void;
}
