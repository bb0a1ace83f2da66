import { componentLogger } from '@/services/logger';
import type { SessionStore } from './SessionStore';
import { createSession, isTurnInFlight, type Session } from './sessionState';

interface SessionEntry {
  session: Session;
  timestamp: number;
}

export interface InMemorySessionStoreOptions {
  ttlMinutes?: number;
  maxSessions?: number;
  /** 0 disables the background sweep. */
  sweepIntervalMs?: number;
}

const log = componentLogger('sessions');

export class InMemorySessionStore implements SessionStore {
  private readonly memory = new Map<string, SessionEntry>();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly ttl: number;
  private readonly maxSessions: number;
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.ttl = (options.ttlMinutes ?? 30) * 60 * 1000;
    this.maxSessions = options.maxSessions ?? 1000;
    const sweepIntervalMs = options.sweepIntervalMs ?? 5 * 60 * 1000;
    if (sweepIntervalMs > 0) {
      this.cleanupInterval = setInterval(() => this.sweep(), sweepIntervalMs);
      this.cleanupInterval.unref();
    }
  }

  async getOrCreate(sessionKey: string): Promise<Session> {
    return this.touch(sessionKey).session;
  }

  async get(sessionKey: string): Promise<Session | null> {
    return this.memory.get(sessionKey)?.session ?? null;
  }

  update<T>(sessionKey: string, mutate: (session: Session) => T): Promise<T> {
    const previous = this.locks.get(sessionKey) ?? Promise.resolve();
    const run = previous.then(() => {
      const entry = this.touch(sessionKey);
      const result = mutate(entry.session);
      entry.session.updatedAt = entry.timestamp;
      return result;
    });
    const tail: Promise<void> = run.then(
      () => undefined,
      () => undefined,
    ).then(() => {
      if (this.locks.get(sessionKey) === tail) this.locks.delete(sessionKey);
    });
    this.locks.set(sessionKey, tail);
    return run;
  }

  async delete(sessionKey: string): Promise<void> {
    this.memory.delete(sessionKey);
    log.debug(`cleared session ${sessionKey}`);
  }

  size(): number {
    return this.memory.size;
  }

  /** `keep` is never evicted: the key being created or touched right now. */
  sweep(now: number = Date.now(), keep?: string): number {
    let cleaned = 0;

    for (const [key, entry] of this.memory) {
      if (key === keep) continue;
      if (now - entry.timestamp > this.ttl && !isTurnInFlight(entry.session)) {
        this.memory.delete(key);
        cleaned++;
      }
    }

    if (this.memory.size >= this.maxSessions) {
      const idle = [...this.memory.entries()]
        .filter(([key, entry]) => key !== keep && !isTurnInFlight(entry.session))
        .sort(([, a], [, b]) => a.timestamp - b.timestamp);
      const toRemove = Math.floor(this.memory.size * 0.2);
      for (const [key] of idle.slice(0, toRemove)) {
        this.memory.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      log.info(`cleaned up ${cleaned} expired/old sessions`);
    }
    return cleaned;
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }

  private touch(sessionKey: string): SessionEntry {
    const now = Date.now();
    const existing = this.memory.get(sessionKey);
    if (existing) {
      existing.timestamp = now;
      return existing;
    }
    const entry: SessionEntry = { session: createSession(sessionKey, now), timestamp: now };
    this.memory.set(sessionKey, entry);
    if (this.memory.size > this.maxSessions) this.sweep(now, sessionKey);
    return entry;
  }
}
