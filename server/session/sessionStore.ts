import { DashboardSession } from "./dashboardSession";

/**
 * Lifetime of an idle dashboard session; matches the session cookie maxAge.
 */
export const SESSION_TTL_MS = 7 * 24 * 60 * 60 * 1000;

export const SESSION_STORE_DEFAULTS = {
  ttlMs: SESSION_TTL_MS,
  maxEntries: 1000,
} as const;

/**
 * Maps an HTTP session id to its dashboard state.
 * Sessions never share a dataset or a selection.
 */
export interface IDashboardSessionStore {
  get(sessionId: string): DashboardSession | undefined;
  getOrCreate(sessionId: string): DashboardSession;
  delete(sessionId: string): boolean;
  size(): number;
}

export interface MemDashboardSessionStoreOptions {
  /** Idle time after which an entry is dropped */
  ttlMs?: number;
  /** Oldest-idle entries are evicted beyond this count */
  maxEntries?: number;
  /** Clock in ms (tests pin it) */
  now?: () => number;
}

interface StoreEntry {
  session: DashboardSession;
  lastAccess: number;
}

/**
 * In-memory store with idle expiry and a size cap.
 *
 * Map insertion order doubles as recency order: every access re-inserts the
 * entry, so the first key is always the least recently used one.
 */
export class MemDashboardSessionStore implements IDashboardSessionStore {
  private sessions = new Map<string, StoreEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: MemDashboardSessionStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? SESSION_STORE_DEFAULTS.ttlMs;
    this.maxEntries = options.maxEntries ?? SESSION_STORE_DEFAULTS.maxEntries;
    this.now = options.now ?? Date.now;
  }

  get(sessionId: string): DashboardSession | undefined {
    const entry = this.sessions.get(sessionId);
    if (!entry) return undefined;

    const now = this.now();
    if (this.isExpired(entry, now)) {
      this.sessions.delete(sessionId);
      return undefined;
    }
    this.touch(sessionId, entry, now);
    return entry.session;
  }

  getOrCreate(sessionId: string): DashboardSession {
    const existing = this.get(sessionId);
    if (existing) return existing;

    this.prune();
    while (this.sessions.size >= this.maxEntries) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }

    const session = new DashboardSession();
    this.sessions.set(sessionId, { session, lastAccess: this.now() });
    return session;
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  size(): number {
    this.prune();
    return this.sessions.size;
  }

  /**
   * Drops expired entries; returns how many were removed.
   */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [sessionId, entry] of this.sessions) {
      // Recency order: everything after the first live entry is live too
      if (!this.isExpired(entry, now)) break;
      this.sessions.delete(sessionId);
      removed++;
    }
    return removed;
  }

  private isExpired(entry: StoreEntry, now: number): boolean {
    return now - entry.lastAccess >= this.ttlMs;
  }

  private touch(sessionId: string, entry: StoreEntry, now: number) {
    entry.lastAccess = now;
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, entry);
  }
}
