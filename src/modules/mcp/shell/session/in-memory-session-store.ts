/**
 * In-memory Session Store for MCP
 *
 * Sessions live as long as the process and expire after an idle TTL.
 */

import type { McpSessionStore } from '../../core/ports.js';
import type { McpSession } from '../../core/types.js';

export interface InMemorySessionStoreOptions {
  /** Idle time after which a session is gone */
  ttlSeconds: number;
  /** Clock, injectable for tests */
  now?: () => number;
}

class InMemorySessionStore implements McpSessionStore {
  private readonly sessions = new Map<string, McpSession>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: InMemorySessionStoreOptions) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? Date.now;
  }

  private isExpired(session: McpSession): boolean {
    return this.now() - session.lastAccessedAt > this.ttlMs;
  }

  get(sessionId: string): Promise<McpSession | null> {
    const session = this.sessions.get(sessionId);
    if (session === undefined) {
      return Promise.resolve(null);
    }
    if (this.isExpired(session)) {
      this.sessions.delete(sessionId);
      return Promise.resolve(null);
    }
    return Promise.resolve({ ...session });
  }

  set(session: McpSession): Promise<void> {
    this.sessions.set(session.id, { ...session });
    return Promise.resolve();
  }

  delete(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
    return Promise.resolve();
  }

  touch(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (session !== undefined && !this.isExpired(session)) {
      session.lastAccessedAt = this.now();
    }
    return Promise.resolve();
  }

  sweep(): Promise<string[]> {
    const expired: string[] = [];
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(id);
        expired.push(id);
      }
    }
    return Promise.resolve(expired);
  }
}

/**
 * Creates an in-memory MCP session store.
 */
export const makeInMemorySessionStore = (
  options: InMemorySessionStoreOptions
): McpSessionStore => {
  return new InMemorySessionStore(options);
};
