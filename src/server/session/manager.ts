import { randomUUID } from 'crypto';
import type { Catalog } from '@/server/algo/types';
import type { GameState } from '@/server/game/types';
import { serialize, deserialize } from '@/server/game/stateCodec';
import { StateCorruptError } from '@/server/errors';
import { parseEnv } from '@/server/config/loader';
import { getDatabase, isSqlite } from '@/server/db/client';
import { MemorySessionStore, type SessionStore } from './store';
import { SqliteSessionStore } from './sqliteStore';

/**
 * Session management
 * Persists the serialized GameState per session; the engine never sees the store.
 */
export class SessionManager {
  constructor(
    private readonly store: SessionStore,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Create a session holding the initial state
   */
  async createSession(state: GameState): Promise<string> {
    const sessionId = randomUUID();
    await this.store.create({
      sessionId,
      gameState: serialize(state),
      lastAccessed: this.now(),
    });
    return sessionId;
  }

  /**
   * Load a game. null when the session does not exist.
   * A corrupt blob drops the session so the client starts over.
   */
  async getGame(sessionId: string, catalog: Catalog): Promise<GameState | null> {
    const record = await this.store.get(sessionId);
    if (!record) {
      return null;
    }

    try {
      return deserialize(record.gameState, catalog);
    } catch (error) {
      if (error instanceof StateCorruptError) {
        console.error(`[SessionManager] Corrupt state for session ${sessionId}:`, error.details);
        await this.store.delete(sessionId);
      }
      throw error;
    }
  }

  async saveGame(sessionId: string, state: GameState): Promise<void> {
    const updated = await this.store.update(sessionId, serialize(state), this.now());
    if (!updated) {
      throw new Error(`Session not found: ${sessionId}`);
    }
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    return this.store.delete(sessionId);
  }

  /**
   * Drop sessions untouched for longer than ttlMs
   */
  async evictIdleSessions(ttlMs: number): Promise<number> {
    const removed = await this.store.deleteIdle(this.now() - ttlMs);
    if (removed > 0) {
      console.log(`[SessionManager] Evicted ${removed} idle session(s)`);
    }
    return removed;
  }
}

const globalForSessions = globalThis as unknown as {
  sessionManager: SessionManager | undefined;
};

/**
 * Process-wide manager: SQLite when DATABASE_URL=file:..., in-memory otherwise
 */
export function getSessionManager(): SessionManager {
  if (globalForSessions.sessionManager) {
    return globalForSessions.sessionManager;
  }

  const { DATABASE_URL } = parseEnv();
  const store: SessionStore = isSqlite(DATABASE_URL)
    ? new SqliteSessionStore(getDatabase())
    : new MemorySessionStore();

  if (!isSqlite(DATABASE_URL)) {
    console.warn('[SessionManager] DATABASE_URL is not SQLite; sessions are kept in memory');
  }

  const manager = new SessionManager(store);
  globalForSessions.sessionManager = manager;
  return manager;
}
