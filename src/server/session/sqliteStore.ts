import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { SessionRecord, SessionStore } from './store';

const SessionRowSchema = z.object({
  session_id: z.string(),
  game_state: z.string(),
  last_accessed: z.number(),
});

/**
 * SQLite-backed store (better-sqlite3, table game_sessions)
 */
export class SqliteSessionStore implements SessionStore {
  constructor(private readonly db: Database.Database) {}

  async create(record: SessionRecord): Promise<void> {
    this.db
      .prepare(
        'INSERT INTO game_sessions (session_id, game_state, last_accessed) VALUES (?, ?, ?)'
      )
      .run(record.sessionId, record.gameState, record.lastAccessed);
  }

  async get(sessionId: string): Promise<SessionRecord | null> {
    const row: unknown = this.db
      .prepare('SELECT session_id, game_state, last_accessed FROM game_sessions WHERE session_id = ?')
      .get(sessionId);

    if (row === undefined) {
      return null;
    }

    const parsed = SessionRowSchema.parse(row);
    return {
      sessionId: parsed.session_id,
      gameState: parsed.game_state,
      lastAccessed: parsed.last_accessed,
    };
  }

  async update(sessionId: string, gameState: string, lastAccessed: number): Promise<boolean> {
    const result = this.db
      .prepare('UPDATE game_sessions SET game_state = ?, last_accessed = ? WHERE session_id = ?')
      .run(gameState, lastAccessed, sessionId);
    return result.changes > 0;
  }

  async delete(sessionId: string): Promise<boolean> {
    const result = this.db
      .prepare('DELETE FROM game_sessions WHERE session_id = ?')
      .run(sessionId);
    return result.changes > 0;
  }

  async deleteIdle(olderThan: number): Promise<number> {
    const result = this.db
      .prepare('DELETE FROM game_sessions WHERE last_accessed < ?')
      .run(olderThan);
    return result.changes;
  }
}
