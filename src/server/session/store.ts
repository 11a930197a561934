/**
 * Session persistence
 * One opaque state blob per session, stored and returned byte for byte.
 */

export interface SessionRecord {
  sessionId: string;
  gameState: string;
  /** epoch ms */
  lastAccessed: number;
}

export interface SessionStore {
  create(record: SessionRecord): Promise<void>;
  get(sessionId: string): Promise<SessionRecord | null>;
  /** false when the session does not exist */
  update(sessionId: string, gameState: string, lastAccessed: number): Promise<boolean>;
  delete(sessionId: string): Promise<boolean>;
  /** removes sessions with lastAccessed < olderThan, returns how many */
  deleteIdle(olderThan: number): Promise<number>;
}

/**
 * In-process store (local development and tests)
 */
export class MemorySessionStore implements SessionStore {
  private sessions: Map<string, SessionRecord> = new Map();

  async create(record: SessionRecord): Promise<void> {
    if (this.sessions.has(record.sessionId)) {
      throw new Error(`Session already exists: ${record.sessionId}`);
    }
    this.sessions.set(record.sessionId, { ...record });
  }

  async get(sessionId: string): Promise<SessionRecord | null> {
    const record = this.sessions.get(sessionId);
    return record ? { ...record } : null;
  }

  async update(sessionId: string, gameState: string, lastAccessed: number): Promise<boolean> {
    if (!this.sessions.has(sessionId)) {
      return false;
    }
    this.sessions.set(sessionId, { sessionId, gameState, lastAccessed });
    return true;
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  async deleteIdle(olderThan: number): Promise<number> {
    let removed = 0;
    for (const [sessionId, record] of this.sessions) {
      if (record.lastAccessed < olderThan) {
        this.sessions.delete(sessionId);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
