import Database from 'better-sqlite3';
import { parseEnv } from '@/server/config/loader';

// Singleton SQLite handle (server-side only)
// Kept on globalThis so dev-server hot reloads reuse the same connection
const globalForDb = globalThis as unknown as {
  sessionDb: Database.Database | undefined;
};

/**
 * DATABASE_URL is SQLite when it uses the file: scheme
 */
export function isSqlite(databaseUrl: string | undefined): boolean {
  const dbUrl = databaseUrl ?? '';
  return dbUrl.startsWith('file:') || dbUrl.startsWith('file://');
}

export function sqlitePathFromUrl(databaseUrl: string): string {
  return databaseUrl.replace(/^file:(\/\/)?/, '');
}

export function ensureSessionSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS game_sessions (
      session_id TEXT PRIMARY KEY,
      game_state TEXT NOT NULL,
      last_accessed INTEGER NOT NULL
    );
  `);
  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_game_sessions_last_accessed
    ON game_sessions (last_accessed);
  `);
}

export function openDatabase(filename: string): Database.Database {
  const db = new Database(filename);
  if (filename !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  ensureSessionSchema(db);
  return db;
}

/**
 * Shared connection for DATABASE_URL=file:...; throws when DATABASE_URL is not SQLite
 */
export function getDatabase(): Database.Database {
  if (globalForDb.sessionDb) {
    return globalForDb.sessionDb;
  }

  const { DATABASE_URL } = parseEnv();
  if (!DATABASE_URL || !isSqlite(DATABASE_URL)) {
    throw new Error('DATABASE_URL must use the file: scheme for the SQLite session store');
  }

  try {
    const db = openDatabase(sqlitePathFromUrl(DATABASE_URL));
    globalForDb.sessionDb = db;
    console.log(`[db] SQLite session store opened: ${DATABASE_URL}`);
    return db;
  } catch (error) {
    console.error('[db] Failed to open SQLite session store:', error);
    throw error;
  }
}
