import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { migrate } from './migrate.js';

export type DbClient = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: DbClient;
  /** Resolved file path, or ':memory:' */
  path: string;
  /** Migration steps applied while opening (empty for an up-to-date file) */
  migrations: string[];
  close(): void;
}

export function createClient(sqlite: Database.Database): DbClient {
  return drizzle(sqlite, { schema });
}

/**
 * Open (creating if needed) the notification database and migrate it.
 *
 * better-sqlite3 serializes statements on its single connection, which is the only
 * concurrency control the store relies on. File databases run in WAL mode so the
 * history reads never block behind a writer.
 *
 * Throws whatever better-sqlite3 throws; a database that cannot be opened is fatal
 * at startup, so the caller decides how to report it.
 */
export function openDatabase(path: string): DatabaseHandle {
  const sqlite = new Database(path);

  try {
    if (path !== ':memory:') {
      sqlite.pragma('journal_mode = WAL');
    }
    sqlite.pragma('busy_timeout = 5000');
    const migrations = migrate(sqlite);

    return {
      db: createClient(sqlite),
      path,
      migrations,
      close: () => {
        if (sqlite.open) sqlite.close();
      },
    };
  } catch (err) {
    sqlite.close();
    throw err;
  }
}
