import type Database from 'better-sqlite3';

type Sqlite = Database.Database;

const CREATE_NOTIFICATIONS = `
  CREATE TABLE IF NOT EXISTS notifications (
    id         INTEGER PRIMARY KEY AUTOINCREMENT,
    title      TEXT NOT NULL DEFAULT '',
    text       TEXT NOT NULL,
    created_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
    seen_at    DATETIME
  )
`;

function hasColumn(sqlite: Sqlite, table: string, column: string): boolean {
  const columns = sqlite.prepare(`PRAGMA table_info(${table})`).all();
  return columns.some(
    (info) => typeof info === 'object' && info !== null && 'name' in info && info.name === column,
  );
}

/**
 * Bring a database file up to the current schema.
 *
 * Only additive steps live here: databases written by an older relay that had no
 * seen_at column get it added (existing rows read as unseen). Nothing is ever
 * dropped or rewritten, so running this against a current file is a no-op.
 *
 * @returns names of the steps that changed the schema
 */
export function migrate(sqlite: Sqlite): string[] {
  const applied: string[] = [];

  const run = sqlite.transaction(() => {
    const existed = sqlite
      .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'notifications'`)
      .get();

    sqlite.exec(CREATE_NOTIFICATIONS);
    if (existed === undefined) {
      applied.push('create_notifications');
      return;
    }

    if (!hasColumn(sqlite, 'notifications', 'seen_at')) {
      sqlite.exec('ALTER TABLE notifications ADD COLUMN seen_at DATETIME');
      applied.push('add_seen_at');
    }
  });
  run();

  return applied;
}
