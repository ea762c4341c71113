import { and, count, desc, inArray, isNull } from 'drizzle-orm';
import type { DbClient } from './client.js';
import { InternalError, ValidationError } from './errors.js';
import { notifications, type Notification } from './schema/index.js';

export const DEFAULT_HISTORY_LIMIT = 50;
/** Used in place of a zero or negative limit, and as the size of the connect snapshot. */
export const MAX_HISTORY_LIMIT = 100;

// SQLite's CURRENT_TIMESTAMP form, written by older relays: UTC without zone or millis.
const SQLITE_DATETIME = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2})$/;

/** Read a stored timestamp in the ISO-8601 form new rows are written in. */
function toIsoTimestamp(value: string): string {
  const match = SQLITE_DATETIME.exec(value);
  return match ? `${match[1]}T${match[2]}.000Z` : value;
}

function normalizeTimestamps(row: Notification): Notification {
  return {
    ...row,
    createdAt: toIsoTimestamp(row.createdAt),
    seenAt: row.seenAt === null ? null : toIsoTimestamp(row.seenAt),
  };
}

export interface NotificationStoreOptions {
  /** Clock used for created_at and seen_at. Defaults to the system clock. */
  now?: () => Date;
}

/**
 * Durable, append-only notification log.
 *
 * All methods are synchronous: better-sqlite3 runs each statement to completion on
 * the calling tick, so no two store operations ever interleave inside this process.
 * Storage failures are rethrown as InternalError and never retried here.
 */
export class NotificationStore {
  private readonly now: () => Date;

  constructor(
    private readonly db: DbClient,
    options: NotificationStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Append a notification. The store assigns id and created_at; seen_at starts null.
   *
   * @throws ValidationError when text is empty after trimming
   */
  insert(title: string | undefined, text: string): Notification {
    if (text.trim() === '') {
      throw new ValidationError('text is required');
    }

    const rows = this.guard('insert', () =>
      this.db
        .insert(notifications)
        .values({ title: title ?? '', text, createdAt: this.now().toISOString() })
        .returning()
        .all(),
    );

    const row = rows[0];
    if (!row) {
      throw new InternalError('insert', new Error('insert returned no rows'));
    }
    return row;
  }

  /**
   * Newest-first page of the log. A missing limit means 50; a zero, negative or
   * non-finite limit is replaced by 100 rather than rejected. Negative offsets read as 0.
   * Values beyond SQLite's integer range are clamped to Number.MAX_SAFE_INTEGER.
   */
  history(limit: number = DEFAULT_HISTORY_LIMIT, offset = 0): Notification[] {
    const take =
      Number.isFinite(limit) && limit >= 1
        ? Math.min(Math.floor(limit), Number.MAX_SAFE_INTEGER)
        : MAX_HISTORY_LIMIT;
    const skip =
      Number.isFinite(offset) && offset > 0 ? Math.min(Math.floor(offset), Number.MAX_SAFE_INTEGER) : 0;

    const rows = this.guard('history', () =>
      this.db
        .select()
        .from(notifications)
        .orderBy(desc(notifications.id))
        .limit(take)
        .offset(skip)
        .all(),
    );
    return rows.map(normalizeTimestamps);
  }

  /**
   * Set seen_at on unseen rows: the listed ids, or every unseen row when ids is
   * absent or empty. Rows already seen keep their original timestamp.
   *
   * @returns number of rows that changed state
   */
  markSeen(ids?: readonly number[]): number {
    const seenAt = this.now().toISOString();
    const unseen = isNull(notifications.seenAt);
    const where = ids && ids.length > 0 ? and(unseen, inArray(notifications.id, [...ids])) : unseen;

    const result = this.guard('markSeen', () =>
      this.db.update(notifications).set({ seenAt }).where(where).run(),
    );
    return result.changes;
  }

  /** Delete every notification. There is no undo. */
  clear(): void {
    this.guard('clear', () => this.db.delete(notifications).run());
  }

  count(): number {
    const rows = this.guard('count', () =>
      this.db.select({ value: count() }).from(notifications).all(),
    );
    return rows[0]?.value ?? 0;
  }

  unseenCount(): number {
    const rows = this.guard('unseenCount', () =>
      this.db
        .select({ value: count() })
        .from(notifications)
        .where(isNull(notifications.seenAt))
        .all(),
    );
    return rows[0]?.value ?? 0;
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new InternalError(operation, err);
    }
  }
}
