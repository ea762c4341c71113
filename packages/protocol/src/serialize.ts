import type { HistoryMessage, NotificationJson, NotificationMessage } from './messages.js';

/** Structural shape of a stored notification row (camelCase, as the store returns it). */
export interface NotificationRecord {
  id: number;
  title: string;
  text: string;
  createdAt: string;
  seenAt: string | null;
}

export function toNotificationJson(record: NotificationRecord): NotificationJson {
  return {
    id: record.id,
    title: record.title,
    text: record.text,
    created_at: record.createdAt,
    seen_at: record.seenAt,
  };
}

export function historyMessage(records: readonly NotificationRecord[]): HistoryMessage {
  return { type: 'history', notifications: records.map(toNotificationJson) };
}

export function notificationMessage(record: NotificationRecord): NotificationMessage {
  return {
    type: 'notification',
    id: record.id,
    title: record.title,
    text: record.text,
    created_at: record.createdAt,
  };
}
