import type { NotificationJson, ServerMessage } from '@notirelay/protocol';

type Printable = Pick<NotificationJson, 'id' | 'title' | 'text' | 'created_at'> & {
  seen_at?: string | null;
};

/** `#3 2026-01-01T00:00:00.000Z (seen) Deploy: done`; title and seen marker only when present. */
export function formatNotification(n: Printable): string {
  const seen = n.seen_at ? ' (seen)' : '';
  const title = n.title === '' ? '' : `${n.title}: `;
  return `#${n.id} ${n.created_at}${seen} ${title}${n.text}`;
}

export function describeMessage(message: ServerMessage): string[] {
  switch (message.type) {
    case 'history':
      return [
        `history: ${message.notifications.length} notifications`,
        ...message.notifications.map(formatNotification),
      ];
    case 'notification':
      return [formatNotification(message)];
  }
}
