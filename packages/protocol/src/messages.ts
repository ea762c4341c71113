import { z } from 'zod';

/**
 * Wire format shared by the relay and its clients.
 *
 * HTTP bodies and WebSocket frames are JSON with snake_case keys. Server-to-client
 * frames are a discriminated union on `type`:
 * - `history`: sent exactly once, as the first frame after the upgrade
 * - `notification`: one per live broadcast
 */

export const NotificationJson = z.object({
  id: z.number().int(),
  title: z.string(),
  text: z.string(),
  /** ISO-8601 timestamp assigned by the relay at insert */
  created_at: z.string(),
  /** null until the notification is marked seen */
  seen_at: z.string().nullable(),
});

export type NotificationJson = z.infer<typeof NotificationJson>;

export const HistoryMessage = z.object({
  type: z.literal('history'),
  /** Newest first */
  notifications: z.array(NotificationJson),
});

export type HistoryMessage = z.infer<typeof HistoryMessage>;

// A freshly inserted notification is always unseen, so seen_at is never sent here.
export const NotificationMessage = z.object({
  type: z.literal('notification'),
  id: z.number().int(),
  title: z.string(),
  text: z.string(),
  created_at: z.string(),
});

export type NotificationMessage = z.infer<typeof NotificationMessage>;

export const ServerMessage = z.discriminatedUnion('type', [HistoryMessage, NotificationMessage]);

export type ServerMessage = z.infer<typeof ServerMessage>;

/** Body of GET /history: newest first */
export const HistoryResponse = z.array(NotificationJson);

export type HistoryResponse = z.infer<typeof HistoryResponse>;

export const SendRequest = z.object({
  title: z.string().nullish(),
  text: z.string(),
});

export type SendRequest = z.infer<typeof SendRequest>;

export const SendResponse = z.object({
  id: z.number().int(),
  /** Subscribers registered right after the broadcast; not a delivery receipt */
  sent_to: z.number().int(),
});

export type SendResponse = z.infer<typeof SendResponse>;

export const MarkSeenRequest = z.object({
  /** Absent, null or empty marks every unseen notification */
  ids: z.array(z.number().int()).nullish(),
});

export type MarkSeenRequest = z.infer<typeof MarkSeenRequest>;

export const MarkSeenResponse = z.object({
  marked: z.number().int(),
});

export type MarkSeenResponse = z.infer<typeof MarkSeenResponse>;

export const ErrorResponse = z.object({
  error: z.string(),
});

export type ErrorResponse = z.infer<typeof ErrorResponse>;
