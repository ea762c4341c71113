import type { NotificationMessage } from '@notirelay/protocol';
import { describe, expect, it } from 'vitest';
import { BroadcastHub, OUTBOUND_QUEUE_CAPACITY, createSubscriber } from './broadcast-hub.js';

function frame(id: number): NotificationMessage {
  return { type: 'notification', id, title: 'A', text: 'B', created_at: '2026-01-01T00:00:00.000Z' };
}

function fill(subscriber: ReturnType<typeof createSubscriber>): void {
  while (subscriber.queue.tryEnqueue('filler')) {
    // keep going until the queue refuses
  }
}

describe('BroadcastHub', () => {
  it('delivers one serialized frame to every subscriber', async () => {
    const hub = new BroadcastHub();
    const a = createSubscriber();
    const b = createSubscriber();
    hub.register(a);
    hub.register(b);

    expect(hub.publish(frame(2))).toEqual({ delivered: 2, dropped: 0 });

    const expected = JSON.stringify(frame(2));
    expect(await a.queue.next()).toEqual({ value: expected, done: false });
    expect(await b.queue.next()).toEqual({ value: expected, done: false });
    expect(a.queue.size).toBe(0);
  });

  it('drops only for the subscriber whose queue is full', async () => {
    const hub = new BroadcastHub();
    const subscribers = [createSubscriber(), createSubscriber(), createSubscriber(), createSubscriber()];
    for (const s of subscribers) hub.register(s);
    const slow = subscribers[2];
    if (!slow) throw new Error('missing subscriber');
    fill(slow);

    expect(hub.publish(frame(9))).toEqual({ delivered: 3, dropped: 1 });

    for (const s of subscribers) {
      if (s === slow) {
        expect(s.queue.size).toBe(OUTBOUND_QUEUE_CAPACITY);
      } else {
        expect(await s.queue.next()).toEqual({ value: JSON.stringify(frame(9)), done: false });
      }
    }
  });

  it('keeps publish order per subscriber', async () => {
    const hub = new BroadcastHub();
    const s = createSubscriber();
    hub.register(s);
    hub.publish(frame(1));
    hub.publish(frame(2));
    hub.publish(frame(3));
    hub.unregister(s);

    const ids: number[] = [];
    for await (const raw of s.queue) {
      const parsed: unknown = JSON.parse(raw);
      if (typeof parsed === 'object' && parsed !== null && 'id' in parsed && typeof parsed.id === 'number') {
        ids.push(parsed.id);
      }
    }
    expect(ids).toEqual([1, 2, 3]);
  });

  it('unregister is idempotent and closes the queue once', () => {
    const hub = new BroadcastHub();
    const s = createSubscriber();
    hub.register(s);

    expect(hub.unregister(s)).toBe(true);
    expect(s.queue.isClosed).toBe(true);
    expect(hub.unregister(s)).toBe(false);
    expect(hub.connectedCount()).toBe(0);
  });

  it('does not close the queue of a subscriber it never held', () => {
    const hub = new BroadcastHub();
    const s = createSubscriber();

    expect(hub.unregister(s)).toBe(false);
    expect(s.queue.isClosed).toBe(false);
  });

  it('publishes to nobody without error', () => {
    expect(new BroadcastHub().publish(frame(1))).toEqual({ delivered: 0, dropped: 0 });
  });

  it('closeAll empties the registry', () => {
    const hub = new BroadcastHub();
    const a = createSubscriber();
    const b = createSubscriber();
    hub.register(a);
    hub.register(b);

    expect(hub.closeAll()).toBe(2);
    expect(hub.connectedCount()).toBe(0);
    expect(a.queue.isClosed && b.queue.isClosed).toBe(true);
  });

  it('reserves slots up to capacity, counting registered subscribers', () => {
    const hub = new BroadcastHub();
    hub.register(createSubscriber());

    expect(hub.reserve(3)).toBe(true);
    expect(hub.reserve(3)).toBe(true);
    expect(hub.reserve(3)).toBe(false);
    expect(hub.reservedCount()).toBe(2);
    expect(hub.connectedCount()).toBe(1);

    hub.release();
    expect(hub.reserve(3)).toBe(true);
  });

  it('never releases below zero', () => {
    const hub = new BroadcastHub();
    hub.release();

    expect(hub.reservedCount()).toBe(0);
    expect(hub.reserve(1)).toBe(true);
    expect(hub.reserve(1)).toBe(false);
  });

  it('gives every subscriber a distinct id', () => {
    expect(createSubscriber().id).not.toBe(createSubscriber().id);
  });
});
