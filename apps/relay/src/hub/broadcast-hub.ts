import type { ServerMessage } from '@notirelay/protocol';
import { OutboundQueue } from './outbound-queue.js';

/** Pending frames a subscriber may lag behind before new ones are dropped for it. */
export const OUTBOUND_QUEUE_CAPACITY = 64;

export interface Subscriber {
  readonly id: number;
  readonly queue: OutboundQueue<string>;
}

export interface PublishResult {
  delivered: number;
  /** Subscribers whose queue was full; the frame is lost for them only */
  dropped: number;
}

let subscriberIdCounter = 0;

export function createSubscriber(capacity = OUTBOUND_QUEUE_CAPACITY): Subscriber {
  return { id: ++subscriberIdCounter, queue: new OutboundQueue<string>(capacity) };
}

/**
 * Registry of live subscribers and the fanout over their outbound queues.
 *
 * register, unregister and publish are synchronous and run to completion on the event
 * loop, so they are serialized against each other without a lock: publish always
 * iterates a registry that cannot change under it. The registry itself never leaves
 * this class.
 *
 * Delivery is at-most-once and never blocks: a subscriber with a full queue misses
 * the frame while every other subscriber still gets it. Frames reach each subscriber
 * in publish order.
 */
export class BroadcastHub {
  private readonly subscribers = new Set<Subscriber>();
  private reserved = 0;

  register(subscriber: Subscriber): void {
    this.subscribers.add(subscriber);
  }

  /**
   * Remove a subscriber and close its queue, which ends its writer.
   * Returns false (and does nothing) when it was not registered.
   */
  unregister(subscriber: Subscriber): boolean {
    if (!this.subscribers.delete(subscriber)) return false;
    subscriber.queue.close();
    return true;
  }

  publish(message: ServerMessage): PublishResult {
    const frame = JSON.stringify(message);
    const result: PublishResult = { delivered: 0, dropped: 0 };

    for (const subscriber of this.subscribers) {
      if (subscriber.queue.tryEnqueue(frame)) {
        result.delivered++;
      } else {
        result.dropped++;
      }
    }
    return result;
  }

  connectedCount(): number {
    return this.subscribers.size;
  }

  /**
   * Hold a slot for a connection that passed its checks but is still upgrading, so
   * concurrent upgrades cannot overshoot `capacity`. Returns false when registered
   * subscribers plus held slots already reach it.
   */
  reserve(capacity: number): boolean {
    if (this.subscribers.size + this.reserved >= capacity) return false;
    this.reserved++;
    return true;
  }

  /** Give back a slot taken with reserve. */
  release(): void {
    if (this.reserved > 0) this.reserved--;
  }

  reservedCount(): number {
    return this.reserved;
  }

  /** Unregister everyone (shutdown). Returns how many were removed. */
  closeAll(): number {
    const removed = this.subscribers.size;
    for (const subscriber of [...this.subscribers]) {
      this.unregister(subscriber);
    }
    return removed;
  }
}
