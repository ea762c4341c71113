import type { Notification, NotificationStore } from '@notirelay/db';
import { MAX_HISTORY_LIMIT } from '@notirelay/db';
import { historyMessage } from '@notirelay/protocol';
import { AuthError, CapacityError } from '../errors.js';
import { createSubscriber, type BroadcastHub, type Subscriber } from '../hub/broadcast-hub.js';
import type { Logger } from '../logger.js';
import { tokensMatch } from '../middleware/auth.js';
import { delay, withDeadline } from './deadline.js';
import type { SubscriberTransport } from './transport.js';

/** Upper bound on concurrently active subscribers. */
export const MAX_SUBSCRIBERS = 15;

export interface LifecycleTimings {
  /** Peer is presumed dead when no pong arrives for this long */
  readDeadlineMs: number;
  /** Bound on every frame and ping write */
  writeDeadlineMs: number;
  pingIntervalMs: number;
}

// Two ping periods fit inside the read deadline before the peer is given up on.
export const DEFAULT_TIMINGS: LifecycleTimings = {
  readDeadlineMs: 70_000,
  writeDeadlineMs: 10_000,
  pingIntervalMs: 30_000,
};

export type ConnectionState = 'connecting' | 'authenticated' | 'active' | 'closed';

export type CloseReason =
  | 'peer-closed'
  | 'read-timeout'
  | 'write-failed'
  | 'ping-failed'
  | 'queue-closed'
  | 'aborted';

export interface LifecycleDeps {
  token: string;
  hub: BroadcastHub;
  store: Pick<NotificationStore, 'history'>;
  log: Logger;
  maxSubscribers?: number;
  timings?: LifecycleTimings;
}

/**
 * One subscriber connection, from the upgrade request to teardown.
 *
 *   connecting --authenticate--> authenticated --activate--> active --> closed
 *
 * authenticate and admit run before the protocol upgrade so a bad token or a full
 * relay is answered with a plain HTTP error. activate registers the subscriber and
 * then runs three duties under one AbortController:
 *
 * - inbound watch: waits for the peer to go away; every pong pushes the read deadline out
 * - outbound drain: writes queued frames, each under the write deadline
 * - keepalive: pings on an interval, under the write deadline
 *
 * Whichever duty ends first decides the close reason. The others are aborted, the
 * subscriber is unregistered (closing its queue) and the socket is terminated.
 */
export class ConnectionLifecycle {
  private current: ConnectionState = 'connecting';
  private holdsSlot = false;
  private readonly maxSubscribers: number;
  private readonly timings: LifecycleTimings;

  constructor(private readonly deps: LifecycleDeps) {
    this.maxSubscribers = deps.maxSubscribers ?? MAX_SUBSCRIBERS;
    this.timings = deps.timings ?? DEFAULT_TIMINGS;
  }

  get state(): ConnectionState {
    return this.current;
  }

  /**
   * @throws AuthError when the query token is absent or does not match
   */
  authenticate(token: string | undefined): void {
    this.expectState('connecting');
    if (token === undefined || !tokensMatch(token, this.deps.token)) {
      throw new AuthError();
    }
    this.current = 'authenticated';
  }

  /**
   * Capacity check ahead of the upgrade. On success a slot is held in the hub until
   * activate turns it into a registration or abandon gives it back, so a rejected
   * or abandoned attempt is never counted.
   *
   * @throws CapacityError when registered subscribers plus held slots reach maxSubscribers
   */
  admit(): void {
    this.expectState('authenticated');
    if (this.holdsSlot) return;
    if (!this.deps.hub.reserve(this.maxSubscribers)) {
      throw new CapacityError(this.maxSubscribers);
    }
    this.holdsSlot = true;
  }

  /** The upgrade never completed: give the held slot back. No-op once activated. */
  abandon(): void {
    if (this.current !== 'authenticated') return;
    this.releaseSlot();
    this.current = 'closed';
  }

  /**
   * Enter the active state on an upgraded socket and run until the connection ends.
   *
   * Registration, the history read and the enqueue of the history frame happen in
   * one synchronous step. Store writes are synchronous too, so no notification can
   * be inserted in between: everything older is in the snapshot, everything newer
   * arrives as a live frame after it.
   *
   * @returns why the connection ended
   * @throws CapacityError when called without admit on a full relay
   */
  async activate(transport: SubscriberTransport): Promise<CloseReason> {
    this.expectState('authenticated');
    const { hub, store, log } = this.deps;

    try {
      this.admit();
    } catch (err) {
      this.current = 'closed';
      transport.terminate();
      throw err;
    }
    this.releaseSlot();

    const subscriber = createSubscriber();
    hub.register(subscriber);

    let snapshot: Notification[] = [];
    try {
      snapshot = store.history(MAX_HISTORY_LIMIT, 0);
    } catch (err) {
      log(`ws history: ${err instanceof Error ? err.message : String(err)}`);
    }
    subscriber.queue.tryEnqueue(JSON.stringify(historyMessage(snapshot)));

    this.current = 'active';
    log(
      `ws: subscriber #${subscriber.id} connected from ${transport.remoteAddress} ` +
        `(${hub.connectedCount()}/${this.maxSubscribers})`,
    );

    const reason = await this.run(subscriber, transport);
    log(`ws: subscriber #${subscriber.id} disconnected from ${transport.remoteAddress}: ${reason}`);
    return reason;
  }

  private async run(subscriber: Subscriber, transport: SubscriberTransport): Promise<CloseReason> {
    const controller = new AbortController();
    const duties = [
      this.watchInbound(transport, controller.signal),
      this.drainOutbound(subscriber, transport, controller.signal),
      this.keepalive(transport, controller.signal),
    ];

    const reason = await Promise.race(duties);

    controller.abort();
    this.deps.hub.unregister(subscriber);
    subscriber.queue.close();
    transport.terminate();
    await Promise.allSettled(duties);

    this.current = 'closed';
    return reason;
  }

  private watchInbound(transport: SubscriberTransport, signal: AbortSignal): Promise<CloseReason> {
    return new Promise((resolve) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;
      let removePong: () => void = () => {};
      let removeClose: () => void = () => {};

      const finish = (reason: CloseReason): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        removePong();
        removeClose();
        signal.removeEventListener('abort', onAbort);
        resolve(reason);
      };
      const onAbort = (): void => finish('aborted');
      const armReadDeadline = (): void => {
        clearTimeout(timer);
        timer = setTimeout(() => finish('read-timeout'), this.timings.readDeadlineMs);
      };

      armReadDeadline();
      removePong = transport.onPong(armReadDeadline);
      removeClose = transport.onClose(() => finish('peer-closed'));
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  private async drainOutbound(
    subscriber: Subscriber,
    transport: SubscriberTransport,
    signal: AbortSignal,
  ): Promise<CloseReason> {
    for await (const frame of subscriber.queue) {
      if (signal.aborted) return 'aborted';
      try {
        await withDeadline('write', () => transport.send(frame), this.timings.writeDeadlineMs);
      } catch (err) {
        this.deps.log(
          `ws: write to subscriber #${subscriber.id} failed: ${err instanceof Error ? err.message : String(err)}`,
        );
        return 'write-failed';
      }
    }
    return signal.aborted ? 'aborted' : 'queue-closed';
  }

  private async keepalive(transport: SubscriberTransport, signal: AbortSignal): Promise<CloseReason> {
    while (await delay(this.timings.pingIntervalMs, signal)) {
      try {
        await withDeadline('ping', () => transport.ping(), this.timings.writeDeadlineMs);
      } catch {
        return signal.aborted ? 'aborted' : 'ping-failed';
      }
    }
    return 'aborted';
  }

  private releaseSlot(): void {
    if (!this.holdsSlot) return;
    this.holdsSlot = false;
    this.deps.hub.release();
  }

  private expectState(expected: ConnectionState): void {
    if (this.current !== expected) {
      throw new Error(`connection is ${this.current}, expected ${expected}`);
    }
  }
}
