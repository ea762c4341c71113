import type { Notification } from '@notirelay/db';
import { ServerMessage, historyMessage, notificationMessage } from '@notirelay/protocol';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AuthError, CapacityError } from '../errors.js';
import { BroadcastHub, createSubscriber } from '../hub/broadcast-hub.js';
import { silentLogger } from '../logger.js';
import { ConnectionLifecycle } from './lifecycle.js';
import type { SubscriberTransport } from './transport.js';

class FakeTransport implements SubscriberTransport {
  readonly remoteAddress = 'test-peer';
  readonly sent: string[] = [];
  pings = 0;
  terminated = false;
  failSends = false;
  hangSends = false;
  failPings = false;
  private readonly pongListeners = new Set<() => void>();
  private readonly closeListeners = new Set<(reason: string) => void>();

  send(data: string): Promise<void> {
    if (this.hangSends) return new Promise(() => {});
    if (this.failSends) return Promise.reject(new Error('broken pipe'));
    this.sent.push(data);
    return Promise.resolve();
  }

  ping(): Promise<void> {
    this.pings++;
    return this.failPings ? Promise.reject(new Error('broken pipe')) : Promise.resolve();
  }

  onPong(listener: () => void): () => void {
    this.pongListeners.add(listener);
    return () => this.pongListeners.delete(listener);
  }

  onClose(listener: (reason: string) => void): () => void {
    this.closeListeners.add(listener);
    return () => this.closeListeners.delete(listener);
  }

  terminate(): void {
    this.terminated = true;
  }

  pong(): void {
    for (const listener of [...this.pongListeners]) listener();
  }

  peerClose(): void {
    for (const listener of [...this.closeListeners]) listener('closed (1000)');
  }

  frames(): ServerMessage[] {
    return this.sent.map((raw) => ServerMessage.parse(JSON.parse(raw)));
  }
}

function notification(id: number): Notification {
  return { id, title: `t${id}`, text: `b${id}`, createdAt: '2026-01-01T00:00:00.000Z', seenAt: null };
}

function setup(options: { rows?: Notification[]; hub?: BroadcastHub; failHistory?: boolean } = {}) {
  const hub = options.hub ?? new BroadcastHub();
  const history = vi.fn((_limit?: number, _offset?: number): Notification[] => {
    if (options.failHistory) throw new Error('disk I/O error');
    return options.rows ?? [];
  });
  const lifecycle = new ConnectionLifecycle({
    token: 'test-secret',
    hub,
    store: { history },
    log: silentLogger,
  });
  return { hub, history, lifecycle };
}

function fullHub(): BroadcastHub {
  const hub = new BroadcastHub();
  for (let i = 0; i < 15; i++) hub.register(createSubscriber());
  return hub;
}

const flush = () => vi.advanceTimersByTimeAsync(0);

describe('ConnectionLifecycle handshake', () => {
  it('moves to authenticated on the right token', () => {
    const { lifecycle } = setup();
    lifecycle.authenticate('test-secret');

    expect(lifecycle.state).toBe('authenticated');
  });

  it('rejects a wrong or missing token and stays connecting', () => {
    const { lifecycle } = setup();

    expect(() => lifecycle.authenticate('wrong')).toThrow(AuthError);
    expect(() => lifecycle.authenticate(undefined)).toThrow(AuthError);
    expect(lifecycle.state).toBe('connecting');
  });

  it('refuses to admit once 15 subscribers are active and leaves them alone', () => {
    const hub = fullHub();
    const { lifecycle } = setup({ hub });
    lifecycle.authenticate('test-secret');

    expect(() => lifecycle.admit()).toThrow(CapacityError);
    expect(hub.connectedCount()).toBe(15);
  });

  it('admits the fifteenth subscriber', () => {
    const hub = new BroadcastHub();
    for (let i = 0; i < 14; i++) hub.register(createSubscriber());
    const { lifecycle } = setup({ hub });
    lifecycle.authenticate('test-secret');

    expect(() => lifecycle.admit()).not.toThrow();
  });

  it('cannot activate before authenticating', async () => {
    const { lifecycle } = setup();

    await expect(lifecycle.activate(new FakeTransport())).rejects.toThrow(
      'connection is connecting, expected authenticated',
    );
  });
});

describe('ConnectionLifecycle while active', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('sends the history snapshot first, then live frames', async () => {
    const rows = [notification(2), notification(1)];
    const { hub, history, lifecycle } = setup({ rows });
    const transport = new FakeTransport();
    lifecycle.authenticate('test-secret');
    const done = lifecycle.activate(transport);
    await flush();

    expect(history).toHaveBeenCalledWith(100, 0);
    expect(lifecycle.state).toBe('active');
    expect(hub.connectedCount()).toBe(1);

    hub.publish(notificationMessage(notification(3)));
    await flush();

    expect(transport.frames()).toEqual([historyMessage(rows), notificationMessage(notification(3))]);

    transport.peerClose();
    await expect(done).resolves.toBe('peer-closed');
    expect(hub.connectedCount()).toBe(0);
    expect(transport.terminated).toBe(true);
    expect(lifecycle.state).toBe('closed');
  });

  it('sends an empty history when the store read fails', async () => {
    const { lifecycle } = setup({ failHistory: true });
    const transport = new FakeTransport();
    lifecycle.authenticate('test-secret');
    const done = lifecycle.activate(transport);
    await flush();

    expect(transport.frames()).toEqual([{ type: 'history', notifications: [] }]);

    transport.peerClose();
    await done;
  });

  it('unregisters a silent peer when the read deadline passes', async () => {
    const { hub, lifecycle } = setup();
    const transport = new FakeTransport();
    lifecycle.authenticate('test-secret');
    const done = lifecycle.activate(transport);
    await flush();

    await vi.advanceTimersByTimeAsync(69_999);
    expect(hub.connectedCount()).toBe(1);
    expect(transport.pings).toBe(2);

    await vi.advanceTimersByTimeAsync(1);
    await expect(done).resolves.toBe('read-timeout');
    expect(hub.connectedCount()).toBe(0);
    expect(transport.terminated).toBe(true);
  });

  it('stays open while pongs keep arriving', async () => {
    const { lifecycle } = setup();
    const transport = new FakeTransport();
    lifecycle.authenticate('test-secret');
    const done = lifecycle.activate(transport);
    await flush();

    for (let i = 0; i < 4; i++) {
      await vi.advanceTimersByTimeAsync(30_000);
      transport.pong();
    }
    await vi.advanceTimersByTimeAsync(20_000);

    expect(lifecycle.state).toBe('active');
    expect(transport.pings).toBe(4);

    transport.peerClose();
    await expect(done).resolves.toBe('peer-closed');
  });

  it('closes on a failed write', async () => {
    const { hub, lifecycle } = setup();
    const transport = new FakeTransport();
    transport.failSends = true;
    lifecycle.authenticate('test-secret');

    await expect(lifecycle.activate(transport)).resolves.toBe('write-failed');
    expect(hub.connectedCount()).toBe(0);
  });

  it('closes when a write outlives the write deadline', async () => {
    const { lifecycle } = setup();
    const transport = new FakeTransport();
    transport.hangSends = true;
    lifecycle.authenticate('test-secret');
    const done = lifecycle.activate(transport);

    await vi.advanceTimersByTimeAsync(10_000);
    await expect(done).resolves.toBe('write-failed');
  });

  it('closes when a ping cannot be written', async () => {
    const { lifecycle } = setup();
    const transport = new FakeTransport();
    transport.failPings = true;
    lifecycle.authenticate('test-secret');
    const done = lifecycle.activate(transport);

    await vi.advanceTimersByTimeAsync(30_000);
    await expect(done).resolves.toBe('ping-failed');
  });

  it('closes when the hub drops the subscriber', async () => {
    const { hub, lifecycle } = setup();
    const transport = new FakeTransport();
    lifecycle.authenticate('test-secret');
    const done = lifecycle.activate(transport);
    await flush();

    hub.closeAll();
    await expect(done).resolves.toBe('queue-closed');
    expect(transport.terminated).toBe(true);
  });

  it('rejects activation on a full relay when it was never admitted', async () => {
    const hub = fullHub();
    const { lifecycle } = setup({ hub });
    lifecycle.authenticate('test-secret');
    const transport = new FakeTransport();

    await expect(lifecycle.activate(transport)).rejects.toThrow(CapacityError);
    expect(transport.terminated).toBe(true);
    expect(lifecycle.state).toBe('closed');
    expect(hub.connectedCount()).toBe(15);
  });

  it('turns the slot held since admission into the registration', async () => {
    const hub = new BroadcastHub();
    const { lifecycle } = setup({ hub });
    lifecycle.authenticate('test-secret');
    lifecycle.admit();
    expect(hub.reservedCount()).toBe(1);

    const done = lifecycle.activate(new FakeTransport());
    await flush();

    expect(hub.reservedCount()).toBe(0);
    expect(hub.connectedCount()).toBe(1);
    hub.closeAll();
    await expect(done).resolves.toBe('queue-closed');
  });
});

describe('ConnectionLifecycle slot reservation', () => {
  function admittedOn(hub: BroadcastHub): ConnectionLifecycle {
    const { lifecycle } = setup({ hub });
    lifecycle.authenticate('test-secret');
    lifecycle.admit();
    return lifecycle;
  }

  it('counts an admitted but unfinished upgrade against the cap', () => {
    const hub = new BroadcastHub();
    for (let i = 0; i < 14; i++) hub.register(createSubscriber());
    admittedOn(hub);

    const { lifecycle: late } = setup({ hub });
    late.authenticate('test-secret');

    expect(() => late.admit()).toThrow(CapacityError);
    expect(hub.connectedCount()).toBe(14);
  });

  it('gives the slot back when the upgrade is abandoned', () => {
    const hub = new BroadcastHub();
    for (let i = 0; i < 14; i++) hub.register(createSubscriber());
    const first = admittedOn(hub);

    first.abandon();

    expect(first.state).toBe('closed');
    expect(hub.reservedCount()).toBe(0);
    expect(() => admittedOn(hub)).not.toThrow();
  });

  it('holds one slot however often admit is called', () => {
    const hub = new BroadcastHub();
    const lifecycle = admittedOn(hub);

    lifecycle.admit();

    expect(hub.reservedCount()).toBe(1);
  });

  it('ignores abandon after activation', async () => {
    vi.useFakeTimers();
    const hub = new BroadcastHub();
    const lifecycle = admittedOn(hub);
    const done = lifecycle.activate(new FakeTransport());
    await flush();

    lifecycle.abandon();

    expect(lifecycle.state).toBe('active');
    expect(hub.connectedCount()).toBe(1);
    hub.closeAll();
    await expect(done).resolves.toBe('queue-closed');
    vi.useRealTimers();
  });
});
