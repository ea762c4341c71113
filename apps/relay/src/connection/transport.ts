import type { WebSocket } from 'ws';

/**
 * What a subscriber connection needs from its socket. Kept narrow so the
 * lifecycle can run against a fake in tests.
 */
export interface SubscriberTransport {
  /** Peer address, for logs only */
  readonly remoteAddress: string;
  /** Resolves once the frame is handed to the OS, rejects if the socket cannot take it. */
  send(data: string): Promise<void>;
  ping(): Promise<void>;
  /** Returns a function that removes the listener. */
  onPong(listener: () => void): () => void;
  /** Fires once when the peer closes or the socket errors. Returns a remover. */
  onClose(listener: (reason: string) => void): () => void;
  /** Drop the connection immediately. */
  terminate(): void;
}

export function webSocketTransport(ws: WebSocket, remoteAddress: string): SubscriberTransport {
  return {
    remoteAddress,

    send: (data) =>
      new Promise<void>((resolve, reject) => {
        ws.send(data, (err) => (err ? reject(err) : resolve()));
      }),

    ping: () =>
      new Promise<void>((resolve, reject) => {
        ws.ping(undefined, undefined, (err?: Error) => (err ? reject(err) : resolve()));
      }),

    onPong(listener) {
      ws.on('pong', listener);
      return () => {
        ws.off('pong', listener);
      };
    },

    onClose(listener) {
      let fired = false;
      const onClose = (code: number): void => {
        if (fired) return;
        fired = true;
        listener(`closed (${code})`);
      };
      const onError = (err: Error): void => {
        if (fired) return;
        fired = true;
        listener(`error: ${err.message}`);
      };
      ws.on('close', onClose);
      ws.on('error', onError);
      return () => {
        ws.off('close', onClose);
        ws.off('error', onError);
      };
    },

    terminate: () => {
      ws.terminate();
    },
  };
}
