import type { Server } from 'node:http';
import type { WebSocketServer } from 'ws';
import type { BroadcastHub } from './hub/broadcast-hub.js';
import type { Logger } from './logger.js';

/**
 * Graceful shutdown on SIGTERM / SIGINT, in this order:
 * 1. Subscribers: unregister everyone (their writers end and sockets are terminated)
 * 2. WebSocket server: terminate any socket still mid-handshake, then close
 * 3. HTTP server: stop accepting, drop idle keep-alive connections
 * 4. SQLite handle
 *
 * A 10-second force-exit timer covers a shutdown that hangs.
 */
export interface ShutdownResources {
  server: Server;
  wss: WebSocketServer;
  hub: BroadcastHub;
  database: { close(): void };
  log: Logger;
}

export function registerShutdownHandlers(resources: ShutdownResources): void {
  const { server, wss, hub, database, log } = resources;
  let shuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    log(`Received ${signal}. Shutting down...`);

    const forceKillTimer = setTimeout(() => {
      log('Graceful shutdown timed out after 10s. Forcing exit.');
      process.exit(1);
    }, 10_000);
    forceKillTimer.unref();

    try {
      const closed = hub.closeAll();
      log(`Closed ${closed} subscriber connections.`);

      for (const ws of wss.clients) ws.terminate();
      await new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });

      const serverClosed = new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      server.closeIdleConnections();
      await serverClosed;
      log('HTTP server closed.');

      database.close();
      log('Database closed.');

      process.exit(0);
    } catch (err) {
      log(`Error during shutdown: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  }

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
}
