import 'dotenv/config';
import { serve } from '@hono/node-server';
import { NotificationStore, openDatabase, type DatabaseHandle } from '@notirelay/db';
import { CommanderError } from 'commander';
import { Server } from 'node:http';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { DEFAULT_TIMINGS, MAX_SUBSCRIBERS } from './connection/lifecycle.js';
import { attachSubscriptions } from './connection/upgrade.js';
import type { RelayContext } from './context.js';
import { BroadcastHub } from './hub/broadcast-hub.js';
import { createLogger } from './logger.js';
import { registerShutdownHandlers } from './shutdown.js';

/**
 * Relay entry point. Token misconfiguration or an unusable database file stop the
 * process before it starts serving.
 */

const log = createLogger('relay');

function fatal(message: string): never {
  process.stderr.write(`[relay] FATAL: ${message}\n`);
  process.exit(1);
}

async function main(): Promise<void> {
  const config = await loadConfig(process.argv);

  let database: DatabaseHandle;
  try {
    database = openDatabase(config.dbPath);
  } catch (err) {
    fatal(`init db: ${err instanceof Error ? err.message : String(err)}`);
  }
  log(`database: ${database.path}`);
  if (database.migrations.length > 0) {
    log(`database: applied ${database.migrations.join(', ')}`);
  }

  const store = new NotificationStore(database.db);
  log(`database: ${store.count()} notifications (${store.unseenCount()} unseen)`);

  const ctx: RelayContext = {
    token: config.token,
    store,
    hub: new BroadcastHub(),
    log,
    maxSubscribers: MAX_SUBSCRIBERS,
    timings: DEFAULT_TIMINGS,
  };

  const app = createApp(ctx);
  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    log(`listening on ${info.address}:${info.port}`);
  });
  if (!(server instanceof Server)) {
    fatal('expected an HTTP/1.1 server');
  }
  server.on('error', (err) => fatal(`listen: ${err.message}`));

  const wss = attachSubscriptions(server, ctx);
  registerShutdownHandlers({ server, wss, hub: ctx.hub, database, log: createLogger('shutdown') });
}

main().catch((err: unknown) => {
  if (err instanceof CommanderError) {
    process.exit(err.exitCode);
  }
  fatal(err instanceof Error ? err.message : String(err));
});
