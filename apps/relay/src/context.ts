import type { NotificationStore } from '@notirelay/db';
import type { LifecycleTimings } from './connection/lifecycle.js';
import type { BroadcastHub } from './hub/broadcast-hub.js';
import type { Logger } from './logger.js';

/**
 * Everything a handler or connection needs, built once at startup and passed
 * down explicitly. Nothing in the relay reads process-wide state.
 */
export interface RelayContext {
  token: string;
  store: NotificationStore;
  hub: BroadcastHub;
  log: Logger;
  maxSubscribers: number;
  timings: LifecycleTimings;
}
