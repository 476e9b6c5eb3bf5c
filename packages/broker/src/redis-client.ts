/**
 * node-redis implementation of {@link PubSubClient}.
 *
 * Redis requires a dedicated connection for subscriptions, so the client
 * holds two: one for `publish()` and one for `subscribe()/unsubscribe()`.
 * Reconnection gives up after a few attempts so a missing server surfaces as
 * a failed `connect()` rather than an endless retry loop.
 *
 * @module broker/redis-client
 */
import { createClient } from 'redis';
import type { Logger } from '@a2a/shared/logger';
import { createTaggedLogger, logError } from './lib/logger.js';
import type { PubSubClient } from './types.js';

/** Reconnect attempts before a connection is declared lost. */
const MAX_RECONNECT_ATTEMPTS = 5;

export interface RedisPubSubClientOptions {
  url: string;
  /** Socket connect timeout in milliseconds. */
  connectTimeoutMs?: number;
  logger?: Logger;
}

/** Create a pub/sub client backed by a pair of node-redis connections. */
export function createRedisPubSubClient(options: RedisPubSubClientOptions): PubSubClient {
  const logger = options.logger ?? createTaggedLogger('RedisClient');

  const publisher = createClient({
    url: options.url,
    socket: {
      connectTimeout: options.connectTimeoutMs ?? 5000,
      reconnectStrategy: (retries: number) =>
        retries >= MAX_RECONNECT_ATTEMPTS
          ? new Error(`gave up reconnecting after ${retries} attempts`)
          : Math.min(retries * 200, 2000),
    },
  });
  const subscriber = publisher.duplicate();

  publisher.on('error', (err: unknown) => logger.warn('publisher connection error', logError(err)));
  subscriber.on('error', (err: unknown) => logger.warn('subscriber connection error', logError(err)));

  return {
    async connect() {
      try {
        await publisher.connect();
        await subscriber.connect();
      } catch (err) {
        if (publisher.isOpen) await publisher.disconnect();
        if (subscriber.isOpen) await subscriber.disconnect();
        throw err;
      }
    },

    publish(channel, message) {
      return publisher.publish(channel, message);
    },

    async subscribe(channel, listener) {
      await subscriber.subscribe(channel, listener);
    },

    // Without the listener node-redis drops every listener on the channel
    async unsubscribe(channel, listener) {
      await subscriber.unsubscribe(channel, listener);
    },

    async disconnect() {
      if (publisher.isReady) await publisher.quit();
      else if (publisher.isOpen) await publisher.disconnect();
      if (subscriber.isReady) await subscriber.quit();
      else if (subscriber.isOpen) await subscriber.disconnect();
    },
  };
}
