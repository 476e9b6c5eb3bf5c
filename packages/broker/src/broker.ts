/**
 * Default wiring for a broker process.
 *
 * Builds the file transport, dead letter queue, TTL enforcer and router from
 * a {@link BrokerConfig}. When a pub/sub URL is configured (or a client is
 * injected) the file transport is wrapped in {@link PubSubTransport} and a
 * connection is attempted; a failed connection leaves the broker in
 * file-only mode.
 *
 * @module broker/broker
 */
import { LOG_LEVEL_MAP, type BrokerConfig } from '@a2a/shared/config-schema';
import { createMessage, type CreateMessageInput } from '@a2a/shared/message';
import type { A2AMessage } from '@a2a/shared/message-schemas';
import type { Logger } from '@a2a/shared/logger';
import { DeadLetterQueue } from './dead-letter-queue.js';
import { Deduplicator } from './deduplicator.js';
import { FileTransport } from './file-transport.js';
import { createTaggedLogger, initLogger } from './lib/logger.js';
import { PubSubTransport } from './pubsub-transport.js';
import { createRedisPubSubClient } from './redis-client.js';
import { MessageRouter } from './router.js';
import { TtlEnforcer } from './ttl-enforcer.js';
import type { DurableTransport, PubSubClient } from './types.js';

/** Optional overrides for {@link createBroker}. */
export interface BrokerDeps {
  /** Use this client instead of building a node-redis one from `pubsub.url`. */
  pubsubClient?: PubSubClient;
  /** Route every component's logs here instead of the tagged consola loggers. */
  logger?: Logger;
  /** Skip `initLogger()` (the caller already configured logging). */
  skipLoggerInit?: boolean;
}

/** A fully wired broker. */
export interface Broker {
  config: BrokerConfig;
  transport: DurableTransport;
  /** Present when the pub/sub layer was configured, connected or not. */
  pubsub: PubSubTransport | null;
  router: MessageRouter;
  deadLetterQueue: DeadLetterQueue;
  ttlEnforcer: TtlEnforcer;
  /** {@link createMessage} with the configured TTL and retry defaults. */
  newMessage(input: CreateMessageInput): A2AMessage;
  close(): Promise<void>;
}

/**
 * Create a broker from configuration.
 *
 * @throws {BrokerError} `CONFIGURATION_ERROR` when the vault directories cannot be created.
 *
 * @example
 * ```ts
 * const broker = await createBroker(loadBrokerConfig());
 * await broker.router.route(broker.newMessage({
 *   sender: 'cloud',
 *   recipient: 'local',
 *   messageType: 'task_delegation',
 *   payload: { task: 'Summarize inbox' },
 * }));
 * ```
 */
export async function createBroker(config: BrokerConfig, deps: BrokerDeps = {}): Promise<Broker> {
  if (!deps.skipLoggerInit) {
    initLogger({ level: LOG_LEVEL_MAP[config.logging.level], logDir: config.logging.logDir });
  }
  const log = (tag: string): Logger => deps.logger ?? createTaggedLogger(tag);

  const fileTransport = new FileTransport({ vaultPath: config.vaultPath, logger: log('FileTransport') });
  const deadLetterQueue = new DeadLetterQueue({ vaultPath: config.vaultPath, logger: log('DeadLetterQueue') });
  const ttlEnforcer = new TtlEnforcer({
    vaultPath: config.vaultPath,
    deadLetterQueue,
    logger: log('TtlEnforcer'),
  });

  let pubsub: PubSubTransport | null = null;
  const url = config.pubsub.url;
  const client =
    deps.pubsubClient ??
    (url ? createRedisPubSubClient({ url, connectTimeoutMs: config.pubsub.connectTimeoutMs, logger: log('RedisClient') }) : null);
  if (client) {
    pubsub = new PubSubTransport({
      durable: fileTransport,
      client,
      channelPrefix: config.pubsub.channelPrefix,
      connectTimeoutMs: config.pubsub.connectTimeoutMs,
      logger: log('PubSubTransport'),
    });
    await pubsub.connect();
  }

  const transport: DurableTransport = pubsub ?? fileTransport;
  const dedupOptions = { maxSize: config.dedup.maxSize, ttlSeconds: config.dedup.ttlSeconds };
  const router = new MessageRouter({
    transport,
    deadLetterQueue,
    ttlEnforcer,
    outboundDedup: new Deduplicator(dedupOptions),
    inboundDedup: new Deduplicator(dedupOptions),
    logger: log('MessageRouter'),
  });

  return {
    config,
    transport,
    pubsub,
    router,
    deadLetterQueue,
    ttlEnforcer,
    newMessage: (input) =>
      createMessage({
        ttlSeconds: config.messages.defaultTtlSeconds,
        maxRetries: config.messages.defaultMaxRetries,
        ...input,
      }),
    close: () => router.close(),
  };
}
