/**
 * @a2a/broker — store-and-forward routing core for cloud/local agent messaging.
 *
 * @module broker
 */
export { createBroker } from './broker.js';
export type { Broker, BrokerDeps } from './broker.js';
export { MessageRouter } from './router.js';
export type { MessageRouterOptions } from './router.js';
export { FileTransport } from './file-transport.js';
export type { FileTransportOptions } from './file-transport.js';
export { PubSubTransport, inboxChannel, DEFAULT_CHANNEL_PREFIX } from './pubsub-transport.js';
export type { PubSubTransportOptions } from './pubsub-transport.js';
export { createRedisPubSubClient } from './redis-client.js';
export type { RedisPubSubClientOptions } from './redis-client.js';
export { Deduplicator, DEFAULT_DEDUP_MAX_SIZE, DEFAULT_DEDUP_TTL_SECONDS } from './deduplicator.js';
export type { DeduplicatorOptions } from './deduplicator.js';
export { DeadLetterQueue } from './dead-letter-queue.js';
export type { DeadLetterQueueOptions, DeadLetterEntry, DeadLetterReason } from './dead-letter-queue.js';
export { TtlEnforcer } from './ttl-enforcer.js';
export type { TtlEnforcerOptions } from './ttl-enforcer.js';
export { InboxWatcher } from './inbox-watcher.js';
export { claimTask, canWriteDashboard, DASHBOARD_WRITER } from './vault-rules.js';
export { loadBrokerConfig } from './env.js';
export type { BrokerEnv } from './env.js';
export { BrokerError, errorMessage } from './errors.js';
export type { BrokerErrorCode } from './errors.js';
export { logger, initLogger, createTaggedLogger, logError } from './lib/logger.js';
export { resolveMessagePaths, messageFileName } from './lib/paths.js';
export type { MessagePaths } from './lib/paths.js';
export type {
  DurableTransport,
  MessageHandler,
  MessageListener,
  PubSubClient,
  PubSubListener,
  RouteFailureReason,
  RouteResult,
  RouterStatus,
  SendResult,
  StopWatching,
  Transport,
  TransportKind,
} from './types.js';
