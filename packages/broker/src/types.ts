/**
 * Internal type definitions for the @a2a/broker package.
 *
 * All types used across broker modules are defined here to avoid
 * circular imports and provide a single source of truth.
 *
 * @module broker/types
 */
import type { A2AMessage, AgentRole, MessageStatus } from '@a2a/shared/message-schemas';
import type { BrokerErrorCode } from './errors.js';

export type MessageHandler = (message: A2AMessage) => void | Promise<void>;
export type MessageListener = (message: A2AMessage) => void;
export type StopWatching = () => Promise<void>;

/** Which transport stack a router is running on. */
export type TransportKind = 'file' | 'file+pubsub';

/** Result of a transport send. */
export type SendResult =
  | { ok: true; messageId: string }
  | { ok: false; code: BrokerErrorCode; error: string };

/** Contract every transport implements. */
export interface Transport {
  readonly kind: TransportKind;

  /** Persist or publish a message for its recipient. */
  send(message: A2AMessage): Promise<SendResult>;

  /** Up to `limit` messages waiting in `role`'s inbox, oldest first. */
  receive(role: AgentRole, limit: number): Promise<A2AMessage[]>;

  close(): Promise<void>;
}

/**
 * A transport whose storage is the ground truth for delivery state.
 *
 * Inbox files can be acknowledged, dead-lettered and watched.
 */
export interface DurableTransport extends Transport {
  /** Move the inbox file into `processed/`. `false` when it is already gone. */
  acknowledge(message: A2AMessage, role: AgentRole): Promise<boolean>;

  /** Move the inbox file into `dead_letter/`, or write the message there if it is gone. */
  moveToDeadLetter(message: A2AMessage, role: AgentRole): Promise<boolean>;

  /** Notify `listener` of each message arriving in `role`'s inbox until stopped. */
  watch(role: AgentRole, listener: MessageListener): Promise<StopWatching>;
}

/** Why `route()` did not deliver a message. */
export type RouteFailureReason =
  | 'duplicate'
  | 'expired_before_routing'
  | 'send_failed'
  | 'max_retries_exceeded'
  /** The message belonged in the DLQ but the record could not be written. */
  | 'dead_letter_failed';

/** Result of a route operation. `status` is the message's status afterwards. */
export type RouteResult =
  | { ok: true; messageId: string; status: MessageStatus }
  | { ok: false; messageId: string; reason: RouteFailureReason; status: MessageStatus };

/** Cheap counters describing a running router. */
export interface RouterStatus {
  transport: TransportKind;
  /** Whether the real-time channel is up (always `false` for file-only). */
  connected: boolean;
  dedupCacheSize: number;
  dlqCount: number;
}

export type PubSubListener = (message: string) => void;

/**
 * Minimal pub/sub client surface used by the best-effort transport.
 *
 * The default implementation wraps node-redis; tests use an in-process stand-in.
 */
export interface PubSubClient {
  connect(): Promise<void>;
  publish(channel: string, message: string): Promise<number>;
  subscribe(channel: string, listener: PubSubListener): Promise<void>;
  /** Remove `listener` only; other listeners on `channel` keep receiving. */
  unsubscribe(channel: string, listener: PubSubListener): Promise<void>;
  disconnect(): Promise<void>;
}
