/**
 * Best-effort real-time transport layered over a durable transport.
 *
 * Composition, not inheritance: every call is answered by the wrapped
 * {@link DurableTransport}, and a pub/sub publish is attempted only after
 * the durable write succeeded. Nothing the pub/sub side does can turn a
 * durable success into a failure. With the channel down the broker keeps
 * running in file-only mode.
 *
 * Wire format: the serialized message on channel `{prefix}:{role}:inbox`,
 * at-most-once with no acknowledgements.
 *
 * @module broker/pubsub-transport
 */
import type { A2AMessage, AgentRole } from '@a2a/shared/message-schemas';
import { parseMessage, serializeMessage } from '@a2a/shared/message';
import type { Logger } from '@a2a/shared/logger';
import { createTaggedLogger, logError } from './lib/logger.js';
import type {
  DurableTransport,
  MessageHandler,
  MessageListener,
  PubSubClient,
  PubSubListener,
  SendResult,
  StopWatching,
} from './types.js';

/** Default channel prefix. */
export const DEFAULT_CHANNEL_PREFIX = 'a2a';

/** Default time allowed for the pub/sub connection handshake. */
const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

export interface PubSubTransportOptions {
  /** Ground-truth transport every operation falls back on. */
  durable: DurableTransport;
  client: PubSubClient;
  channelPrefix?: string;
  connectTimeoutMs?: number;
  logger?: Logger;
}

/** Channel a role listens on for real-time pushes. */
export function inboxChannel(role: AgentRole, prefix: string = DEFAULT_CHANNEL_PREFIX): string {
  return `${prefix}:${role}:inbox`;
}

export class PubSubTransport implements DurableTransport {
  readonly kind = 'file+pubsub' as const;
  private readonly durable: DurableTransport;
  private readonly client: PubSubClient;
  private readonly channelPrefix: string;
  private readonly connectTimeoutMs: number;
  private readonly logger: Logger;
  private connected = false;

  constructor(options: PubSubTransportOptions) {
    this.durable = options.durable;
    this.client = options.client;
    this.channelPrefix = options.channelPrefix ?? DEFAULT_CHANNEL_PREFIX;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.logger = options.logger ?? createTaggedLogger('PubSubTransport');
  }

  /** Whether the pub/sub channel is available. */
  get isConnected(): boolean {
    return this.connected;
  }

  /**
   * Try to open the pub/sub connection.
   *
   * Never throws: on failure the transport stays in file-only mode.
   *
   * @returns Whether the connection is up.
   */
  async connect(): Promise<boolean> {
    if (this.connected) return true;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`connect timed out after ${this.connectTimeoutMs}ms`)),
        this.connectTimeoutMs,
      );
    });

    try {
      await Promise.race([this.client.connect(), timeout]);
      this.connected = true;
      this.logger.info('pub/sub connected');
    } catch (err) {
      this.connected = false;
      this.logger.warn('pub/sub unavailable, continuing in file-only mode', logError(err));
      await this.disconnectQuietly();
    } finally {
      clearTimeout(timer);
    }
    return this.connected;
  }

  /**
   * Persist durably, then publish best-effort.
   *
   * The durable result is returned unchanged whatever happens to the publish.
   */
  async send(message: A2AMessage): Promise<SendResult> {
    const result = await this.durable.send(message);
    if (!result.ok || !this.connected) return result;

    const channel = inboxChannel(message.recipient, this.channelPrefix);
    try {
      await this.client.publish(channel, serializeMessage(message));
    } catch (err) {
      this.logger.warn('publish failed; message is still on disk', {
        messageId: message.message_id,
        channel,
        ...logError(err),
      });
    }
    return result;
  }

  receive(role: AgentRole, limit: number): Promise<A2AMessage[]> {
    return this.durable.receive(role, limit);
  }

  acknowledge(message: A2AMessage, role: AgentRole): Promise<boolean> {
    return this.durable.acknowledge(message, role);
  }

  moveToDeadLetter(message: A2AMessage, role: AgentRole): Promise<boolean> {
    return this.durable.moveToDeadLetter(message, role);
  }

  watch(role: AgentRole, listener: MessageListener): Promise<StopWatching> {
    return this.durable.watch(role, listener);
  }

  /**
   * Deliver real-time pushes for `role` to `handler` until `signal` aborts.
   *
   * Handlers run one at a time in arrival order; a throwing handler is
   * logged and the loop keeps going. When the channel is down (or the
   * subscription fails) the loop watches the durable inbox instead.
   *
   * On abort the subscription is torn down first, then the returned promise
   * rejects with `signal.reason`.
   *
   * @example
   * ```ts
   * const controller = new AbortController();
   * const loop = transport.subscribe('local', (msg) => notify(msg), controller.signal);
   * // ...later
   * controller.abort();
   * await loop.catch(() => {});
   * ```
   */
  async subscribe(role: AgentRole, handler: MessageHandler, signal: AbortSignal): Promise<void> {
    signal.throwIfAborted();

    let chain: Promise<void> = Promise.resolve();
    const enqueue = (message: A2AMessage) => {
      chain = chain.then(() => this.invokeHandler(handler, message));
    };

    const stop = await this.startListening(role, enqueue);
    try {
      await waitForAbort(signal);
    } finally {
      await stop();
      this.logger.debug('subscription closed', { role });
    }
  }

  /** Disconnect pub/sub, then close the durable transport. */
  async close(): Promise<void> {
    if (this.connected) {
      this.connected = false;
      await this.disconnectQuietly();
    }
    await this.durable.close();
  }

  // --- Private Helpers ---

  private async startListening(role: AgentRole, enqueue: MessageListener): Promise<StopWatching> {
    if (this.connected) {
      const channel = inboxChannel(role, this.channelPrefix);
      try {
        const listener: PubSubListener = (raw) => {
          const parsed = parseMessage(raw);
          if (!parsed.ok) {
            this.logger.warn('dropped unreadable push', { channel, error: parsed.error });
            return;
          }
          enqueue(parsed.message);
        };
        await this.client.subscribe(channel, listener);
        this.logger.debug('subscribed', { channel });
        return async () => {
          try {
            await this.client.unsubscribe(channel, listener);
          } catch (err) {
            this.logger.warn('unsubscribe failed', { channel, ...logError(err) });
          }
        };
      } catch (err) {
        this.logger.warn('subscribe failed, watching the inbox instead', { channel, ...logError(err) });
      }
    }

    const stopWatching = await this.durable.watch(role, enqueue);
    return async () => {
      try {
        await stopWatching();
      } catch (err) {
        this.logger.warn('failed to stop inbox watcher', { role, ...logError(err) });
      }
    };
  }

  private async invokeHandler(handler: MessageHandler, message: A2AMessage): Promise<void> {
    try {
      await handler(message);
    } catch (err) {
      this.logger.error('subscriber handler failed', { messageId: message.message_id, ...logError(err) });
    }
  }

  private async disconnectQuietly(): Promise<void> {
    try {
      await this.client.disconnect();
    } catch (err) {
      this.logger.debug('pub/sub disconnect failed', logError(err));
    }
  }
}

/** Settles only by rejecting with the signal's abort reason. */
function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}
