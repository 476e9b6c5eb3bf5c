/**
 * Message router, the broker's single entry point for agents.
 *
 * Outbound, `route()` deduplicates, rejects expired messages and sends
 * through the transport, counting failures against `max_retries`. Inbound,
 * `receive()` sweeps expired inbox files, then filters duplicates, late
 * expiries and integrity failures before handing back a priority-ordered
 * batch. Retries are never scheduled here: a `send_failed` result is the
 * caller's cue to route again.
 *
 * @module broker/router
 */
import type { A2AMessage, AgentRole } from '@a2a/shared/message-schemas';
import { isExpired, sortByPriority, transitionStatus, verifyChecksum } from '@a2a/shared/message';
import type { Logger } from '@a2a/shared/logger';
import type { DeadLetterQueue } from './dead-letter-queue.js';
import { Deduplicator } from './deduplicator.js';
import { createTaggedLogger } from './lib/logger.js';
import type { TtlEnforcer } from './ttl-enforcer.js';
import type { DurableTransport, RouteResult, RouterStatus } from './types.js';

/** Candidates fetched per requested message, leaving room for filtered ones. */
const RECEIVE_OVERFETCH = 2;

export interface MessageRouterOptions {
  transport: DurableTransport;
  deadLetterQueue: DeadLetterQueue;
  ttlEnforcer: TtlEnforcer;
  /** Ids already routed by this process. */
  outboundDedup?: Deduplicator;
  /** Ids already handed to a receiver by this process. */
  inboundDedup?: Deduplicator;
  logger?: Logger;
}

/** Anything exposing a live connection flag, such as the pub/sub transport. */
interface ConnectionAware {
  readonly isConnected: boolean;
}

function isConnectionAware(value: object): value is ConnectionAware {
  return 'isConnected' in value && typeof value.isConnected === 'boolean';
}

export class MessageRouter {
  private readonly transport: DurableTransport;
  private readonly dlq: DeadLetterQueue;
  private readonly ttlEnforcer: TtlEnforcer;
  private readonly outboundDedup: Deduplicator;
  private readonly inboundDedup: Deduplicator;
  private readonly logger: Logger;

  constructor(options: MessageRouterOptions) {
    this.transport = options.transport;
    this.dlq = options.deadLetterQueue;
    this.ttlEnforcer = options.ttlEnforcer;
    this.outboundDedup = options.outboundDedup ?? new Deduplicator();
    this.inboundDedup = options.inboundDedup ?? new Deduplicator();
    this.logger = options.logger ?? createTaggedLogger('MessageRouter');
  }

  /**
   * Deliver a message to its recipient's inbox.
   *
   * Updates `status` and `retry_count` on the passed message. The status
   * changes after the transport write, so the inbox copy is stored as
   * `pending`: a file in an inbox is by definition not yet processed.
   *
   * @example
   * ```ts
   * const result = await router.route(message);
   * if (!result.ok && result.reason === 'send_failed') {
   *   // still pending; route again later
   * }
   * ```
   */
  async route(message: A2AMessage): Promise<RouteResult> {
    const messageId = message.message_id;

    if (this.outboundDedup.isDuplicate(message)) {
      this.logger.info('duplicate message ignored', { messageId });
      return { ok: false, messageId, reason: 'duplicate', status: message.status };
    }

    if (isExpired(message)) {
      if (!(await this.dlq.add(message, 'expired_before_routing'))) {
        return this.deadLetterFailed(message, 'expired_before_routing');
      }
      transitionStatus(message, 'dead_letter');
      return { ok: false, messageId, reason: 'expired_before_routing', status: message.status };
    }

    const result = await this.transport.send(message);
    if (result.ok) {
      this.outboundDedup.markSeen(message);
      transitionStatus(message, 'delivered');
      this.logger.info('message routed', {
        messageId,
        sender: message.sender,
        recipient: message.recipient,
        type: message.message_type,
        priority: message.priority,
      });
      return { ok: true, messageId, status: message.status };
    }

    message.retry_count += 1;
    if (message.retry_count >= message.max_retries) {
      if (!(await this.dlq.add(message, 'max_retries_exceeded'))) {
        return this.deadLetterFailed(message, 'max_retries_exceeded');
      }
      transitionStatus(message, 'dead_letter');
      this.logger.error('message exhausted its retries', {
        messageId,
        retryCount: message.retry_count,
        error: result.error,
      });
      return { ok: false, messageId, reason: 'max_retries_exceeded', status: message.status };
    }

    transitionStatus(message, 'pending');
    this.logger.warn('send failed, message left pending', {
      messageId,
      retryCount: message.retry_count,
      maxRetries: message.max_retries,
      error: result.error,
    });
    return { ok: false, messageId, reason: 'send_failed', status: message.status };
  }

  /**
   * Fetch up to `limit` deliverable messages for `role`, highest priority first.
   *
   * Duplicates are acknowledged away, expired messages and checksum failures
   * are dead-lettered. Messages returned stay in the inbox until acknowledged.
   */
  async receive(role: AgentRole, limit: number = 10): Promise<A2AMessage[]> {
    if (limit <= 0) return [];

    await this.ttlEnforcer.enforce();
    const candidates = await this.transport.receive(role, limit * RECEIVE_OVERFETCH);

    const accepted: A2AMessage[] = [];
    for (const message of candidates) {
      if (accepted.length >= limit) break;
      if (await this.admit(message, role)) accepted.push(message);
    }

    return sortByPriority(accepted);
  }

  /** Move the message to `processed/` and mark it processed. */
  async acknowledge(message: A2AMessage, role: AgentRole): Promise<boolean> {
    const moved = await this.transport.acknowledge(message, role);
    if (moved) {
      transitionStatus(message, 'processed');
      this.logger.debug('message acknowledged', { messageId: message.message_id, role });
    }
    return moved;
  }

  async getStatus(): Promise<RouterStatus> {
    return {
      transport: this.transport.kind,
      connected: isConnectionAware(this.transport) ? this.transport.isConnected : false,
      dedupCacheSize: this.outboundDedup.size + this.inboundDedup.size,
      dlqCount: await this.dlq.count(),
    };
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  // --- Private Helpers ---

  /** Result for a message whose DLQ record could not be written. Its status is left as it was. */
  private deadLetterFailed(message: A2AMessage, intended: string): RouteResult {
    this.logger.error('dead letter write failed, message not dead-lettered', {
      messageId: message.message_id,
      intended,
      retryCount: message.retry_count,
    });
    return { ok: false, messageId: message.message_id, reason: 'dead_letter_failed', status: message.status };
  }

  /** Filter one inbox candidate. `true` means hand it to the receiver. */
  private async admit(message: A2AMessage, role: AgentRole): Promise<boolean> {
    const messageId = message.message_id;

    if (this.inboundDedup.isDuplicate(message)) {
      this.logger.debug('duplicate delivery dropped', { messageId, role });
      await this.transport.acknowledge(message, role);
      return false;
    }

    if (isExpired(message)) {
      if (await this.dlq.add(message, 'ttl_expired')) {
        await this.transport.acknowledge(message, role);
      } else {
        this.logger.error('expired message left in inbox, dead letter write failed', { messageId, role });
      }
      return false;
    }

    if (!verifyChecksum(message)) {
      this.logger.error('checksum mismatch', { messageId, role });
      // Move first so the stamped DLQ record is what stays on disk
      await this.transport.moveToDeadLetter(message, role);
      await this.dlq.add(message, 'checksum_mismatch');
      return false;
    }

    this.inboundDedup.markSeen(message);
    return true;
  }
}
