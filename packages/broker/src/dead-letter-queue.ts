/**
 * Dead letter queue for the broker.
 *
 * Provides a high-level interface for parking undeliverable, invalid and
 * expired messages, listing them, retrying them by hand and purging old
 * entries. Each dead letter is one file, `dead_letter/{message_id}.json`,
 * holding the message with `status = 'dead_letter'` and two metadata stamps:
 * - `dlq_reason`    — why it was dead-lettered
 * - `dlq_timestamp` — ISO 8601 time it was dead-lettered
 *
 * Re-adding an id overwrites its record, so `add` is idempotent.
 *
 * @module broker/dead-letter-queue
 */
import * as fsSync from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
  DLQ_REASON_KEY,
  DLQ_TIMESTAMP_KEY,
  MESSAGE_ID_PATTERN,
} from '@a2a/shared/message-schemas';
import type { A2AMessage } from '@a2a/shared/message-schemas';
import { parseMessage, prepareRetry, serializeMessage } from '@a2a/shared/message';
import type { Logger } from '@a2a/shared/logger';
import { BrokerError, errorMessage } from './errors.js';
import { isEnoent, listMessageFiles, writeFileAtomic, type MessageFileEntry } from './lib/fs-utils.js';
import { createTaggedLogger, logError } from './lib/logger.js';
import { messageFileName, resolveMessagePaths } from './lib/paths.js';

// === Types ===

/** Options for creating a DeadLetterQueue. */
export interface DeadLetterQueueOptions {
  /** Vault root; records live in `{vaultPath}/Messages/dead_letter/`. */
  vaultPath: string;
  logger?: Logger;
}

/** Standard dead-letter reasons recorded by the broker. */
export type DeadLetterReason =
  | 'ttl_expired'
  | 'expired_before_routing'
  | 'max_retries_exceeded'
  | 'checksum_mismatch';

/** A dead letter record with its reason and time pulled out of metadata. */
export interface DeadLetterEntry {
  message: A2AMessage;
  reason: string;
  failedAt: string | null;
}

// === DeadLetterQueue ===

/**
 * File-backed dead letter queue.
 *
 * @example
 * ```ts
 * const dlq = new DeadLetterQueue({ vaultPath });
 *
 * await dlq.add(message, 'max_retries_exceeded');
 * const newest = await dlq.list(20);
 *
 * // Manual intervention: the caller must route the returned message again
 * const retried = await dlq.retry(message.message_id);
 * if (retried) await router.route(retried);
 *
 * // Drop entries older than a day
 * const purged = await dlq.purge(24);
 * ```
 */
export class DeadLetterQueue {
  private readonly dir: string;
  private readonly logger: Logger;

  /** @throws {BrokerError} `CONFIGURATION_ERROR` when the directory cannot be created. */
  constructor(options: DeadLetterQueueOptions) {
    this.dir = resolveMessagePaths(options.vaultPath).deadLetter;
    this.logger = options.logger ?? createTaggedLogger('DeadLetterQueue');

    try {
      fsSync.mkdirSync(this.dir, { recursive: true, mode: 0o700 });
    } catch (err) {
      throw new BrokerError(
        `cannot create dead letter directory ${this.dir}: ${errorMessage(err)}`,
        'CONFIGURATION_ERROR',
        { cause: err },
      );
    }
  }

  /**
   * Write a dead letter record for the message.
   *
   * The stored copy carries `status = 'dead_letter'` plus the reason and
   * time stamps; the passed message is not modified.
   *
   * @returns `true` once the record is on disk.
   */
  async add(message: A2AMessage, reason: DeadLetterReason | (string & {})): Promise<boolean> {
    const record: A2AMessage = {
      ...message,
      status: 'dead_letter',
      metadata: {
        ...message.metadata,
        [DLQ_REASON_KEY]: reason,
        [DLQ_TIMESTAMP_KEY]: new Date().toISOString(),
      },
    };

    try {
      await writeFileAtomic(this.recordPath(message.message_id), serializeMessage(record));
      this.logger.warn('message dead-lettered', { messageId: message.message_id, reason });
      return true;
    } catch (err) {
      this.logger.error('failed to write dead letter', { messageId: message.message_id, reason, ...logError(err) });
      return false;
    }
  }

  /** Read one record, or `null` when absent or unreadable. */
  async get(messageId: string): Promise<A2AMessage | null> {
    if (!MESSAGE_ID_PATTERN.test(messageId)) return null;
    return this.readRecord(this.recordPath(messageId));
  }

  /**
   * List dead letters, newest first by file modification time.
   *
   * @param limit - Maximum number of entries to return (all when omitted).
   */
  async list(limit?: number): Promise<DeadLetterEntry[]> {
    const files = await this.listFiles();
    files.sort((a, b) => b.mtimeMs - a.mtimeMs || b.filePath.localeCompare(a.filePath));

    const entries: DeadLetterEntry[] = [];
    for (const file of files) {
      if (limit !== undefined && entries.length >= limit) break;
      const message = await this.readRecord(file.filePath);
      if (!message) continue;
      entries.push({
        message,
        reason: stringField(message.metadata[DLQ_REASON_KEY]) ?? 'unknown',
        failedAt: stringField(message.metadata[DLQ_TIMESTAMP_KEY]),
      });
    }
    return entries;
  }

  /** Number of dead letter records on disk. */
  async count(): Promise<number> {
    return (await this.listFiles()).length;
  }

  /**
   * Remove a record and hand its message back for resubmission.
   *
   * The returned message is `pending` with `retry_count` incremented by one.
   * Nothing is requeued: until the caller routes it again the message exists
   * only in memory.
   *
   * @returns The message, or `null` if no record exists for the id.
   */
  async retry(messageId: string): Promise<A2AMessage | null> {
    const record = await this.get(messageId);
    if (!record) return null;

    try {
      await fs.unlink(this.recordPath(messageId));
    } catch (err) {
      // Someone else retried or purged it first
      if (!isEnoent(err)) {
        this.logger.warn('failed to remove dead letter for retry', { messageId, ...logError(err) });
      }
      return null;
    }

    const message = prepareRetry(record);
    this.logger.info('dead letter released for retry', { messageId, retryCount: message.retry_count });
    return message;
  }

  /**
   * Delete records dead-lettered more than `olderThanHours` ago.
   *
   * Age comes from `dlq_timestamp`, falling back to the message timestamp.
   * Unparsable files are left alone.
   *
   * @returns Number of records deleted.
   */
  async purge(olderThanHours: number): Promise<number> {
    const cutoff = Date.now() - olderThanHours * 3_600_000;
    let purged = 0;

    for (const file of await this.listFiles()) {
      const message = await this.readRecord(file.filePath, { quiet: true });
      if (!message) continue;

      const failedAt = Date.parse(stringField(message.metadata[DLQ_TIMESTAMP_KEY]) ?? message.timestamp);
      if (Number.isNaN(failedAt) || failedAt >= cutoff) continue;

      try {
        await fs.unlink(file.filePath);
        purged++;
      } catch (err) {
        if (!isEnoent(err)) {
          this.logger.warn('failed to purge dead letter', { file: file.filePath, ...logError(err) });
        }
      }
    }

    if (purged > 0) this.logger.info('purged dead letters', { purged, olderThanHours });
    return purged;
  }

  // --- Private Helpers ---

  private recordPath(messageId: string): string {
    return path.join(this.dir, messageFileName(messageId));
  }

  private async listFiles(): Promise<MessageFileEntry[]> {
    try {
      return await listMessageFiles(this.dir);
    } catch (err) {
      this.logger.error('failed to list dead letters', logError(err));
      return [];
    }
  }

  private async readRecord(filePath: string, options?: { quiet?: boolean }): Promise<A2AMessage | null> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (!isEnoent(err) && !options?.quiet) {
        this.logger.warn('failed to read dead letter', { file: filePath, ...logError(err) });
      }
      return null;
    }

    const parsed = parseMessage(text);
    if (!parsed.ok) {
      if (!options?.quiet) {
        this.logger.warn('skipped unreadable dead letter', { file: filePath, error: parsed.error });
      }
      return null;
    }
    return parsed.message;
  }
}

function stringField(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}
