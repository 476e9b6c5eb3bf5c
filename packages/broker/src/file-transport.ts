/**
 * Durable, directory-backed transport.
 *
 * The file layout under `{vault}/Messages/` is the ground truth for all
 * delivery state:
 * - `outbox/{role}/`  — audit copy of everything a role has sent
 * - `inbox/{role}/`   — delivered, not yet acknowledged
 * - `processed/`      — acknowledged
 * - `dead_letter/`    — undeliverable, invalid or expired
 *
 * Every file is named `{message_id}.json` and written through a temp file
 * plus atomic rename, so readers never see partial writes. Moves between
 * directories are single renames.
 *
 * @module broker/file-transport
 */
import * as fsSync from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { AGENT_ROLES } from '@a2a/shared/message-schemas';
import type { A2AMessage, AgentRole } from '@a2a/shared/message-schemas';
import { parseMessage, serializeMessage } from '@a2a/shared/message';
import type { Logger } from '@a2a/shared/logger';
import { BrokerError, errorMessage } from './errors.js';
import { InboxWatcher } from './inbox-watcher.js';
import { isEnoent, listMessageFiles, writeFileAtomic, type MessageFileEntry } from './lib/fs-utils.js';
import { createTaggedLogger, logError } from './lib/logger.js';
import { messageFileName, resolveMessagePaths, type MessagePaths } from './lib/paths.js';
import type { DurableTransport, MessageListener, SendResult, StopWatching } from './types.js';

/** Directory permission: rwx for owner only. */
const DIR_MODE = 0o700;

/** Options for creating a FileTransport. */
export interface FileTransportOptions {
  /** Vault root; messages live under `{vaultPath}/Messages/`. */
  vaultPath: string;
  logger?: Logger;
}

/**
 * File-backed {@link DurableTransport}.
 *
 * @example
 * ```ts
 * const transport = new FileTransport({ vaultPath: '/srv/vault' });
 * const result = await transport.send(message);
 * const inbox = await transport.receive('local', 10);
 * ```
 */
export class FileTransport implements DurableTransport {
  readonly kind = 'file' as const;
  readonly paths: MessagePaths;
  private readonly logger: Logger;
  private readonly watcher: InboxWatcher;

  /**
   * Creates the six message directories if they do not exist.
   *
   * @throws {BrokerError} `CONFIGURATION_ERROR` when the vault is not writable.
   */
  constructor(options: FileTransportOptions) {
    this.paths = resolveMessagePaths(options.vaultPath);
    this.logger = options.logger ?? createTaggedLogger('FileTransport');
    this.watcher = new InboxWatcher(this.logger);
    this.ensureDirectories();
  }

  // --- Send ---

  /**
   * Write the message to the sender's outbox and the recipient's inbox.
   *
   * Both writes are attempted. A failure in either is reported; the other
   * write is not rolled back.
   */
  async send(message: A2AMessage): Promise<SendResult> {
    const data = serializeMessage(message);
    const filename = messageFileName(message.message_id);
    const targets = [
      path.join(this.paths.outbox(message.sender), filename),
      path.join(this.paths.inbox(message.recipient), filename),
    ];

    const failures: string[] = [];
    for (const target of targets) {
      try {
        await writeFileAtomic(target, data);
      } catch (err) {
        failures.push(`${path.relative(this.paths.root, target)}: ${errorMessage(err)}`);
      }
    }

    if (failures.length > 0) {
      const error = `send failed: ${failures.join('; ')}`;
      this.logger.error('message write failed', { messageId: message.message_id, error });
      return { ok: false, code: 'TRANSPORT_ERROR', error };
    }

    this.logger.debug('message written', {
      messageId: message.message_id,
      sender: message.sender,
      recipient: message.recipient,
    });
    return { ok: true, messageId: message.message_id };
  }

  // --- Receive ---

  /**
   * Read up to `limit` inbox messages, oldest-modified first.
   *
   * Files are ordered by mtime, ties broken by file name (ULID order).
   * An unreadable or invalid file is logged and skipped.
   */
  async receive(role: AgentRole, limit: number): Promise<A2AMessage[]> {
    if (limit <= 0) return [];

    let entries: MessageFileEntry[];
    try {
      entries = await listMessageFiles(this.paths.inbox(role));
    } catch (err) {
      this.logger.error('failed to list inbox', { role, ...logError(err) });
      return [];
    }

    entries.sort((a, b) => a.mtimeMs - b.mtimeMs || a.filePath.localeCompare(b.filePath));

    const messages: A2AMessage[] = [];
    for (const entry of entries.slice(0, limit)) {
      const message = await this.readMessageFile(entry.filePath);
      if (message) messages.push(message);
    }
    return messages;
  }

  // --- Acknowledge / Dead letter ---

  /** Atomically move the inbox file into `processed/`. */
  async acknowledge(message: A2AMessage, role: AgentRole): Promise<boolean> {
    const filename = messageFileName(message.message_id);
    const inboxPath = path.join(this.paths.inbox(role), filename);
    const processedPath = path.join(this.paths.processed, filename);

    try {
      await fs.rename(inboxPath, processedPath);
      return true;
    } catch (err) {
      if (isEnoent(err)) {
        this.logger.debug('acknowledge skipped: inbox file already gone', { messageId: message.message_id, role });
      } else {
        this.logger.warn('acknowledge failed', { messageId: message.message_id, role, ...logError(err) });
      }
      return false;
    }
  }

  /**
   * Move the inbox file into `dead_letter/`.
   *
   * When the inbox file no longer exists the message itself is serialized
   * into `dead_letter/` so it is preserved either way.
   */
  async moveToDeadLetter(message: A2AMessage, role: AgentRole): Promise<boolean> {
    const filename = messageFileName(message.message_id);
    const inboxPath = path.join(this.paths.inbox(role), filename);
    const deadLetterPath = path.join(this.paths.deadLetter, filename);

    try {
      await fs.rename(inboxPath, deadLetterPath);
      return true;
    } catch (err) {
      if (!isEnoent(err)) {
        this.logger.warn('dead-letter move failed', { messageId: message.message_id, role, ...logError(err) });
        return false;
      }
    }

    try {
      await writeFileAtomic(deadLetterPath, serializeMessage(message));
      return true;
    } catch (err) {
      this.logger.warn('dead-letter write failed', { messageId: message.message_id, ...logError(err) });
      return false;
    }
  }

  // --- Watch ---

  /** Notify `listener` of each message that lands in `role`'s inbox. */
  watch(role: AgentRole, listener: MessageListener): Promise<StopWatching> {
    return this.watcher.watch(this.paths.inbox(role), listener);
  }

  /** Stop every inbox watcher. Nothing else holds resources. */
  async close(): Promise<void> {
    await this.watcher.closeAll();
  }

  // --- Private Helpers ---

  private ensureDirectories(): void {
    const dirs = [
      ...AGENT_ROLES.flatMap((role) => [this.paths.inbox(role), this.paths.outbox(role)]),
      this.paths.processed,
      this.paths.deadLetter,
    ];
    try {
      for (const dir of dirs) {
        fsSync.mkdirSync(dir, { recursive: true, mode: DIR_MODE });
      }
    } catch (err) {
      throw new BrokerError(
        `cannot create message directories under ${this.paths.root}: ${errorMessage(err)}`,
        'CONFIGURATION_ERROR',
        { cause: err },
      );
    }
  }

  private async readMessageFile(filePath: string): Promise<A2AMessage | null> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (!isEnoent(err)) {
        this.logger.warn('failed to read message file', { file: filePath, ...logError(err) });
      }
      return null;
    }

    const parsed = parseMessage(text);
    if (!parsed.ok) {
      this.logger.warn('skipped unreadable message file', { file: filePath, error: parsed.error });
      return null;
    }
    return parsed.message;
  }
}
