/**
 * TTL enforcement for role inboxes.
 *
 * Sweeps every role's inbox and moves expired messages to the dead letter
 * queue with reason `ttl_expired`. The router runs a sweep at the start of
 * every `receive()`; a periodic caller may also invoke `enforce()` directly.
 *
 * @module broker/ttl-enforcer
 */
import * as fs from 'node:fs/promises';
import { AGENT_ROLES } from '@a2a/shared/message-schemas';
import type { AgentRole } from '@a2a/shared/message-schemas';
import { isExpired, parseMessage } from '@a2a/shared/message';
import type { Logger } from '@a2a/shared/logger';
import type { DeadLetterQueue } from './dead-letter-queue.js';
import { isEnoent, listMessageFiles, silentUnlink, type MessageFileEntry } from './lib/fs-utils.js';
import { createTaggedLogger, logError } from './lib/logger.js';
import { resolveMessagePaths, type MessagePaths } from './lib/paths.js';

export interface TtlEnforcerOptions {
  vaultPath: string;
  deadLetterQueue: DeadLetterQueue;
  /** Roles whose inboxes are swept. Defaults to every role. */
  roles?: readonly AgentRole[];
  logger?: Logger;
}

export class TtlEnforcer {
  private readonly paths: MessagePaths;
  private readonly dlq: DeadLetterQueue;
  private readonly roles: readonly AgentRole[];
  private readonly logger: Logger;

  constructor(options: TtlEnforcerOptions) {
    this.paths = resolveMessagePaths(options.vaultPath);
    this.dlq = options.deadLetterQueue;
    this.roles = options.roles ?? AGENT_ROLES;
    this.logger = options.logger ?? createTaggedLogger('TtlEnforcer');
  }

  /**
   * Dead-letter every expired inbox message.
   *
   * The inbox file is deleted only after its dead letter record is written.
   * A failure on one file is logged and the sweep moves on.
   *
   * @returns Number of messages expired.
   */
  async enforce(): Promise<number> {
    const now = Date.now();
    let expired = 0;

    for (const role of this.roles) {
      const inboxDir = this.paths.inbox(role);
      let files: MessageFileEntry[];
      try {
        files = await listMessageFiles(inboxDir);
      } catch (err) {
        this.logger.warn('failed to list inbox for ttl sweep', { role, ...logError(err) });
        continue;
      }

      for (const { filePath } of files) {
        try {
          if (await this.expireFile(filePath, now)) expired++;
        } catch (err) {
          this.logger.warn('ttl check failed', { file: filePath, ...logError(err) });
        }
      }
    }

    if (expired > 0) this.logger.info('expired inbox messages', { expired });
    return expired;
  }

  private async expireFile(filePath: string, now: number): Promise<boolean> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (isEnoent(err)) return false;
      throw err;
    }

    const parsed = parseMessage(text);
    if (!parsed.ok) {
      this.logger.warn('skipped unreadable inbox file during ttl sweep', { file: filePath, error: parsed.error });
      return false;
    }
    if (!isExpired(parsed.message, now)) return false;

    if (!(await this.dlq.add(parsed.message, 'ttl_expired'))) return false;
    await silentUnlink(filePath);
    return true;
  }
}
