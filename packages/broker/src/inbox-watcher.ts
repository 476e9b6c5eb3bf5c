/**
 * Inbox watcher for the file transport.
 *
 * Manages chokidar watchers on role inbox directories and notifies
 * listeners of every newly arrived message file. Watching never claims or
 * moves a file; `receive()` stays the authoritative read path.
 *
 * @module broker/inbox-watcher
 */
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import chokidar, { type FSWatcher } from 'chokidar';
import { parseMessage } from '@a2a/shared/message';
import type { Logger } from '@a2a/shared/logger';
import { FILE_EXT, isEnoent } from './lib/fs-utils.js';
import { logError } from './lib/logger.js';
import type { MessageListener, StopWatching } from './types.js';

export class InboxWatcher {
  private readonly watchers = new Set<FSWatcher>();

  constructor(private readonly logger: Logger) {}

  /**
   * Start a chokidar watcher on an inbox directory.
   *
   * Resolves once the watcher is ready and actively monitoring the directory.
   *
   * @param inboxDir - Directory to watch
   * @param listener - Called with each parsable message that arrives
   * @returns A function that stops this watcher
   */
  async watch(inboxDir: string, listener: MessageListener): Promise<StopWatching> {
    const watcher = chokidar.watch(inboxDir, {
      persistent: true,
      ignoreInitial: true,
      depth: 0,
    });

    watcher.on('add', (filePath: string) => {
      void this.handleNewFile(filePath, listener);
    });
    watcher.on('error', (err: unknown) => {
      this.logger.warn('inbox watcher error', { inboxDir, ...logError(err) });
    });

    this.watchers.add(watcher);

    await new Promise<void>((resolve) => {
      watcher.on('ready', () => resolve());
    });

    return async () => {
      if (this.watchers.delete(watcher)) {
        await watcher.close();
      }
    };
  }

  /** Close all active watchers. */
  async closeAll(): Promise<void> {
    const watchers = [...this.watchers];
    this.watchers.clear();
    await Promise.all(watchers.map((w) => w.close()));
  }

  private async handleNewFile(filePath: string, listener: MessageListener): Promise<void> {
    const filename = path.basename(filePath);
    if (!filename.endsWith(FILE_EXT) || filename.startsWith('.')) return;

    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      // Already acknowledged or expired by the time the event fired
      if (isEnoent(err)) return;
      this.logger.warn('failed to read new inbox file', { file: filePath, ...logError(err) });
      return;
    }

    const parsed = parseMessage(text);
    if (!parsed.ok) {
      this.logger.warn('skipped unreadable inbox file', { file: filePath, error: parsed.error });
      return;
    }

    try {
      listener(parsed.message);
    } catch (err) {
      this.logger.error('inbox listener threw', { messageId: parsed.message.message_id, ...logError(err) });
    }
  }
}
