import * as path from 'node:path';
import type { AgentRole } from '@a2a/shared/message-schemas';
import { FILE_EXT } from './fs-utils.js';

/** Resolved message directories under a vault root. */
export interface MessagePaths {
  /** `{vault}/Messages` */
  root: string;
  inbox: (role: AgentRole) => string;
  outbox: (role: AgentRole) => string;
  processed: string;
  deadLetter: string;
}

/** Resolve the `Messages/` layout for a vault root. */
export function resolveMessagePaths(vaultPath: string): MessagePaths {
  const root = path.join(vaultPath, 'Messages');
  return {
    root,
    inbox: (role) => path.join(root, 'inbox', role),
    outbox: (role) => path.join(root, 'outbox', role),
    processed: path.join(root, 'processed'),
    deadLetter: path.join(root, 'dead_letter'),
  };
}

/** File name for a message id. */
export function messageFileName(messageId: string): string {
  return messageId + FILE_EXT;
}
