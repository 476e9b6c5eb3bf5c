/**
 * Ownership rules for shared vault files.
 *
 * Tasks are claimed by moving them out of `Needs_Action/` into the claiming
 * role's `In_Progress/{role}/` folder; the rename is the lock, so whichever
 * agent renames first owns the task. `Dashboard.md` has a single writer.
 *
 * @module broker/vault-rules
 */
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { AgentRole } from '@a2a/shared/message-schemas';
import type { Logger } from '@a2a/shared/logger';
import { isEnoent } from './lib/fs-utils.js';
import { createTaggedLogger, logError } from './lib/logger.js';

/** The only role allowed to write `Dashboard.md`. */
export const DASHBOARD_WRITER: AgentRole = 'local';

export const NEEDS_ACTION_DIR = 'Needs_Action';
export const IN_PROGRESS_DIR = 'In_Progress';

/**
 * Claim a task by moving `Needs_Action/{taskFile}` to `In_Progress/{role}/{taskFile}`.
 *
 * @returns `false` if the task is gone (another agent claimed it) or the move failed.
 */
export async function claimTask(
  vaultPath: string,
  taskFile: string,
  role: AgentRole,
  logger: Logger = createTaggedLogger('VaultRules'),
): Promise<boolean> {
  const name = path.basename(taskFile);
  const source = path.join(vaultPath, NEEDS_ACTION_DIR, name);
  const targetDir = path.join(vaultPath, IN_PROGRESS_DIR, role);

  try {
    await fs.mkdir(targetDir, { recursive: true });
    await fs.rename(source, path.join(targetDir, name));
    logger.info('task claimed', { task: name, role });
    return true;
  } catch (err) {
    if (isEnoent(err)) {
      logger.debug('task already claimed', { task: name, role });
    } else {
      logger.warn('task claim failed', { task: name, role, ...logError(err) });
    }
    return false;
  }
}

/** Whether `role` may write `Dashboard.md`. */
export function canWriteDashboard(role: AgentRole): boolean {
  return role === DASHBOARD_WRITER;
}
