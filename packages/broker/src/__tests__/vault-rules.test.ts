import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { noopLogger } from '@a2a/shared/logger';
import { canWriteDashboard, claimTask } from '../vault-rules.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vault-rules-test-'));
  await fs.mkdir(path.join(tmpDir, 'Needs_Action'));
  await fs.writeFile(path.join(tmpDir, 'Needs_Action', 'reply-to-client.md'), '# Reply to client\n');
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('claimTask', () => {
  it('moves the task into the role in-progress folder', async () => {
    expect(await claimTask(tmpDir, 'reply-to-client.md', 'cloud', noopLogger)).toBe(true);

    const claimed = await fs.readFile(path.join(tmpDir, 'In_Progress', 'cloud', 'reply-to-client.md'), 'utf-8');
    expect(claimed).toBe('# Reply to client\n');
    expect(await fs.readdir(path.join(tmpDir, 'Needs_Action'))).toEqual([]);
  });

  it('lets only the first claimant win', async () => {
    const first = await claimTask(tmpDir, 'reply-to-client.md', 'cloud', noopLogger);
    const second = await claimTask(tmpDir, 'reply-to-client.md', 'local', noopLogger);

    expect([first, second]).toEqual([true, false]);
  });

  it('accepts a path and claims by base name', async () => {
    const taskPath = path.join(tmpDir, 'Needs_Action', 'reply-to-client.md');

    expect(await claimTask(tmpDir, taskPath, 'local', noopLogger)).toBe(true);
    await expect(
      fs.access(path.join(tmpDir, 'In_Progress', 'local', 'reply-to-client.md')),
    ).resolves.toBeUndefined();
  });
});

describe('canWriteDashboard', () => {
  it('allows only the local role', () => {
    expect(canWriteDashboard('local')).toBe(true);
    expect(canWriteDashboard('cloud')).toBe(false);
  });
});
