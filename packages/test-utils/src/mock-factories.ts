import { vi } from 'vitest';
import { computeChecksum } from '@a2a/shared/message';
import type { A2AMessage } from '@a2a/shared/message-schemas';
import type { DurableTransport } from '@a2a/broker';

let sequence = 0;

/**
 * Create a valid pending message with sensible defaults.
 *
 * The checksum is computed after overrides are applied, unless the
 * overrides set `checksum` themselves.
 */
export function createMockMessage(overrides: Partial<A2AMessage> = {}): A2AMessage {
  sequence += 1;
  const message: A2AMessage = {
    message_id: `test-msg-${String(sequence).padStart(4, '0')}`,
    sender: 'cloud',
    recipient: 'local',
    message_type: 'task_delegation',
    priority: 'normal',
    status: 'pending',
    timestamp: new Date().toISOString(),
    requires_approval: false,
    ttl_seconds: 3600,
    retry_count: 0,
    max_retries: 3,
    payload: { task: 'Draft weekly summary' },
    metadata: {},
    schema_version: 1,
    ...overrides,
  };
  if ('checksum' in overrides) return message;
  return { ...message, checksum: computeChecksum(message) };
}

/** Create a mock DurableTransport whose send succeeds and inbox is empty. */
export function createMockTransport(overrides: Partial<DurableTransport> = {}): DurableTransport {
  return {
    kind: 'file',
    send: vi.fn(async (message: A2AMessage) => ({ ok: true as const, messageId: message.message_id })),
    receive: vi.fn(async () => []),
    acknowledge: vi.fn(async () => true),
    moveToDeadLetter: vi.fn(async () => true),
    watch: vi.fn(async () => async () => {}),
    close: vi.fn(async () => {}),
    ...overrides,
  };
}
