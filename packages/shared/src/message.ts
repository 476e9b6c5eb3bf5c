/**
 * Message capabilities shared by every broker component.
 *
 * Construction, expiry, integrity and serialization of {@link A2AMessage}
 * envelopes live here so the broker only consumes them through these
 * functions and never reaches into envelope internals itself.
 *
 * @module shared/message
 */
import { createHash } from 'node:crypto';
import { monotonicFactory } from 'ulidx';
import {
  A2AMessageSchema,
  DLQ_REASON_KEY,
  DLQ_TIMESTAMP_KEY,
  MESSAGE_SCHEMA_VERSION,
} from './message-schemas.js';
import type {
  A2AMessage,
  AgentRole,
  MessagePriority,
  MessageStatus,
  MessageType,
} from './message-schemas.js';

/** Monotonic ULID factory: ids sort in creation order within a millisecond. */
const generateUlid = monotonicFactory();

// === Construction ===

/** Input accepted by {@link createMessage}. Omitted fields take envelope defaults. */
export interface CreateMessageInput {
  sender: AgentRole;
  recipient: AgentRole;
  messageType: MessageType;
  payload: unknown;
  priority?: MessagePriority;
  ttlSeconds?: number;
  maxRetries?: number;
  correlationId?: string;
  requiresApproval?: boolean;
  metadata?: Record<string, unknown>;
  /** Override the generated ULID (fixtures, replays). */
  messageId?: string;
  /** Override the creation time. */
  timestamp?: Date;
}

/**
 * Build a new pending message with a fresh ULID and a stamped checksum.
 *
 * @example
 * ```ts
 * const msg = createMessage({
 *   sender: 'cloud',
 *   recipient: 'local',
 *   messageType: 'task_delegation',
 *   payload: { task: 'Draft email reply' },
 * });
 * ```
 */
export function createMessage(input: CreateMessageInput): A2AMessage {
  const message = A2AMessageSchema.parse({
    message_id: input.messageId ?? generateUlid(),
    sender: input.sender,
    recipient: input.recipient,
    message_type: input.messageType,
    priority: input.priority,
    status: 'pending',
    timestamp: (input.timestamp ?? new Date()).toISOString(),
    correlation_id: input.correlationId,
    requires_approval: input.requiresApproval,
    ttl_seconds: input.ttlSeconds,
    max_retries: input.maxRetries,
    payload: input.payload ?? null,
    metadata: input.metadata,
    schema_version: MESSAGE_SCHEMA_VERSION,
  });
  return { ...message, checksum: computeChecksum(message) };
}

// === Expiry ===

/**
 * Whether the message's time-to-live has elapsed.
 *
 * A `ttl_seconds` of 0 never expires. An unparsable timestamp counts as
 * expired so the message is dead-lettered rather than delivered forever.
 */
export function isExpired(message: A2AMessage, now: number = Date.now()): boolean {
  if (message.ttl_seconds === 0) return false;
  const createdAt = Date.parse(message.timestamp);
  if (Number.isNaN(createdAt)) return true;
  return now - createdAt > message.ttl_seconds * 1000;
}

// === Integrity ===

/**
 * SHA-256 over the canonical JSON of the routing fields and payload.
 *
 * Status, retry counters and metadata are excluded: they change as the
 * message moves through the broker.
 */
export function computeChecksum(message: A2AMessage): string {
  const covered = {
    message_id: message.message_id,
    sender: message.sender,
    recipient: message.recipient,
    message_type: message.message_type,
    payload: message.payload ?? null,
  };
  return createHash('sha256').update(canonicalJson(covered)).digest('hex');
}

/** True when the envelope carries no checksum or the checksum matches. */
export function verifyChecksum(message: A2AMessage): boolean {
  if (message.checksum === undefined) return true;
  return message.checksum === computeChecksum(message);
}

/** JSON with object keys sorted at every depth. */
function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

// === Serialization ===

/** Result of parsing a message file or wire payload. */
export type ParseMessageResult =
  | { ok: true; message: A2AMessage }
  | { ok: false; error: string };

/** Serialize a message to the on-disk and on-wire JSON form. */
export function serializeMessage(message: A2AMessage): string {
  return JSON.stringify(message, null, 2);
}

/** Parse and validate a serialized message. Never throws. */
export function parseMessage(text: string): ParseMessageResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { ok: false, error: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const result = A2AMessageSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    return { ok: false, error: `invalid message: ${issues.join('; ')}` };
  }
  return { ok: true, message: result.data };
}

// === Priority ===

/** Delivery order of the known priorities; lower ranks are delivered first. */
export const PRIORITY_RANK: Readonly<Record<string, number>> = {
  critical: 0,
  high: 1,
  normal: 2,
  low: 3,
};

/** Rank assigned to priorities outside {@link PRIORITY_RANK}. */
const UNRANKED = Number.MAX_SAFE_INTEGER;

export function priorityRank(priority: string): number {
  return PRIORITY_RANK[priority] ?? UNRANKED;
}

/** Stable sort, ascending by priority rank. Returns a new array. */
export function sortByPriority<T extends Pick<A2AMessage, 'priority'>>(messages: readonly T[]): T[] {
  return [...messages].sort((a, b) => priorityRank(a.priority) - priorityRank(b.priority));
}

// === Lifecycle ===

const STATUS_TRANSITIONS: Record<MessageStatus, readonly MessageStatus[]> = {
  pending: ['pending', 'delivered', 'processed', 'dead_letter'],
  delivered: ['processed', 'dead_letter'],
  processed: [],
  dead_letter: [],
};

/** Whether `from → to` is a forward move along the message lifecycle. */
export function canTransition(from: MessageStatus, to: MessageStatus): boolean {
  return STATUS_TRANSITIONS[from].includes(to);
}

/**
 * Move a message to `next` in place if the lifecycle allows it.
 *
 * @returns `false` (and leaves the message untouched) for a regression.
 */
export function transitionStatus(message: A2AMessage, next: MessageStatus): boolean {
  if (!canTransition(message.status, next)) return false;
  message.status = next;
  return true;
}

/**
 * Copy of a dead-lettered message prepared for manual resubmission.
 *
 * This is the only path that moves a message backwards (to `pending`).
 * The retry counter grows by one and the DLQ stamps are dropped.
 */
export function prepareRetry(message: A2AMessage): A2AMessage {
  const { [DLQ_REASON_KEY]: _reason, [DLQ_TIMESTAMP_KEY]: _failedAt, ...metadata } = message.metadata;
  return {
    ...message,
    status: 'pending',
    retry_count: message.retry_count + 1,
    metadata,
  };
}
