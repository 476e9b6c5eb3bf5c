/**
 * Zod schemas for agent-to-agent messages.
 *
 * Defines the roles, message types, priorities, lifecycle statuses and the
 * envelope persisted as one JSON file per message under `Messages/`. All
 * schemas include `.openapi()` metadata for schema document generation.
 *
 * @module shared/message-schemas
 */
import { z } from 'zod';
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi';

extendZodWithOpenApi(z);

// === Enums ===

export const AgentRoleSchema = z.enum(['cloud', 'local']).openapi('AgentRole');

export type AgentRole = z.infer<typeof AgentRoleSchema>;

/** Every role that owns an inbox/outbox pair. */
export const AGENT_ROLES: readonly AgentRole[] = AgentRoleSchema.options;

export const MessageTypeSchema = z
  .enum([
    'task_delegation',
    'approval_request',
    'approval_response',
    'status_update',
    'result_delivery',
    'heartbeat',
  ])
  .openapi('MessageType');

export type MessageType = z.infer<typeof MessageTypeSchema>;

export const MessagePrioritySchema = z
  .enum(['critical', 'high', 'normal', 'low'])
  .openapi('MessagePriority');

export type MessagePriority = z.infer<typeof MessagePrioritySchema>;

export const MessageStatusSchema = z
  .enum(['pending', 'delivered', 'processed', 'dead_letter'])
  .openapi('MessageStatus');

export type MessageStatus = z.infer<typeof MessageStatusSchema>;

// === Envelope ===

/** Message ids double as file names, so path separators and dots are excluded. */
export const MESSAGE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Current envelope version written by {@link createMessage}. */
export const MESSAGE_SCHEMA_VERSION = 1;

export const A2AMessageSchema = z
  .object({
    message_id: z
      .string()
      .regex(MESSAGE_ID_PATTERN, 'message_id may only contain letters, digits, "-" and "_"')
      .describe('ULID message ID, also the file name on disk'),
    sender: AgentRoleSchema,
    recipient: AgentRoleSchema,
    message_type: MessageTypeSchema,
    priority: MessagePrioritySchema.default('normal'),
    status: MessageStatusSchema.default('pending'),
    timestamp: z.string().datetime({ offset: true }),
    correlation_id: z.string().optional(),
    requires_approval: z.boolean().default(false),
    ttl_seconds: z.number().int().min(0).default(3600).describe('0 disables expiry'),
    retry_count: z.number().int().min(0).default(0),
    max_retries: z.number().int().min(0).default(3),
    payload: z.unknown(),
    metadata: z.record(z.string(), z.unknown()).default({}),
    schema_version: z.literal(MESSAGE_SCHEMA_VERSION).default(MESSAGE_SCHEMA_VERSION),
    checksum: z.string().optional().describe('SHA-256 hex digest of the routing fields and payload'),
  })
  .openapi('A2AMessage');

export type A2AMessage = z.infer<typeof A2AMessageSchema>;

/** Metadata keys stamped on dead-lettered messages. */
export const DLQ_REASON_KEY = 'dlq_reason';
export const DLQ_TIMESTAMP_KEY = 'dlq_timestamp';
