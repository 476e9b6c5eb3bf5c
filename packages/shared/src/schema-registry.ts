/**
 * Schema document for the message file format.
 *
 * Registers the envelope schemas and renders them as OpenAPI 3.1 components
 * so vault sync tooling can validate message files without importing
 * this package.
 *
 * @module shared/schema-registry
 */
import { OpenAPIRegistry, OpenApiGeneratorV31 } from '@asteasolutions/zod-to-openapi';
import {
  A2AMessageSchema,
  AgentRoleSchema,
  MessagePrioritySchema,
  MessageStatusSchema,
  MessageTypeSchema,
} from './message-schemas.js';

/** Render the message schemas as an OpenAPI 3.1 components document. */
export function generateMessageSchemaDocument() {
  const registry = new OpenAPIRegistry();

  registry.register('AgentRole', AgentRoleSchema);
  registry.register('MessageType', MessageTypeSchema);
  registry.register('MessagePriority', MessagePrioritySchema);
  registry.register('MessageStatus', MessageStatusSchema);
  registry.register('A2AMessage', A2AMessageSchema);

  return new OpenApiGeneratorV31(registry.definitions).generateComponents();
}
