import { describe, it, expect } from 'vitest';
import { generateMessageSchemaDocument } from '../schema-registry.js';

describe('generateMessageSchemaDocument', () => {
  const doc = generateMessageSchemaDocument();
  const schemas = doc.components?.schemas ?? {};

  it('registers every message schema as a component', () => {
    expect(Object.keys(schemas).sort()).toEqual([
      'A2AMessage',
      'AgentRole',
      'MessagePriority',
      'MessageStatus',
      'MessageType',
    ]);
  });

  it('describes the priority enum', () => {
    expect(schemas['MessagePriority']).toMatchObject({
      type: 'string',
      enum: ['critical', 'high', 'normal', 'low'],
    });
  });

  it('lists the required envelope fields', () => {
    expect(schemas['A2AMessage']).toMatchObject({
      type: 'object',
      required: expect.arrayContaining([
        'message_id',
        'sender',
        'recipient',
        'message_type',
        'timestamp',
      ]),
    });
  });
});
