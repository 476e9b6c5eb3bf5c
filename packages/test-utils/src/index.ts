export { createMockMessage, createMockTransport } from './mock-factories.js';
export { InMemoryPubSubHub, createFakePubSubClient } from './pubsub-fake.js';
export type { FakePubSubClient, FakePubSubFailures } from './pubsub-fake.js';
