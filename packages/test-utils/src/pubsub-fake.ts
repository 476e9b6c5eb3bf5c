import { vi, type Mock } from 'vitest';
import type { PubSubClient } from '@a2a/broker';

type ChannelListener = (message: string) => void;

/** In-process channel hub shared by fake clients. Delivery is synchronous. */
export class InMemoryPubSubHub {
  private readonly channels = new Map<string, Set<ChannelListener>>();
  /** Every message published through any client, in order. */
  readonly published: Array<{ channel: string; message: string }> = [];

  publish(channel: string, message: string): number {
    this.published.push({ channel, message });
    const listeners = this.channels.get(channel);
    if (!listeners) return 0;
    for (const listener of [...listeners]) listener(message);
    return listeners.size;
  }

  subscribe(channel: string, listener: ChannelListener): void {
    let listeners = this.channels.get(channel);
    if (!listeners) {
      listeners = new Set();
      this.channels.set(channel, listeners);
    }
    listeners.add(listener);
  }

  unsubscribe(channel: string, listener: ChannelListener): void {
    const listeners = this.channels.get(channel);
    if (!listeners) return;
    listeners.delete(listener);
    if (listeners.size === 0) this.channels.delete(channel);
  }

  subscriberCount(channel: string): number {
    return this.channels.get(channel)?.size ?? 0;
  }
}

/** Failure switches, read on every call so tests can flip them mid-run. */
export interface FakePubSubFailures {
  failConnect?: boolean;
  failPublish?: boolean;
  failSubscribe?: boolean;
  failUnsubscribe?: boolean;
  /** `connect()` never settles, for timeout tests. */
  hangConnect?: boolean;
}

export interface FakePubSubClient extends PubSubClient {
  connect: Mock<() => Promise<void>>;
  publish: Mock<(channel: string, message: string) => Promise<number>>;
  subscribe: Mock<(channel: string, listener: ChannelListener) => Promise<void>>;
  unsubscribe: Mock<(channel: string, listener: ChannelListener) => Promise<void>>;
  disconnect: Mock<() => Promise<void>>;
  readonly failures: FakePubSubFailures;
  readonly isConnected: () => boolean;
}

/** Create a {@link PubSubClient} stand-in attached to `hub`. */
export function createFakePubSubClient(
  hub: InMemoryPubSubHub = new InMemoryPubSubHub(),
  failures: FakePubSubFailures = {},
): FakePubSubClient {
  let connected = false;
  const subscriptions = new Map<string, Set<ChannelListener>>();

  const requireConnection = () => {
    if (!connected) throw new Error('client is not connected');
  };

  return {
    failures,
    isConnected: () => connected,

    connect: vi.fn(async () => {
      if (failures.hangConnect) return new Promise<void>(() => {});
      if (failures.failConnect) throw new Error('ECONNREFUSED 127.0.0.1:6379');
      connected = true;
    }),

    publish: vi.fn(async (channel: string, message: string) => {
      requireConnection();
      if (failures.failPublish) throw new Error('publish rejected');
      return hub.publish(channel, message);
    }),

    subscribe: vi.fn(async (channel: string, listener: ChannelListener) => {
      requireConnection();
      if (failures.failSubscribe) throw new Error('subscribe rejected');
      let listeners = subscriptions.get(channel);
      if (!listeners) {
        listeners = new Set();
        subscriptions.set(channel, listeners);
      }
      listeners.add(listener);
      hub.subscribe(channel, listener);
    }),

    unsubscribe: vi.fn(async (channel: string, listener: ChannelListener) => {
      const listeners = subscriptions.get(channel);
      if (listeners?.delete(listener)) {
        hub.unsubscribe(channel, listener);
        if (listeners.size === 0) subscriptions.delete(channel);
      }
      if (failures.failUnsubscribe) throw new Error('unsubscribe rejected');
    }),

    disconnect: vi.fn(async () => {
      for (const [channel, listeners] of subscriptions) {
        for (const listener of listeners) hub.unsubscribe(channel, listener);
      }
      subscriptions.clear();
      connected = false;
    }),
  };
}
