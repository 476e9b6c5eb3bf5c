import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { noopLogger } from '@a2a/shared/logger';
import { serializeMessage } from '@a2a/shared/message';
import type { A2AMessage } from '@a2a/shared/message-schemas';
import {
  InMemoryPubSubHub,
  createFakePubSubClient,
  createMockMessage,
  type FakePubSubClient,
} from '@a2a/test-utils';
import { FileTransport } from '../file-transport.js';
import { PubSubTransport, inboxChannel } from '../pubsub-transport.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let tmpDir: string;
let durable: FileTransport;
let hub: InMemoryPubSubHub;
let client: FakePubSubClient;
let transport: PubSubTransport;

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Poll until `predicate` holds, with a timeout. */
async function waitFor(predicate: () => boolean, timeoutMs = 5000, intervalMs = 25): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (predicate()) return;
    await wait(intervalMs);
  }
  throw new Error(`waitFor timed out after ${timeoutMs}ms`);
}

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pubsub-transport-test-'));
  durable = new FileTransport({ vaultPath: tmpDir, logger: noopLogger });
  hub = new InMemoryPubSubHub();
  client = createFakePubSubClient(hub);
  transport = new PubSubTransport({ durable, client, logger: noopLogger });
});

afterEach(async () => {
  await transport.close();
  await fs.rm(tmpDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('inboxChannel()', () => {
  it('builds the per-role channel name', () => {
    expect(inboxChannel('local')).toBe('a2a:local:inbox');
    expect(inboxChannel('cloud', 'vault1')).toBe('vault1:cloud:inbox');
  });
});

describe('PubSubTransport.connect()', () => {
  it('resolves true and reports connected', async () => {
    expect(await transport.connect()).toBe(true);
    expect(transport.isConnected).toBe(true);
  });

  it('resolves false without throwing when the server is unreachable', async () => {
    client.failures.failConnect = true;

    expect(await transport.connect()).toBe(false);
    expect(transport.isConnected).toBe(false);
  });

  it('gives up after the connect timeout', async () => {
    client.failures.hangConnect = true;
    const slow = new PubSubTransport({ durable, client, connectTimeoutMs: 50, logger: noopLogger });

    expect(await slow.connect()).toBe(false);
    expect(client.disconnect).toHaveBeenCalled();
  });
});

describe('PubSubTransport.send()', () => {
  it('persists durably and publishes to the recipient channel', async () => {
    await transport.connect();
    const msg = createMockMessage({ recipient: 'local' });

    const result = await transport.send(msg);

    expect(result).toEqual({ ok: true, messageId: msg.message_id });
    expect(hub.published).toEqual([{ channel: 'a2a:local:inbox', message: serializeMessage(msg) }]);
    expect((await durable.receive('local', 10)).map((m) => m.message_id)).toEqual([msg.message_id]);
  });

  it('returns the durable success when publishing fails', async () => {
    const logger = { ...noopLogger, warn: vi.fn() };
    const t = new PubSubTransport({ durable, client, logger });
    await t.connect();
    client.failures.failPublish = true;
    const msg = createMockMessage();

    const result = await t.send(msg);

    expect(result).toEqual({ ok: true, messageId: msg.message_id });
    expect(logger.warn).toHaveBeenCalledWith(
      'publish failed; message is still on disk',
      expect.objectContaining({ messageId: msg.message_id, channel: 'a2a:local:inbox', error: 'publish rejected' }),
    );
  });

  it('does not publish when disconnected', async () => {
    const msg = createMockMessage();

    const result = await transport.send(msg);

    expect(result.ok).toBe(true);
    expect(client.publish).not.toHaveBeenCalled();
  });

  it('does not publish when the durable write fails', async () => {
    await transport.connect();
    const failing = vi.spyOn(durable, 'send').mockResolvedValue({
      ok: false,
      code: 'TRANSPORT_ERROR',
      error: 'send failed: disk full',
    });

    const result = await transport.send(createMockMessage());

    expect(result).toEqual({ ok: false, code: 'TRANSPORT_ERROR', error: 'send failed: disk full' });
    expect(client.publish).not.toHaveBeenCalled();
    failing.mockRestore();
  });
});

describe('PubSubTransport delegation', () => {
  it('receives, acknowledges and dead-letters through the durable transport', async () => {
    const msg = createMockMessage();
    await transport.send(msg);

    expect((await transport.receive('local', 10)).map((m) => m.message_id)).toEqual([msg.message_id]);
    expect(await transport.acknowledge(msg, 'local')).toBe(true);
    expect(await transport.moveToDeadLetter(msg, 'local')).toBe(true);
    await expect(
      fs.access(path.join(durable.paths.deadLetter, `${msg.message_id}.json`)),
    ).resolves.toBeUndefined();
  });
});

describe('PubSubTransport.subscribe()', () => {
  it('delivers pushed messages to the handler in order', async () => {
    await transport.connect();
    const received: string[] = [];
    const controller = new AbortController();
    const loop = transport.subscribe('local', (m) => { received.push(m.message_id); }, controller.signal);
    await waitFor(() => hub.subscriberCount('a2a:local:inbox') === 1);

    const first = createMockMessage();
    const second = createMockMessage();
    await transport.send(first);
    await transport.send(second);
    await waitFor(() => received.length === 2);

    expect(received).toEqual([first.message_id, second.message_id]);
    controller.abort();
    await expect(loop).rejects.toBeDefined();
  });

  it('runs handlers one at a time', async () => {
    await transport.connect();
    let active = 0;
    let maxActive = 0;
    const done: string[] = [];
    const controller = new AbortController();
    const loop = transport.subscribe(
      'local',
      async (m) => {
        active++;
        maxActive = Math.max(maxActive, active);
        await wait(20);
        active--;
        done.push(m.message_id);
      },
      controller.signal,
    );
    await waitFor(() => hub.subscriberCount('a2a:local:inbox') === 1);

    for (let i = 0; i < 3; i++) await transport.send(createMockMessage());
    await waitFor(() => done.length === 3);

    expect(maxActive).toBe(1);
    controller.abort();
    await loop.catch(() => {});
  });

  it('keeps going after a handler throws', async () => {
    const logger = { ...noopLogger, error: vi.fn() };
    const t = new PubSubTransport({ durable, client, logger });
    await t.connect();
    const seen: A2AMessage[] = [];
    const controller = new AbortController();
    const loop = t.subscribe(
      'local',
      (m) => {
        seen.push(m);
        if (seen.length === 1) throw new Error('handler exploded');
      },
      controller.signal,
    );
    await waitFor(() => hub.subscriberCount('a2a:local:inbox') === 1);

    await t.send(createMockMessage());
    await t.send(createMockMessage());
    await waitFor(() => seen.length === 2);

    expect(logger.error).toHaveBeenCalledWith(
      'subscriber handler failed',
      expect.objectContaining({ error: 'handler exploded' }),
    );
    controller.abort();
    await loop.catch(() => {});
  });

  it('drops unparsable pushes', async () => {
    await transport.connect();
    const handler = vi.fn();
    const controller = new AbortController();
    const loop = transport.subscribe('local', handler, controller.signal);
    await waitFor(() => hub.subscriberCount('a2a:local:inbox') === 1);

    hub.publish('a2a:local:inbox', 'not json');
    const msg = createMockMessage();
    await transport.send(msg);
    await waitFor(() => handler.mock.calls.length === 1);

    expect(handler).toHaveBeenCalledWith(expect.objectContaining({ message_id: msg.message_id }));
    controller.abort();
    await loop.catch(() => {});
  });

  it('unsubscribes before rejecting with the abort reason', async () => {
    await transport.connect();
    const controller = new AbortController();
    const loop = transport.subscribe('local', () => {}, controller.signal);
    await waitFor(() => hub.subscriberCount('a2a:local:inbox') === 1);
    const reason = new Error('shutting down');

    controller.abort(reason);

    await expect(loop).rejects.toBe(reason);
    expect(client.unsubscribe).toHaveBeenCalledWith('a2a:local:inbox', expect.any(Function));
    expect(hub.subscriberCount('a2a:local:inbox')).toBe(0);
  });

  it('leaves a second subscription on the same role running when one is aborted', async () => {
    await transport.connect();
    const kept: string[] = [];
    const first = new AbortController();
    const second = new AbortController();
    const firstLoop = transport.subscribe('local', () => {}, first.signal);
    const secondLoop = transport.subscribe('local', (m) => { kept.push(m.message_id); }, second.signal);
    await waitFor(() => hub.subscriberCount('a2a:local:inbox') === 2);

    first.abort();
    await firstLoop.catch(() => {});
    const msg = createMockMessage();
    await transport.send(msg);
    await waitFor(() => kept.length === 1);

    expect(hub.subscriberCount('a2a:local:inbox')).toBe(1);
    expect(kept).toEqual([msg.message_id]);
    second.abort();
    await secondLoop.catch(() => {});
  });

  it('still rejects with the abort reason when unsubscribe fails', async () => {
    await transport.connect();
    client.failures.failUnsubscribe = true;
    const controller = new AbortController();
    const loop = transport.subscribe('local', () => {}, controller.signal);
    await waitFor(() => hub.subscriberCount('a2a:local:inbox') === 1);
    const reason = new Error('stop');

    controller.abort(reason);

    await expect(loop).rejects.toBe(reason);
  });

  it('rejects immediately for an already-aborted signal', async () => {
    const reason = new Error('already gone');

    await expect(transport.subscribe('local', () => {}, AbortSignal.abort(reason))).rejects.toBe(reason);
    expect(client.subscribe).not.toHaveBeenCalled();
  });

  it('falls back to watching the durable inbox when disconnected', async () => {
    const received: string[] = [];
    const controller = new AbortController();
    const watchSpy = vi.spyOn(durable, 'watch');
    const loop = transport.subscribe('local', (m) => { received.push(m.message_id); }, controller.signal);
    await waitFor(() => watchSpy.mock.results.length === 1);
    await watchSpy.mock.results[0]?.value;

    const msg = createMockMessage();
    await transport.send(msg);
    await waitFor(() => received.length === 1);

    expect(received).toEqual([msg.message_id]);
    expect(client.subscribe).not.toHaveBeenCalled();
    controller.abort();
    await loop.catch(() => {});
  });

  it('falls back to watching the durable inbox when the subscription fails', async () => {
    await transport.connect();
    client.failures.failSubscribe = true;
    const watchSpy = vi.spyOn(durable, 'watch');
    const controller = new AbortController();
    const loop = transport.subscribe('local', () => {}, controller.signal);

    await waitFor(() => watchSpy.mock.calls.length === 1);

    expect(watchSpy).toHaveBeenCalledWith('local', expect.any(Function));
    controller.abort();
    await loop.catch(() => {});
  });
});

describe('PubSubTransport.close()', () => {
  it('disconnects the client and closes the durable transport', async () => {
    await transport.connect();
    const durableClose = vi.spyOn(durable, 'close');

    await transport.close();

    expect(client.disconnect).toHaveBeenCalledOnce();
    expect(durableClose).toHaveBeenCalledOnce();
    expect(transport.isConnected).toBe(false);
  });
});
