import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Deduplicator } from '../deduplicator.js';

const msg = (id: string) => ({ message_id: id });

describe('Deduplicator', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('reports unseen ids as new', () => {
    const dedup = new Deduplicator();

    expect(dedup.isDuplicate(msg('a'))).toBe(false);
    expect(dedup.size).toBe(0);
  });

  it('reports a marked id as duplicate', () => {
    const dedup = new Deduplicator();
    dedup.markSeen(msg('a'));

    expect(dedup.isDuplicate(msg('a'))).toBe(true);
    expect(dedup.isDuplicate(msg('b'))).toBe(false);
  });

  it('holds at most maxSize ids, evicting the oldest', () => {
    const dedup = new Deduplicator({ maxSize: 3 });
    for (const id of ['a', 'b', 'c', 'd']) {
      dedup.markSeen(msg(id));
      vi.advanceTimersByTime(1000);
    }

    expect(dedup.size).toBe(3);
    expect(dedup.isDuplicate(msg('a'))).toBe(false);
    expect(dedup.isDuplicate(msg('b'))).toBe(true);
    expect(dedup.isDuplicate(msg('d'))).toBe(true);
  });

  it('re-marking an id moves it to the newest position', () => {
    const dedup = new Deduplicator({ maxSize: 2 });
    dedup.markSeen(msg('a'));
    dedup.markSeen(msg('b'));
    dedup.markSeen(msg('a'));
    dedup.markSeen(msg('c'));

    expect(dedup.isDuplicate(msg('a'))).toBe(true);
    expect(dedup.isDuplicate(msg('b'))).toBe(false);
    expect(dedup.isDuplicate(msg('c'))).toBe(true);
  });

  it('forgets ids once their ttl has passed', () => {
    const dedup = new Deduplicator({ ttlSeconds: 60 });
    dedup.markSeen(msg('old'));
    vi.advanceTimersByTime(30_000);
    dedup.markSeen(msg('young'));
    vi.advanceTimersByTime(30_001);

    expect(dedup.isDuplicate(msg('old'))).toBe(false);
    expect(dedup.isDuplicate(msg('young'))).toBe(true);
    expect(dedup.size).toBe(1);
  });

  it('keeps an id seen exactly ttl ago', () => {
    const dedup = new Deduplicator({ ttlSeconds: 60 });
    dedup.markSeen(msg('a'));
    vi.advanceTimersByTime(60_000);

    expect(dedup.isDuplicate(msg('a'))).toBe(true);
  });

  it('clear() empties the cache', () => {
    const dedup = new Deduplicator();
    dedup.markSeen(msg('a'));
    dedup.clear();

    expect(dedup.size).toBe(0);
    expect(dedup.isDuplicate(msg('a'))).toBe(false);
  });
});
