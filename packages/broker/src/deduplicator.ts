/**
 * Bounded cache of recently seen message ids.
 *
 * Entries expire `ttlSeconds` after they were last seen (swept lazily on
 * every `isDuplicate` call) and the cache never holds more than `maxSize`
 * ids. Map insertion order tracks last-seen time: `markSeen` re-inserts,
 * so the first entry is always the oldest.
 *
 * @module broker/deduplicator
 */
import type { A2AMessage } from '@a2a/shared/message-schemas';

/** Default maximum number of tracked ids. */
export const DEFAULT_DEDUP_MAX_SIZE = 10_000;

/** Default retention for a seen id: 2 hours. */
export const DEFAULT_DEDUP_TTL_SECONDS = 7200;

export interface DeduplicatorOptions {
  maxSize?: number;
  ttlSeconds?: number;
}

export class Deduplicator {
  private readonly seen = new Map<string, number>();
  private readonly maxSize: number;
  private readonly ttlMs: number;

  constructor(options: DeduplicatorOptions = {}) {
    this.maxSize = options.maxSize ?? DEFAULT_DEDUP_MAX_SIZE;
    this.ttlMs = (options.ttlSeconds ?? DEFAULT_DEDUP_TTL_SECONDS) * 1000;
  }

  /** Number of ids currently tracked. */
  get size(): number {
    return this.seen.size;
  }

  /** Evict stale entries, then report whether the message id is still tracked. */
  isDuplicate(message: Pick<A2AMessage, 'message_id'>): boolean {
    this.evictExpired(Date.now());
    return this.seen.has(message.message_id);
  }

  /** Record the message id as seen now; drop the oldest id when over capacity. */
  markSeen(message: Pick<A2AMessage, 'message_id'>): void {
    this.seen.delete(message.message_id);
    this.seen.set(message.message_id, Date.now());

    if (this.seen.size > this.maxSize) {
      const oldest = this.seen.keys().next();
      if (!oldest.done) this.seen.delete(oldest.value);
    }
  }

  clear(): void {
    this.seen.clear();
  }

  private evictExpired(now: number): void {
    for (const [id, seenAt] of this.seen) {
      if (now - seenAt <= this.ttlMs) break;
      this.seen.delete(id);
    }
  }
}
