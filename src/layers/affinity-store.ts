/**
 * Affinity Store: per-user affinity cache with lazy TTL expiration
 *
 * Every operation runs synchronously to completion, so the event loop is the
 * lock: a read that finds a stale entry deletes it before any writer can run.
 */

import type { AffinityRecord } from "../types.js";
import { DEFAULT_CACHE_TTL_SECONDS } from "../types.js";

interface CacheEntry {
  record: AffinityRecord;
  recordedAt: number;
}

export class AffinityStore {
  private entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: { ttlSeconds?: number; now?: () => number } = {}) {
    this.ttlMs = (opts.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS) * 1000;
    this.now = opts.now ?? Date.now;
  }

  get(userId: string): AffinityRecord | undefined {
    const entry = this.entries.get(userId);
    if (!entry) return undefined;

    if (this.now() - entry.recordedAt > this.ttlMs) {
      this.entries.delete(userId);
      return undefined;
    }
    return entry.record;
  }

  /** Replace whatever is cached for the user; last write wins. */
  set(userId: string, impression: number, attitude: string): AffinityRecord {
    const record: AffinityRecord = Object.freeze({ userId, impression, attitude });
    this.entries.set(userId, { record, recordedAt: this.now() });
    return record;
  }

  /** Entries held, including stale ones not yet touched. */
  get size(): number {
    return this.entries.size;
  }
}
