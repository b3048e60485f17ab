// src/dedup_cache.ts

import type { Digest } from "./crypto";

export interface DedupCacheOptions {
  /** Maximum number of digests retained. */
  capacity: number;
  /** Maximum age in ms of a retained digest. */
  ttlMs: number;
}

export interface DedupEntry {
  digest: Digest;
  firstSeen: number;
}

/**
 * Bounded recency set of digests already seen by this node.
 *
 * Entries are evicted oldest-first once either bound is exceeded. An evicted
 * digest is forgotten entirely: inserting it again counts as a first
 * sighting, so an object rebroadcast after eviction is processed again.
 */
export class DedupCache {
  // Map iteration order is insertion order, which is firstSeen order.
  private readonly entries = new Map<Digest, number>();
  private evictedCount = 0;

  constructor(private readonly options: DedupCacheOptions) {}

  get size(): number {
    return this.entries.size;
  }

  get capacity(): number {
    return this.options.capacity;
  }

  /** Number of entries evicted so far by age or capacity. */
  get evictions(): number {
    return this.evictedCount;
  }

  contains(digest: Digest): boolean {
    const firstSeen = this.entries.get(digest);
    if (firstSeen === undefined) {
      return false;
    }
    if (this.isExpired(firstSeen, Date.now())) {
      this.entries.delete(digest);
      this.evictedCount++;
      return false;
    }
    return true;
  }

  /**
   * Records a digest. Returns false when it was already present, in which
   * case its firstSeen is left unchanged.
   */
  insert(digest: Digest): boolean {
    if (this.contains(digest)) {
      return false;
    }
    const now = Date.now();
    this.evictExpired(now);
    this.entries.set(digest, now);
    while (this.entries.size > this.options.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictedCount++;
    }
    return true;
  }

  /** Drops every entry older than the TTL. Returns the number removed. */
  evictExpired(now = Date.now()): number {
    let removed = 0;
    for (const [digest, firstSeen] of this.entries) {
      if (!this.isExpired(firstSeen, now)) break;
      this.entries.delete(digest);
      removed++;
    }
    this.evictedCount += removed;
    return removed;
  }

  /** Snapshot of live entries, oldest first. */
  snapshot(): DedupEntry[] {
    return Array.from(this.entries, ([digest, firstSeen]) => ({
      digest,
      firstSeen,
    }));
  }

  clear(): void {
    this.entries.clear();
  }

  private isExpired(firstSeen: number, now: number): boolean {
    return now - firstSeen >= this.options.ttlMs;
  }
}
