// test/dedup_cache.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { DedupCache } from "../src/dedup_cache";

const digest = (n: number): string => n.toString(16).padStart(64, "0");

describe("DedupCache", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(1_000_000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should report inserted digests as present", () => {
    const cache = new DedupCache({ capacity: 10, ttlMs: 1000 });

    expect(cache.contains(digest(1))).toBe(false);
    expect(cache.insert(digest(1))).toBe(true);
    expect(cache.contains(digest(1))).toBe(true);
    expect(cache.size).toBe(1);
  });

  it("should treat a second insert as a duplicate and keep the first sighting", () => {
    const cache = new DedupCache({ capacity: 10, ttlMs: 1000 });
    cache.insert(digest(1));
    vi.advanceTimersByTime(400);

    expect(cache.insert(digest(1))).toBe(false);
    expect(cache.snapshot()).toEqual([
      { digest: digest(1), firstSeen: 1_000_000 },
    ]);
  });

  it("should evict exactly the oldest entry when capacity is exceeded by one", () => {
    const cache = new DedupCache({ capacity: 3, ttlMs: 60_000 });
    for (let i = 1; i <= 3; i++) {
      cache.insert(digest(i));
      vi.advanceTimersByTime(10);
    }

    cache.insert(digest(4));

    expect(cache.size).toBe(3);
    expect(cache.contains(digest(1))).toBe(false);
    expect(cache.contains(digest(2))).toBe(true);
    expect(cache.contains(digest(3))).toBe(true);
    expect(cache.contains(digest(4))).toBe(true);
    expect(cache.evictions).toBe(1);
  });

  it("should treat a digest re-inserted after eviction as novel", () => {
    const cache = new DedupCache({ capacity: 1, ttlMs: 60_000 });
    cache.insert(digest(1));
    cache.insert(digest(2));

    expect(cache.insert(digest(1))).toBe(true);
    expect(cache.contains(digest(2))).toBe(false);
  });

  it("should stop reporting entries once they reach the ttl", () => {
    const cache = new DedupCache({ capacity: 10, ttlMs: 1000 });
    cache.insert(digest(1));

    vi.advanceTimersByTime(999);
    expect(cache.contains(digest(1))).toBe(true);

    vi.advanceTimersByTime(1);
    expect(cache.contains(digest(1))).toBe(false);
    expect(cache.size).toBe(0);
  });

  it("should sweep expired entries oldest first", () => {
    const cache = new DedupCache({ capacity: 10, ttlMs: 1000 });
    cache.insert(digest(1));
    vi.advanceTimersByTime(500);
    cache.insert(digest(2));
    vi.advanceTimersByTime(600);

    expect(cache.evictExpired()).toBe(1);
    expect(cache.snapshot().map((e) => e.digest)).toEqual([digest(2)]);
  });

  it("should never hold more than its capacity", () => {
    const cache = new DedupCache({ capacity: 50, ttlMs: 60_000 });
    for (let i = 0; i < 500; i++) {
      cache.insert(digest(i));
    }

    expect(cache.size).toBe(50);
    expect(cache.evictions).toBe(450);
    expect(cache.snapshot()[0]?.digest).toBe(digest(450));
  });
});
