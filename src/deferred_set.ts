// src/deferred_set.ts

import type { Digest } from "./crypto";
import type { SharedObject } from "./shared_object";

export interface DeferredSetOptions {
  /** Re-submissions allowed per object before it is dropped. */
  maxRetries: number;
  /** Time in ms an object may wait, counted from its first deferral. */
  ttlMs: number;
  /** Maximum number of objects held at once. */
  capacity: number;
}

export type DeferredDropCause = "retries_exhausted" | "expired" | "capacity";

export interface DeferredDrop {
  object: SharedObject;
  missingDependency: Digest;
  cause: DeferredDropCause;
}

interface Waiting {
  object: SharedObject;
  missingDependency: Digest;
}

interface Attempts {
  retries: number;
  firstDeferredAt: number;
}

/**
 * Objects waiting for a dependency that has not been accepted yet, keyed by
 * the digest they wait for.
 *
 * Attempt counts outlive a release: an object re-submitted and deferred
 * again keeps its retry count and its original deadline until `forget` is
 * called for it.
 */
export class DeferredSet {
  private readonly waiting = new Map<Digest, Waiting>();
  private readonly byDependency = new Map<Digest, Set<Digest>>();
  private readonly attempts = new Map<Digest, Attempts>();

  constructor(private readonly options: DeferredSetOptions) {}

  get size(): number {
    return this.waiting.size;
  }

  get capacity(): number {
    return this.options.capacity;
  }

  has(digest: Digest): boolean {
    return this.waiting.has(digest);
  }

  /** Number of objects waiting for `dependency`. */
  waitingOn(dependency: Digest): number {
    return this.byDependency.get(dependency)?.size ?? 0;
  }

  /**
   * Holds an object until `missingDependency` is released.
   * @returns The drop when the object cannot be held, otherwise undefined.
   */
  hold(object: SharedObject, missingDependency: Digest): DeferredDrop | undefined {
    const now = Date.now();
    const attempts = this.attempts.get(object.digest) ?? {
      retries: 0,
      firstDeferredAt: now,
    };

    if (attempts.retries >= this.options.maxRetries) {
      this.forget(object.digest);
      return { object, missingDependency, cause: "retries_exhausted" };
    }
    if (now - attempts.firstDeferredAt >= this.options.ttlMs) {
      this.forget(object.digest);
      return { object, missingDependency, cause: "expired" };
    }

    this.unlink(object.digest);
    if (this.waiting.size >= this.options.capacity) {
      this.attempts.delete(object.digest);
      return { object, missingDependency, cause: "capacity" };
    }

    this.attempts.set(object.digest, attempts);
    this.waiting.set(object.digest, { object, missingDependency });
    let dependents = this.byDependency.get(missingDependency);
    if (!dependents) {
      dependents = new Set();
      this.byDependency.set(missingDependency, dependents);
    }
    dependents.add(object.digest);
    return undefined;
  }

  /**
   * Removes and returns every object waiting for `dependency`, counting one
   * retry for each.
   */
  release(dependency: Digest): SharedObject[] {
    const dependents = this.byDependency.get(dependency);
    if (!dependents) {
      return [];
    }
    this.byDependency.delete(dependency);

    const released: SharedObject[] = [];
    for (const digest of dependents) {
      const entry = this.waiting.get(digest);
      if (!entry) continue;
      this.waiting.delete(digest);
      const attempts = this.attempts.get(digest);
      if (attempts) {
        attempts.retries++;
      }
      released.push(entry.object);
    }
    return released;
  }

  /** Forgets an object that reached a final decision. */
  forget(digest: Digest): void {
    this.unlink(digest);
    this.attempts.delete(digest);
  }

  /** Drops objects whose deadline passed. */
  expire(now = Date.now()): DeferredDrop[] {
    const dropped: DeferredDrop[] = [];
    for (const [digest, attempts] of this.attempts) {
      if (now - attempts.firstDeferredAt < this.options.ttlMs) continue;
      const entry = this.waiting.get(digest);
      this.forget(digest);
      if (entry) {
        dropped.push({ ...entry, cause: "expired" });
      }
    }
    return dropped;
  }

  clear(): void {
    this.waiting.clear();
    this.byDependency.clear();
    this.attempts.clear();
  }

  private unlink(digest: Digest): void {
    const entry = this.waiting.get(digest);
    if (!entry) {
      return;
    }
    this.waiting.delete(digest);
    const dependents = this.byDependency.get(entry.missingDependency);
    dependents?.delete(digest);
    if (dependents && dependents.size === 0) {
      this.byDependency.delete(entry.missingDependency);
    }
  }
}
