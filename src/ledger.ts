// src/ledger.ts

import type { Digest } from "./crypto";
import type { ObjectKind, SharedObject } from "./shared_object";

/**
 * One committed object in the local node's history.
 */
export interface LedgerEntry {
  digest: Digest;
  kind: ObjectKind;
  orderIndex: number;
  acceptedAt: number;
  conflictKey?: string;
}

/**
 * Read-only view of the committed history handed to validators. Validators
 * must decide purely from the candidate object and this view.
 */
export interface LocalStateView {
  /** Number of committed objects. */
  readonly size: number;
  isCommitted(digest: Digest): boolean;
  get(digest: Digest): LedgerEntry | undefined;
  /** Most recently committed entry. */
  head(): LedgerEntry | undefined;
  /** Digest that holds the given conflict key, if any. */
  conflictHolder(key: string): Digest | undefined;
}

/**
 * Append-only record of accepted objects with strictly increasing order
 * indices starting at 0.
 */
export class CommittedLedger implements LocalStateView {
  private readonly byDigest = new Map<Digest, LedgerEntry>();
  private readonly ordered: LedgerEntry[] = [];
  private readonly conflicts = new Map<string, Digest>();

  get size(): number {
    return this.ordered.length;
  }

  isCommitted(digest: Digest): boolean {
    return this.byDigest.has(digest);
  }

  get(digest: Digest): LedgerEntry | undefined {
    return this.byDigest.get(digest);
  }

  head(): LedgerEntry | undefined {
    return this.ordered[this.ordered.length - 1];
  }

  conflictHolder(key: string): Digest | undefined {
    return this.conflicts.get(key);
  }

  /**
   * Appends an object. Committing a digest twice returns the original entry.
   */
  commit(object: SharedObject, conflictKey?: string): LedgerEntry {
    const existing = this.byDigest.get(object.digest);
    if (existing) {
      return existing;
    }
    const entry: LedgerEntry = {
      digest: object.digest,
      kind: object.kind,
      orderIndex: this.ordered.length,
      acceptedAt: Date.now(),
      conflictKey,
    };
    this.byDigest.set(entry.digest, entry);
    this.ordered.push(entry);
    if (conflictKey !== undefined) {
      this.conflicts.set(conflictKey, entry.digest);
    }
    return entry;
  }

  /** Entries with orderIndex >= fromIndex, in commit order. */
  since(fromIndex: number): LedgerEntry[] {
    return this.ordered.slice(Math.max(0, fromIndex));
  }
}
