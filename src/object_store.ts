// src/object_store.ts

import type { Digest } from "./crypto";

/**
 * Content-addressed persistence used by the gossip engine. Implementations
 * must make a completed `put` visible to a following `get` on the same node.
 */
export interface ObjectStore {
  put(digest: Digest, bytes: Buffer): Promise<void>;
  get(digest: Digest): Promise<Buffer | undefined>;
  contains(digest: Digest): Promise<boolean>;
}

/**
 * Map-backed ObjectStore, the default for tests and single-process networks.
 */
export class InMemoryObjectStore implements ObjectStore {
  private readonly data = new Map<Digest, Buffer>();

  async put(digest: Digest, bytes: Buffer): Promise<void> {
    this.data.set(digest, Buffer.from(bytes));
  }

  async get(digest: Digest): Promise<Buffer | undefined> {
    const bytes = this.data.get(digest);
    return bytes ? Buffer.from(bytes) : undefined;
  }

  async contains(digest: Digest): Promise<boolean> {
    return this.data.has(digest);
  }

  async delete(digest: Digest): Promise<void> {
    this.data.delete(digest);
  }

  async clear(): Promise<void> {
    this.data.clear();
  }

  size(): number {
    return this.data.size;
  }
}
