// src/outbound_queue.ts

import { toError } from "./logger";
import type { PeerId } from "./shared_object";

export type SendFn = (bytes: Buffer) => Promise<void>;

/**
 * Bounded FIFO of encoded messages for one peer, drained by its own loop.
 *
 * When the queue is full new messages are refused (drop-newest) instead of
 * waiting, so a slow peer only ever delays its own traffic.
 */
export class OutboundQueue {
  private readonly items: Buffer[] = [];
  private draining: Promise<void> = Promise.resolve();
  private isDraining = false;
  private closed = false;
  private sentCount = 0;
  private droppedCount = 0;

  constructor(
    readonly peerId: PeerId,
    private readonly capacity: number,
    private readonly sendFn: SendFn,
    private readonly onError: (error: Error) => void,
  ) {}

  get length(): number {
    return this.items.length;
  }

  get sent(): number {
    return this.sentCount;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  /**
   * Queues bytes for sending.
   * @returns false when the queue is full or closed and the bytes were dropped.
   */
  enqueue(bytes: Buffer): boolean {
    if (this.closed || this.items.length >= this.capacity) {
      this.droppedCount++;
      return false;
    }
    this.items.push(bytes);
    if (!this.isDraining) {
      this.isDraining = true;
      this.draining = this.drain();
    }
    return true;
  }

  /** Resolves when nothing is queued or being sent. */
  whenIdle(): Promise<void> {
    return this.draining;
  }

  /** Discards queued messages and refuses new ones. */
  close(): void {
    this.closed = true;
    this.droppedCount += this.items.length;
    this.items.length = 0;
  }

  private async drain(): Promise<void> {
    try {
      let next = this.items.shift();
      while (next !== undefined && !this.closed) {
        await this.sendFn(next);
        this.sentCount++;
        next = this.items.shift();
      }
    } catch (err) {
      this.droppedCount += this.items.length;
      this.items.length = 0;
      this.onError(toError(err));
    } finally {
      this.isDraining = false;
    }
  }
}
