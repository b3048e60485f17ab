// src/peer_session.ts

import { Logger, toError } from "./logger";
import { OutboundQueue, SendFn } from "./outbound_queue";
import type { PeerId } from "./shared_object";
import type { GossipMessage } from "./wire_codec";

export type InboundHandler = (
  message: GossipMessage,
  signal: AbortSignal,
) => Promise<void>;

export interface PeerSessionOptions {
  outboundCapacity: number;
  inboundCapacity: number;
}

/**
 * The per-connection task: gossip messages from one peer are handled
 * strictly one after another, and messages to it leave through a bounded
 * queue. Closing the session aborts its signal so in-flight handling stops
 * before touching shared state.
 */
export class PeerSession {
  readonly outbound: OutboundQueue;
  private readonly controller = new AbortController();
  private inboundTail: Promise<void> = Promise.resolve();
  private inboundPending = 0;
  private inboundDropped = 0;

  constructor(
    readonly peerId: PeerId,
    private readonly options: PeerSessionOptions,
    send: SendFn,
    private readonly handler: InboundHandler,
    onSendError: (error: Error) => void,
    private readonly log: Logger,
  ) {
    this.outbound = new OutboundQueue(
      peerId,
      options.outboundCapacity,
      send,
      onSendError,
    );
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  /** Queues bytes for the peer; false when dropped. */
  send(bytes: Buffer): boolean {
    return this.outbound.enqueue(bytes);
  }

  /**
   * Queues an inbound message behind earlier ones from the same peer.
   * @returns false when the inbound queue is full and the message was dropped.
   */
  receive(message: GossipMessage): boolean {
    if (this.closed) {
      return false;
    }
    if (this.inboundPending >= this.options.inboundCapacity) {
      this.inboundDropped++;
      return false;
    }
    this.inboundPending++;
    this.inboundTail = this.inboundTail
      .then(() => (this.closed ? undefined : this.handler(message, this.signal)))
      .catch((err) => {
        this.log.error("Inbound handler failed", toError(err), {
          peerId: this.peerId,
          type: message.type,
        });
      })
      .finally(() => {
        this.inboundPending--;
      });
    return true;
  }

  getStats(): {
    inboundPending: number;
    inboundDropped: number;
    outboundQueued: number;
    outboundSent: number;
    outboundDropped: number;
  } {
    return {
      inboundPending: this.inboundPending,
      inboundDropped: this.inboundDropped,
      outboundQueued: this.outbound.length,
      outboundSent: this.outbound.sent,
      outboundDropped: this.outbound.dropped,
    };
  }

  /** Resolves once every inbound message queued so far was handled. */
  whenInboundIdle(): Promise<void> {
    return this.inboundTail;
  }

  /** Resolves once queued inbound handling and outbound sends finished. */
  async whenIdle(): Promise<void> {
    await Promise.all([this.inboundTail, this.outbound.whenIdle()]);
  }

  close(): void {
    this.controller.abort();
    this.outbound.close();
  }
}
