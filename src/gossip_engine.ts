// src/gossip_engine.ts

import { EventEmitter } from "events";
import type { ConsensusEngine } from "./consensus_engine";
import type { CryptoProvider, Digest } from "./crypto";
import type { DedupCache } from "./dedup_cache";
import { DeferredDrop, DeferredSet, DeferredSetOptions } from "./deferred_set";
import {
  CapacityExceededError,
  ChainweaveError,
  DependencyMissingError,
  NodeShuttingDownError,
  StoreUnavailableError,
  ValidationRejectedError,
  WireIntegrityError,
} from "./errors";
import type { ComponentHealth } from "./health";
import { Logger, createLogger, toError } from "./logger";
import type { ObjectStore } from "./object_store";
import { PeerSession } from "./peer_session";
import {
  ObjectKind,
  PeerId,
  SharedObject,
  createSharedObject,
  kindForDigest,
  objectDigest,
} from "./shared_object";
import type { Transport } from "./transport";
import type { ConsensusDecision } from "./validator";
import {
  GossipMessage,
  ObjectMessage,
  WireMessage,
  encodeWireMessage,
} from "./wire_codec";

/** Penalty for an object whose payload does not match its digest. */
export const INTEGRITY_PENALTY = 25;
/** Penalty for bytes that do not decode to a wire message. */
export const MALFORMED_PENALTY = 10;
/** Penalty for a peer whose queue overflowed. */
export const BACKPRESSURE_PENALTY = 1;

/**
 * What the gossip engine reports back about the peers it talks to.
 */
export interface PeerFeedback {
  penalize(peerId: PeerId, reason: string, weight: number): void;
  recordSeen(peerId: PeerId, useful: boolean): void;
}

export interface GossipEngineConfig {
  outboundQueueCapacity: number;
  inboundQueueCapacity: number;
  deferred: DeferredSetOptions;
  /** How often expired deferrals and dedup entries are swept (ms). */
  sweepIntervalMs: number;
}

export const DEFAULT_GOSSIP_ENGINE_CONFIG: GossipEngineConfig = {
  outboundQueueCapacity: 256,
  inboundQueueCapacity: 1024,
  deferred: { maxRetries: 5, ttlMs: 60000, capacity: 1000 },
  sweepIntervalMs: 1000,
};

export interface GossipEngineDeps {
  nodeId: PeerId;
  crypto: CryptoProvider;
  store: ObjectStore;
  dedup: DedupCache;
  consensus: ConsensusEngine;
  transport: Pick<Transport, "send">;
  peers: PeerFeedback;
}

export interface GossipStats {
  objectsReceived: number;
  duplicates: number;
  integrityViolations: number;
  requestsSent: number;
  objectsServed: number;
  announcementsSent: number;
  accepted: number;
  rejected: number;
  deferred: number;
  droppedDeferred: number;
  outboundDropped: number;
  inboundDropped: number;
}

/**
 * Pull-based dissemination of shared objects: peers announce digests,
 * receivers request what they lack, and objects travel only on request.
 *
 * Every connected peer gets a PeerSession. Inbound gossip from one peer is
 * handled in arrival order; outbound traffic goes through that peer's
 * bounded queue so a slow peer never holds up the others.
 *
 * Events:
 * - 'accepted' (object, orderIndex)
 * - 'rejected' (object, reason)
 * - 'dropped' (object, error: DependencyMissingError)
 * - 'integrity_violation' (peerId, error: WireIntegrityError)
 * - 'fatal' (error: StoreUnavailableError)
 */
export class GossipEngine extends EventEmitter {
  private readonly config: GossipEngineConfig;
  private readonly log: Logger;
  private readonly deferred: DeferredSet;
  private readonly sessions = new Map<PeerId, PeerSession>();
  private readonly persisting = new Set<Digest>();
  private readonly pending = new Set<Promise<void>>();
  private sweepTimer?: NodeJS.Timeout;
  private stopped = false;
  private failure?: StoreUnavailableError;
  private readonly stats: GossipStats = {
    objectsReceived: 0,
    duplicates: 0,
    integrityViolations: 0,
    requestsSent: 0,
    objectsServed: 0,
    announcementsSent: 0,
    accepted: 0,
    rejected: 0,
    deferred: 0,
    droppedDeferred: 0,
    outboundDropped: 0,
    inboundDropped: 0,
  };

  private readonly boundOnDecision: (
    object: SharedObject,
    decision: ConsensusDecision,
  ) => void;

  constructor(
    private readonly deps: GossipEngineDeps,
    config: Partial<GossipEngineConfig> = {},
  ) {
    super();
    this.config = { ...DEFAULT_GOSSIP_ENGINE_CONFIG, ...config };
    this.log = createLogger("GossipEngine", deps.nodeId);
    this.deferred = new DeferredSet(this.config.deferred);
    this.boundOnDecision = (object, decision) => {
      this.track(this.onConsensusResult(object, decision));
    };
    this.deps.consensus.on("decision", this.boundOnDecision);
  }

  start(): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, this.config.sweepIntervalMs);
  }

  /**
   * Stops the sweep and refuses local submissions and new sessions.
   * Decisions already in flight still complete; await `settle()` for them.
   */
  stop(): void {
    this.stopped = true;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  /**
   * Closes every session and stops listening for consensus decisions.
   * Call after `settle()`.
   */
  close(): void {
    this.stop();
    for (const peerId of Array.from(this.sessions.keys())) {
      this.detachPeer(peerId);
    }
    this.deps.consensus.removeListener("decision", this.boundOnDecision);
  }

  /** The store failure that stopped the engine, if any. */
  get fatalError(): StoreUnavailableError | undefined {
    return this.failure;
  }

  get deferredCount(): number {
    return this.deferred.size;
  }

  // ---------------------------------------------------------------------------
  // Peer sessions
  // ---------------------------------------------------------------------------

  attachPeer(peerId: PeerId): void {
    if (this.sessions.has(peerId) || this.stopped) {
      return;
    }
    const session = new PeerSession(
      peerId,
      {
        outboundCapacity: this.config.outboundQueueCapacity,
        inboundCapacity: this.config.inboundQueueCapacity,
      },
      (bytes) => this.deps.transport.send(peerId, bytes),
      (message, signal) => this.onReceive(peerId, message, signal),
      (error) => {
        this.log.warn("Send failed, dropping queued messages", { peerId }, error);
      },
      this.log,
    );
    this.sessions.set(peerId, session);
  }

  detachPeer(peerId: PeerId): void {
    const session = this.sessions.get(peerId);
    if (!session) {
      return;
    }
    this.sessions.delete(peerId);
    session.close();
  }

  getSessionPeers(): PeerId[] {
    return Array.from(this.sessions.keys());
  }

  getSession(peerId: PeerId): PeerSession | undefined {
    return this.sessions.get(peerId);
  }

  /**
   * Queues an inbound gossip message behind earlier ones from the same peer.
   */
  deliver(from: PeerId, message: GossipMessage): void {
    const session = this.sessions.get(from);
    if (!session) {
      this.log.debug("Dropping message from peer without session", {
        peerId: from,
        type: message.type,
      });
      return;
    }
    if (!session.receive(message)) {
      this.stats.inboundDropped++;
      this.overflow(
        from,
        new CapacityExceededError(
          "inbound queue",
          this.config.inboundQueueCapacity,
          from,
        ),
      );
    }
  }

  /**
   * Queues a message for one peer.
   * @returns false when the peer has no session or its queue is full.
   */
  sendTo(peerId: PeerId, message: WireMessage): boolean {
    const session = this.sessions.get(peerId);
    if (!session) {
      return false;
    }
    if (session.send(encodeWireMessage(message))) {
      return true;
    }
    this.stats.outboundDropped++;
    this.overflow(
      peerId,
      new CapacityExceededError(
        "outbound queue",
        this.config.outboundQueueCapacity,
        peerId,
      ),
    );
    return false;
  }

  // ---------------------------------------------------------------------------
  // Gossip protocol
  // ---------------------------------------------------------------------------

  /**
   * Handles one gossip message. Once `signal` is aborted the message is
   * abandoned before it changes any shared state.
   */
  async onReceive(
    from: PeerId,
    message: GossipMessage,
    signal?: AbortSignal,
  ): Promise<void> {
    if (signal?.aborted) {
      return;
    }
    switch (message.type) {
      case "announce": {
        if (this.deps.dedup.contains(message.digest)) {
          return;
        }
        const stored = await this.storeContains(message.digest);
        if (
          stored !== false ||
          signal?.aborted ||
          this.deps.dedup.contains(message.digest)
        ) {
          return;
        }
        if (this.sendTo(from, { type: "request", digest: message.digest })) {
          this.stats.requestsSent++;
        }
        return;
      }
      case "request": {
        const payload = await this.storeGet(message.digest);
        if (payload === undefined || signal?.aborted) {
          return;
        }
        const kind =
          this.deps.consensus.view.get(message.digest)?.kind ??
          kindForDigest(this.deps.crypto, message.digest, payload);
        if (kind === undefined) {
          this.log.warn("Stored payload does not match its digest", {
            digest: message.digest,
          });
          return;
        }
        if (
          this.sendTo(from, {
            type: "object",
            digest: message.digest,
            kind,
            payload,
          })
        ) {
          this.stats.objectsServed++;
        }
        return;
      }
      case "object":
        this.receiveObject(from, message, signal);
        return;
    }
  }

  /**
   * Reacts to a consensus decision: persists and announces accepted objects,
   * holds deferred ones and wakes objects that waited for an accepted one.
   */
  async onConsensusResult(
    object: SharedObject,
    decision: ConsensusDecision,
  ): Promise<void> {
    switch (decision.status) {
      case "accepted": {
        this.deferred.forget(object.digest);
        const stored = await this.persist(object);
        if (stored === undefined) {
          return;
        }
        if (!stored) {
          this.announce(object);
        }
        this.stats.accepted++;
        this.log.debug("Object accepted", {
          digest: object.digest,
          orderIndex: decision.orderIndex,
        });
        this.emit("accepted", object, decision.orderIndex);
        for (const dependent of this.deferred.release(object.digest)) {
          this.resubmit(dependent);
        }
        return;
      }
      case "rejected": {
        this.deferred.forget(object.digest);
        this.stats.rejected++;
        const error = new ValidationRejectedError(object.digest, decision.reason);
        this.log.info(error.message, {
          digest: object.digest,
          peerId: object.originPeer,
        });
        this.emit("rejected", object, decision.reason);
        return;
      }
      case "deferred": {
        this.stats.deferred++;
        const drop = this.deferred.hold(object, decision.missingDependency);
        if (drop) {
          this.dropDeferred(drop);
          return;
        }
        this.log.debug("Object deferred", {
          digest: object.digest,
          missing: decision.missingDependency,
        });
        // The dependency may have been committed while this decision was
        // on its way here.
        if (this.deps.consensus.view.isCommitted(decision.missingDependency)) {
          for (const dependent of this.deferred.release(
            decision.missingDependency,
          )) {
            this.resubmit(dependent);
          }
        }
        return;
      }
    }
  }

  /**
   * Submits a locally created object. It is validated like any received
   * object and announced to every peer once accepted.
   */
  submitLocal(payload: Uint8Array, kind: ObjectKind = "custom"): Digest {
    if (this.failure) {
      throw this.failure;
    }
    if (this.stopped) {
      throw new NodeShuttingDownError("submit object");
    }
    const object = createSharedObject(this.deps.crypto, payload, kind);
    if (!this.deps.dedup.insert(object.digest)) {
      this.log.debug("Local object already seen", { digest: object.digest });
      return object.digest;
    }
    this.deps.consensus.submit(object);
    return object.digest;
  }

  /** Sweeps expired deferrals and dedup entries. */
  sweep(now = Date.now()): void {
    for (const drop of this.deferred.expire(now)) {
      this.dropDeferred(drop);
    }
    this.deps.dedup.evictExpired(now);
  }

  /**
   * Resolves once inbound messages queued so far, consensus rounds and the
   * store writes and announcements they trigger have finished.
   */
  async idle(): Promise<void> {
    do {
      await Promise.all(
        Array.from(this.sessions.values(), (s) => s.whenInboundIdle()),
      );
      await this.settle();
    } while (
      Array.from(this.sessions.values()).some(
        (s) => s.getStats().inboundPending > 0,
      )
    );
  }

  /** Resolves once consensus is drained and no decision is being handled. */
  async settle(): Promise<void> {
    do {
      await this.deps.consensus.drain();
      await Promise.all(Array.from(this.pending));
    } while (!this.deps.consensus.isIdle() || this.pending.size > 0);
  }

  getStats(): GossipStats & { sessions: number; pendingDeferred: number } {
    return {
      ...this.stats,
      sessions: this.sessions.size,
      pendingDeferred: this.deferred.size,
    };
  }

  /** Consensus health including the deferred backlog. */
  getConsensusHealth(): ComponentHealth {
    const base = this.deps.consensus.getHealth();
    const backlog = this.deferred.size;
    const degraded = backlog > this.deferred.capacity / 2;
    return {
      ...base,
      status: degraded ? "degraded" : base.status,
      message: degraded
        ? `Deferred backlog ${backlog} above half of ${this.deferred.capacity}`
        : base.message,
      details: { ...base.details, deferred: backlog },
    };
  }

  getStoreHealth(): ComponentHealth {
    if (this.failure) {
      return {
        name: "store",
        status: "unhealthy",
        message: this.failure.message,
      };
    }
    return { name: "store", status: "healthy" };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private receiveObject(
    from: PeerId,
    message: ObjectMessage,
    signal?: AbortSignal,
  ): void {
    this.stats.objectsReceived++;
    const actual = objectDigest(
      this.deps.crypto,
      message.kind,
      message.payload,
    );
    if (actual !== message.digest) {
      const error = new WireIntegrityError(message.digest, actual, from);
      this.stats.integrityViolations++;
      this.log.warn("Dropping object with mismatched digest", {
        peerId: from,
        digest: message.digest,
      }, error);
      this.deps.peers.penalize(from, "integrity", INTEGRITY_PENALTY);
      this.emit("integrity_violation", from, error);
      return;
    }
    if (signal?.aborted) {
      return;
    }
    if (!this.deps.dedup.insert(message.digest)) {
      this.stats.duplicates++;
      return;
    }
    this.deps.peers.recordSeen(from, true);

    const object: SharedObject = {
      digest: message.digest,
      kind: message.kind,
      payload: message.payload,
      originPeer: from,
      receivedAt: Date.now(),
    };
    this.resubmit(object);
  }

  private resubmit(object: SharedObject): void {
    try {
      this.deps.consensus.submit(object);
    } catch (err) {
      if (err instanceof NodeShuttingDownError) {
        this.log.debug("Not submitting, consensus closed", {
          digest: object.digest,
        });
        return;
      }
      throw err;
    }
  }

  private announce(object: SharedObject): void {
    for (const peerId of this.sessions.keys()) {
      if (peerId === object.originPeer) continue;
      if (this.sendTo(peerId, { type: "announce", digest: object.digest })) {
        this.stats.announcementsSent++;
      }
    }
  }

  /**
   * Writes an accepted object unless it is already stored.
   * @returns whether it was stored before, or undefined when the store failed.
   */
  private async persist(object: SharedObject): Promise<boolean | undefined> {
    if (this.persisting.has(object.digest)) {
      return true;
    }
    this.persisting.add(object.digest);
    try {
      if (await this.deps.store.contains(object.digest)) {
        return true;
      }
      await this.deps.store.put(object.digest, object.payload);
      return false;
    } catch (err) {
      this.fail(new StoreUnavailableError("put", toError(err)));
      return undefined;
    } finally {
      this.persisting.delete(object.digest);
    }
  }

  private async storeContains(digest: Digest): Promise<boolean | undefined> {
    try {
      return await this.deps.store.contains(digest);
    } catch (err) {
      this.fail(new StoreUnavailableError("contains", toError(err)));
      return undefined;
    }
  }

  private async storeGet(digest: Digest): Promise<Buffer | undefined> {
    try {
      return await this.deps.store.get(digest);
    } catch (err) {
      this.fail(new StoreUnavailableError("get", toError(err)));
      return undefined;
    }
  }

  private fail(error: StoreUnavailableError): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    this.log.error("Object store unavailable", error);
    this.emit("fatal", error);
  }

  private dropDeferred(drop: DeferredDrop): void {
    this.stats.droppedDeferred++;
    const error = new DependencyMissingError(
      drop.object.digest,
      drop.missingDependency,
      drop.cause,
    );
    this.log.warn(error.message, { digest: drop.object.digest });
    this.emit("dropped", drop.object, error);
  }

  private overflow(peerId: PeerId, error: ChainweaveError): void {
    this.log.warn(error.message, { peerId });
    this.deps.peers.penalize(peerId, "backpressure", BACKPRESSURE_PENALTY);
  }

  private track(work: Promise<void>): void {
    const tracked: Promise<void> = work
      .catch((err) => {
        this.log.error("Decision handling failed", toError(err));
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }
}
