// src/node.ts

import { EventEmitter } from "events";
import { v4 as uuidv4 } from "uuid";
import { ApplicationObject, ApplicationObjectRegistry } from "./application_object";
import { NodeConfig, resolveNodeConfig } from "./config";
import { ConsensusEngine, ConsensusStats } from "./consensus_engine";
import type { CryptoProvider, Digest } from "./crypto";
import { DedupCache } from "./dedup_cache";
import {
  DiscoverySource,
  PeerExchangeSource,
  StaticDiscoverySource,
} from "./discovery";
import {
  MalformedMessageError,
  NodeNotStartedError,
  NodeShuttingDownError,
} from "./errors";
import { GossipEngine, GossipStats, MALFORMED_PENALTY } from "./gossip_engine";
import { HealthAggregator, HealthReport } from "./health";
import { HeartbeatManager } from "./heartbeat";
import type { LedgerEntry } from "./ledger";
import { Logger, createLogger, toError } from "./logger";
import type { ObjectStore } from "./object_store";
import { PeerManager, PeerManagerStats } from "./peer_manager";
import type {
  NetworkAddress,
  ObjectKind,
  PeerId,
  SharedObject,
} from "./shared_object";
import type { Transport } from "./transport";
import type { JsonObject } from "./validators/payload";
import { WireMessage, decodeWireMessage, isGossipMessage } from "./wire_codec";

/** Builds the transport once the final configuration is known. */
export type TransportFactory = (config: NodeConfig, nodeId: PeerId) => Transport;

export interface GossipNodeDeps {
  /** A ready transport, or a factory called by `start()`. */
  transport: Transport | TransportFactory;
  store: ObjectStore;
  crypto: CryptoProvider;
  /** Used with a transport factory. Default: a random uuid. */
  nodeId?: PeerId;
  /** Discovery sources beyond the bootstrap list and peer exchange. */
  discoverySources?: DiscoverySource[];
  /** Application objects fed with every accepted object. */
  applications?: ApplicationObject[];
}

/** Settings the bootstrap layer may override at start. */
export interface StartOptions {
  port?: number;
  maxPeers?: number;
  bootstrapAddresses?: NetworkAddress[];
}

export type NodeState = "created" | "starting" | "running" | "stopping" | "stopped";

export interface NodeStats {
  nodeId: PeerId;
  state: NodeState;
  address?: NetworkAddress;
  peers: PeerManagerStats;
  gossip: GossipStats & { sessions: number; pendingDeferred: number };
  consensus: ConsensusStats;
  dedup: { size: number; capacity: number; evictions: number };
}

interface NodeComponents {
  config: NodeConfig;
  transport: Transport;
  dedup: DedupCache;
  consensus: ConsensusEngine;
  peers: PeerManager;
  exchange: PeerExchangeSource;
  engine: GossipEngine;
  heartbeat: HeartbeatManager;
}

/**
 * A gossip node. Owns its peer table, dedup cache, consensus engine and
 * sessions from `start()` to `stop()`; nothing is shared between nodes in
 * one process.
 *
 * Events:
 * - 'accepted' (object, orderIndex)
 * - 'applied' (object, applicationObjectIds)
 * - 'rejected' (object, reason)
 * - 'dropped' (object, error)
 * - 'integrity_violation' (peerId, error)
 * - 'peer_connected' (peerId, address)
 * - 'peer_disconnected' (peerId, reason)
 * - 'fatal' (error: StoreUnavailableError) the node needs a restart
 */
export class GossipNode extends EventEmitter {
  readonly nodeId: PeerId;
  /** Application objects; more may be registered at any time. */
  readonly applications: ApplicationObjectRegistry;
  private readonly log: Logger;
  private readonly health: HealthAggregator;
  private state: NodeState = "created";
  private components?: NodeComponents;
  private listenAddress?: NetworkAddress;
  private applying: Promise<void> = Promise.resolve();

  constructor(
    private readonly deps: GossipNodeDeps,
    private readonly options: Partial<NodeConfig> = {},
  ) {
    super();
    this.nodeId =
      typeof deps.transport === "function"
        ? (deps.nodeId ?? uuidv4())
        : deps.transport.getNodeId();
    this.log = createLogger("GossipNode", this.nodeId);
    this.health = new HealthAggregator(this.nodeId);
    this.applications = new ApplicationObjectRegistry(this.nodeId);
    for (const object of deps.applications ?? []) {
      this.applications.register(object);
    }
  }

  getState(): NodeState {
    return this.state;
  }

  /** Address other nodes dial to reach this one, once started. */
  get address(): NetworkAddress | undefined {
    return this.listenAddress;
  }

  /**
   * Listens, dials the bootstrap addresses and starts the periodic tasks.
   * @throws ConfigError when the merged configuration is invalid
   */
  async start(overrides: StartOptions = {}): Promise<void> {
    if (this.state === "running" || this.state === "starting") {
      this.log.warn("Node already started");
      return;
    }
    if (this.state !== "created") {
      throw new NodeShuttingDownError("start node");
    }
    this.state = "starting";

    const merged: Partial<NodeConfig> = { ...this.options };
    if (overrides.port !== undefined) merged.port = overrides.port;
    if (overrides.maxPeers !== undefined) merged.maxPeers = overrides.maxPeers;
    if (overrides.bootstrapAddresses !== undefined) {
      merged.bootstrapAddresses = overrides.bootstrapAddresses;
    }

    let components: NodeComponents;
    try {
      components = this.build(resolveNodeConfig(merged));
      this.components = components;
      this.listenAddress = await components.transport.listen();
    } catch (err) {
      this.state = "stopped";
      this.components = undefined;
      throw err;
    }

    components.peers.start(this.listenAddress);
    components.engine.start();
    components.heartbeat.start();
    this.state = "running";
    this.log.info("Node started", {
      address: this.listenAddress,
      strategy: components.consensus.strategy,
      maxPeers: components.config.maxPeers,
    });

    await components.peers.bootstrap();
  }

  /**
   * Submits a locally created object.
   * @returns The object's digest over its kind and payload.
   * @throws NodeShuttingDownError after `stop()` began
   * @throws StoreUnavailableError after the store failed
   */
  submitLocal(payload: Uint8Array, kind: ObjectKind = "custom"): Digest {
    if (this.state === "stopping" || this.state === "stopped") {
      throw new NodeShuttingDownError("submit object");
    }
    return this.require("submit object").engine.submitLocal(payload, kind);
  }

  /**
   * Graceful shutdown: stops accepting peers, drains validations and the
   * store writes they trigger, then closes every connection.
   */
  async stop(): Promise<void> {
    const components = this.components;
    if (!components || this.state === "stopping" || this.state === "stopped") {
      this.state = "stopped";
      return;
    }
    this.state = "stopping";
    this.log.info("Stopping node");

    const { peers, heartbeat, engine, consensus, transport } = components;
    heartbeat.stop();
    await peers.stop();
    engine.stop();
    await engine.settle();
    await this.applying;
    await peers.disconnectAll("shutdown");
    engine.close();
    consensus.close();
    try {
      await transport.disconnect();
    } finally {
      this.state = "stopped";
      this.log.info("Node stopped");
    }
  }

  async getObject(digest: Digest): Promise<Buffer | undefined> {
    return this.deps.store.get(digest);
  }

  /** Committed history of this node from `fromIndex` onwards. */
  history(fromIndex = 0): LedgerEntry[] {
    return this.require("read history").consensus.history(fromIndex);
  }

  /**
   * Committed entries after `digest`, for a peer catching up from it.
   * Undefined when `digest` is not committed here.
   */
  historySince(digest: Digest): LedgerEntry[] | undefined {
    const { consensus } = this.require("read history");
    const entry = consensus.view.get(digest);
    return entry === undefined
      ? undefined
      : consensus.history(entry.orderIndex + 1);
  }

  /** State of a registered application object. */
  getApplicationState(id: string): JsonObject | undefined {
    return this.applications.getState(id);
  }

  /**
   * Resolves once queued inbound messages and validations are handled and
   * accepted objects are applied.
   */
  async idle(): Promise<void> {
    await this.require("wait for idle").engine.idle();
    await this.applying;
  }

  async getHealth(): Promise<HealthReport> {
    return this.health.getHealth();
  }

  getStats(): NodeStats {
    const { peers, engine, consensus, dedup } = this.require("read stats");
    return {
      nodeId: this.nodeId,
      state: this.state,
      address: this.listenAddress,
      peers: peers.getStats(),
      gossip: engine.getStats(),
      consensus: consensus.getStats(),
      dedup: {
        size: dedup.size,
        capacity: dedup.capacity,
        evictions: dedup.evictions,
      },
    };
  }

  /** The peer manager, for diagnostics and tests. */
  get peers(): PeerManager {
    return this.require("access peers").peers;
  }

  /** The gossip engine, for diagnostics and tests. */
  get gossip(): GossipEngine {
    return this.require("access gossip engine").engine;
  }

  get consensus(): ConsensusEngine {
    return this.require("access consensus").consensus;
  }

  private require(operation: string): NodeComponents {
    if (!this.components) {
      throw new NodeNotStartedError(operation);
    }
    return this.components;
  }

  private build(config: NodeConfig): NodeComponents {
    const transport =
      typeof this.deps.transport === "function"
        ? this.deps.transport(config, this.nodeId)
        : this.deps.transport;
    const dedup = new DedupCache({
      capacity: config.dedupCapacity,
      ttlMs: config.dedupTtlMs,
    });
    const consensus = new ConsensusEngine(config.consensusStrategy, this.nodeId);
    const exchange = new PeerExchangeSource(() => this.requestPeers());
    const peers = new PeerManager(
      transport,
      [
        new StaticDiscoverySource(config.bootstrapAddresses),
        exchange,
        ...(this.deps.discoverySources ?? []),
      ],
      {
        maxPeers: config.maxPeers,
        minPeers: config.minPeers,
        connectTimeoutMs: config.connectTimeoutMs,
        backoffBaseMs: config.backoffBaseMs,
        backoffMaxMs: config.backoffMaxMs,
        banThreshold: config.banThreshold,
        banDurationMs: config.banDurationMs,
        misbehaviorThreshold: config.misbehaviorThreshold,
        disconnectedRetentionMs: config.disconnectedRetentionMs,
        maintenanceIntervalMs: config.maintenanceIntervalMs,
        discoveryIntervalMs: config.discoveryIntervalMs,
      },
    );
    const engine = new GossipEngine(
      {
        nodeId: this.nodeId,
        crypto: this.deps.crypto,
        store: this.deps.store,
        dedup,
        consensus,
        transport,
        peers,
      },
      {
        outboundQueueCapacity: config.outboundQueueCapacity,
        inboundQueueCapacity: config.inboundQueueCapacity,
        deferred: {
          maxRetries: config.deferredMaxRetries,
          ttlMs: config.deferredTtlMs,
          capacity: config.deferredCapacity,
        },
        sweepIntervalMs: config.maintenanceIntervalMs,
      },
    );
    const heartbeat = new HeartbeatManager(
      this.nodeId,
      peers,
      (peerId, ping) => engine.sendTo(peerId, ping),
      {
        intervalMs: config.heartbeatIntervalMs,
        timeoutMs: config.peerTimeoutMs,
      },
    );

    const components: NodeComponents = {
      config,
      transport,
      dedup,
      consensus,
      peers,
      exchange,
      engine,
      heartbeat,
    };
    this.wire(components);

    this.health.register("peers", peers);
    this.health.register("consensus", {
      getHealth: () => engine.getConsensusHealth(),
    });
    this.health.register("store", { getHealth: () => engine.getStoreHealth() });
    return components;
  }

  private wire(components: NodeComponents): void {
    const { transport, peers, engine, heartbeat } = components;

    transport.onMessage((from, bytes) => this.handleBytes(components, from, bytes));
    transport.onConnection((peerId, address) =>
      peers.handleInbound(peerId, address),
    );
    transport.onDisconnect((peerId) => peers.handleRemoteClose(peerId));

    peers.on("peer_connected", (peerId: PeerId, address: NetworkAddress) => {
      engine.attachPeer(peerId);
      this.emit("peer_connected", peerId, address);
    });
    peers.on("peer_disconnected", (peerId: PeerId, reason: string) => {
      engine.detachPeer(peerId);
      heartbeat.removePeer(peerId);
      this.emit("peer_disconnected", peerId, reason);
    });
    engine.on("accepted", (object: SharedObject, orderIndex: number) => {
      this.applying = this.applying
        .then(async () => {
          const applied = await this.applications.process(object, orderIndex);
          if (applied.length > 0) {
            this.emit("applied", object, applied);
          }
        })
        .catch((err) => {
          this.log.error("Applying accepted object failed", toError(err), {
            digest: object.digest,
          });
        });
    });
    heartbeat.on("peer_timeout", (peerId: PeerId) => {
      peers.disconnect(peerId, "timeout").catch((err) => {
        this.log.warn("Timeout disconnect failed", { peerId }, toError(err));
      });
    });

    for (const event of [
      "accepted",
      "rejected",
      "dropped",
      "integrity_violation",
      "fatal",
    ]) {
      engine.on(event, (...args: unknown[]) => {
        this.emit(event, ...args);
      });
    }
  }

  private handleBytes(
    components: NodeComponents,
    from: PeerId,
    bytes: Buffer,
  ): void {
    const { peers, engine, heartbeat, exchange, config } = components;
    let message: WireMessage;
    try {
      message = decodeWireMessage(bytes);
    } catch (err) {
      if (!(err instanceof MalformedMessageError)) {
        throw err;
      }
      this.log.warn("Dropping malformed message", { peerId: from }, err);
      peers.penalize(from, "malformed", MALFORMED_PENALTY);
      return;
    }

    peers.recordSeen(from, false);
    if (isGossipMessage(message)) {
      engine.deliver(from, message);
      return;
    }
    switch (message.type) {
      case "ping":
        engine.sendTo(from, heartbeat.handlePing(from, message));
        return;
      case "pong":
        heartbeat.handlePong(from, message);
        return;
      case "peer_request":
        engine.sendTo(from, {
          type: "peer_response",
          addresses: peers.getShareableAddresses(
            from,
            Math.min(message.limit, config.peerExchangeLimit),
          ),
        });
        return;
      case "peer_response": {
        const added = exchange.offer(message.addresses);
        this.log.debug("Peer exchange reply", { peerId: from, added });
        return;
      }
    }
  }

  private requestPeers(): void {
    const components = this.components;
    if (!components) {
      return;
    }
    for (const peerId of components.peers.getConnectedPeers()) {
      components.engine.sendTo(peerId, {
        type: "peer_request",
        limit: components.config.peerExchangeLimit,
      });
    }
  }
}
