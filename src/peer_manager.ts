// src/peer_manager.ts

import { EventEmitter } from "events";
import type { DiscoverySource } from "./discovery";
import {
  ConnectionError,
  NodeShuttingDownError,
  PeerBannedError,
} from "./errors";
import type { PeerFeedback } from "./gossip_engine";
import type { ComponentHealth, HealthCheckable } from "./health";
import { Logger, createLogger, toError } from "./logger";
import type { NetworkAddress, PeerId } from "./shared_object";
import type { Transport } from "./transport";

export type PeerState =
  | "discovered"
  | "connecting"
  | "connected"
  | "disconnected"
  | "banned";

export type DisconnectReason =
  | "timeout"
  | "evicted"
  | "misbehavior"
  | "banned"
  | "remote_closed"
  | "shutdown";

/**
 * What the node knows about one address. `peerId` is filled in once a
 * handshake with the address succeeded.
 */
export interface PeerRecord {
  address: NetworkAddress;
  peerId?: PeerId;
  state: PeerState;
  /** Last traffic of any kind (ms). */
  lastSeen: number;
  /** Last traffic that delivered a novel object (ms). */
  lastUsefulAt: number;
  /** Consecutive failed dials. */
  failureCount: number;
  /** Accumulated misbehavior weight. */
  penalty: number;
  /** Earliest time the address may be dialed again (ms). */
  nextRetryAt: number;
  disconnectedAt?: number;
  bannedUntil?: number;
}

type ConnectedRecord = PeerRecord & { peerId: PeerId };

export interface PeerManagerConfig {
  /** Connected peers above which the lowest scoring are evicted. */
  maxPeers: number;
  /** Eviction never goes below this many connected peers. */
  minPeers: number;
  connectTimeoutMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** Consecutive dial failures that ban an address. */
  banThreshold: number;
  banDurationMs: number;
  /** Accumulated penalty that bans a connected peer. */
  misbehaviorThreshold: number;
  /** How long a disconnected record is kept before removal. */
  disconnectedRetentionMs: number;
  maintenanceIntervalMs: number;
  discoveryIntervalMs: number;
}

export const DEFAULT_PEER_MANAGER_CONFIG: PeerManagerConfig = {
  maxPeers: 8,
  minPeers: 1,
  connectTimeoutMs: 5000,
  backoffBaseMs: 1000,
  backoffMaxMs: 60000,
  banThreshold: 5,
  banDurationMs: 600000,
  misbehaviorThreshold: 100,
  disconnectedRetentionMs: 300000,
  maintenanceIntervalMs: 1000,
  discoveryIntervalMs: 30000,
};

export interface PeerManagerStats {
  known: number;
  discovered: number;
  connecting: number;
  connected: number;
  disconnected: number;
  banned: number;
  dialsInFlight: number;
}

/** Delay before the next dial after `failureCount` consecutive failures. */
export function backoffDelay(
  failureCount: number,
  baseMs: number,
  maxMs: number,
): number {
  return Math.min(maxMs, baseMs * 2 ** Math.max(0, failureCount - 1));
}

/**
 * Eviction score; higher is better. Peers lose a point per second without
 * useful traffic, five per failed dial and their accumulated penalty.
 */
export function peerScore(record: PeerRecord, now: number): number {
  return (
    -(now - record.lastUsefulAt) / 1000 -
    5 * record.failureCount -
    record.penalty
  );
}

function isConnected(record: PeerRecord): record is ConnectedRecord {
  return record.state === "connected" && record.peerId !== undefined;
}

/**
 * Owns the table of known peers: discovery, dialing with backoff, inbound
 * acceptance, eviction, penalties and bans.
 *
 * Events:
 * - 'peer_connected' (peerId, address)
 * - 'peer_disconnected' (peerId, reason: DisconnectReason)
 * - 'peer_banned' (address, reason)
 * - 'discovered' (addresses: NetworkAddress[]) newly inserted records
 */
export class PeerManager
  extends EventEmitter
  implements HealthCheckable, PeerFeedback
{
  private readonly config: PeerManagerConfig;
  private readonly nodeId: PeerId;
  private readonly log: Logger;
  private readonly records = new Map<NetworkAddress, PeerRecord>();
  private readonly byPeerId = new Map<PeerId, NetworkAddress>();
  private readonly dialing = new Map<NetworkAddress, Promise<PeerId>>();
  private readonly selfAddresses = new Set<NetworkAddress>();
  private readonly pendingCloses = new Set<Promise<void>>();
  private accepting = false;
  private maintenanceTimer?: NodeJS.Timeout;
  private discoveryTimer?: NodeJS.Timeout;
  private maintaining?: Promise<void>;
  private discovering?: Promise<void>;

  constructor(
    private readonly transport: Transport,
    private readonly sources: DiscoverySource[],
    config: Partial<PeerManagerConfig> = {},
  ) {
    super();
    this.config = { ...DEFAULT_PEER_MANAGER_CONFIG, ...config };
    this.nodeId = transport.getNodeId();
    this.log = createLogger("PeerManager", this.nodeId);
  }

  /**
   * Starts accepting peers and the periodic maintenance and discovery.
   * @param selfAddress This node's own listen address, never dialed.
   */
  start(selfAddress?: NetworkAddress): void {
    if (selfAddress !== undefined) {
      this.selfAddresses.add(selfAddress);
    }
    if (this.accepting) {
      return;
    }
    this.accepting = true;
    this.maintenanceTimer = setInterval(() => {
      this.runMaintenance();
    }, this.config.maintenanceIntervalMs);
    this.discoveryTimer = setInterval(() => {
      this.runDiscovery();
    }, this.config.discoveryIntervalMs);
  }

  /** Discovers addresses and dials until `maxPeers` are connected. */
  async bootstrap(): Promise<void> {
    await this.discover();
    await this.maintain();
  }

  /**
   * Stops accepting inbound peers, dialing and the periodic tasks. Peers
   * already connected stay connected until `disconnectAll`.
   */
  async stop(): Promise<void> {
    this.accepting = false;
    if (this.maintenanceTimer) {
      clearInterval(this.maintenanceTimer);
      this.maintenanceTimer = undefined;
    }
    if (this.discoveryTimer) {
      clearInterval(this.discoveryTimer);
      this.discoveryTimer = undefined;
    }
    await Promise.all([this.maintaining, this.discovering]);
    await Promise.allSettled(Array.from(this.dialing.values()));
  }

  /** Disconnects every connected peer and waits for their links to close. */
  async disconnectAll(reason: DisconnectReason): Promise<void> {
    for (const record of this.connectedRecords()) {
      await this.disconnect(record.peerId, reason);
    }
    await Promise.all(Array.from(this.pendingCloses));
  }

  isAccepting(): boolean {
    return this.accepting;
  }

  // ---------------------------------------------------------------------------
  // Discovery and dialing
  // ---------------------------------------------------------------------------

  /**
   * Queries every discovery source and records addresses not seen before.
   * Banned addresses and this node's own addresses are skipped.
   * @returns Every usable address the sources reported.
   */
  async discover(): Promise<Set<NetworkAddress>> {
    const found = new Set<NetworkAddress>();
    for (const source of this.sources) {
      let addresses: NetworkAddress[];
      try {
        addresses = await source.discover();
      } catch (err) {
        this.log.warn(
          "Discovery source failed",
          { source: source.name },
          toError(err),
        );
        continue;
      }
      for (const address of addresses) {
        if (this.selfAddresses.has(address) || this.isBanned(address)) continue;
        found.add(address);
      }
    }

    const now = Date.now();
    const inserted: NetworkAddress[] = [];
    for (const address of found) {
      if (this.records.has(address)) continue;
      this.records.set(address, this.newRecord(address, now));
      inserted.push(address);
    }
    if (inserted.length > 0) {
      this.log.debug("Discovered peers", { count: inserted.length });
      this.emit("discovered", inserted);
    }
    return found;
  }

  /**
   * Dials an address. Concurrent calls for the same address share one
   * attempt.
   * @throws PeerBannedError when the address is banned
   * @throws ConnectionError when the dial fails or the address is backing off
   */
  connect(address: NetworkAddress): Promise<PeerId> {
    const inFlight = this.dialing.get(address);
    if (inFlight) {
      return inFlight;
    }
    const attempt = this.dial(address).finally(() => {
      this.dialing.delete(address);
    });
    this.dialing.set(address, attempt);
    return attempt;
  }

  private async dial(address: NetworkAddress): Promise<PeerId> {
    if (!this.accepting) {
      throw new NodeShuttingDownError(`connect to ${address}`);
    }
    if (this.selfAddresses.has(address)) {
      throw new ConnectionError(address, "address belongs to this node");
    }
    const now = Date.now();
    const banned = this.activeBan(address, now);
    if (banned !== undefined) {
      throw new PeerBannedError(address, banned);
    }

    let record = this.records.get(address);
    if (record && isConnected(record)) {
      return record.peerId;
    }
    if (record && record.nextRetryAt > now) {
      throw new ConnectionError(
        address,
        `backing off for ${record.nextRetryAt - now}ms`,
      );
    }
    if (!record) {
      record = this.newRecord(address, now);
      this.records.set(address, record);
    }
    record.state = "connecting";
    this.log.debug("Dialing", { address });

    let peerId: PeerId;
    try {
      peerId = await this.transport.connect(
        address,
        this.config.connectTimeoutMs,
      );
    } catch (err) {
      const cause = toError(err);
      this.recordDialFailure(record, cause.message);
      throw new ConnectionError(address, cause.message, cause);
    }

    if (peerId === this.nodeId) {
      this.records.delete(address);
      this.selfAddresses.add(address);
      throw new ConnectionError(address, "address belongs to this node");
    }
    const current = this.records.get(address);
    if (current && isConnected(current) && current.peerId === peerId) {
      // The same peer dialed us while our dial was in flight.
      return peerId;
    }
    if (current !== record || current.state !== "connecting") {
      this.trackClose(peerId);
      if (current?.state === "banned") {
        throw new PeerBannedError(address, current.bannedUntil ?? now);
      }
      throw new ConnectionError(address, "peer record changed during dial");
    }
    if (!this.accepting) {
      this.trackClose(peerId);
      throw new NodeShuttingDownError(`connect to ${address}`);
    }

    this.markConnected(record, peerId, Date.now());
    this.enforceCapacity(this.config.maxPeers, peerId);
    return peerId;
  }

  /**
   * Decides on a connection opened by a remote node. Called from the
   * transport's connection handler.
   */
  handleInbound(peerId: PeerId, address: NetworkAddress): boolean {
    if (!this.accepting || peerId === this.nodeId) {
      return false;
    }
    const now = Date.now();
    if (this.activeBan(address, now) !== undefined) {
      this.log.info("Refusing banned peer", { peerId, address });
      return false;
    }

    let record = this.records.get(address);
    if (record && isConnected(record)) {
      return record.peerId === peerId;
    }
    if (!record) {
      record = this.newRecord(address, now);
      this.records.set(address, record);
    }
    this.markConnected(record, peerId, now);
    this.enforceCapacity(this.config.maxPeers, peerId);
    return true;
  }

  /** Called when the transport reports a link closed by the remote side. */
  handleRemoteClose(peerId: PeerId): void {
    const record = this.getRecordByPeerId(peerId);
    if (record && isConnected(record)) {
      this.markDisconnected(record, "remote_closed", Date.now());
    }
  }

  /**
   * Disconnects a peer. The transport link is closed even when a listener
   * of 'peer_disconnected' throws.
   */
  async disconnect(peerId: PeerId, reason: DisconnectReason): Promise<void> {
    const record = this.getRecordByPeerId(peerId);
    try {
      if (record && isConnected(record)) {
        this.markDisconnected(record, reason, Date.now());
      }
    } finally {
      await this.closeLink(peerId);
    }
  }

  /**
   * Evicts the lowest scoring peers until at most `maxPeers` are connected,
   * never going below `minPeers` and never evicting `protect`.
   * @returns The evicted peer ids, in eviction order.
   */
  enforceCapacity(maxPeers: number, protect?: PeerId): PeerId[] {
    const evicted: PeerId[] = [];
    const now = Date.now();
    let connected = this.connectedRecords();
    while (connected.length > maxPeers && connected.length > this.config.minPeers) {
      const candidates = connected
        .filter((r) => r.peerId !== protect)
        .sort(
          (a, b) =>
            peerScore(a, now) - peerScore(b, now) ||
            (a.peerId < b.peerId ? -1 : a.peerId > b.peerId ? 1 : 0),
        );
      const victim = candidates[0];
      if (!victim) break;
      this.log.info("Evicting peer over capacity", {
        peerId: victim.peerId,
        score: peerScore(victim, now),
        maxPeers,
      });
      this.markDisconnected(victim, "evicted", now);
      this.trackClose(victim.peerId);
      evicted.push(victim.peerId);
      connected = this.connectedRecords();
    }
    return evicted;
  }

  // ---------------------------------------------------------------------------
  // Standing
  // ---------------------------------------------------------------------------

  recordSeen(peerId: PeerId, useful: boolean): void {
    const record = this.getRecordByPeerId(peerId);
    if (!record || !isConnected(record)) {
      return;
    }
    const now = Date.now();
    record.lastSeen = now;
    if (useful) {
      record.lastUsefulAt = now;
    }
  }

  /**
   * Adds to a peer's penalty. A peer reaching `misbehaviorThreshold` is
   * banned and disconnected with reason `misbehavior`.
   */
  penalize(peerId: PeerId, reason: string, weight: number): void {
    const record = this.getRecordByPeerId(peerId);
    if (!record || record.state === "banned") {
      return;
    }
    record.penalty += weight;
    this.log.debug("Penalized peer", {
      peerId,
      reason,
      weight,
      penalty: record.penalty,
    });
    if (record.penalty >= this.config.misbehaviorThreshold) {
      this.banRecord(record, `misbehavior: ${reason}`, "misbehavior");
    }
  }

  /** Bans an address for `banDurationMs`, disconnecting it if connected. */
  ban(address: NetworkAddress, reason: string): void {
    let record = this.records.get(address);
    if (!record) {
      record = this.newRecord(address, Date.now());
      this.records.set(address, record);
    }
    this.banRecord(record, reason, "banned");
  }

  isBanned(address: NetworkAddress): boolean {
    return this.activeBan(address, Date.now()) !== undefined;
  }

  // ---------------------------------------------------------------------------
  // Maintenance
  // ---------------------------------------------------------------------------

  /**
   * Removes stale disconnected records and expired bans, then dials
   * candidates whose backoff elapsed while below `maxPeers`.
   */
  async maintain(): Promise<void> {
    const now = Date.now();
    for (const [address, record] of this.records) {
      if (record.state === "banned") {
        this.activeBan(address, now);
      } else if (
        record.state === "disconnected" &&
        now - (record.disconnectedAt ?? now) >= this.config.disconnectedRetentionMs
      ) {
        this.removeRecord(record);
      }
    }

    if (!this.accepting) {
      return;
    }
    const slots =
      this.config.maxPeers - this.connectedRecords().length - this.dialing.size;
    if (slots <= 0) {
      return;
    }
    const candidates = Array.from(this.records.values())
      .filter(
        (r) =>
          (r.state === "discovered" || r.state === "disconnected") &&
          r.nextRetryAt <= now &&
          !this.dialing.has(r.address),
      )
      .sort(
        (a, b) =>
          a.nextRetryAt - b.nextRetryAt ||
          (a.address < b.address ? -1 : a.address > b.address ? 1 : 0),
      )
      .slice(0, slots);

    await Promise.all(
      candidates.map((record) =>
        this.connect(record.address).then(
          () => undefined,
          (err) => {
            this.log.debug("Dial failed", {
              address: record.address,
              error: toError(err).message,
            });
          },
        ),
      ),
    );
  }

  private runMaintenance(): void {
    if (this.maintaining) {
      return;
    }
    this.maintaining = this.maintain()
      .catch((err) => {
        this.log.error("Peer maintenance failed", toError(err));
      })
      .finally(() => {
        this.maintaining = undefined;
      });
  }

  private runDiscovery(): void {
    if (this.discovering) {
      return;
    }
    this.discovering = this.discover()
      .then(() => undefined)
      .catch((err) => {
        this.log.error("Discovery failed", toError(err));
      })
      .finally(() => {
        this.discovering = undefined;
      });
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getConnectedPeers(): PeerId[] {
    return this.connectedRecords().map((r) => r.peerId);
  }

  getRecord(address: NetworkAddress): Readonly<PeerRecord> | undefined {
    const record = this.records.get(address);
    return record ? { ...record } : undefined;
  }

  getRecordByPeerId(peerId: PeerId): PeerRecord | undefined {
    const address = this.byPeerId.get(peerId);
    return address === undefined ? undefined : this.records.get(address);
  }

  /** Time of the last traffic from a connected peer. */
  lastSeen(peerId: PeerId): number | undefined {
    const record = this.getRecordByPeerId(peerId);
    return record && isConnected(record) ? record.lastSeen : undefined;
  }

  /**
   * Addresses of connected peers other than `exclude`, most recently active
   * first, for peer exchange.
   */
  getShareableAddresses(exclude: PeerId | undefined, limit: number): NetworkAddress[] {
    return this.connectedRecords()
      .filter((r) => r.peerId !== exclude)
      .sort((a, b) => b.lastSeen - a.lastSeen)
      .slice(0, Math.max(0, limit))
      .map((r) => r.address);
  }

  getStats(): PeerManagerStats {
    const stats: PeerManagerStats = {
      known: this.records.size,
      discovered: 0,
      connecting: 0,
      connected: 0,
      disconnected: 0,
      banned: 0,
      dialsInFlight: this.dialing.size,
    };
    for (const record of this.records.values()) {
      stats[record.state]++;
    }
    return stats;
  }

  getHealth(): ComponentHealth {
    const stats = this.getStats();
    const degraded = stats.connected < this.config.minPeers;
    return {
      name: "peers",
      status: degraded ? "degraded" : "healthy",
      message: degraded
        ? `${stats.connected} connected, minimum is ${this.config.minPeers}`
        : undefined,
      details: { ...stats, maxPeers: this.config.maxPeers },
    };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private newRecord(address: NetworkAddress, now: number): PeerRecord {
    return {
      address,
      state: "discovered",
      lastSeen: now,
      lastUsefulAt: now,
      failureCount: 0,
      penalty: 0,
      nextRetryAt: 0,
    };
  }

  private connectedRecords(): ConnectedRecord[] {
    return Array.from(this.records.values()).filter(isConnected);
  }

  private markConnected(record: PeerRecord, peerId: PeerId, now: number): void {
    const previous = this.byPeerId.get(peerId);
    if (previous !== undefined && previous !== record.address) {
      // Same node reached under another address; keep the newest record.
      this.records.delete(previous);
    }
    record.peerId = peerId;
    record.state = "connected";
    record.failureCount = 0;
    record.lastSeen = now;
    record.lastUsefulAt = now;
    record.nextRetryAt = 0;
    record.disconnectedAt = undefined;
    this.byPeerId.set(peerId, record.address);
    this.log.info("Peer connected", { peerId, address: record.address });
    this.emit("peer_connected", peerId, record.address);
  }

  private markDisconnected(
    record: ConnectedRecord,
    reason: DisconnectReason,
    now: number,
  ): void {
    record.state = "disconnected";
    record.disconnectedAt = now;
    switch (reason) {
      case "evicted":
        record.nextRetryAt = now + this.config.backoffMaxMs;
        break;
      case "timeout":
        record.failureCount++;
        record.nextRetryAt =
          now +
          backoffDelay(
            record.failureCount,
            this.config.backoffBaseMs,
            this.config.backoffMaxMs,
          );
        break;
      default:
        record.nextRetryAt = now + this.config.backoffBaseMs;
    }
    this.log.info("Peer disconnected", {
      peerId: record.peerId,
      address: record.address,
      reason,
    });
    this.emit("peer_disconnected", record.peerId, reason);
  }

  private recordDialFailure(record: PeerRecord, reason: string): void {
    const now = Date.now();
    record.failureCount++;
    if (record.failureCount >= this.config.banThreshold) {
      this.banRecord(
        record,
        `${record.failureCount} consecutive connection failures`,
        "banned",
      );
      return;
    }
    record.state = "disconnected";
    record.disconnectedAt = now;
    record.nextRetryAt =
      now +
      backoffDelay(
        record.failureCount,
        this.config.backoffBaseMs,
        this.config.backoffMaxMs,
      );
    this.log.debug("Dial failed, backing off", {
      address: record.address,
      failureCount: record.failureCount,
      retryInMs: record.nextRetryAt - now,
      reason,
    });
  }

  private banRecord(
    record: PeerRecord,
    reason: string,
    disconnectReason: DisconnectReason,
  ): void {
    const now = Date.now();
    const wasConnected = isConnected(record) ? record.peerId : undefined;
    record.state = "banned";
    record.bannedUntil = now + this.config.banDurationMs;
    this.log.warn("Peer banned", {
      address: record.address,
      peerId: record.peerId,
      reason,
      bannedUntil: record.bannedUntil,
    });
    this.emit("peer_banned", record.address, reason);
    if (wasConnected !== undefined) {
      this.log.info("Peer disconnected", {
        peerId: wasConnected,
        address: record.address,
        reason: disconnectReason,
      });
      try {
        this.emit("peer_disconnected", wasConnected, disconnectReason);
      } finally {
        this.trackClose(wasConnected);
      }
    }
  }

  /**
   * Returns the end of an active ban on `address`. An expired ban is lifted
   * and its record removed.
   */
  private activeBan(address: NetworkAddress, now: number): number | undefined {
    const record = this.records.get(address);
    if (!record || record.state !== "banned") {
      return undefined;
    }
    const until = record.bannedUntil ?? 0;
    if (until > now) {
      return until;
    }
    this.log.info("Ban expired", { address });
    this.removeRecord(record);
    return undefined;
  }

  private removeRecord(record: PeerRecord): void {
    this.records.delete(record.address);
    if (
      record.peerId !== undefined &&
      this.byPeerId.get(record.peerId) === record.address
    ) {
      this.byPeerId.delete(record.peerId);
    }
  }

  private async closeLink(peerId: PeerId): Promise<void> {
    try {
      await this.transport.close(peerId);
    } catch (err) {
      this.log.warn("Failed to close link", { peerId }, toError(err));
    }
  }

  private trackClose(peerId: PeerId): void {
    const closing: Promise<void> = this.closeLink(peerId).finally(() => {
      this.pendingCloses.delete(closing);
    });
    this.pendingCloses.add(closing);
  }
}
