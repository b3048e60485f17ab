// src/heartbeat.ts

import { EventEmitter } from "events";
import { createLogger, Logger } from "./logger";
import type { PeerId } from "./shared_object";
import type { PingMessage, PongMessage } from "./wire_codec";

/**
 * Configuration for the heartbeat protocol.
 */
export interface HeartbeatConfig {
  /** Enable/disable heartbeat protocol. Default: true */
  enabled: boolean;

  /** How often to run the heartbeat loop (ms). Default: 5000 */
  intervalMs: number;

  /** Silence after which a peer is declared timed out (ms). Default: 30000 */
  timeoutMs: number;

  /** Stagger pings across interval to avoid network bursts. Default: true */
  staggerPings: boolean;
}

/**
 * Default heartbeat configuration.
 */
export const DEFAULT_HEARTBEAT_CONFIG: HeartbeatConfig = {
  enabled: true,
  intervalMs: 5000,
  timeoutMs: 30000,
  staggerPings: true,
};

/**
 * Where the heartbeat learns which peers exist and when they last spoke.
 */
export interface LivenessSource {
  getConnectedPeers(): PeerId[];
  lastSeen(peerId: PeerId): number | undefined;
}

export type PingSender = (peerId: PeerId, ping: PingMessage) => boolean;

/**
 * Tracks heartbeat state for a single peer.
 */
export interface PeerHeartbeatState {
  peerId: PeerId;
  pingsSent: number;
  lastPingAt?: number;
  lastRttMs?: number;
}

/**
 * HeartbeatManager keeps links alive and detects silent peers.
 *
 * Every interval it pings each connected peer. Any traffic from a peer,
 * pongs included, refreshes its `lastSeen`; a peer silent for longer than
 * `timeoutMs` is reported once per loop.
 *
 * Events:
 * - 'peer_timeout' (peerId, silentMs)
 *
 * @example
 * ```typescript
 * const heartbeat = new HeartbeatManager(nodeId, peerManager, sendPing, config);
 * heartbeat.on('peer_timeout', (peerId) => {
 *   peerManager.disconnect(peerId, 'timeout').catch(console.error);
 * });
 * heartbeat.start();
 * ```
 */
export class HeartbeatManager extends EventEmitter {
  private readonly config: HeartbeatConfig;
  private readonly log: Logger;

  private readonly peerStates = new Map<PeerId, PeerHeartbeatState>();
  private heartbeatTimer?: NodeJS.Timeout;
  private readonly staggerTimers = new Set<NodeJS.Timeout>();
  private _isRunning = false;

  constructor(
    nodeId: PeerId,
    private readonly peers: LivenessSource,
    private readonly sendPing: PingSender,
    config: Partial<HeartbeatConfig> = {},
  ) {
    super();
    this.config = { ...DEFAULT_HEARTBEAT_CONFIG, ...config };
    this.log = createLogger("HeartbeatManager", nodeId);
  }

  /**
   * Returns whether the heartbeat manager is currently running.
   */
  isRunning(): boolean {
    return this._isRunning;
  }

  /**
   * Starts periodic pings. The first loop runs one interval after start.
   */
  start(): void {
    if (!this.config.enabled) {
      this.log.info("Heartbeat disabled by configuration");
      return;
    }

    if (this._isRunning) {
      this.log.warn("HeartbeatManager already running");
      return;
    }

    this._isRunning = true;
    this.log.info("Starting heartbeat manager", {
      intervalMs: this.config.intervalMs,
      timeoutMs: this.config.timeoutMs,
      staggerPings: this.config.staggerPings,
    });

    this.heartbeatTimer = setInterval(() => {
      this.heartbeatLoop();
    }, this.config.intervalMs);
  }

  /**
   * Stops the heartbeat manager and cancels pending staggered pings.
   */
  stop(): void {
    if (!this._isRunning) {
      return;
    }

    this.log.info("Stopping heartbeat manager");
    this._isRunning = false;

    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }

    for (const timer of this.staggerTimers) {
      clearTimeout(timer);
    }
    this.staggerTimers.clear();
    this.peerStates.clear();
  }

  /**
   * Builds the reply to a ping. The timestamp is echoed so the sender can
   * measure the round trip.
   */
  handlePing(from: PeerId, ping: PingMessage): PongMessage {
    this.log.debug("Received ping", { peerId: from, timestamp: ping.timestamp });
    return { type: "pong", timestamp: ping.timestamp };
  }

  /**
   * Records a pong.
   * @returns The round trip in ms.
   */
  handlePong(from: PeerId, pong: PongMessage): number {
    const rtt = Math.max(0, Date.now() - pong.timestamp);
    const state = this.peerStates.get(from);
    if (state) {
      state.lastRttMs = rtt;
    }
    this.log.debug("Received pong", { peerId: from, rttMs: rtt });
    return rtt;
  }

  /** Forgets a peer that disconnected. */
  removePeer(peerId: PeerId): void {
    this.peerStates.delete(peerId);
  }

  /**
   * Runs one heartbeat round: reports silent peers and pings the rest.
   * @returns Peers reported as timed out.
   */
  heartbeatLoop(): PeerId[] {
    if (!this._isRunning) {
      return [];
    }

    const now = Date.now();
    const timedOut: PeerId[] = [];
    const alive: PeerId[] = [];
    for (const peerId of this.peers.getConnectedPeers()) {
      const lastSeen = this.peers.lastSeen(peerId);
      if (lastSeen === undefined) continue;
      const silentMs = now - lastSeen;
      if (silentMs >= this.config.timeoutMs) {
        timedOut.push(peerId);
      } else {
        alive.push(peerId);
      }
    }

    for (const peerId of timedOut) {
      this.log.warn("Peer timed out", { peerId });
      this.peerStates.delete(peerId);
      this.emit("peer_timeout", peerId, now - (this.peers.lastSeen(peerId) ?? now));
    }

    if (this.config.staggerPings && alive.length > 1) {
      // Stagger pings across the interval
      const staggerDelayMs = this.config.intervalMs / alive.length;
      alive.forEach((peerId, index) => {
        const timer = setTimeout(() => {
          this.staggerTimers.delete(timer);
          this.pingPeer(peerId);
        }, index * staggerDelayMs);
        this.staggerTimers.add(timer);
      });
    } else {
      for (const peerId of alive) {
        this.pingPeer(peerId);
      }
    }
    return timedOut;
  }

  /**
   * Get the current heartbeat state for a peer (for testing/debugging).
   */
  getPeerState(peerId: PeerId): PeerHeartbeatState | undefined {
    return this.peerStates.get(peerId);
  }

  private pingPeer(peerId: PeerId): void {
    if (!this._isRunning) {
      return;
    }
    let state = this.peerStates.get(peerId);
    if (!state) {
      state = { peerId, pingsSent: 0 };
      this.peerStates.set(peerId, state);
    }
    const now = Date.now();
    if (this.sendPing(peerId, { type: "ping", timestamp: now })) {
      state.pingsSent++;
      state.lastPingAt = now;
    } else {
      this.log.debug("Ping not queued", { peerId });
    }
  }
}
