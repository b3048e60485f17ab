// test/heartbeat.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { HeartbeatManager, LivenessSource } from "../src/heartbeat";
import type { PeerId } from "../src/shared_object";
import type { PingMessage } from "../src/wire_codec";

const START = 1_000_000;

class FakeLiveness implements LivenessSource {
  readonly seen = new Map<PeerId, number>();

  getConnectedPeers(): PeerId[] {
    return Array.from(this.seen.keys());
  }

  lastSeen(peerId: PeerId): number | undefined {
    return this.seen.get(peerId);
  }
}

describe("HeartbeatManager", () => {
  let peers: FakeLiveness;
  let pings: Array<{ peerId: PeerId; ping: PingMessage }>;
  const sendPing = (peerId: PeerId, ping: PingMessage) => {
    pings.push({ peerId, ping });
    return true;
  };

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
    peers = new FakeLiveness();
    pings = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should ping connected peers once per interval", () => {
    peers.seen.set("p1", START);
    const heartbeat = new HeartbeatManager("self", peers, sendPing, {
      intervalMs: 1000,
      staggerPings: false,
    });

    heartbeat.start();
    expect(pings).toEqual([]);
    vi.advanceTimersByTime(1000);

    expect(pings).toEqual([
      { peerId: "p1", ping: { type: "ping", timestamp: START + 1000 } },
    ]);
    expect(heartbeat.getPeerState("p1")).toEqual({
      peerId: "p1",
      pingsSent: 1,
      lastPingAt: START + 1000,
    });
    heartbeat.stop();
  });

  it("should report peers silent for the timeout", () => {
    peers.seen.set("quiet", START - 30000);
    peers.seen.set("chatty", START - 29999);
    const heartbeat = new HeartbeatManager("self", peers, sendPing, {
      timeoutMs: 30000,
      staggerPings: false,
    });
    const timeouts: Array<[PeerId, number]> = [];
    heartbeat.on("peer_timeout", (peerId: PeerId, silentMs: number) => {
      timeouts.push([peerId, silentMs]);
    });

    heartbeat.start();
    expect(heartbeat.heartbeatLoop()).toEqual(["quiet"]);

    expect(timeouts).toEqual([["quiet", 30000]]);
    expect(pings.map((p) => p.peerId)).toEqual(["chatty"]);
    heartbeat.stop();
  });

  it("should stagger pings across the interval", () => {
    peers.seen.set("p1", START);
    peers.seen.set("p2", START);
    const heartbeat = new HeartbeatManager("self", peers, sendPing, {
      intervalMs: 1000,
    });

    heartbeat.start();
    heartbeat.heartbeatLoop();
    vi.advanceTimersByTime(0);
    expect(pings.map((p) => p.peerId)).toEqual(["p1"]);

    vi.advanceTimersByTime(500);
    expect(pings.map((p) => p.peerId)).toEqual(["p1", "p2"]);
    heartbeat.stop();
  });

  it("should cancel staggered pings on stop", () => {
    peers.seen.set("p1", START);
    peers.seen.set("p2", START);
    const heartbeat = new HeartbeatManager("self", peers, sendPing, {
      intervalMs: 1000,
    });

    heartbeat.start();
    heartbeat.heartbeatLoop();
    heartbeat.stop();
    vi.advanceTimersByTime(2000);

    expect(pings).toEqual([]);
    expect(heartbeat.isRunning()).toBe(false);
  });

  it("should measure round trips from pongs", () => {
    peers.seen.set("p1", START);
    const heartbeat = new HeartbeatManager("self", peers, sendPing, {
      staggerPings: false,
    });

    heartbeat.start();
    heartbeat.heartbeatLoop();
    vi.advanceTimersByTime(40);

    expect(heartbeat.handlePong("p1", { type: "pong", timestamp: START })).toBe(40);
    expect(heartbeat.getPeerState("p1")?.lastRttMs).toBe(40);
    heartbeat.stop();
  });

  it("should echo the ping timestamp", () => {
    const heartbeat = new HeartbeatManager("self", peers, sendPing);

    expect(heartbeat.handlePing("p1", { type: "ping", timestamp: 77 })).toEqual({
      type: "pong",
      timestamp: 77,
    });
  });

  it("should not start when disabled", () => {
    peers.seen.set("p1", START);
    const heartbeat = new HeartbeatManager("self", peers, sendPing, {
      enabled: false,
      intervalMs: 1000,
    });

    heartbeat.start();
    vi.advanceTimersByTime(5000);

    expect(heartbeat.isRunning()).toBe(false);
    expect(pings).toEqual([]);
  });
});
