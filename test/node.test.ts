// test/node.test.ts

import { describe, it, expect, afterEach, vi } from "vitest";
import type { NodeConfig } from "../src/config";
import { SharedCounter } from "../src/application_object";
import { NodeCryptoProvider, generateKeyPair } from "../src/crypto";
import { NodeNotStartedError, NodeShuttingDownError } from "../src/errors";
import { InMemoryNetwork, InMemoryTransport } from "../src/in_memory_transport";
import type { LocalStateView } from "../src/ledger";
import { GossipNode } from "../src/node";
import { InMemoryObjectStore } from "../src/object_store";
import { SharedObject, objectDigest } from "../src/shared_object";
import type { ValidationVerdict, Validator } from "../src/validator";
import { AppendOnlyValidator } from "../src/validators/append_only";
import { encodeJsonPayload } from "../src/validators/payload";
import {
  StakeWeightedValidator,
  createSignedPayload,
} from "../src/validators/stake_weighted";
import { encodeWireMessage } from "../src/wire_codec";

const crypto = new NodeCryptoProvider();

class CountingValidator implements Validator {
  readonly name = "counting";
  readonly seen: string[] = [];
  private readonly inner = new AppendOnlyValidator();

  validate(object: SharedObject, view: LocalStateView): ValidationVerdict {
    this.seen.push(object.digest);
    return this.inner.validate(object, view);
  }
}

describe("GossipNode", () => {
  const running: GossipNode[] = [];
  let network: InMemoryNetwork;

  function spawn(name: string, config: Partial<NodeConfig> = {}) {
    const transport = new InMemoryTransport(`node-${name}`, `mem://${name}`, network);
    const node = new GossipNode(
      { transport, store: new InMemoryObjectStore(), crypto },
      // Keep background redials out of the way
      { maintenanceIntervalMs: 60000, ...config },
    );
    running.push(node);
    return { node, transport };
  }

  function digests(node: GossipNode): string[] {
    return node.history().map((entry) => entry.digest);
  }

  afterEach(async () => {
    await Promise.all(running.splice(0).map((node) => node.stop()));
  });

  describe("propagation", () => {
    it("should relay an object along a line of nodes", async () => {
      network = new InMemoryNetwork();
      const a = spawn("a").node;
      const b = spawn("b").node;
      const c = spawn("c").node;
      await a.start();
      await b.start({ bootstrapAddresses: ["mem://a"] });
      await c.start({ bootstrapAddresses: ["mem://b"] });

      const digest = a.submitLocal(Buffer.from("hello"), "transaction");

      await vi.waitFor(() => expect(digests(c)).toEqual([digest]));
      expect(digests(a)).toEqual([digest]);
      expect(digests(b)).toEqual([digest]);
      expect((await c.getObject(digest))?.toString()).toBe("hello");
      expect(c.history()[0]?.kind).toBe("transaction");
    });

    it("should not announce an object back to the peer it came from", async () => {
      network = new InMemoryNetwork();
      const a = spawn("a").node;
      const b = spawn("b").node;
      const c = spawn("c").node;
      await a.start();
      await b.start({ bootstrapAddresses: ["mem://a"] });
      await c.start({ bootstrapAddresses: ["mem://b"] });

      const digest = a.submitLocal(Buffer.from("no echo"));
      await vi.waitFor(() => expect(digests(c)).toEqual([digest]));
      await Promise.all([a.idle(), b.idle(), c.idle()]);

      expect(a.getStats().gossip.announcementsSent).toBe(1);
      expect(b.getStats().gossip.announcementsSent).toBe(1);
      expect(c.getStats().gossip.announcementsSent).toBe(0);
      expect(a.getStats().gossip.requestsSent).toBe(0);
    });

    it("should validate an object once per node however many peers offer it", async () => {
      network = new InMemoryNetwork();
      const validators = [new CountingValidator(), new CountingValidator(), new CountingValidator()];
      const a = spawn("a", { consensusStrategy: validators[0] }).node;
      const b = spawn("b", { consensusStrategy: validators[1] }).node;
      const c = spawn("c", { consensusStrategy: validators[2] }).node;
      await a.start();
      await b.start({ bootstrapAddresses: ["mem://a"] });
      await c.start({ bootstrapAddresses: ["mem://a", "mem://b"] });

      const digest = a.submitLocal(Buffer.from("once"));
      expect(a.submitLocal(Buffer.from("once"))).toBe(digest);
      await vi.waitFor(() => {
        expect(digests(b)).toEqual([digest]);
        expect(digests(c)).toEqual([digest]);
      });
      await Promise.all([a.idle(), b.idle(), c.idle()]);

      expect(validators.map((v) => v.seen)).toEqual([[digest], [digest], [digest]]);
    });

    it("should commit a dependent object after its parent on every node", async () => {
      network = new InMemoryNetwork();
      const a = spawn("a").node;
      const b = spawn("b").node;
      await a.start();
      await b.start({ bootstrapAddresses: ["mem://a"] });
      const parentPayload = Buffer.from("parent");
      const parent = objectDigest(crypto, "custom", parentPayload);

      const child = a.submitLocal(encodeJsonPayload({ parents: [parent] }));
      await a.idle();
      expect(a.gossip.deferredCount).toBe(1);
      a.submitLocal(parentPayload);

      await vi.waitFor(() => expect(digests(b)).toEqual([parent, child]));
      expect(digests(a)).toEqual([parent, child]);
    });
  });

  describe("backpressure", () => {
    it("should keep serving other peers while one is stalled", async () => {
      network = new InMemoryNetwork();
      const { node: a, transport } = spawn("a", { outboundQueueCapacity: 2 });
      const b = spawn("b").node;
      const c = spawn("c").node;
      await a.start();
      await b.start({ bootstrapAddresses: ["mem://a"] });
      await c.start({ bootstrapAddresses: ["mem://a"] });

      transport.stall("node-b");
      const texts = ["one", "two", "three", "four"];
      for (const [i, text] of texts.entries()) {
        a.submitLocal(Buffer.from(text));
        await vi.waitFor(() => expect(digests(c)).toHaveLength(i + 1));
      }
      await a.idle();

      expect(digests(b)).toEqual([]);
      expect(a.getStats().gossip.outboundDropped).toBe(1);
      expect(a.peers.getRecordByPeerId("node-b")?.penalty).toBe(1);

      transport.resume("node-b");
      await vi.waitFor(() => expect(digests(b)).toHaveLength(3));
    });
  });

  describe("peers", () => {
    it("should evict the lowest scoring peer when a fourth connects over maxPeers", async () => {
      network = new InMemoryNetwork();
      const hub = spawn("hub", { maxPeers: 2 }).node;
      const p1 = spawn("p1").node;
      const p2 = spawn("p2").node;
      const p3 = spawn("p3").node;
      const disconnects: Array<[string, string]> = [];
      hub.on("peer_disconnected", (peerId: string, reason: string) => {
        disconnects.push([peerId, reason]);
      });
      await hub.start();
      await p1.start({ bootstrapAddresses: ["mem://hub"] });
      await p2.start({ bootstrapAddresses: ["mem://hub"] });

      await p3.start({ bootstrapAddresses: ["mem://hub"] });

      expect(disconnects).toEqual([["node-p1", "evicted"]]);
      expect(hub.peers.getConnectedPeers().sort()).toEqual(["node-p2", "node-p3"]);
      await vi.waitFor(() => expect(p1.peers.getConnectedPeers()).toEqual([]));
      expect(p1.peers.getRecord("mem://hub")?.state).toBe("disconnected");
    });

    it("should learn addresses from connected peers", async () => {
      network = new InMemoryNetwork();
      const hub = spawn("hub").node;
      const b = spawn("b").node;
      const c = spawn("c").node;
      await hub.start();
      await b.start({ bootstrapAddresses: ["mem://hub"] });
      await c.start({ bootstrapAddresses: ["mem://hub"] });

      await b.peers.discover();
      await vi.waitFor(async () => {
        const found = await b.peers.discover();
        expect(Array.from(found)).toContain("mem://c");
      });
      await b.peers.maintain();

      expect(b.peers.getConnectedPeers().sort()).toEqual(["node-c", "node-hub"]);
    });

    it("should disconnect a silent peer with reason timeout", async () => {
      vi.useFakeTimers({ toFake: ["setInterval", "clearInterval", "Date"] });
      try {
        network = new InMemoryNetwork();
        const a = spawn("a", {
          heartbeatIntervalMs: 1000,
          peerTimeoutMs: 5000,
        }).node;
        await a.start();
        const disconnects: Array<[string, string]> = [];
        a.on("peer_disconnected", (peerId: string, reason: string) => {
          disconnects.push([peerId, reason]);
        });
        const silent = new InMemoryTransport("node-silent", "mem://silent", network);
        await silent.listen();
        await silent.connect("mem://a", 1000);
        expect(a.peers.getConnectedPeers()).toEqual(["node-silent"]);

        vi.advanceTimersByTime(4000);
        expect(disconnects).toEqual([]);
        vi.advanceTimersByTime(1000);

        await vi.waitFor(() =>
          expect(disconnects).toEqual([["node-silent", "timeout"]]),
        );
        expect(a.peers.getRecord("mem://silent")?.state).toBe("disconnected");
        await silent.disconnect();
        await a.stop();
      } finally {
        vi.useRealTimers();
      }
    });

    it("should ban a peer that keeps sending corrupted objects", async () => {
      network = new InMemoryNetwork();
      const a = spawn("a").node;
      await a.start();
      const rogue = new InMemoryTransport("node-rogue", "mem://rogue", network);
      await rogue.listen();
      await rogue.connect("mem://a", 1000);
      const disconnects: Array<[string, string]> = [];
      a.on("peer_disconnected", (peerId: string, reason: string) => {
        disconnects.push([peerId, reason]);
      });

      const forged = encodeWireMessage({
        type: "object",
        digest: objectDigest(crypto, "custom", Buffer.from("claimed")),
        kind: "custom",
        payload: Buffer.from("actual"),
      });
      for (let i = 0; i < 4; i++) {
        await rogue.send("node-a", forged);
      }

      await vi.waitFor(() =>
        expect(disconnects).toEqual([["node-rogue", "misbehavior"]]),
      );
      expect(a.getStats().gossip.integrityViolations).toBe(4);
      expect(a.peers.isBanned("mem://rogue")).toBe(true);
      await rogue.disconnect();
    });

    it("should penalize undecodable bytes", async () => {
      network = new InMemoryNetwork();
      const a = spawn("a").node;
      await a.start();
      const rogue = new InMemoryTransport("node-rogue", "mem://rogue", network);
      await rogue.listen();
      await rogue.connect("mem://a", 1000);

      await rogue.send("node-a", Buffer.from("not a message"));

      await vi.waitFor(() =>
        expect(a.peers.getRecordByPeerId("node-rogue")?.penalty).toBe(10),
      );
      await rogue.disconnect();
    });
  });

  describe("object identity", () => {
    it("should reject a signed block relabelled by a relay", async () => {
      network = new InMemoryNetwork();
      const keys = generateKeyPair();
      const { node: a } = spawn("a", {
        consensusStrategy: new StakeWeightedValidator({
          crypto,
          stakes: new Map([[keys.publicKey, 1]]),
        }),
      });
      await a.start();
      const rejections: string[] = [];
      a.on("rejected", (_object: SharedObject, reason: string) => {
        rejections.push(reason);
      });
      const first = a.submitLocal(
        createSignedPayload(crypto, keys, { kind: "block", body: "one", slot: 3 }),
        "block",
      );
      await a.idle();

      const rogue = new InMemoryTransport("node-rogue", "mem://rogue", network);
      await rogue.listen();
      await rogue.connect("mem://a", 1000);
      const second = createSignedPayload(crypto, keys, {
        kind: "block",
        body: "two",
        slot: 3,
      });
      await rogue.send(
        "node-a",
        encodeWireMessage({
          type: "object",
          digest: objectDigest(crypto, "transaction", second),
          kind: "transaction",
          payload: second,
        }),
      );

      await vi.waitFor(() =>
        expect(rejections).toEqual(["signed as block, received as transaction"]),
      );
      expect(digests(a)).toEqual([first]);
      await rogue.disconnect();
    });

    it("should accept an honest copy after rejecting a mislabelled one", async () => {
      network = new InMemoryNetwork();
      const a = spawn("a", {
        consensusStrategy: new AppendOnlyValidator({
          allowedKinds: ["transaction"],
        }),
      }).node;
      const b = spawn("b").node;
      await a.start();
      await b.start({ bootstrapAddresses: ["mem://a"] });
      const rejections: string[] = [];
      a.on("rejected", (_object: SharedObject, reason: string) => {
        rejections.push(reason);
      });
      const payload = Buffer.from("transfer 5");

      const rogue = new InMemoryTransport("node-rogue", "mem://rogue", network);
      await rogue.listen();
      await rogue.connect("mem://a", 1000);
      await rogue.send(
        "node-a",
        encodeWireMessage({
          type: "object",
          digest: objectDigest(crypto, "vote", payload),
          kind: "vote",
          payload,
        }),
      );
      await vi.waitFor(() => expect(rejections).toEqual(["kind vote not accepted"]));

      const honest = b.submitLocal(payload, "transaction");

      await vi.waitFor(() => expect(digests(a)).toEqual([honest]));
      expect(a.history()[0].kind).toBe("transaction");
      await rogue.disconnect();
    });
  });

  describe("application objects", () => {
    it("should apply accepted objects on every node", async () => {
      network = new InMemoryNetwork();
      const a = spawn("a").node;
      const b = spawn("b").node;
      b.applications.register(new SharedCounter("counter"));
      const applied: string[][] = [];
      b.on("applied", (_object: SharedObject, ids: string[]) => {
        applied.push(ids);
      });
      await a.start();
      await b.start({ bootstrapAddresses: ["mem://a"] });

      a.submitLocal(encodeJsonPayload({ add: 5 }), "transaction");
      a.submitLocal(encodeJsonPayload({ add: 7 }), "transaction");
      a.submitLocal(Buffer.from("not a counter update"));

      await vi.waitFor(() => expect(digests(b)).toHaveLength(3));
      await b.idle();
      expect(b.getApplicationState("counter")).toEqual({ value: 12, messages: 2 });
      expect(applied).toEqual([["counter"], ["counter"]]);
    });

    it("should list the history after a digest for catching up", async () => {
      network = new InMemoryNetwork();
      const a = spawn("a").node;
      await a.start();
      a.submitLocal(Buffer.from("one"));
      a.submitLocal(Buffer.from("two"));
      a.submitLocal(Buffer.from("three"));
      await a.idle();
      const [first, second, third] = digests(a);

      expect(a.historySince(first)?.map((e) => e.digest)).toEqual([second, third]);
      expect(a.historySince(third)).toEqual([]);
      expect(
        a.historySince(objectDigest(crypto, "custom", Buffer.from("never"))),
      ).toBeUndefined();
    });
  });

  describe("lifecycle", () => {
    it("should require start before reading state", () => {
      network = new InMemoryNetwork();
      const a = spawn("a").node;

      expect(() => a.history()).toThrow(NodeNotStartedError);
      expect(a.getState()).toBe("created");
    });

    it("should refuse work after stop", async () => {
      network = new InMemoryNetwork();
      const a = spawn("a").node;
      await a.start();
      await a.stop();

      expect(a.getState()).toBe("stopped");
      expect(() => a.submitLocal(Buffer.from("late"))).toThrow(NodeShuttingDownError);
      await expect(a.start()).rejects.toBeInstanceOf(NodeShuttingDownError);
    });

    it("should disconnect its peers on stop", async () => {
      network = new InMemoryNetwork();
      const a = spawn("a").node;
      const b = spawn("b").node;
      await a.start();
      await b.start({ bootstrapAddresses: ["mem://a"] });

      await b.stop();

      await vi.waitFor(() => expect(a.peers.getConnectedPeers()).toEqual([]));
      expect(a.peers.getRecord("mem://b")?.state).toBe("disconnected");
    });

    it("should report component health", async () => {
      network = new InMemoryNetwork();
      const a = spawn("a").node;
      const b = spawn("b").node;
      await a.start();
      await b.start({ bootstrapAddresses: ["mem://a"] });

      const report = await b.getHealth();

      expect(report.nodeId).toBe("node-b");
      expect(report.status).toBe("healthy");
      expect(report.components.map((c) => c.name)).toEqual([
        "peers",
        "consensus",
        "store",
      ]);
    });
  });
});
