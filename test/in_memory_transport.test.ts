// test/in_memory_transport.test.ts

import { describe, it, expect, vi } from "vitest";
import { PeerNotFoundError, TransportError } from "../src/errors";
import { InMemoryNetwork, InMemoryTransport } from "../src/in_memory_transport";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

async function pair() {
  const network = new InMemoryNetwork();
  const a = new InMemoryTransport("node-a", "mem://a", network);
  const b = new InMemoryTransport("node-b", "mem://b", network);
  await a.listen();
  await b.listen();
  return { network, a, b };
}

describe("InMemoryTransport", () => {
  it("should report the dialer and its listen address to the remote", async () => {
    const { a, b } = await pair();
    const onConnection = vi.fn(() => true);
    b.onConnection(onConnection);

    await expect(a.connect("mem://b", 1000)).resolves.toBe("node-b");
    expect(onConnection).toHaveBeenCalledWith("node-a", "mem://a");
    expect(a.getLinkedPeers()).toEqual(["node-b"]);
    expect(b.getLinkedPeers()).toEqual(["node-a"]);
  });

  it("should deliver messages in order", async () => {
    const { a, b } = await pair();
    const received: string[] = [];
    b.onMessage((from, bytes) => received.push(`${from}:${bytes.toString()}`));
    await a.connect("mem://b", 1000);

    await a.send("node-b", Buffer.from("one"));
    await a.send("node-b", Buffer.from("two"));
    await tick();
    await tick();

    expect(received).toEqual(["node-a:one", "node-a:two"]);
  });

  it("should fail to dial a refused, missing or own address", async () => {
    const { a, b } = await pair();
    b.onConnection(() => false);

    await expect(a.connect("mem://b", 1000)).rejects.toThrow(
      "Connection refused by mem://b",
    );
    await expect(a.connect("mem://nowhere", 1000)).rejects.toBeInstanceOf(
      TransportError,
    );
    await expect(a.connect("mem://a", 1000)).resolves.toBe("node-a");
  });

  it("should hold sends to a stalled peer until resumed", async () => {
    const { a, b } = await pair();
    const received: string[] = [];
    b.onMessage((_from, bytes) => received.push(bytes.toString()));
    await a.connect("mem://b", 1000);

    a.stall("node-b");
    const pending = a.send("node-b", Buffer.from("slow"));
    await tick();
    expect(received).toEqual([]);

    a.resume("node-b");
    await pending;
    await tick();
    expect(received).toEqual(["slow"]);
  });

  it("should tell the remote when a link closes", async () => {
    const { a, b } = await pair();
    const onDisconnect = vi.fn();
    b.onDisconnect(onDisconnect);
    await a.connect("mem://b", 1000);

    await a.close("node-b");
    await tick();

    expect(onDisconnect).toHaveBeenCalledWith("node-a");
    expect(b.getLinkedPeers()).toEqual([]);
    await expect(a.send("node-b", Buffer.from("x"))).rejects.toBeInstanceOf(
      PeerNotFoundError,
    );
  });

  it("should stop being reachable after disconnect", async () => {
    const { network, a, b } = await pair();
    await b.disconnect();

    expect(network.lookup("mem://b")).toBeUndefined();
    await expect(a.connect("mem://b", 1000)).rejects.toThrow(
      "No node listening at mem://b",
    );
  });

  it("should refuse a second listener on one address", async () => {
    const { network } = await pair();
    const clash = new InMemoryTransport("node-c", "mem://a", network);

    await expect(clash.listen()).rejects.toThrow("Address mem://a already in use");
  });
});
