// examples/in_memory_network.ts
//
// Demonstrates: Three nodes gossiping inside one process
// Run: npx tsx examples/in_memory_network.ts
//
// This example shows:
// - Wiring nodes over an InMemoryNetwork
// - Bootstrapping a line of nodes (a <- b <- c)
// - Submitting objects and watching them reach every node
// - Dependencies: an object naming a parent commits after it
// - A SharedCounter application object summing `add` fields on every node

import {
  GossipNode,
  InMemoryNetwork,
  InMemoryObjectStore,
  InMemoryTransport,
  NodeCryptoProvider,
  SharedCounter,
  SharedObject,
  encodeJsonPayload,
  loggerConfig,
} from "../src";

loggerConfig.configure({ level: "warn" });

const crypto = new NodeCryptoProvider();
const network = new InMemoryNetwork();

function spawn(name: string): GossipNode {
  const node = new GossipNode({
    transport: new InMemoryTransport(name, `mem://${name}`, network),
    store: new InMemoryObjectStore(),
    crypto,
    applications: [new SharedCounter("counter")],
  });
  node.on("accepted", (object: SharedObject, orderIndex: number) => {
    console.log(
      `[${name}] accepted #${orderIndex} ${object.digest.slice(0, 12)} from ${object.originPeer ?? "local"}`,
    );
  });
  return node;
}

async function main() {
  const a = spawn("a");
  const b = spawn("b");
  const c = spawn("c");

  await a.start();
  await b.start({ bootstrapAddresses: ["mem://a"] });
  await c.start({ bootstrapAddresses: ["mem://b"] });

  console.log("\n--- Submitting a root object at a ---");
  const root = a.submitLocal(encodeJsonPayload({ text: "genesis" }), "block");
  await new Promise((resolve) => setTimeout(resolve, 100));

  console.log("\n--- Submitting a child at c ---");
  c.submitLocal(
    encodeJsonPayload({ text: "reply", parents: [root] }),
    "transaction",
  );
  b.submitLocal(encodeJsonPayload({ add: 3 }), "transaction");
  a.submitLocal(encodeJsonPayload({ add: 4 }), "transaction");
  await new Promise((resolve) => setTimeout(resolve, 100));

  for (const node of [a, b, c]) {
    const history = node
      .history()
      .map((e) => `${e.orderIndex}:${e.digest.slice(0, 8)}`);
    console.log(`[${node.nodeId}] history ${history.join(" ")}`);
    console.log(
      `[${node.nodeId}] counter ${JSON.stringify(node.getApplicationState("counter"))}`,
    );
  }

  console.log("\nShutting down...");
  await Promise.all([a.stop(), b.stop(), c.stop()]);
  console.log("Done!");
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
