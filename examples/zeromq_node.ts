// examples/zeromq_node.ts
//
// Demonstrates: Nodes in separate processes over ZeroMQ
// Prerequisites: Two terminals
// Run:
//   Terminal 1: npx tsx examples/zeromq_node.ts 7400
//   Terminal 2: npx tsx examples/zeromq_node.ts 7401 127.0.0.1:7400
//
// Each node submits a timestamped object every few seconds and prints what
// it accepts from the other. Ctrl+C stops gracefully.

import { SharedObject, createNode } from "../src";

const port = Number(process.argv[2] ?? 7400);
const bootstrapAddresses = process.argv.slice(3);

async function main() {
  const node = createNode({
    port,
    bootstrapAddresses,
    heartbeatIntervalMs: 2000,
    peerTimeoutMs: 10000,
  });

  node.on("peer_connected", (peerId: string, address: string) => {
    console.log(`Peer connected: ${peerId} at ${address}`);
  });
  node.on("peer_disconnected", (peerId: string, reason: string) => {
    console.log(`Peer disconnected: ${peerId} (${reason})`);
  });
  node.on("accepted", (object: SharedObject, orderIndex: number) => {
    if (object.originPeer) {
      console.log(
        `#${orderIndex} from ${object.originPeer}: ${object.payload.toString()}`,
      );
    }
  });

  await node.start();
  console.log(`Node ${node.nodeId} listening at ${node.address}`);

  const timer = setInterval(() => {
    const digest = node.submitLocal(
      Buffer.from(`hello from ${port} at ${new Date().toISOString()}`),
    );
    console.log(`Submitted ${digest.slice(0, 12)}`);
  }, 3000);

  process.on("SIGINT", () => {
    clearInterval(timer);
    console.log("\nShutting down...");
    node.stop().then(
      () => process.exit(0),
      (err) => {
        console.error(err);
        process.exit(1);
      },
    );
  });
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
