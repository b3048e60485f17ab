// src/create_node.ts

import { v4 as uuidv4 } from "uuid";
import type { ApplicationObject } from "./application_object";
import type { NodeConfig } from "./config";
import { CryptoProvider, HashAlgorithm, NodeCryptoProvider } from "./crypto";
import type { DiscoverySource } from "./discovery";
import { GossipNode, TransportFactory } from "./node";
import { InMemoryObjectStore, ObjectStore } from "./object_store";
import type { PeerId } from "./shared_object";
import type { Transport } from "./transport";
import { ZeroMQTransport } from "./zeromq_transport";

/**
 * Node configuration plus the collaborators `createNode` fills in when
 * they are left out.
 */
export interface CreateNodeConfig extends Partial<NodeConfig> {
  /** Default: a random uuid, or the transport's id when one is given. */
  nodeId?: PeerId;
  /** Default: a ZeroMQ transport listening on `host:port`. */
  transport?: Transport;
  /** Default: an InMemoryObjectStore. */
  store?: ObjectStore;
  /** Default: a NodeCryptoProvider using `hashAlgorithm`. */
  crypto?: CryptoProvider;
  /** Digest algorithm of the default crypto provider. Default: sha256 */
  hashAlgorithm?: HashAlgorithm;
  discoverySources?: DiscoverySource[];
  applications?: ApplicationObject[];
}

const zeroMQTransport: TransportFactory = (config, nodeId) =>
  new ZeroMQTransport({ nodeId, port: config.port, advertiseHost: config.host });

/**
 * Creates a node with default collaborators. Call `start()` on the result.
 *
 * @example
 * ```typescript
 * const node = createNode({ port: 7401, bootstrapAddresses: ["127.0.0.1:7400"] });
 * await node.start();
 * const digest = node.submitLocal(Buffer.from("hello"));
 * ```
 */
export function createNode(config: CreateNodeConfig = {}): GossipNode {
  const {
    nodeId,
    transport,
    store,
    crypto,
    hashAlgorithm,
    discoverySources,
    applications,
    ...nodeConfig
  } = config;

  return new GossipNode(
    {
      nodeId: nodeId ?? uuidv4(),
      transport: transport ?? zeroMQTransport,
      store: store ?? new InMemoryObjectStore(),
      crypto: crypto ?? new NodeCryptoProvider(hashAlgorithm),
      discoverySources,
      applications,
    },
    nodeConfig,
  );
}
