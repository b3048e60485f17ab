// src/in_memory_transport.ts

import { PeerNotFoundError, TransportError } from "./errors";
import type { NetworkAddress, PeerId } from "./shared_object";
import type {
  ConnectionHandler,
  DisconnectHandler,
  MessageHandler,
  Transport,
} from "./transport";

/**
 * Address book shared by the InMemoryTransports of one simulated network.
 * Each test or process creates its own, so independent networks never see
 * each other.
 */
export class InMemoryNetwork {
  private readonly listeners = new Map<NetworkAddress, InMemoryTransport>();

  register(address: NetworkAddress, transport: InMemoryTransport): void {
    const existing = this.listeners.get(address);
    if (existing && existing !== transport) {
      throw new TransportError(`Address ${address} already in use`);
    }
    this.listeners.set(address, transport);
  }

  unregister(address: NetworkAddress, transport: InMemoryTransport): void {
    if (this.listeners.get(address) === transport) {
      this.listeners.delete(address);
    }
  }

  lookup(address: NetworkAddress): InMemoryTransport | undefined {
    return this.listeners.get(address);
  }
}

/**
 * In-process Transport. Delivery is asynchronous (one macrotask per
 * message) and ordered per link. `stall` holds sends to one peer until
 * `resume`, which simulates a slow or unresponsive remote.
 */
export class InMemoryTransport implements Transport {
  private readonly links = new Map<PeerId, InMemoryTransport>();
  private readonly stalled = new Map<PeerId, Array<() => void>>();
  private messageHandler?: MessageHandler;
  private connectionHandler?: ConnectionHandler;
  private disconnectHandler?: DisconnectHandler;
  private listening = false;

  constructor(
    private readonly nodeId: PeerId,
    readonly address: NetworkAddress,
    private readonly network: InMemoryNetwork,
  ) {}

  getNodeId(): PeerId {
    return this.nodeId;
  }

  async listen(): Promise<NetworkAddress> {
    this.network.register(this.address, this);
    this.listening = true;
    return this.address;
  }

  // The handshake completes synchronously, so there is nothing to time out.
  async connect(address: NetworkAddress, _timeoutMs: number): Promise<PeerId> {
    const remote = this.network.lookup(address);
    if (!remote || !remote.listening) {
      throw new TransportError(`No node listening at ${address}`);
    }
    if (remote === this) {
      return this.nodeId;
    }
    if (!remote.accept(this.nodeId, this.address, this)) {
      throw new TransportError(
        `Connection refused by ${address}`,
        remote.nodeId,
      );
    }
    this.links.set(remote.nodeId, remote);
    return remote.nodeId;
  }

  async send(peerId: PeerId, bytes: Buffer): Promise<void> {
    const remote = this.links.get(peerId);
    if (!remote) {
      throw new PeerNotFoundError(peerId);
    }

    await this.waitIfStalled(peerId);
    if (this.links.get(peerId) !== remote) {
      throw new TransportError(`Link to ${peerId} closed`, peerId);
    }

    const copy = Buffer.from(bytes);
    setImmediate(() => remote.deliver(this.nodeId, copy));
  }

  async close(peerId: PeerId): Promise<void> {
    const remote = this.links.get(peerId);
    if (!remote) {
      return;
    }
    this.links.delete(peerId);
    this.releaseStalled(peerId);
    remote.handleRemoteClose(this.nodeId);
  }

  onMessage(handler: MessageHandler): void {
    this.messageHandler = handler;
  }

  onConnection(handler: ConnectionHandler): void {
    this.connectionHandler = handler;
  }

  onDisconnect(handler: DisconnectHandler): void {
    this.disconnectHandler = handler;
  }

  async disconnect(): Promise<void> {
    for (const peerId of Array.from(this.links.keys())) {
      await this.close(peerId);
    }
    this.network.unregister(this.address, this);
    this.listening = false;
  }

  /** Holds every send to `peerId` until `resume` is called. */
  stall(peerId: PeerId): void {
    if (!this.stalled.has(peerId)) {
      this.stalled.set(peerId, []);
    }
  }

  resume(peerId: PeerId): void {
    this.releaseStalled(peerId);
  }

  /** Peers with an open link, for tests and diagnostics. */
  getLinkedPeers(): PeerId[] {
    return Array.from(this.links.keys());
  }

  private accept(
    peerId: PeerId,
    address: NetworkAddress,
    transport: InMemoryTransport,
  ): boolean {
    const accepted = this.connectionHandler
      ? this.connectionHandler(peerId, address)
      : true;
    if (accepted) {
      this.links.set(peerId, transport);
    }
    return accepted;
  }

  private deliver(from: PeerId, bytes: Buffer): void {
    // Bytes still in flight when the link closed are lost, as on a socket.
    if (!this.links.has(from)) {
      return;
    }
    this.messageHandler?.(from, bytes);
  }

  private handleRemoteClose(peerId: PeerId): void {
    if (!this.links.delete(peerId)) {
      return;
    }
    this.releaseStalled(peerId);
    setImmediate(() => this.disconnectHandler?.(peerId));
  }

  private waitIfStalled(peerId: PeerId): Promise<void> {
    const waiters = this.stalled.get(peerId);
    if (!waiters) {
      return Promise.resolve();
    }
    return new Promise((resolve) => waiters.push(resolve));
  }

  private releaseStalled(peerId: PeerId): void {
    const waiters = this.stalled.get(peerId);
    if (!waiters) {
      return;
    }
    this.stalled.delete(peerId);
    for (const resolve of waiters) {
      resolve();
    }
  }
}
