// src/transport.ts

import type { NetworkAddress, PeerId } from "./shared_object";

/**
 * Handler for bytes received from a connected peer.
 */
export type MessageHandler = (peerId: PeerId, bytes: Buffer) => void;

/**
 * Handler for a connection opened by a remote node. `address` is the
 * remote node's own listen address. Returning false refuses the connection.
 */
export type ConnectionHandler = (
  peerId: PeerId,
  address: NetworkAddress,
) => boolean;

/**
 * Handler for a link closed by the remote side or lost.
 */
export type DisconnectHandler = (peerId: PeerId) => void;

/**
 * Point-to-point byte transport between nodes. Channel security and framing
 * belong to the implementation; the node only sees whole messages.
 *
 * Messages sent over one link are delivered in order.
 */
export interface Transport {
  /** This node's identifier, announced during handshakes. */
  getNodeId(): PeerId;

  /**
   * Starts accepting connections.
   * @returns The address other nodes dial to reach this one.
   */
  listen(): Promise<NetworkAddress>;

  /**
   * Opens a link to the node at `address` and performs the handshake.
   * @returns The remote node's identifier.
   */
  connect(address: NetworkAddress, timeoutMs: number): Promise<PeerId>;

  /**
   * Sends one message to a connected peer. The promise settles when the
   * transport has taken the bytes, so a slow link keeps it pending.
   */
  send(peerId: PeerId, bytes: Buffer): Promise<void>;

  /** Closes the link to a peer. Closing an unknown peer is a no-op. */
  close(peerId: PeerId): Promise<void>;

  onMessage(handler: MessageHandler): void;

  onConnection(handler: ConnectionHandler): void;

  onDisconnect(handler: DisconnectHandler): void;

  /** Closes every link and stops listening. */
  disconnect(): Promise<void>;
}
