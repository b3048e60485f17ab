// src/zeromq_transport.ts

import * as zmq from "zeromq";
import { v4 as uuidv4 } from "uuid";
import { Logger, createLogger, toError } from "./logger";
import { PeerNotFoundError, TimeoutError, TransportError } from "./errors";
import type { NetworkAddress, PeerId } from "./shared_object";
import type {
  ConnectionHandler,
  DisconnectHandler,
  MessageHandler,
  Transport,
} from "./transport";

interface PendingHandshake {
  resolve: (peerId: PeerId) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

interface Hello {
  nodeId: PeerId;
  address: NetworkAddress;
  correlationId: string;
}

interface HandshakeReply {
  nodeId: PeerId;
  correlationId: string;
  reason?: string;
}

export interface ZeroMQTransportConfig {
  nodeId: PeerId;
  port: number;
  /** Interface to bind. Default: 0.0.0.0 */
  bindAddress?: string;
  /** Host other nodes use to reach this one. Default: 127.0.0.1 */
  advertiseHost?: string;
  /** Messages buffered per socket before sends wait. Default: 1000 */
  sendHighWaterMark?: number;
}

function parseJson(frame: Buffer | undefined): Record<string, unknown> | undefined {
  if (!frame) return undefined;
  try {
    const value: unknown = JSON.parse(frame.toString());
    if (value !== null && typeof value === "object" && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
  } catch {
    // fall through: not a handshake frame
  }
  return undefined;
}

function parseHello(frame: Buffer | undefined): Hello | undefined {
  const data = parseJson(frame);
  if (
    !data ||
    typeof data.nodeId !== "string" ||
    typeof data.address !== "string" ||
    typeof data.correlationId !== "string"
  ) {
    return undefined;
  }
  return {
    nodeId: data.nodeId,
    address: data.address,
    correlationId: data.correlationId,
  };
}

function parseReply(frame: Buffer | undefined): HandshakeReply | undefined {
  const data = parseJson(frame);
  if (
    !data ||
    typeof data.nodeId !== "string" ||
    typeof data.correlationId !== "string"
  ) {
    return undefined;
  }
  return {
    nodeId: data.nodeId,
    correlationId: data.correlationId,
    reason: typeof data.reason === "string" ? data.reason : undefined,
  };
}

/**
 * Transport over ZeroMQ TCP sockets.
 *
 * A ROUTER socket accepts inbound links; each outbound link is a DEALER.
 * Frames are `[kind, body]` with kinds `hello`, `welcome`, `refused`, `data`
 * and `bye`. A link is usable in both directions once the handshake
 * completes: the dialing side sends on its DEALER, the accepting side
 * replies through its ROUTER.
 */
export class ZeroMQTransport implements Transport {
  private readonly nodeId: PeerId;
  private readonly bindEndpoint: string;
  private readonly advertisedAddress: NetworkAddress;
  private readonly sendHighWaterMark: number;
  private readonly log: Logger;

  private router?: zmq.Router;
  private readonly dealers = new Map<PeerId, zmq.Dealer>();
  private readonly inboundIdentities = new Map<PeerId, Buffer>();
  private readonly peersByIdentity = new Map<string, PeerId>();
  private readonly pendingHandshakes = new Map<string, PendingHandshake>();

  private messageHandler?: MessageHandler;
  private connectionHandler?: ConnectionHandler;
  private disconnectHandler?: DisconnectHandler;

  constructor(config: ZeroMQTransportConfig) {
    this.nodeId = config.nodeId;
    this.bindEndpoint = `tcp://${config.bindAddress ?? "0.0.0.0"}:${config.port}`;
    this.advertisedAddress = `${config.advertiseHost ?? "127.0.0.1"}:${config.port}`;
    this.sendHighWaterMark = config.sendHighWaterMark ?? 1000;
    this.log = createLogger("ZeroMQTransport", this.nodeId);
  }

  getNodeId(): PeerId {
    return this.nodeId;
  }

  async listen(): Promise<NetworkAddress> {
    this.router = new zmq.Router({
      mandatory: true,
      linger: 0,
      sendHighWaterMark: this.sendHighWaterMark,
    });
    await this.router.bind(this.bindEndpoint);
    this.runRouterLoop(this.router).catch((err) => {
      this.log.error("Router loop failed", toError(err));
    });
    this.log.info("Listening", { endpoint: this.bindEndpoint });
    return this.advertisedAddress;
  }

  async connect(address: NetworkAddress, timeoutMs: number): Promise<PeerId> {
    const dealer = new zmq.Dealer({
      linger: 0,
      sendHighWaterMark: this.sendHighWaterMark,
    });
    dealer.connect(`tcp://${address}`);

    const correlationId = uuidv4();
    const handshake = new Promise<PeerId>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingHandshakes.delete(correlationId);
        reject(new TimeoutError(`handshake with ${address}`, timeoutMs));
      }, timeoutMs);
      this.pendingHandshakes.set(correlationId, { resolve, reject, timer });
    });

    this.runDealerLoop(dealer).catch((err) => {
      this.log.error("Dealer loop failed", toError(err), { address });
    });

    try {
      const hello: Hello = {
        nodeId: this.nodeId,
        address: this.advertisedAddress,
        correlationId,
      };
      await dealer.send(["hello", JSON.stringify(hello)]);
      const peerId = await handshake;
      this.dealers.set(peerId, dealer);
      return peerId;
    } catch (err) {
      const pending = this.pendingHandshakes.get(correlationId);
      if (pending) {
        clearTimeout(pending.timer);
        this.pendingHandshakes.delete(correlationId);
      }
      dealer.close();
      if (err instanceof TimeoutError || err instanceof TransportError) {
        throw err;
      }
      throw new TransportError(
        `Failed to connect to ${address}`,
        undefined,
        toError(err),
      );
    }
  }

  async send(peerId: PeerId, bytes: Buffer): Promise<void> {
    try {
      const dealer = this.dealers.get(peerId);
      if (dealer) {
        await dealer.send(["data", bytes]);
        return;
      }
      const identity = this.inboundIdentities.get(peerId);
      if (identity && this.router) {
        await this.router.send([identity, "data", bytes]);
        return;
      }
    } catch (err) {
      throw new TransportError(
        `Failed to send message to ${peerId}`,
        peerId,
        toError(err),
      );
    }
    throw new PeerNotFoundError(peerId);
  }

  async close(peerId: PeerId): Promise<void> {
    const dealer = this.dealers.get(peerId);
    if (dealer) {
      this.dealers.delete(peerId);
      await dealer.send(["bye", ""]).catch((err) => {
        this.log.debug("Could not send bye", {
          peerId,
          error: toError(err).message,
        });
      });
      dealer.close();
    }

    const identity = this.inboundIdentities.get(peerId);
    if (identity) {
      this.forgetInbound(peerId, identity);
      await this.router?.send([identity, "bye", ""]).catch((err) => {
        this.log.debug("Could not send bye", {
          peerId,
          error: toError(err).message,
        });
      });
    }
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
    for (const pending of this.pendingHandshakes.values()) {
      clearTimeout(pending.timer);
      pending.reject(new TransportError("Transport disconnected"));
    }
    this.pendingHandshakes.clear();

    const peers = new Set([
      ...this.dealers.keys(),
      ...this.inboundIdentities.keys(),
    ]);
    for (const peerId of peers) {
      await this.close(peerId);
    }

    this.router?.close();
    this.router = undefined;
  }

  private async runRouterLoop(router: zmq.Router): Promise<void> {
    for await (const [identity, kindFrame, body] of router) {
      if (!identity || !kindFrame) continue;
      const kind = kindFrame.toString();
      try {
        await this.handleRouterFrame(router, identity, kind, body);
      } catch (err) {
        this.log.error("Error handling inbound frame", toError(err), {
          kind,
          peerId: this.peersByIdentity.get(identity.toString("hex")),
        });
      }
    }
  }

  private async handleRouterFrame(
    router: zmq.Router,
    identity: Buffer,
    kind: string,
    body: Buffer | undefined,
  ): Promise<void> {
    const key = identity.toString("hex");

    switch (kind) {
      case "hello": {
        const hello = parseHello(body);
        if (!hello) {
          this.log.warn("Dropping malformed handshake");
          return;
        }
        const accepted = this.connectionHandler
          ? this.connectionHandler(hello.nodeId, hello.address)
          : true;
        const reply: HandshakeReply = {
          nodeId: this.nodeId,
          correlationId: hello.correlationId,
        };
        if (!accepted) {
          reply.reason = "refused";
          await router.send([identity, "refused", JSON.stringify(reply)]);
          return;
        }
        this.peersByIdentity.set(key, hello.nodeId);
        this.inboundIdentities.set(hello.nodeId, identity);
        try {
          await router.send([identity, "welcome", JSON.stringify(reply)]);
        } catch (err) {
          // The dialer left before the welcome reached it
          this.forgetInbound(hello.nodeId, identity);
          this.disconnectHandler?.(hello.nodeId);
          throw err;
        }
        return;
      }
      case "data": {
        const peerId = this.peersByIdentity.get(key);
        if (peerId && body) {
          this.messageHandler?.(peerId, body);
        }
        return;
      }
      case "bye": {
        const peerId = this.peersByIdentity.get(key);
        if (peerId) {
          this.forgetInbound(peerId, identity);
          this.disconnectHandler?.(peerId);
        }
        return;
      }
      default:
        this.log.debug("Ignoring unknown frame kind", { kind });
    }
  }

  private async runDealerLoop(dealer: zmq.Dealer): Promise<void> {
    let peerId: PeerId | undefined;

    for await (const [kindFrame, body] of dealer) {
      if (!kindFrame) continue;
      const kind = kindFrame.toString();

      try {
        if (kind === "welcome" || kind === "refused") {
          const reply = parseReply(body);
          const pending =
            reply && this.pendingHandshakes.get(reply.correlationId);
          if (!reply || !pending) continue;
          clearTimeout(pending.timer);
          this.pendingHandshakes.delete(reply.correlationId);
          if (kind === "welcome") {
            peerId = reply.nodeId;
            pending.resolve(reply.nodeId);
          } else {
            pending.reject(
              new TransportError(
                `Connection refused: ${reply.reason ?? "unknown"}`,
                reply.nodeId,
              ),
            );
          }
        } else if (kind === "data" && peerId && body) {
          this.messageHandler?.(peerId, body);
        } else if (kind === "bye" && peerId) {
          if (this.dealers.get(peerId) === dealer) {
            this.dealers.delete(peerId);
            dealer.close();
            this.disconnectHandler?.(peerId);
          }
          return;
        }
      } catch (err) {
        this.log.error("Error handling dealer frame", toError(err), {
          kind,
          peerId,
        });
      }
    }
  }

  private forgetInbound(peerId: PeerId, identity: Buffer): void {
    this.inboundIdentities.delete(peerId);
    this.peersByIdentity.delete(identity.toString("hex"));
  }
}
