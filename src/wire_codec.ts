// src/wire_codec.ts

import type { Digest } from "./crypto";
import { MalformedMessageError } from "./errors";
import { NetworkAddress, ObjectKind, isObjectKind } from "./shared_object";

/** Announces that the sender holds an object. */
export interface AnnounceMessage {
  type: "announce";
  digest: Digest;
}

/** Asks the receiver for an object's payload. */
export interface RequestMessage {
  type: "request";
  digest: Digest;
}

/** Carries an object. `digest` is the sender's claim and must be checked. */
export interface ObjectMessage {
  type: "object";
  digest: Digest;
  kind: ObjectKind;
  payload: Buffer;
}

export interface PingMessage {
  type: "ping";
  timestamp: number;
}

export interface PongMessage {
  type: "pong";
  timestamp: number;
}

/** Asks a peer for addresses it knows. */
export interface PeerRequestMessage {
  type: "peer_request";
  limit: number;
}

export interface PeerResponseMessage {
  type: "peer_response";
  addresses: NetworkAddress[];
}

/** Messages handled by the gossip engine. */
export type GossipMessage = AnnounceMessage | RequestMessage | ObjectMessage;

/** Liveness and discovery messages handled by the node itself. */
export type ControlMessage =
  | PingMessage
  | PongMessage
  | PeerRequestMessage
  | PeerResponseMessage;

export type WireMessage = GossipMessage | ControlMessage;

const MAX_PEER_RESPONSE = 256;
const HEX = /^[0-9a-f]+$/;

export function isGossipMessage(message: WireMessage): message is GossipMessage {
  return (
    message.type === "announce" ||
    message.type === "request" ||
    message.type === "object"
  );
}

/**
 * Serializes a message to bytes. Payloads travel base64-encoded inside a
 * JSON envelope.
 */
export function encodeWireMessage(message: WireMessage): Buffer {
  if (message.type === "object") {
    return Buffer.from(
      JSON.stringify({
        type: message.type,
        digest: message.digest,
        kind: message.kind,
        payload: message.payload.toString("base64"),
      }),
    );
  }
  return Buffer.from(JSON.stringify(message));
}

/**
 * Parses bytes received from a peer.
 * @throws MalformedMessageError when the bytes are not a known message.
 */
export function decodeWireMessage(bytes: Buffer): WireMessage {
  let data: unknown;
  try {
    data = JSON.parse(bytes.toString("utf8"));
  } catch {
    throw new MalformedMessageError("not JSON");
  }
  if (data === null || typeof data !== "object" || Array.isArray(data)) {
    throw new MalformedMessageError("not an object");
  }
  const fields = new Map<string, unknown>(Object.entries(data));
  const type = fields.get("type");

  switch (type) {
    case "announce":
    case "request":
      return { type, digest: readDigest(fields) };
    case "object": {
      const kind = fields.get("kind");
      const payload = fields.get("payload");
      if (!isObjectKind(kind)) {
        throw new MalformedMessageError("unknown object kind");
      }
      if (typeof payload !== "string") {
        throw new MalformedMessageError("payload must be base64 text");
      }
      return {
        type,
        digest: readDigest(fields),
        kind,
        payload: Buffer.from(payload, "base64"),
      };
    }
    case "ping":
    case "pong":
      return { type, timestamp: readNumber(fields, "timestamp") };
    case "peer_request":
      return { type, limit: readNumber(fields, "limit") };
    case "peer_response": {
      const addresses = fields.get("addresses");
      if (
        !Array.isArray(addresses) ||
        addresses.length > MAX_PEER_RESPONSE ||
        !addresses.every((a): a is string => typeof a === "string")
      ) {
        throw new MalformedMessageError("addresses must be a list of strings");
      }
      return { type, addresses };
    }
    default:
      throw new MalformedMessageError(`unknown message type ${String(type)}`);
  }
}

function readDigest(fields: Map<string, unknown>): Digest {
  const digest = fields.get("digest");
  if (typeof digest !== "string" || !HEX.test(digest)) {
    throw new MalformedMessageError("digest must be lowercase hex");
  }
  return digest;
}

function readNumber(fields: Map<string, unknown>, key: string): number {
  const value = fields.get(key);
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new MalformedMessageError(`${key} must be a number`);
  }
  return value;
}
