// src/shared_object.ts

import type { CryptoProvider, Digest } from "./crypto";

/** Peer identifier assigned by the remote node (uuid v4 by default). */
export type PeerId = string;

/** Transport-level address of a node, e.g. `127.0.0.1:7400` or `mem://a`. */
export type NetworkAddress = string;

export const OBJECT_KINDS = ["transaction", "block", "vote", "custom"] as const;

export type ObjectKind = (typeof OBJECT_KINDS)[number];

export function isObjectKind(value: unknown): value is ObjectKind {
  return (
    typeof value === "string" &&
    (OBJECT_KINDS as readonly string[]).includes(value)
  );
}

/**
 * An immutable, content-addressed unit of gossiped data.
 *
 * The digest is the identity and covers the kind and the payload bytes: the
 * same bytes under two kinds are two objects. `originPeer` and `receivedAt`
 * are local annotations and are not covered by the digest.
 */
export interface SharedObject {
  readonly digest: Digest;
  readonly kind: ObjectKind;
  readonly payload: Buffer;
  /** Peer the object was received from; undefined for local submissions. */
  readonly originPeer?: PeerId;
  /** Local timestamp (ms) of first receipt or submission. */
  readonly receivedAt: number;
}

export function createSharedObject(
  crypto: CryptoProvider,
  payload: Uint8Array,
  kind: ObjectKind = "custom",
  originPeer?: PeerId,
): SharedObject {
  const bytes = Buffer.from(payload);
  return {
    digest: objectDigest(crypto, kind, bytes),
    kind,
    payload: bytes,
    originPeer,
    receivedAt: Date.now(),
  };
}

/** Digest of the kind tag byte followed by the payload. */
export function objectDigest(
  crypto: CryptoProvider,
  kind: ObjectKind,
  payload: Uint8Array,
): Digest {
  return crypto.hash(
    Buffer.concat([Buffer.from([OBJECT_KINDS.indexOf(kind)]), payload]),
  );
}

/** The kind under which `payload` hashes to `digest`, if any. */
export function kindForDigest(
  crypto: CryptoProvider,
  digest: Digest,
  payload: Uint8Array,
): ObjectKind | undefined {
  return OBJECT_KINDS.find(
    (kind) => objectDigest(crypto, kind, payload) === digest,
  );
}

/** True when the object's digest matches its kind and payload. */
export function verifySharedObject(
  crypto: CryptoProvider,
  object: Pick<SharedObject, "digest" | "kind" | "payload">,
): boolean {
  return objectDigest(crypto, object.kind, object.payload) === object.digest;
}
