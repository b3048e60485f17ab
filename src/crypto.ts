// src/crypto.ts

import crypto from "crypto";

/** Lowercase hex digest identifying a shared object. */
export type Digest = string;

/**
 * Hashing and signature capability used by the node. Keys and signatures
 * travel as hex strings so they can sit inside JSON payloads.
 */
export interface CryptoProvider {
  /** Digest of the given bytes. */
  hash(data: Uint8Array): Digest;

  /** Checks a hex signature over `data` made by the hex-encoded public key. */
  verify(publicKey: string, signature: string, data: Uint8Array): boolean;

  /** Signs `data` with the hex-encoded private key, returning a hex signature. */
  sign(privateKey: string, data: Uint8Array): string;
}

export type HashAlgorithm = "sha256" | "sha3-256";

export interface KeyPair {
  /** Hex-encoded DER (SPKI) Ed25519 public key. */
  publicKey: string;
  /** Hex-encoded DER (PKCS#8) Ed25519 private key. */
  privateKey: string;
}

/**
 * CryptoProvider backed by Node's crypto module: SHA-256 or SHA3-256
 * digests and Ed25519 signatures.
 */
export class NodeCryptoProvider implements CryptoProvider {
  constructor(private readonly algorithm: HashAlgorithm = "sha256") {}

  hash(data: Uint8Array): Digest {
    return crypto.createHash(this.algorithm).update(data).digest("hex");
  }

  verify(publicKey: string, signature: string, data: Uint8Array): boolean {
    try {
      const key = crypto.createPublicKey({
        key: Buffer.from(publicKey, "hex"),
        format: "der",
        type: "spki",
      });
      return crypto.verify(null, data, key, Buffer.from(signature, "hex"));
    } catch {
      // Undecodable keys or signatures are simply invalid
      return false;
    }
  }

  sign(privateKey: string, data: Uint8Array): string {
    const key = crypto.createPrivateKey({
      key: Buffer.from(privateKey, "hex"),
      format: "der",
      type: "pkcs8",
    });
    return crypto.sign(null, data, key).toString("hex");
  }
}

export function generateKeyPair(): KeyPair {
  const { publicKey, privateKey } = crypto.generateKeyPairSync("ed25519");
  return {
    publicKey: publicKey.export({ format: "der", type: "spki" }).toString("hex"),
    privateKey: privateKey
      .export({ format: "der", type: "pkcs8" })
      .toString("hex"),
  };
}
