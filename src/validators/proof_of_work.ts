// src/validators/proof_of_work.ts

import type { CryptoProvider, Digest } from "../crypto";
import type { LocalStateView } from "../ledger";
import { ObjectKind, SharedObject, objectDigest } from "../shared_object";
import {
  ValidationVerdict,
  Validator,
  accept,
  defer,
  reject,
} from "../validator";
import {
  JsonObject,
  encodeJsonPayload,
  firstMissingParent,
  parseJsonPayload,
  readParents,
} from "./payload";

export interface ProofOfWorkOptions {
  /** Number of leading zero hex digits required in the digest. */
  difficulty: number;
}

/**
 * Accepts objects whose digest starts with `difficulty` zero hex digits and
 * whose declared parents are committed.
 */
export class ProofOfWorkValidator implements Validator {
  readonly name = "proof-of-work";
  private readonly prefix: string;

  constructor(options: ProofOfWorkOptions) {
    if (!Number.isInteger(options.difficulty) || options.difficulty < 0) {
      throw new RangeError("difficulty must be a non-negative integer");
    }
    this.prefix = "0".repeat(options.difficulty);
  }

  validate(object: SharedObject, view: LocalStateView): ValidationVerdict {
    if (!object.digest.startsWith(this.prefix)) {
      return reject(
        `insufficient proof of work: need ${this.prefix.length} leading zeros`,
      );
    }
    const parents = readParents(parseJsonPayload(object.payload));
    if (!parents.ok) {
      return reject(parents.reason);
    }
    const missing = firstMissingParent(parents.parents, view);
    return missing === undefined ? accept() : defer(missing);
  }
}

export interface MinedPayload {
  payload: Buffer;
  digest: Digest;
  nonce: number;
}

export interface MineOptions {
  /** Kind the object will be submitted under. Default: "custom" */
  kind?: ObjectKind;
  maxNonce?: number;
}

/**
 * Searches for a `nonce` field that gives the JSON payload, submitted under
 * `kind`, a digest with the required number of leading zeros.
 */
export function mineProofOfWork(
  crypto: CryptoProvider,
  body: JsonObject,
  difficulty: number,
  options: MineOptions = {},
): MinedPayload {
  const kind = options.kind ?? "custom";
  const maxNonce = options.maxNonce ?? 0xffffffff;
  const prefix = "0".repeat(difficulty);
  for (let nonce = 0; nonce <= maxNonce; nonce++) {
    const payload = encodeJsonPayload({ ...body, nonce });
    const digest = objectDigest(crypto, kind, payload);
    if (digest.startsWith(prefix)) {
      return { payload, digest, nonce };
    }
  }
  throw new Error(`No proof of work found below nonce ${maxNonce}`);
}
