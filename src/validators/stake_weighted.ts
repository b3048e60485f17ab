// src/validators/stake_weighted.ts

import type { CryptoProvider, Digest } from "../crypto";
import type { LocalStateView } from "../ledger";
import { ObjectKind, SharedObject, isObjectKind } from "../shared_object";
import {
  ValidationVerdict,
  Validator,
  accept,
  defer,
  reject,
} from "../validator";
import {
  encodeJsonPayload,
  firstMissingParent,
  parseJsonPayload,
  readParents,
} from "./payload";

/**
 * Signed payload envelope read by StakeWeightedValidator.
 */
export interface SignedEnvelope {
  /** Hex-encoded public key of the signer. */
  signer: string;
  /** Hex signature over `signingBytes` of the envelope. */
  signature: string;
  /** Kind the signer published the object as. */
  kind: ObjectKind;
  body: string;
  /** Round the object belongs to; blocks and votes conflict per slot. */
  slot?: number;
  parents?: Digest[];
}

export interface StakeWeightedOptions {
  crypto: CryptoProvider;
  /** Stake per signer public key. */
  stakes: ReadonlyMap<string, number>;
  /** Minimum stake a signer needs. Default: 1 */
  minStake?: number;
}

/** Bytes covered by the envelope signature. */
export function signingBytes(
  envelope: Omit<SignedEnvelope, "signature">,
): Buffer {
  return Buffer.from(
    JSON.stringify([
      envelope.signer,
      envelope.kind,
      envelope.body,
      envelope.slot ?? null,
      envelope.parents ?? [],
    ]),
    "utf8",
  );
}

export function createSignedPayload(
  crypto: CryptoProvider,
  keys: { publicKey: string; privateKey: string },
  content: {
    kind: ObjectKind;
    body: string;
    slot?: number;
    parents?: Digest[];
  },
): Buffer {
  const unsigned = { signer: keys.publicKey, ...content };
  const signature = crypto.sign(keys.privateKey, signingBytes(unsigned));
  return encodeJsonPayload({ ...unsigned, signature });
}

/**
 * Accepts objects signed by a staked key. The signature covers the kind, so
 * a copy relabelled by a relay is rejected. A block claims its slot and a
 * vote claims its signer's slot, so a second block for the same slot or a
 * second vote by the same signer in a slot is rejected.
 */
export class StakeWeightedValidator implements Validator {
  readonly name = "stake-weighted";
  private readonly crypto: CryptoProvider;
  private readonly stakes: ReadonlyMap<string, number>;
  private readonly minStake: number;

  constructor(options: StakeWeightedOptions) {
    this.crypto = options.crypto;
    this.stakes = options.stakes;
    this.minStake = options.minStake ?? 1;
  }

  validate(object: SharedObject, view: LocalStateView): ValidationVerdict {
    const body = parseJsonPayload(object.payload);
    if (
      !body ||
      typeof body.signer !== "string" ||
      typeof body.signature !== "string" ||
      typeof body.body !== "string" ||
      !isObjectKind(body.kind)
    ) {
      return reject("malformed signed envelope");
    }
    if (body.kind !== object.kind) {
      return reject(`signed as ${body.kind}, received as ${object.kind}`);
    }
    const slot = body.slot;
    if (slot !== undefined && !(Number.isInteger(slot) && Number(slot) >= 0)) {
      return reject("slot must be a non-negative integer");
    }
    const parents = readParents(body);
    if (!parents.ok) {
      return reject(parents.reason);
    }

    const envelope: SignedEnvelope = {
      signer: body.signer,
      signature: body.signature,
      kind: body.kind,
      body: body.body,
      slot: typeof slot === "number" ? slot : undefined,
      parents: body.parents === undefined ? undefined : parents.parents,
    };

    const stake = this.stakes.get(envelope.signer) ?? 0;
    if (stake < this.minStake) {
      return reject(`signer stake ${stake} below minimum ${this.minStake}`);
    }
    if (
      !this.crypto.verify(
        envelope.signer,
        envelope.signature,
        signingBytes(envelope),
      )
    ) {
      return reject("invalid signature");
    }

    const missing = firstMissingParent(parents.parents, view);
    if (missing !== undefined) {
      return defer(missing);
    }
    return accept(this.conflictKey(envelope));
  }

  private conflictKey(envelope: SignedEnvelope): string | undefined {
    if (envelope.slot === undefined) {
      return undefined;
    }
    switch (envelope.kind) {
      case "block":
        return `block:${envelope.slot}`;
      case "vote":
        return `vote:${envelope.signer}:${envelope.slot}`;
      default:
        return undefined;
    }
  }
}
