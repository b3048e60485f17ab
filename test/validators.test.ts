// test/validators.test.ts

import { describe, it, expect } from "vitest";
import { NodeCryptoProvider, generateKeyPair } from "../src/crypto";
import { CommittedLedger } from "../src/ledger";
import { ObjectKind, createSharedObject } from "../src/shared_object";
import { AppendOnlyValidator } from "../src/validators/append_only";
import { encodeJsonPayload, parseJsonPayload } from "../src/validators/payload";
import {
  ProofOfWorkValidator,
  mineProofOfWork,
} from "../src/validators/proof_of_work";
import {
  StakeWeightedValidator,
  createSignedPayload,
} from "../src/validators/stake_weighted";

const crypto = new NodeCryptoProvider();

function object(payload: Buffer | string, kind: ObjectKind = "custom") {
  return createSharedObject(
    crypto,
    typeof payload === "string" ? Buffer.from(payload) : payload,
    kind,
  );
}

describe("AppendOnlyValidator", () => {
  it("should accept an opaque payload", () => {
    const validator = new AppendOnlyValidator();
    expect(validator.validate(object("hello"), new CommittedLedger())).toEqual({
      status: "accept",
      conflictKey: undefined,
    });
  });

  it("should reject empty and oversized payloads", () => {
    const validator = new AppendOnlyValidator({ maxPayloadBytes: 4 });
    const ledger = new CommittedLedger();

    expect(validator.validate(object(""), ledger)).toEqual({
      status: "reject",
      reason: "empty payload",
    });
    expect(validator.validate(object("12345"), ledger)).toEqual({
      status: "reject",
      reason: "payload of 5 bytes exceeds 4",
    });
  });

  it("should reject kinds outside the allowed set", () => {
    const validator = new AppendOnlyValidator({ allowedKinds: ["transaction"] });
    expect(
      validator.validate(object("x", "vote"), new CommittedLedger()),
    ).toEqual({ status: "reject", reason: "kind vote not accepted" });
  });

  it("should defer until every parent is committed", () => {
    const validator = new AppendOnlyValidator();
    const ledger = new CommittedLedger();
    const first = object("first");
    const second = object("second");
    const child = object(
      encodeJsonPayload({ parents: [first.digest, second.digest] }),
    );

    expect(validator.validate(child, ledger)).toEqual({
      status: "defer",
      missingDependency: first.digest,
    });
    ledger.commit(first);
    expect(validator.validate(child, ledger)).toEqual({
      status: "defer",
      missingDependency: second.digest,
    });
    ledger.commit(second);
    expect(validator.validate(child, ledger).status).toBe("accept");
  });

  it("should reject malformed parents", () => {
    const validator = new AppendOnlyValidator();
    const child = object(encodeJsonPayload({ parents: ["not-a-digest"] }));

    expect(validator.validate(child, new CommittedLedger())).toEqual({
      status: "reject",
      reason: "parents must be an array of hex digests",
    });
  });
});

describe("ProofOfWorkValidator", () => {
  it("should accept a mined payload", () => {
    const mined = mineProofOfWork(crypto, { body: "work" }, 2);
    const candidate = object(mined.payload);

    expect(candidate.digest).toBe(mined.digest);
    expect(mined.digest.startsWith("00")).toBe(true);
    expect(parseJsonPayload(mined.payload)).toEqual({
      body: "work",
      nonce: mined.nonce,
    });
    expect(
      new ProofOfWorkValidator({ difficulty: 2 }).validate(
        candidate,
        new CommittedLedger(),
      ).status,
    ).toBe("accept");
  });

  it("should reject a digest without enough leading zeros", () => {
    const candidate = object("x".repeat(8));
    const difficulty = candidate.digest.startsWith("0") ? 64 : 1;

    expect(
      new ProofOfWorkValidator({ difficulty }).validate(
        candidate,
        new CommittedLedger(),
      ),
    ).toEqual({
      status: "reject",
      reason: `insufficient proof of work: need ${difficulty} leading zeros`,
    });
  });

  it("should defer on a missing parent", () => {
    const parent = object("parent");
    const mined = mineProofOfWork(crypto, { parents: [parent.digest] }, 1);

    expect(
      new ProofOfWorkValidator({ difficulty: 1 }).validate(
        object(mined.payload),
        new CommittedLedger(),
      ),
    ).toEqual({ status: "defer", missingDependency: parent.digest });
  });

  it("should refuse a negative difficulty", () => {
    expect(() => new ProofOfWorkValidator({ difficulty: -1 })).toThrow(
      RangeError,
    );
  });

  it("should mine against the kind the object is submitted under", () => {
    const mined = mineProofOfWork(crypto, { body: "block work" }, 2, {
      kind: "block",
    });

    expect(object(mined.payload, "block").digest).toBe(mined.digest);
    expect(object(mined.payload, "custom").digest).not.toBe(mined.digest);
  });

  it("should give up after maxNonce attempts", () => {
    expect(() => mineProofOfWork(crypto, { body: "hard" }, 64, { maxNonce: 3 })).toThrow(
      "No proof of work found below nonce 3",
    );
  });
});

describe("StakeWeightedValidator", () => {
  const staked = generateKeyPair();
  const unstaked = generateKeyPair();
  const stakes = new Map([[staked.publicKey, 10]]);

  function validator(minStake?: number) {
    return new StakeWeightedValidator({ crypto, stakes, minStake });
  }

  it("should accept a signed block with its slot as conflict key", () => {
    const payload = createSignedPayload(crypto, staked, {
      kind: "block",
      body: "b",
      slot: 3,
    });

    expect(
      validator().validate(object(payload, "block"), new CommittedLedger()),
    ).toEqual({ status: "accept", conflictKey: "block:3" });
  });

  it("should key votes by signer and slot", () => {
    const payload = createSignedPayload(crypto, staked, {
      kind: "vote",
      body: "v",
      slot: 4,
    });

    expect(
      validator().validate(object(payload, "vote"), new CommittedLedger()),
    ).toEqual({
      status: "accept",
      conflictKey: `vote:${staked.publicKey}:4`,
    });
  });

  it("should leave transactions without a conflict key", () => {
    const payload = createSignedPayload(crypto, staked, {
      kind: "transaction",
      body: "t",
      slot: 4,
    });

    expect(
      validator().validate(object(payload, "transaction"), new CommittedLedger()),
    ).toEqual({ status: "accept", conflictKey: undefined });
  });

  it("should reject a signer below the minimum stake", () => {
    const payload = createSignedPayload(crypto, unstaked, { kind: "custom", body: "b" });

    expect(
      validator().validate(object(payload), new CommittedLedger()),
    ).toEqual({ status: "reject", reason: "signer stake 0 below minimum 1" });
    expect(
      validator(20).validate(
        object(
          createSignedPayload(crypto, staked, { kind: "custom", body: "b" }),
        ),
        new CommittedLedger(),
      ),
    ).toEqual({ status: "reject", reason: "signer stake 10 below minimum 20" });
  });

  it("should reject a copy received under another kind than it was signed as", () => {
    const payload = createSignedPayload(crypto, staked, {
      kind: "block",
      body: "b",
      slot: 3,
    });

    expect(
      validator().validate(object(payload, "transaction"), new CommittedLedger()),
    ).toEqual({
      status: "reject",
      reason: "signed as block, received as transaction",
    });
  });

  it("should reject a tampered body", () => {
    const signed = parseJsonPayload(
      createSignedPayload(crypto, staked, {
        kind: "block",
        body: "original",
        slot: 1,
      }),
    );
    const tampered = encodeJsonPayload({ ...signed, body: "forged" });

    expect(
      validator().validate(object(tampered, "block"), new CommittedLedger()),
    ).toEqual({ status: "reject", reason: "invalid signature" });
  });

  it("should reject payloads that are not signed envelopes", () => {
    expect(
      validator().validate(object("plain text"), new CommittedLedger()),
    ).toEqual({ status: "reject", reason: "malformed signed envelope" });
  });

  it("should reject a negative slot", () => {
    const payload = createSignedPayload(crypto, staked, {
      kind: "block",
      body: "b",
      slot: -1,
    });

    expect(
      validator().validate(object(payload, "block"), new CommittedLedger()),
    ).toEqual({
      status: "reject",
      reason: "slot must be a non-negative integer",
    });
  });

  it("should defer a signed object whose parent is missing", () => {
    const parent = object("parent");
    const payload = createSignedPayload(crypto, staked, {
      kind: "custom",
      body: "child",
      parents: [parent.digest],
    });
    const ledger = new CommittedLedger();

    expect(validator().validate(object(payload), ledger)).toEqual({
      status: "defer",
      missingDependency: parent.digest,
    });
    ledger.commit(parent);
    expect(validator().validate(object(payload), ledger).status).toBe("accept");
  });
});
