// src/validators/payload.ts
//
// Payload conventions shared by the reference validators. Payloads are
// opaque bytes to the node; these strategies read them as UTF-8 JSON objects
// and treat a top-level `parents` array of digests as dependencies.

import type { Digest } from "../crypto";
import type { LocalStateView } from "../ledger";

export type JsonObject = { [key: string]: unknown };

const DIGEST_PATTERN = /^[0-9a-f]{64}$/;

export function isDigest(value: unknown): value is Digest {
  return typeof value === "string" && DIGEST_PATTERN.test(value);
}

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Parses a payload as a JSON object; undefined for anything else. */
export function parseJsonPayload(payload: Buffer): JsonObject | undefined {
  try {
    const parsed: unknown = JSON.parse(payload.toString("utf8"));
    return isJsonObject(parsed) ? parsed : undefined;
  } catch {
    // Not JSON: an opaque payload without declared dependencies
    return undefined;
  }
}

export type ParentsResult =
  | { ok: true; parents: Digest[] }
  | { ok: false; reason: string };

/** Reads the `parents` field; absent means no dependencies. */
export function readParents(body: JsonObject | undefined): ParentsResult {
  const parents = body?.parents;
  if (parents === undefined) {
    return { ok: true, parents: [] };
  }
  if (!Array.isArray(parents) || !parents.every(isDigest)) {
    return { ok: false, reason: "parents must be an array of hex digests" };
  }
  return { ok: true, parents };
}

/** First parent not yet committed, in declaration order. */
export function firstMissingParent(
  parents: Digest[],
  view: LocalStateView,
): Digest | undefined {
  return parents.find((parent) => !view.isCommitted(parent));
}

/** Serializes a JSON payload the way the validators read it. */
export function encodeJsonPayload(body: JsonObject): Buffer {
  return Buffer.from(JSON.stringify(body), "utf8");
}
