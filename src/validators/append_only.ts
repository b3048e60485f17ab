// src/validators/append_only.ts

import type { LocalStateView } from "../ledger";
import type { ObjectKind, SharedObject } from "../shared_object";
import {
  ValidationVerdict,
  Validator,
  accept,
  defer,
  reject,
} from "../validator";
import { firstMissingParent, parseJsonPayload, readParents } from "./payload";

export interface AppendOnlyOptions {
  /** Largest payload accepted, in bytes. Default: 1 MiB */
  maxPayloadBytes?: number;
  /** Kinds accepted. Default: all */
  allowedKinds?: readonly ObjectKind[];
}

export const DEFAULT_MAX_PAYLOAD_BYTES = 1024 * 1024;

/**
 * Accepts every well-formed object once its declared parents are committed.
 * Offers no agreement beyond that: two nodes receiving independent objects
 * in different orders commit them in different orders.
 */
export class AppendOnlyValidator implements Validator {
  readonly name = "append-only";
  private readonly maxPayloadBytes: number;
  private readonly allowedKinds?: ReadonlySet<ObjectKind>;

  constructor(options: AppendOnlyOptions = {}) {
    this.maxPayloadBytes = options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;
    if (options.allowedKinds) {
      this.allowedKinds = new Set(options.allowedKinds);
    }
  }

  validate(object: SharedObject, view: LocalStateView): ValidationVerdict {
    if (object.payload.length === 0) {
      return reject("empty payload");
    }
    if (object.payload.length > this.maxPayloadBytes) {
      return reject(
        `payload of ${object.payload.length} bytes exceeds ${this.maxPayloadBytes}`,
      );
    }
    if (this.allowedKinds && !this.allowedKinds.has(object.kind)) {
      return reject(`kind ${object.kind} not accepted`);
    }

    const parents = readParents(parseJsonPayload(object.payload));
    if (!parents.ok) {
      return reject(parents.reason);
    }
    const missing = firstMissingParent(parents.parents, view);
    return missing === undefined ? accept() : defer(missing);
  }
}
