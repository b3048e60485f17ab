// src/validator.ts

import type { Digest } from "./crypto";
import type { LocalStateView } from "./ledger";
import type { SharedObject } from "./shared_object";

/**
 * Outcome a validator reports for one candidate. The consensus engine turns
 * an `accept` into an `accepted` decision with an order index.
 */
export type ValidationVerdict =
  | {
      status: "accept";
      /**
       * Objects sharing a conflict key are mutually exclusive: only the first
       * committed one is accepted.
       */
      conflictKey?: string;
    }
  | { status: "reject"; reason: string }
  | { status: "defer"; missingDependency: Digest };

/**
 * Final decision for a candidate object.
 */
export type ConsensusDecision =
  | { status: "accepted"; orderIndex: number }
  | { status: "rejected"; reason: string }
  | { status: "deferred"; missingDependency: Digest };

/**
 * Pluggable consensus strategy. Implementations decide from the object and
 * the committed view alone, and must not block on I/O: a strategy needing
 * storage lookups returns a promise.
 */
export interface Validator {
  readonly name: string;
  validate(
    object: SharedObject,
    view: LocalStateView,
  ): ValidationVerdict | Promise<ValidationVerdict>;
}

export const accept = (conflictKey?: string): ValidationVerdict => ({
  status: "accept",
  conflictKey,
});

export const reject = (reason: string): ValidationVerdict => ({
  status: "reject",
  reason,
});

export const defer = (missingDependency: Digest): ValidationVerdict => ({
  status: "defer",
  missingDependency,
});
