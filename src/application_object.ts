// src/application_object.ts

import { v4 as uuidv4 } from "uuid";
import type { Digest } from "./crypto";
import {
  ApplicationObjectError,
  DuplicateApplicationObjectError,
} from "./errors";
import { Logger, createLogger, toError } from "./logger";
import type { SharedObject } from "./shared_object";
import { JsonObject, parseJsonPayload } from "./validators/payload";

/** An accepted object as applied to an application object. */
export interface AppliedMessage {
  digest: Digest;
  orderIndex: number;
}

/**
 * Stateful view built from accepted objects, such as a balance table or a
 * chat room. The node offers it every accepted object in acceptance order.
 */
export interface ApplicationObject {
  readonly id: string;
  readonly typeName: string;
  /** Whether this object wants `object` applied. */
  isValid(object: SharedObject): boolean | Promise<boolean>;
  /**
   * Applies an accepted object.
   * @returns false when the digest was applied before
   */
  addMessage(
    object: SharedObject,
    orderIndex: number,
  ): boolean | Promise<boolean>;
  getState(): JsonObject;
  /** Digest of the last applied object. */
  getLatestDigest(): Digest | undefined;
  hasDigest(digest: Digest): boolean;
  /**
   * Objects applied after `digest`, for a peer catching up from it.
   * Undefined when `digest` was never applied here.
   */
  getMessagesSince(digest: Digest): AppliedMessage[] | undefined;
  reset(): void;
}

/**
 * Base for application objects that keep the list of digests they applied.
 * Subclasses implement the state transition.
 */
export abstract class LoggedApplicationObject implements ApplicationObject {
  abstract readonly typeName: string;
  private readonly applied: AppliedMessage[] = [];
  private readonly positions = new Map<Digest, number>();

  constructor(readonly id: string = uuidv4()) {}

  abstract isValid(object: SharedObject): boolean | Promise<boolean>;

  abstract getState(): JsonObject;

  /** Folds one accepted object into the state. */
  protected abstract apply(object: SharedObject): void;

  /** Returns the state to its initial value. */
  protected abstract clearState(): void;

  get messageCount(): number {
    return this.applied.length;
  }

  addMessage(object: SharedObject, orderIndex: number): boolean {
    if (this.positions.has(object.digest)) {
      return false;
    }
    this.apply(object);
    this.positions.set(object.digest, this.applied.length);
    this.applied.push({ digest: object.digest, orderIndex });
    return true;
  }

  getLatestDigest(): Digest | undefined {
    return this.applied[this.applied.length - 1]?.digest;
  }

  hasDigest(digest: Digest): boolean {
    return this.positions.has(digest);
  }

  getMessagesSince(digest: Digest): AppliedMessage[] | undefined {
    const position = this.positions.get(digest);
    return position === undefined
      ? undefined
      : this.applied.slice(position + 1);
  }

  reset(): void {
    this.applied.length = 0;
    this.positions.clear();
    this.clearState();
  }
}

/**
 * Sums the `add` field of JSON payloads such as `{"add": 5}`. Payloads
 * without a safe integer `add` are not for it.
 */
export class SharedCounter extends LoggedApplicationObject {
  readonly typeName = "SharedCounter";
  private total = 0;

  get value(): number {
    return this.total;
  }

  isValid(object: SharedObject): boolean {
    return readIncrement(object.payload) !== undefined;
  }

  getState(): JsonObject {
    return { value: this.total, messages: this.messageCount };
  }

  protected apply(object: SharedObject): void {
    this.total += readIncrement(object.payload) ?? 0;
  }

  protected clearState(): void {
    this.total = 0;
  }
}

function readIncrement(payload: Buffer): number | undefined {
  const add = parseJsonPayload(payload)?.add;
  return typeof add === "number" && Number.isSafeInteger(add) ? add : undefined;
}

/**
 * Application objects of one node, fed with every accepted object.
 */
export class ApplicationObjectRegistry {
  private readonly objects = new Map<string, ApplicationObject>();
  private readonly log: Logger;

  constructor(nodeId?: string) {
    this.log = createLogger("ApplicationObjectRegistry", nodeId);
  }

  /**
   * @returns The object's id
   * @throws DuplicateApplicationObjectError when the id is taken
   */
  register(object: ApplicationObject): string {
    if (this.objects.has(object.id)) {
      throw new DuplicateApplicationObjectError(object.id);
    }
    this.objects.set(object.id, object);
    this.log.debug("Registered application object", {
      objectId: object.id,
      typeName: object.typeName,
    });
    return object.id;
  }

  get(id: string): ApplicationObject | undefined {
    return this.objects.get(id);
  }

  getByType(typeName: string): ApplicationObject[] {
    return Array.from(this.objects.values()).filter(
      (object) => object.typeName === typeName,
    );
  }

  remove(id: string): ApplicationObject | undefined {
    const object = this.objects.get(id);
    this.objects.delete(id);
    return object;
  }

  ids(): string[] {
    return Array.from(this.objects.keys());
  }

  get size(): number {
    return this.objects.size;
  }

  clear(): void {
    this.objects.clear();
  }

  getState(id: string): JsonObject | undefined {
    return this.objects.get(id)?.getState();
  }

  /**
   * Offers an accepted object to every registered object, in registration
   * order. An object that throws is logged and skipped.
   * @returns Ids of the objects that applied it
   */
  async process(object: SharedObject, orderIndex: number): Promise<string[]> {
    const applied: string[] = [];
    for (const target of Array.from(this.objects.values())) {
      try {
        if (!(await target.isValid(object))) continue;
        if (await target.addMessage(object, orderIndex)) {
          applied.push(target.id);
        }
      } catch (err) {
        const error = new ApplicationObjectError(
          target.id,
          object.digest,
          toError(err),
        );
        this.log.warn(error.message, { digest: object.digest }, error);
      }
    }
    return applied;
  }
}
