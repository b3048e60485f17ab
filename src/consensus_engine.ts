// src/consensus_engine.ts

import { EventEmitter } from "events";
import type { Digest } from "./crypto";
import { NodeShuttingDownError } from "./errors";
import type { ComponentHealth, HealthCheckable } from "./health";
import { CommittedLedger, LedgerEntry, LocalStateView } from "./ledger";
import { Logger, createLogger, toError } from "./logger";
import type { SharedObject } from "./shared_object";
import type {
  ConsensusDecision,
  ValidationVerdict,
  Validator,
} from "./validator";

export type ObjectState = "pending" | "accepted";

export interface ConsensusStats {
  rounds: number;
  validated: number;
  accepted: number;
  rejected: number;
  deferred: number;
  conflicts: number;
}

const byDigest = (a: SharedObject, b: SharedObject): number =>
  a.digest < b.digest ? -1 : a.digest > b.digest ? 1 : 0;

/**
 * Runs candidates through the configured Validator and assigns accepted
 * objects their place in the local history.
 *
 * Candidates submitted while no round is running form the next round. A
 * round is validated one object at a time in ascending digest order, each
 * against the view as updated by the commits before it, so when two objects
 * of a round claim the same conflict key the lower digest wins.
 *
 * Events:
 * - 'decision' (object, decision): emitted once per validated candidate,
 *   in validation order.
 */
export class ConsensusEngine extends EventEmitter implements HealthCheckable {
  private readonly ledger = new CommittedLedger();
  private readonly log: Logger;
  private queue: SharedObject[] = [];
  private validating?: Digest;
  private running?: Promise<void>;
  private scheduled?: NodeJS.Immediate;
  private idleWaiters: Array<() => void> = [];
  private closed = false;
  private readonly stats: ConsensusStats = {
    rounds: 0,
    validated: 0,
    accepted: 0,
    rejected: 0,
    deferred: 0,
    conflicts: 0,
  };

  constructor(
    private readonly validator: Validator,
    nodeId?: string,
  ) {
    super();
    this.log = createLogger("ConsensusEngine", nodeId).child({
      strategy: validator.name,
    });
  }

  /** The committed history, read-only. */
  get view(): LocalStateView {
    return this.ledger;
  }

  get strategy(): string {
    return this.validator.name;
  }

  /** Queues a candidate for the next round. */
  submit(object: SharedObject): void {
    if (this.closed) {
      throw new NodeShuttingDownError("submit object for validation");
    }
    this.queue.push(object);
    this.schedule();
  }

  stateOf(digest: Digest): ObjectState | undefined {
    if (this.ledger.isCommitted(digest)) {
      return "accepted";
    }
    if (
      this.validating === digest ||
      this.queue.some((o) => o.digest === digest)
    ) {
      return "pending";
    }
    return undefined;
  }

  /** Committed entries from `fromIndex` onwards. */
  history(fromIndex = 0): LedgerEntry[] {
    return this.ledger.since(fromIndex);
  }

  isIdle(): boolean {
    return (
      this.queue.length === 0 &&
      this.running === undefined &&
      this.scheduled === undefined
    );
  }

  /** Resolves once every queued candidate has been decided. */
  async drain(): Promise<void> {
    while (!this.isIdle()) {
      await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
    }
  }

  /** Refuses further submissions. Call after draining. */
  close(): void {
    this.closed = true;
  }

  getStats(): ConsensusStats {
    return { ...this.stats };
  }

  getHealth(): ComponentHealth {
    return {
      name: "consensus",
      status: "healthy",
      details: {
        strategy: this.validator.name,
        committed: this.ledger.size,
        queued: this.queue.length,
        ...this.stats,
      },
    };
  }

  private schedule(): void {
    if (this.running || this.scheduled) {
      return;
    }
    this.scheduled = setImmediate(() => {
      this.scheduled = undefined;
      this.running = this.runRounds().finally(() => {
        this.running = undefined;
        if (this.queue.length > 0) {
          this.schedule();
        } else {
          this.notifyIdle();
        }
      });
    });
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private async runRounds(): Promise<void> {
    while (this.queue.length > 0) {
      const round = this.queue.splice(0).sort(byDigest);
      this.stats.rounds++;
      this.log.debug("Starting round", { size: round.length });

      for (const object of round) {
        this.validating = object.digest;
        const decision = await this.decide(object);
        this.validating = undefined;
        this.count(decision);
        try {
          this.emit("decision", object, decision);
        } catch (err) {
          this.log.error("Decision listener failed", toError(err), {
            digest: object.digest,
          });
        }
      }
    }
  }

  private async decide(object: SharedObject): Promise<ConsensusDecision> {
    let verdict: ValidationVerdict;
    try {
      verdict = await this.validator.validate(object, this.ledger);
    } catch (err) {
      const error = toError(err);
      this.log.warn(
        "Validator threw, rejecting object",
        { digest: object.digest },
        error,
      );
      return { status: "rejected", reason: `validator error: ${error.message}` };
    } finally {
      this.stats.validated++;
    }

    switch (verdict.status) {
      case "reject":
        return { status: "rejected", reason: verdict.reason };
      case "defer":
        return {
          status: "deferred",
          missingDependency: verdict.missingDependency,
        };
      case "accept": {
        const existing = this.ledger.get(object.digest);
        if (existing) {
          return { status: "accepted", orderIndex: existing.orderIndex };
        }
        if (verdict.conflictKey !== undefined) {
          const holder = this.ledger.conflictHolder(verdict.conflictKey);
          if (holder !== undefined) {
            this.stats.conflicts++;
            return {
              status: "rejected",
              reason: `conflicts with ${holder} on ${verdict.conflictKey}`,
            };
          }
        }
        const entry = this.ledger.commit(object, verdict.conflictKey);
        return { status: "accepted", orderIndex: entry.orderIndex };
      }
    }
  }

  private count(decision: ConsensusDecision): void {
    switch (decision.status) {
      case "accepted":
        this.stats.accepted++;
        break;
      case "rejected":
        this.stats.rejected++;
        break;
      case "deferred":
        this.stats.deferred++;
        break;
    }
  }
}
