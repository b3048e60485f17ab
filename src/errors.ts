// src/errors.ts

/**
 * Base error class for all chainweave errors.
 */
export class ChainweaveError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ChainweaveError";
  }
}

/**
 * A received object whose payload does not hash to its announced digest.
 */
export class WireIntegrityError extends ChainweaveError {
  constructor(
    readonly claimedDigest: string,
    readonly actualDigest: string,
    readonly peerId?: string,
  ) {
    super(
      `Digest mismatch from ${peerId ?? "unknown peer"}: claimed ${claimedDigest}, payload hashes to ${actualDigest}`,
      "WIRE_INTEGRITY",
      { claimedDigest, actualDigest, peerId },
    );
    this.name = "WireIntegrityError";
  }
}

/**
 * Bytes from a peer that do not decode to a known wire message.
 */
export class MalformedMessageError extends ChainweaveError {
  constructor(reason: string, readonly peerId?: string) {
    super(`Malformed wire message: ${reason}`, "MALFORMED_MESSAGE", {
      reason,
      peerId,
    });
    this.name = "MalformedMessageError";
  }
}

/**
 * A dial or handshake that did not produce a connection.
 */
export class ConnectionError extends ChainweaveError {
  readonly originalCause?: Error;

  constructor(
    readonly address: string,
    reason: string,
    cause?: Error,
  ) {
    super(`Failed to connect to ${address}: ${reason}`, "CONNECTION_FAILED", {
      address,
      reason,
      cause: cause?.message,
    });
    this.name = "ConnectionError";
    this.originalCause = cause;
  }
}

/**
 * Thrown when dialing an address that is currently banned.
 */
export class PeerBannedError extends ChainweaveError {
  constructor(
    readonly address: string,
    readonly bannedUntil: number,
  ) {
    super(
      `Peer ${address} is banned until ${new Date(bannedUntil).toISOString()}`,
      "PEER_BANNED",
      { address, bannedUntil },
    );
    this.name = "PeerBannedError";
  }
}

/**
 * An object the consensus strategy rejected. Never retried.
 */
export class ValidationRejectedError extends ChainweaveError {
  constructor(
    readonly digest: string,
    readonly reason: string,
  ) {
    super(`Object ${digest} rejected: ${reason}`, "VALIDATION_REJECTED", {
      digest,
      reason,
    });
    this.name = "ValidationRejectedError";
  }
}

/**
 * A deferred object dropped before its dependency arrived.
 */
export class DependencyMissingError extends ChainweaveError {
  constructor(
    readonly digest: string,
    readonly missingDependency: string,
    cause: "retries_exhausted" | "expired" | "capacity",
  ) {
    super(
      `Object ${digest} dropped waiting for ${missingDependency} (${cause})`,
      "DEPENDENCY_MISSING",
      { digest, missingDependency, cause },
    );
    this.name = "DependencyMissingError";
  }
}

/**
 * A bounded queue or set refused an entry.
 */
export class CapacityExceededError extends ChainweaveError {
  constructor(
    readonly resource: string,
    readonly limit: number,
    peerId?: string,
  ) {
    super(
      `Capacity exceeded for ${resource} (limit ${limit})${peerId ? ` for peer ${peerId}` : ""}`,
      "CAPACITY_EXCEEDED",
      { resource, limit, peerId },
    );
    this.name = "CapacityExceededError";
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends ChainweaveError {
  constructor(operation: string, timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`, "TIMEOUT", {
      operation,
      timeoutMs,
    });
    this.name = "TimeoutError";
  }
}

/**
 * Error thrown when a transport operation fails.
 */
export class TransportError extends ChainweaveError {
  readonly originalCause?: Error;

  constructor(message: string, peerId?: string, cause?: Error) {
    super(message, "TRANSPORT_ERROR", { peerId, cause: cause?.message });
    this.name = "TransportError";
    this.originalCause = cause;
  }
}

/**
 * Error thrown when sending to a peer the transport has no link to.
 */
export class PeerNotFoundError extends ChainweaveError {
  constructor(peerId: string) {
    super(`No connection to peer ${peerId}`, "PEER_NOT_FOUND", { peerId });
    this.name = "PeerNotFoundError";
  }
}

/**
 * The object store failed. The node cannot make progress and must be
 * restarted by whoever embeds it.
 */
export class StoreUnavailableError extends ChainweaveError {
  readonly originalCause?: Error;

  constructor(operation: string, cause?: Error) {
    super(
      `Object store unavailable during ${operation}${cause ? `: ${cause.message}` : ""}`,
      "STORE_UNAVAILABLE",
      { operation, cause: cause?.message },
    );
    this.name = "StoreUnavailableError";
    this.originalCause = cause;
  }
}

/**
 * Error thrown when the node is stopping or stopped.
 */
export class NodeShuttingDownError extends ChainweaveError {
  constructor(operation: string) {
    super(`Cannot ${operation}: node is shutting down`, "NODE_SHUTTING_DOWN", {
      operation,
    });
    this.name = "NodeShuttingDownError";
  }
}

/**
 * Error thrown for an invalid configuration value.
 */
export class ConfigError extends ChainweaveError {
  constructor(key: string, reason: string) {
    super(`Invalid configuration for ${key}: ${reason}`, "INVALID_CONFIG", {
      key,
      reason,
    });
    this.name = "ConfigError";
  }
}

/**
 * Error thrown when a node operation needs components that `start()`
 * creates.
 */
export class NodeNotStartedError extends ChainweaveError {
  constructor(operation: string) {
    super(`Cannot ${operation}: node has not been started`, "NODE_NOT_STARTED", {
      operation,
    });
    this.name = "NodeNotStartedError";
  }
}

/**
 * Registering an application object under an id that is already taken.
 */
export class DuplicateApplicationObjectError extends ChainweaveError {
  constructor(readonly objectId: string) {
    super(
      `Application object ${objectId} is already registered`,
      "DUPLICATE_APPLICATION_OBJECT",
      { objectId },
    );
    this.name = "DuplicateApplicationObjectError";
  }
}

/**
 * An application object threw while checking or applying an accepted object.
 * The other application objects still see it.
 */
export class ApplicationObjectError extends ChainweaveError {
  readonly originalCause?: Error;

  constructor(readonly objectId: string, digest: string, cause?: Error) {
    super(
      `Application object ${objectId} failed on ${digest}${cause ? `: ${cause.message}` : ""}`,
      "APPLICATION_OBJECT_FAILED",
      { objectId, digest, cause: cause?.message },
    );
    this.name = "ApplicationObjectError";
    this.originalCause = cause;
  }
}
