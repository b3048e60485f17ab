// src/config.ts

import { ConfigError } from "./errors";
import type { NetworkAddress } from "./shared_object";
import type { Validator } from "./validator";
import { AppendOnlyValidator } from "./validators/append_only";

/**
 * Settings of one node. Durations are in milliseconds.
 */
export interface NodeConfig {
  /** Listen host for socket transports. Default: 127.0.0.1 */
  host: string;
  /** Listen port. Default: 7400 */
  port: number;
  /** Fan-out ceiling: connected peers above this are evicted. Default: 8 */
  maxPeers: number;
  /** Eviction never drops below this many peers. Default: 1 */
  minPeers: number;
  bootstrapAddresses: NetworkAddress[];
  dedupCapacity: number;
  dedupTtlMs: number;
  /** Silence after which a peer is disconnected. Default: 30000 */
  peerTimeoutMs: number;
  heartbeatIntervalMs: number;
  connectTimeoutMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** Consecutive dial failures before an address is banned. Default: 5 */
  banThreshold: number;
  banDurationMs: number;
  /** Accumulated penalty before a peer is banned. Default: 100 */
  misbehaviorThreshold: number;
  disconnectedRetentionMs: number;
  maintenanceIntervalMs: number;
  discoveryIntervalMs: number;
  /** Addresses sent per peer-exchange reply. Default: 16 */
  peerExchangeLimit: number;
  outboundQueueCapacity: number;
  inboundQueueCapacity: number;
  deferredMaxRetries: number;
  deferredTtlMs: number;
  deferredCapacity: number;
  /** Validation strategy. Default: a fresh AppendOnlyValidator. */
  consensusStrategy: Validator;
}

export const DEFAULT_NODE_CONFIG: Readonly<Omit<NodeConfig, "consensusStrategy">> = {
  host: "127.0.0.1",
  port: 7400,
  maxPeers: 8,
  minPeers: 1,
  bootstrapAddresses: [],
  dedupCapacity: 10000,
  dedupTtlMs: 600000,
  peerTimeoutMs: 30000,
  heartbeatIntervalMs: 5000,
  connectTimeoutMs: 5000,
  backoffBaseMs: 1000,
  backoffMaxMs: 60000,
  banThreshold: 5,
  banDurationMs: 600000,
  misbehaviorThreshold: 100,
  disconnectedRetentionMs: 300000,
  maintenanceIntervalMs: 1000,
  discoveryIntervalMs: 30000,
  peerExchangeLimit: 16,
  outboundQueueCapacity: 256,
  inboundQueueCapacity: 1024,
  deferredMaxRetries: 5,
  deferredTtlMs: 60000,
  deferredCapacity: 1000,
};

type NumericKey = {
  [K in keyof NodeConfig]: NodeConfig[K] extends number ? K : never;
}[keyof NodeConfig];

const POSITIVE_INTEGERS: NumericKey[] = [
  "maxPeers",
  "dedupCapacity",
  "banThreshold",
  "outboundQueueCapacity",
  "inboundQueueCapacity",
  "deferredCapacity",
];

const NON_NEGATIVE_INTEGERS: NumericKey[] = [
  "minPeers",
  "deferredMaxRetries",
  "peerExchangeLimit",
];

const POSITIVE_NUMBERS: NumericKey[] = [
  "dedupTtlMs",
  "peerTimeoutMs",
  "heartbeatIntervalMs",
  "connectTimeoutMs",
  "backoffBaseMs",
  "backoffMaxMs",
  "banDurationMs",
  "misbehaviorThreshold",
  "disconnectedRetentionMs",
  "maintenanceIntervalMs",
  "discoveryIntervalMs",
  "deferredTtlMs",
];

/**
 * Merges `overrides` over the defaults and validates the result.
 * @throws ConfigError naming the first invalid key
 */
export function resolveNodeConfig(overrides: Partial<NodeConfig> = {}): NodeConfig {
  const config: NodeConfig = {
    ...DEFAULT_NODE_CONFIG,
    consensusStrategy: new AppendOnlyValidator(),
    ...overrides,
    bootstrapAddresses: [
      ...(overrides.bootstrapAddresses ?? DEFAULT_NODE_CONFIG.bootstrapAddresses),
    ],
  };

  for (const key of POSITIVE_INTEGERS) {
    if (!Number.isInteger(config[key]) || config[key] < 1) {
      throw new ConfigError(key, "must be a positive integer");
    }
  }
  for (const key of NON_NEGATIVE_INTEGERS) {
    if (!Number.isInteger(config[key]) || config[key] < 0) {
      throw new ConfigError(key, "must be a non-negative integer");
    }
  }
  for (const key of POSITIVE_NUMBERS) {
    if (!Number.isFinite(config[key]) || config[key] <= 0) {
      throw new ConfigError(key, "must be a positive number");
    }
  }
  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    throw new ConfigError("port", "must be an integer between 0 and 65535");
  }
  if (config.minPeers > config.maxPeers) {
    throw new ConfigError("minPeers", "must not exceed maxPeers");
  }
  if (config.backoffBaseMs > config.backoffMaxMs) {
    throw new ConfigError("backoffBaseMs", "must not exceed backoffMaxMs");
  }
  if (config.host.length === 0) {
    throw new ConfigError("host", "must not be empty");
  }
  if (config.bootstrapAddresses.some((a) => typeof a !== "string" || a.length === 0)) {
    throw new ConfigError("bootstrapAddresses", "must be non-empty strings");
  }
  return config;
}
