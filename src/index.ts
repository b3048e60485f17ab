export * from "./logger";
export * from "./errors";
export * from "./health";
export * from "./crypto";
export * from "./shared_object";
export * from "./object_store";
export * from "./dedup_cache";
export * from "./ledger";
export * from "./validator";
export * from "./application_object";
export * from "./consensus_engine";
export * from "./validators/append_only";
export * from "./validators/proof_of_work";
export * from "./validators/stake_weighted";
export type { JsonObject } from "./validators/payload";
export {
  isDigest,
  parseJsonPayload,
  encodeJsonPayload,
} from "./validators/payload";
export * from "./transport";
export * from "./in_memory_transport";
export * from "./zeromq_transport";
export * from "./wire_codec";
export * from "./outbound_queue";
export * from "./peer_session";
export * from "./deferred_set";
export * from "./gossip_engine";
export * from "./discovery";
export * from "./peer_manager";
export * from "./heartbeat";
export * from "./config";
export * from "./node";
export * from "./create_node";
