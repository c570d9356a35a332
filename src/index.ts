export * from "./contracts.js";
export * from "./errors.js";
export { loadMarketConfig, type MarketConfig } from "./config.js";
export { createLogger, resolveLogLevel, type Logger } from "./logger.js";
export * from "./registry/task-header-registry.js";
export * from "./registry/capability-filter.js";
export * from "./trust/trust-ledger.js";
export * from "./persistence.js";
export { RedisReputationStore } from "./persistence/redis-adapter.js";
export * from "./delivery/result-delivery-queue.js";
export * from "./control/retry-policy.js";
export { startSyncLoop, type Tickable } from "./control/sync-loop.js";
export * from "./session/types.js";
export * from "./session/coordinator.js";
export { SubtaskLifecycle, type SubtaskRecord } from "./session/subtask-lifecycle.js";
export { HttpSessionOpener, type FetchLike, type HttpSessionOptions } from "./session/http-session.js";
export * from "./plugins/types.js";
export * from "./plugins/telemetry-plugin.js";
export * from "./marketplace-node.js";
export { buildPeerApi, startPeerApi, type PeerApiOptions, type TaskOwnerHandler } from "./peer-api.js";
