import type { ComputeCapabilities } from "./contracts.js";
import { ValidationError } from "./errors.js";
import { resolveLogLevel } from "./logger.js";

export interface MarketConfig {
  nodeId: string;
  host: string;
  port: number;
  /** Address peers use to reach this node; differs from host behind NAT or in containers. */
  publicAddress: string;
  logLevel: string;
  nodeVersion: string;
  environments: string[];
  capabilities: ComputeCapabilities;
  syncIntervalMs: number;
  removedTaskCooldownMs: number;
  /** How long accepted and rejected subtasks are remembered before the tick forgets them. */
  resolvedSubtaskRetentionMs: number;
  maxResultResendDelayMs: number;
  requestConnectAttempts: number;
  requestRetryBaseDelayMs: number;
  minTrust: number;
  maxTrust: number;
  reputationStore: "memory" | "redis";
  redisUrl: string;
}

function numberFromEnv(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${key} must be a number, got "${raw}"`, key);
  }
  return value;
}

function listFromEnv(env: NodeJS.ProcessEnv, key: string, fallback: string[]): string[] {
  const raw = env[key];
  if (!raw) return fallback;
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function loadMarketConfig(env: NodeJS.ProcessEnv = process.env): MarketConfig {
  const host = env.TASKMESH_HOST ?? "0.0.0.0";
  const minTrust = numberFromEnv(env, "TASKMESH_MIN_TRUST", 0);
  const maxTrust = numberFromEnv(env, "TASKMESH_MAX_TRUST", 1);
  if (minTrust > maxTrust) {
    throw new ValidationError(
      `TASKMESH_MIN_TRUST (${minTrust}) exceeds TASKMESH_MAX_TRUST (${maxTrust})`,
      "TASKMESH_MIN_TRUST"
    );
  }

  const store = env.TASKMESH_REPUTATION_STORE ?? "memory";
  if (store !== "memory" && store !== "redis") {
    throw new ValidationError(
      `TASKMESH_REPUTATION_STORE must be "memory" or "redis", got "${store}"`,
      "TASKMESH_REPUTATION_STORE"
    );
  }

  return {
    nodeId: env.TASKMESH_NODE_ID ?? `node-${Math.random().toString(36).slice(2, 8)}`,
    host,
    port: numberFromEnv(env, "TASKMESH_PORT", 40103),
    publicAddress: env.TASKMESH_PUBLIC_ADDRESS ?? (host === "0.0.0.0" ? "127.0.0.1" : host),
    logLevel: resolveLogLevel(env.TASKMESH_LOG_LEVEL),
    nodeVersion: env.TASKMESH_NODE_VERSION ?? "1.0.0",
    environments: listFromEnv(env, "TASKMESH_ENVIRONMENTS", ["default"]),
    capabilities: {
      estimatedPerformance: numberFromEnv(env, "TASKMESH_ESTIMATED_PERFORMANCE", 1000),
      maxResourceSize: numberFromEnv(env, "TASKMESH_MAX_RESOURCE_SIZE", 250 * 1024),
      maxMemorySize: numberFromEnv(env, "TASKMESH_MAX_MEMORY_SIZE", 250 * 1024),
      numCores: numberFromEnv(env, "TASKMESH_NUM_CORES", 1),
    },
    syncIntervalMs: numberFromEnv(env, "TASKMESH_SYNC_INTERVAL_MS", 1000),
    removedTaskCooldownMs: numberFromEnv(env, "TASKMESH_REMOVED_TASK_COOLDOWN_MS", 240_000),
    resolvedSubtaskRetentionMs: numberFromEnv(env, "TASKMESH_RESOLVED_SUBTASK_RETENTION_MS", 3_600_000),
    maxResultResendDelayMs: numberFromEnv(env, "TASKMESH_MAX_RESULT_RESEND_DELAY_MS", 30_000),
    requestConnectAttempts: Math.max(1, numberFromEnv(env, "TASKMESH_REQUEST_CONNECT_ATTEMPTS", 1)),
    requestRetryBaseDelayMs: numberFromEnv(env, "TASKMESH_REQUEST_RETRY_BASE_DELAY_MS", 250),
    minTrust,
    maxTrust,
    reputationStore: store,
    redisUrl: env.TASKMESH_REDIS_URL ?? "redis://localhost:6379",
  };
}
