import type { MarketConfig } from "./config.js";
import type { TaskHeaderSummary, WaitingTaskResult } from "./contracts.js";
import { startSyncLoop } from "./control/sync-loop.js";
import { ResultDeliveryQueue, type FlushOutcome } from "./delivery/result-delivery-queue.js";
import { errorMessage, ValidationError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { InMemoryReputationStore, type ReputationStore } from "./persistence.js";
import { RedisReputationStore } from "./persistence/redis-adapter.js";
import { createPluginContext, type MarketPluginContext } from "./plugins/types.js";
import { createEnvironmentFilter } from "./registry/capability-filter.js";
import {
  TaskHeaderRegistry,
  toHeaderPayload,
  type CapabilityFilter,
  type LocalTaskSource,
} from "./registry/task-header-registry.js";
import { TaskSessionCoordinator } from "./session/coordinator.js";
import type { LocalExecutor, PaymentService, SessionOpener } from "./session/types.js";
import { TrustLedger, type TrustModifierSource } from "./trust/trust-ledger.js";

/** P2P gossip, resource sync, payment-deadline sweeps: anything run after the core each tick. */
export interface SyncHook {
  name: string;
  sync(now: number): Promise<void> | void;
}

export interface TickReport {
  expired: string[];
  attempted: string[];
  /** Settles when this tick's delivery attempts finish; the tick itself does not wait. */
  deliveries: Promise<FlushOutcome>;
}

export interface NodeStats {
  nodeId: string;
  knownTasks: number;
  supportedTasks: number;
  activeTasks: number;
  waitingResults: number;
  pendingVerifications: number;
}

export interface MarketplaceNodeOptions {
  config: MarketConfig;
  sessions: SessionOpener;
  payments: PaymentService;
  executor: LocalExecutor;
  trustMods: TrustModifierSource;
  reputation?: ReputationStore;
  localTasks?: LocalTaskSource;
  capabilityFilter?: CapabilityFilter;
  syncHooks?: SyncHook[];
  ctx?: MarketPluginContext;
  logger?: Logger;
  clock?: () => number;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export function createReputationStore(config: MarketConfig): ReputationStore {
  const bounds = { minTrust: config.minTrust, maxTrust: config.maxTrust };
  if (config.reputationStore === "redis") {
    return new RedisReputationStore(config.redisUrl, bounds);
  }
  return new InMemoryReputationStore(bounds);
}

/**
 * Composition root. Owns the registry, ledger, queue and coordinator and runs
 * the periodic tick: header expiry and pruning first, then result delivery, then hooks.
 */
export class MarketplaceNode {
  readonly config: MarketConfig;
  readonly ctx: MarketPluginContext;
  readonly logger: Logger;
  readonly registry: TaskHeaderRegistry;
  readonly reputation: ReputationStore;
  readonly ledger: TrustLedger;
  readonly queue: ResultDeliveryQueue;
  readonly coordinator: TaskSessionCoordinator;
  private readonly syncHooks: SyncHook[];
  private readonly clock: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: MarketplaceNodeOptions) {
    const { config } = options;
    this.config = config;
    this.ctx = options.ctx ?? createPluginContext();
    this.logger = options.logger ?? createLogger("taskmesh", config.logLevel);
    this.clock = options.clock ?? Date.now;
    this.syncHooks = options.syncHooks ?? [];

    this.registry = new TaskHeaderRegistry({
      capabilityFilter:
        options.capabilityFilter ??
        createEnvironmentFilter({
          environments: config.environments,
          nodeVersion: config.nodeVersion,
        }),
      localTasks: options.localTasks,
      removedTaskCooldownMs: config.removedTaskCooldownMs,
      ctx: this.ctx,
      logger: this.logger.child({ component: "registry" }),
      random: options.random,
    });

    this.reputation = options.reputation ?? createReputationStore(config);
    this.ledger = new TrustLedger(this.reputation, options.trustMods, {
      minTrust: config.minTrust,
      maxTrust: config.maxTrust,
      logger: this.logger.child({ component: "ledger" }),
    });

    this.queue = new ResultDeliveryQueue({
      maxResendDelayMs: config.maxResultResendDelayMs,
      clock: this.clock,
      logger: this.logger.child({ component: "delivery" }),
    });

    this.coordinator = new TaskSessionCoordinator({
      nodeId: config.nodeId,
      publicAddress: config.publicAddress,
      publicPort: config.port,
      capabilities: config.capabilities,
      registry: this.registry,
      ledger: this.ledger,
      queue: this.queue,
      sessions: options.sessions,
      payments: options.payments,
      executor: options.executor,
      requestConnectAttempts: config.requestConnectAttempts,
      requestRetryBaseDelayMs: config.requestRetryBaseDelayMs,
      resolvedRetentionMs: config.resolvedSubtaskRetentionMs,
      ctx: this.ctx,
      logger: this.logger.child({ component: "sessions" }),
      clock: this.clock,
      sleep: options.sleep,
    });
  }

  async tick(now = this.clock()): Promise<TickReport> {
    const expired = this.registry.tick(now);
    const pruned = this.coordinator.prune(now);
    if (pruned.length > 0) this.logger.debug({ pruned: pruned.length }, "resolved subtasks forgotten");
    const round = this.queue.flush((result) => this.coordinator.deliverResult(result), now);

    round.settled.then(
      (outcome) => {
        if (outcome.delivered.length > 0 || outcome.failed.length > 0) {
          this.logger.debug(outcome, "delivery round settled");
        }
      },
      (err: unknown) => this.logger.error({ err: errorMessage(err) }, "delivery round failed")
    );

    for (const hook of this.syncHooks) {
      try {
        await hook.sync(now);
      } catch (err) {
        this.logger.error({ hook: hook.name, err: errorMessage(err) }, "sync hook failed");
      }
    }

    return { expired, attempted: round.attempted, deliveries: round.settled };
  }

  start(intervalMs = this.config.syncIntervalMs): void {
    if (this.timer) return;
    this.timer = startSyncLoop(this, this.logger, intervalMs);
    this.logger.info({ nodeId: this.config.nodeId, intervalMs }, "sync loop started");
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  // ── Interfaces exposed to the protocol layer ─────────────────────────────

  /** Malformed headers are logged and reported as not added. */
  onTaskHeaderReceived(payload: unknown): boolean {
    try {
      return this.registry.add(payload, this.clock());
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      this.logger.warn({ field: err.field, err: err.message }, "wrong task header received");
      return false;
    }
  }

  onTaskHeaderRetracted(taskId: string): boolean {
    return this.registry.remove(taskId, this.clock());
  }

  onResourceRequestResult(subtaskId: string, ok: boolean, reason?: string): void {
    this.coordinator.onResourceRequestResult(subtaskId, ok, reason);
  }

  onVerificationResult(
    subtaskId: string,
    accepted: boolean,
    rewardOrReason?: number | string
  ): Promise<boolean> {
    return this.coordinator.onVerificationResult(subtaskId, accepted, rewardOrReason);
  }

  listKnownTasks(): TaskHeaderSummary[] {
    const remote = this.registry
      .listHeaders()
      .map((header) => ({ ...toHeaderPayload(header), local: false }));
    const local = this.registry
      .listLocalHeaders()
      .map((header) => ({ ...toHeaderPayload(header), local: true }));
    return [...remote, ...local];
  }

  waitingResults(): WaitingTaskResult[] {
    return this.queue.list();
  }

  stats(): NodeStats {
    return {
      nodeId: this.config.nodeId,
      knownTasks: this.registry.size,
      supportedTasks: this.registry.supportedTaskIds().length,
      activeTasks: this.registry.listActiveEntries().length,
      waitingResults: this.queue.size,
      pendingVerifications: this.coordinator.pendingVerifications().length,
    };
  }
}
