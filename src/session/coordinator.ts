import type {
  ComputeCapabilities,
  PeerRef,
  ResourceDescriptor,
  SubtaskState,
  WaitingTaskResult,
} from "../contracts.js";
import { computeRetryDecision } from "../control/retry-policy.js";
import type { EnqueueResultInput, ResultDeliveryQueue } from "../delivery/result-delivery-queue.js";
import {
  AlreadyResolvedError,
  ConnectionFailure,
  errorMessage,
  PaymentError,
} from "../errors.js";
import type { Logger } from "../logger.js";
import type { MarketEvent, MarketPluginContext } from "../plugins/types.js";
import type { TaskHeaderRegistry } from "../registry/task-header-registry.js";
import type { TrustLedger } from "../trust/trust-ledger.js";
import { SubtaskLifecycle } from "./subtask-lifecycle.js";
import type {
  LocalExecutor,
  PaymentHandle,
  PaymentService,
  PeerSession,
  SessionOpener,
  SessionOpenResult,
} from "./types.js";

const SCHEMA_VERSION = "1.0" as const;
export const CONNECTION_FAILED = "Connection failed";

export type TaskRequestOutcome =
  | { ok: true; taskId: string }
  | { ok: false; taskId?: string; error: "no_supported_task" | "task_not_found" | "connection_failed" };

export interface ResolutionOutcome {
  subtaskId: string;
  trustDelta: number;
  payment?: PaymentHandle;
  peerNotified: boolean;
}

export interface ResourceRequestInput {
  subtaskId: string;
  taskId: string;
  resource: ResourceDescriptor;
  address: string;
  port: number;
}

export interface TaskSessionCoordinatorOptions {
  nodeId: string;
  /** Endpoint reported to task owners together with computed results. */
  publicAddress: string;
  publicPort: number;
  capabilities: ComputeCapabilities;
  registry: TaskHeaderRegistry;
  ledger: TrustLedger;
  queue: ResultDeliveryQueue;
  sessions: SessionOpener;
  payments: PaymentService;
  executor: LocalExecutor;
  requestConnectAttempts?: number;
  requestRetryBaseDelayMs?: number;
  /** How long accepted and rejected subtasks are remembered. */
  resolvedRetentionMs?: number;
  ctx?: MarketPluginContext;
  logger?: Logger;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/** Accepts a number or a numeric string; anything else is a PaymentError. */
export function parseReward(subtaskId: string, raw: unknown): number {
  const value =
    typeof raw === "number" ? raw : typeof raw === "string" && raw.trim() !== "" ? Number(raw) : NaN;
  if (!Number.isFinite(value) || value < 0) throw new PaymentError(subtaskId, raw);
  return value;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Moves subtasks from request to a verified, paid outcome.
 *
 * Computing side: requestTask -> requestResource -> submitResult -> deliverResult
 * -> verificationAccepted | verificationRejected.
 * Requester side: accept | reject, each terminal and exclusive per subtask.
 *
 * Headers and active entries stay in the registry; this class keys everything
 * by id only.
 */
export class TaskSessionCoordinator {
  private readonly pending = new Map<string, string>();
  private readonly lifecycle: SubtaskLifecycle;
  private readonly nodeId: string;
  private readonly publicAddress: string;
  private readonly publicPort: number;
  private readonly capabilities: ComputeCapabilities;
  private readonly registry: TaskHeaderRegistry;
  private readonly ledger: TrustLedger;
  private readonly queue: ResultDeliveryQueue;
  private readonly sessions: SessionOpener;
  private readonly payments: PaymentService;
  private readonly executor: LocalExecutor;
  private readonly requestConnectAttempts: number;
  private readonly requestRetryBaseDelayMs: number;
  private readonly resolvedRetentionMs: number;
  private readonly ctx?: MarketPluginContext;
  private readonly logger?: Logger;
  private readonly clock: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: TaskSessionCoordinatorOptions) {
    this.nodeId = options.nodeId;
    this.publicAddress = options.publicAddress;
    this.publicPort = options.publicPort;
    this.capabilities = options.capabilities;
    this.registry = options.registry;
    this.ledger = options.ledger;
    this.queue = options.queue;
    this.sessions = options.sessions;
    this.payments = options.payments;
    this.executor = options.executor;
    this.requestConnectAttempts = Math.max(1, options.requestConnectAttempts ?? 1);
    this.requestRetryBaseDelayMs = options.requestRetryBaseDelayMs ?? 250;
    this.resolvedRetentionMs = options.resolvedRetentionMs ?? 3_600_000;
    this.ctx = options.ctx;
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.lifecycle = new SubtaskLifecycle(this.clock);
  }

  // ── Computing side ────────────────────────────────────────────────────────

  async requestRandomTask(): Promise<TaskRequestOutcome> {
    const taskId = this.registry.pickRandomSupported();
    if (taskId === undefined) return { ok: false, error: "no_supported_task" };
    return this.requestTask(taskId);
  }

  async requestTask(
    taskId: string,
    capabilities: ComputeCapabilities = this.capabilities
  ): Promise<TaskRequestOutcome> {
    const header = this.registry.get(taskId);
    if (!header) return { ok: false, taskId, error: "task_not_found" };

    this.registry.beginRequest(taskId);
    this.emit({ type: "task.requested", taskId, peerId: header.ownerId });

    const opened = await this.openWithRetry(header.ownerAddress, header.ownerPort);
    if (!opened.ok) {
      this.failTaskRequest(taskId, opened.failure);
      return { ok: false, taskId, error: "connection_failed" };
    }

    try {
      await opened.session.requestTask({
        schemaVersion: SCHEMA_VERSION,
        nodeId: this.nodeId,
        taskId,
        capabilities,
      });
    } catch (err) {
      this.failTaskRequest(
        taskId,
        new ConnectionFailure(header.ownerAddress, header.ownerPort, errorMessage(err))
      );
      return { ok: false, taskId, error: "connection_failed" };
    }

    this.logger?.info({ taskId, ownerId: header.ownerId }, "task requested");
    return { ok: true, taskId };
  }

  async requestResource(input: ResourceRequestInput): Promise<boolean> {
    const { subtaskId, taskId } = input;
    this.lifecycle.advance(subtaskId, "resource_requested", taskId);
    this.emit({ type: "resource.requested", taskId, subtaskId });

    const opened = await this.openSession(input.address, input.port);
    let failure: ConnectionFailure | undefined;
    if (opened.ok) {
      try {
        await opened.session.requestResource({
          schemaVersion: SCHEMA_VERSION,
          subtaskId,
          resource: input.resource,
        });
      } catch (err) {
        failure = new ConnectionFailure(input.address, input.port, errorMessage(err));
      }
    } else {
      failure = opened.failure;
    }

    if (!failure) return true;

    this.logger?.warn(
      { taskId, subtaskId, err: failure.message },
      "cannot reach task owner for resources, removing task"
    );
    this.lifecycle.advance(subtaskId, "resource_rejected");
    this.executor.resourceRequestRejected(subtaskId, CONNECTION_FAILED);
    this.registry.remove(taskId, this.clock());
    this.emit({ type: "resource.rejected", taskId, subtaskId, detail: { reason: CONNECTION_FAILED } });
    return false;
  }

  onResourceRequestResult(subtaskId: string, ok: boolean, reason?: string): void {
    if (ok) {
      this.lifecycle.advance(subtaskId, "resource_granted");
      this.executor.resourceGranted(subtaskId);
      this.emit({ type: "resource.granted", subtaskId });
      return;
    }
    const why = reason ?? "Resource request rejected";
    this.lifecycle.advance(subtaskId, "resource_rejected");
    this.executor.resourceRequestRejected(subtaskId, why);
    this.emit({ type: "resource.rejected", subtaskId, detail: { reason: why } });
  }

  submitResult(input: EnqueueResultInput): WaitingTaskResult {
    const entry = this.queue.enqueue(input);
    this.lifecycle.advance(input.subtaskId, "result_queued", input.taskId);
    this.emit({ type: "result.queued", taskId: input.taskId, subtaskId: input.subtaskId });
    return entry;
  }

  /**
   * Used by the delivery queue. Resolves false on any failure so the entry backs off.
   *
   * The pending verification is registered before the report goes out, since the
   * owner may answer with its verdict while the report call is still open.
   */
  async deliverResult(result: Readonly<WaitingTaskResult>): Promise<boolean> {
    const { subtaskId, taskId } = result;
    const previous = this.lifecycle.get(subtaskId);
    if (previous && (previous.state === "accepted" || previous.state === "rejected")) {
      this.logger?.warn(
        { taskId, subtaskId, state: previous.state },
        "dropping result for a resolved subtask"
      );
      return true;
    }

    const opened = await this.openSession(result.ownerAddress, result.ownerPort);
    if (!opened.ok) return this.deliveryFailed(result, opened.failure.message);

    this.lifecycle.advance(subtaskId, "result_submitted", taskId);
    this.pending.set(subtaskId, taskId);
    try {
      await opened.session.reportResult({
        schemaVersion: SCHEMA_VERSION,
        subtaskId,
        taskId,
        nodeId: this.nodeId,
        resultType: result.resultType,
        payload: result.payload,
        address: this.publicAddress,
        port: this.publicPort,
      });
    } catch (err) {
      if (this.pending.delete(subtaskId)) {
        this.lifecycle.restore(subtaskId, previous);
        return this.deliveryFailed(result, errorMessage(err));
      }
      // The verdict came in before the call failed, so the owner has the result.
      this.logger?.warn(
        { taskId, subtaskId, err: errorMessage(err) },
        "result report failed after its verdict"
      );
    }

    this.emit({ type: "result.delivered", taskId, subtaskId });
    return true;
  }

  async verificationAccepted(subtaskId: string, reward?: number | string): Promise<boolean> {
    const taskId = this.consumePending(subtaskId, "accepted");
    if (taskId === undefined) return false;

    const requester = this.requesterOf(taskId);
    this.registry.endRequest(taskId);

    if (reward !== undefined) {
      const amount = this.rewardOrWarn(subtaskId, reward);
      if (amount !== undefined) {
        await this.payments.collectReward(subtaskId, amount);
        this.logger?.info({ subtaskId, amount }, "reward collected");
      }
    }

    if (requester) {
      await this.ledger.increaseRequesting(requester);
    } else {
      this.logger?.warn({ taskId, subtaskId }, "no requester known for verified task");
    }
    this.emit({ type: "verification.accepted", taskId, subtaskId, peerId: requester });
    return true;
  }

  async verificationRejected(subtaskId: string, reason?: string): Promise<boolean> {
    const taskId = this.consumePending(subtaskId, "rejected");
    if (taskId === undefined) return false;

    const requester = this.requesterOf(taskId);
    this.registry.endRequest(taskId);

    if (requester) {
      await this.ledger.decreaseRequesting(requester);
    } else {
      this.logger?.warn({ taskId, subtaskId }, "no requester known for rejected task");
    }
    this.registry.remove(taskId, this.clock());
    this.emit({
      type: "verification.rejected",
      taskId,
      subtaskId,
      peerId: requester,
      detail: reason ? { reason } : undefined,
    });
    return true;
  }

  onVerificationResult(
    subtaskId: string,
    accepted: boolean,
    rewardOrReason?: number | string
  ): Promise<boolean> {
    if (accepted) return this.verificationAccepted(subtaskId, rewardOrReason);
    return this.verificationRejected(
      subtaskId,
      typeof rewardOrReason === "string" ? rewardOrReason : undefined
    );
  }

  // ── Requester side ────────────────────────────────────────────────────────

  async accept(subtaskId: string, peer: PeerRef, reward?: number | string): Promise<ResolutionOutcome> {
    const trustDelta = await this.resolveWithTrust(subtaskId, "accepted", () =>
      this.ledger.increaseComputing(peer.nodeId, subtaskId)
    );
    this.emit({ type: "subtask.accepted", subtaskId, peerId: peer.nodeId });

    const amount = this.rewardOrWarn(subtaskId, reward ?? this.payments.rewardFor(subtaskId));
    if (amount === undefined) return { subtaskId, trustDelta, peerNotified: false };

    const payment = await this.payments.pay(subtaskId, amount);
    this.logger?.info({ subtaskId, peerId: peer.nodeId, amount }, "paying for subtask");
    const peerNotified = await this.notifyPeer(peer, subtaskId, (session) =>
      session.sendReward(subtaskId, amount)
    );
    return { subtaskId, trustDelta, payment, peerNotified };
  }

  async reject(subtaskId: string, peer: PeerRef, reason = "Result rejected"): Promise<ResolutionOutcome> {
    const trustDelta = await this.resolveWithTrust(subtaskId, "rejected", () =>
      this.ledger.decreaseComputing(peer.nodeId, subtaskId)
    );
    this.emit({ type: "subtask.rejected", subtaskId, peerId: peer.nodeId, detail: { reason } });

    const peerNotified = await this.notifyPeer(peer, subtaskId, (session) =>
      session.sendResultRejected(subtaskId, reason)
    );
    return { subtaskId, trustDelta, peerNotified };
  }

  // ── Snapshots ─────────────────────────────────────────────────────────────

  subtaskState(subtaskId: string): SubtaskState | undefined {
    return this.lifecycle.state(subtaskId);
  }

  pendingVerifications(): Array<{ subtaskId: string; taskId: string }> {
    return [...this.pending].map(([subtaskId, taskId]) => ({ subtaskId, taskId }));
  }

  /** Forgets resolved subtasks older than the retention window. */
  prune(now = this.clock()): string[] {
    return this.lifecycle.prune(now, this.resolvedRetentionMs);
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private deliveryFailed(result: Readonly<WaitingTaskResult>, reason: string): false {
    const { taskId, subtaskId } = result;
    this.logger?.warn({ taskId, subtaskId, err: reason }, "cannot deliver result to task owner");
    this.emit({ type: "result.delivery_failed", taskId, subtaskId, detail: { reason } });
    return false;
  }

  /** The resolution stands only once the trust change is stored. */
  private async resolveWithTrust(
    subtaskId: string,
    resolution: "accepted" | "rejected",
    adjust: () => Promise<number>
  ): Promise<number> {
    const previous = this.lifecycle.get(subtaskId);
    this.lifecycle.resolve(subtaskId, resolution);
    try {
      return await adjust();
    } catch (err) {
      this.lifecycle.restore(subtaskId, previous);
      this.logger?.error(
        { subtaskId, resolution, err: errorMessage(err) },
        "trust update failed, subtask left open"
      );
      throw err;
    }
  }

  private consumePending(subtaskId: string, resolution: "accepted" | "rejected"): string | undefined {
    const state = this.lifecycle.state(subtaskId);
    if (state === "accepted" || state === "rejected") {
      throw new AlreadyResolvedError(subtaskId, state);
    }
    const taskId = this.pending.get(subtaskId);
    if (taskId === undefined) {
      this.logger?.warn({ subtaskId }, "verification result for a subtask that is not pending");
      return undefined;
    }
    this.pending.delete(subtaskId);
    this.lifecycle.resolve(subtaskId, resolution);
    return taskId;
  }

  private requesterOf(taskId: string): string | undefined {
    return this.registry.activeEntry(taskId)?.header.ownerId;
  }

  private failTaskRequest(taskId: string, failure: ConnectionFailure): void {
    this.logger?.warn({ taskId, err: failure.message }, "cannot connect to task owner, removing task");
    this.registry.endRequest(taskId);
    this.executor.taskRequestRejected(taskId, CONNECTION_FAILED);
    this.registry.remove(taskId, this.clock());
    this.emit({ type: "task.request_failed", taskId, detail: { reason: failure.message } });
  }

  private rewardOrWarn(subtaskId: string, raw: unknown): number | undefined {
    try {
      return parseReward(subtaskId, raw);
    } catch (err) {
      if (!(err instanceof PaymentError)) throw err;
      this.logger?.warn({ subtaskId, err: err.message }, "payment skipped");
      return undefined;
    }
  }

  private async notifyPeer(
    peer: PeerRef,
    subtaskId: string,
    send: (session: PeerSession) => Promise<void>
  ): Promise<boolean> {
    if (peer.address === undefined || peer.port === undefined) return false;

    const opened = await this.openSession(peer.address, peer.port);
    if (!opened.ok) {
      this.logger?.warn({ subtaskId, peerId: peer.nodeId, err: opened.failure.message }, "cannot reach peer");
      return false;
    }
    try {
      await send(opened.session);
      return true;
    } catch (err) {
      this.logger?.warn({ subtaskId, peerId: peer.nodeId, err: errorMessage(err) }, "cannot reach peer");
      return false;
    }
  }

  private async openSession(address: string, port: number): Promise<SessionOpenResult> {
    try {
      return await this.sessions.open(address, port);
    } catch (err) {
      return { ok: false, failure: new ConnectionFailure(address, port, errorMessage(err)) };
    }
  }

  private async openWithRetry(address: string, port: number): Promise<SessionOpenResult> {
    for (let attempt = 1; ; attempt++) {
      const opened = await this.openSession(address, port);
      if (opened.ok) return opened;

      const decision = computeRetryDecision({
        attempt,
        maxAttempts: this.requestConnectAttempts,
        baseDelayMs: this.requestRetryBaseDelayMs,
        jitterRatio: 0,
      });
      if (!decision.retry) return opened;

      this.logger?.debug({ address, port, attempt, delayMs: decision.delayMs }, "retrying connect");
      await this.sleep(decision.delayMs);
    }
  }

  private emit(event: Omit<MarketEvent, "at">): void {
    this.ctx?.emit({ ...event, at: this.clock() });
  }
}
