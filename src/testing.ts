import { loadMarketConfig, type MarketConfig } from "./config.js";
import type {
  ResourceRequestMessage,
  ResultReportMessage,
  TaskHeaderPayload,
  TaskRequestMessage,
} from "./contracts.js";
import { ConnectionFailure } from "./errors.js";
import { createLogger } from "./logger.js";
import { MarketplaceNode, type MarketplaceNodeOptions } from "./marketplace-node.js";
import { InMemoryReputationStore } from "./persistence.js";
import type {
  LocalExecutor,
  PaymentHandle,
  PaymentService,
  PeerSession,
  SessionOpener,
  SessionOpenResult,
} from "./session/types.js";
import type { TrustModifierSource } from "./trust/trust-ledger.js";

// Shared fakes for the test files. Nothing here talks to the network.

export const silentLogger = createLogger("test", "silent");

export function testConfig(overrides: Partial<MarketConfig> = {}): MarketConfig {
  return {
    ...loadMarketConfig({ TASKMESH_NODE_ID: "node-self", TASKMESH_LOG_LEVEL: "silent" }),
    ...overrides,
  };
}

export function header(taskId: string, overrides: Partial<TaskHeaderPayload> = {}): TaskHeaderPayload {
  return {
    taskId,
    ownerId: `owner-of-${taskId}`,
    address: "10.0.0.5",
    port: 40200,
    environment: "default",
    ttlMs: 10_000,
    subtaskTimeoutMs: 5_000,
    ...overrides,
  };
}

export type SentMessage =
  | { kind: "requestTask"; to: string; message: TaskRequestMessage }
  | { kind: "requestResource"; to: string; message: ResourceRequestMessage }
  | { kind: "reportResult"; to: string; message: ResultReportMessage }
  | { kind: "reward"; to: string; subtaskId: string; reward: number }
  | { kind: "resultRejected"; to: string; subtaskId: string; reason: string };

/**
 * Records every message per endpoint. Endpoints listed in `unreachable` fail
 * to open; endpoints in `failSends` open but reject every send. `onSend` runs
 * while a send is in progress, before it succeeds or fails.
 */
export class FakeSessionOpener implements SessionOpener {
  readonly sent: SentMessage[] = [];
  readonly opened: string[] = [];
  readonly unreachable = new Set<string>();
  readonly failSends = new Set<string>();
  onSend?: (entry: SentMessage) => Promise<void> | void;

  async open(address: string, port: number): Promise<SessionOpenResult> {
    const to = `${address}:${port}`;
    this.opened.push(to);
    if (this.unreachable.has(to)) {
      return { ok: false, failure: new ConnectionFailure(address, port, "connection refused") };
    }
    return { ok: true, session: this.sessionFor(to) };
  }

  private sessionFor(to: string): PeerSession {
    const record = async (entry: SentMessage) => {
      await this.onSend?.(entry);
      if (this.failSends.has(to)) throw new Error("socket hang up");
      this.sent.push(entry);
    };
    return {
      requestTask: (message) => record({ kind: "requestTask", to, message }),
      requestResource: (message) => record({ kind: "requestResource", to, message }),
      reportResult: (message) => record({ kind: "reportResult", to, message }),
      sendReward: (subtaskId, reward) => record({ kind: "reward", to, subtaskId, reward }),
      sendResultRejected: (subtaskId, reason) =>
        record({ kind: "resultRejected", to, subtaskId, reason }),
    };
  }
}

export class FakePaymentService implements PaymentService {
  readonly payments: PaymentHandle[] = [];
  readonly collected: Array<{ subtaskId: string; amount: number }> = [];
  defaultReward = 10;

  async pay(subtaskId: string, amount: number): Promise<PaymentHandle> {
    const handle = { paymentId: `pay-${this.payments.length + 1}`, subtaskId, amount };
    this.payments.push(handle);
    return handle;
  }

  rewardFor(_subtaskId: string): number {
    return this.defaultReward;
  }

  collectReward(subtaskId: string, amount: number): void {
    this.collected.push({ subtaskId, amount });
  }
}

export class FakeExecutor implements LocalExecutor {
  readonly taskRejections: Array<{ taskId: string; reason: string }> = [];
  readonly resourceRejections: Array<{ subtaskId: string; reason: string }> = [];
  readonly granted: string[] = [];

  taskRequestRejected(taskId: string, reason: string): void {
    this.taskRejections.push({ taskId, reason });
  }

  resourceRequestRejected(subtaskId: string, reason: string): void {
    this.resourceRejections.push({ subtaskId, reason });
  }

  resourceGranted(subtaskId: string): void {
    this.granted.push(subtaskId);
  }
}

export function fixedTrustMods(value: number, perSubtask: Record<string, number> = {}): TrustModifierSource {
  return { trustModFor: (subtaskId) => perSubtask[subtaskId] ?? value };
}

/** A clock tests move by hand. */
export function manualClock(start = 1_000_000) {
  let now = start;
  return {
    now: () => now,
    set(value: number) {
      now = value;
    },
    advance(ms: number) {
      now += ms;
    },
  };
}

export function testNode(overrides: Partial<MarketplaceNodeOptions> = {}) {
  const clock = manualClock();
  const sessions = new FakeSessionOpener();
  const payments = new FakePaymentService();
  const executor = new FakeExecutor();
  const node = new MarketplaceNode({
    config: testConfig(),
    sessions,
    payments,
    executor,
    trustMods: fixedTrustMods(0.5),
    reputation: new InMemoryReputationStore(),
    logger: silentLogger,
    clock: clock.now,
    ...overrides,
  });
  return { node, clock, sessions, payments, executor };
}
