import test from "node:test";
import assert from "node:assert/strict";
import type { TrustRole } from "./contracts.js";
import { ResultDeliveryQueue } from "./delivery/result-delivery-queue.js";
import { AlreadyResolvedError, PaymentError } from "./errors.js";
import { InMemoryReputationStore } from "./persistence.js";
import { createPluginContext, type MarketEvent } from "./plugins/types.js";
import { createEnvironmentFilter } from "./registry/capability-filter.js";
import { TaskHeaderRegistry } from "./registry/task-header-registry.js";
import { parseReward, TaskSessionCoordinator } from "./session/coordinator.js";
import {
  FakeExecutor,
  FakePaymentService,
  FakeSessionOpener,
  fixedTrustMods,
  header,
  manualClock,
  silentLogger,
} from "./testing.js";
import { TrustLedger } from "./trust/trust-ledger.js";

const OWNER = "10.0.0.5:40200";
const CAPABILITIES = {
  estimatedPerformance: 1000,
  maxResourceSize: 1024,
  maxMemorySize: 2048,
  numCores: 4,
};

function setup(options: { requestConnectAttempts?: number; store?: InMemoryReputationStore } = {}) {
  const clock = manualClock(1_000);
  const events: MarketEvent[] = [];
  const ctx = createPluginContext();
  ctx.emit = (event) => events.push(event);

  const registry = new TaskHeaderRegistry({
    capabilityFilter: createEnvironmentFilter({ environments: ["default"], nodeVersion: "1.0.0" }),
    ctx,
  });
  const store = options.store ?? new InMemoryReputationStore({ initialScore: 0.5 });
  const ledger = new TrustLedger(store, fixedTrustMods(0.5));
  const queue = new ResultDeliveryQueue({ clock: clock.now });
  const sessions = new FakeSessionOpener();
  const payments = new FakePaymentService();
  const executor = new FakeExecutor();
  const sleeps: number[] = [];

  const coordinator = new TaskSessionCoordinator({
    nodeId: "node-self",
    publicAddress: "127.0.0.1",
    publicPort: 40103,
    capabilities: CAPABILITIES,
    registry,
    ledger,
    queue,
    sessions,
    payments,
    executor,
    requestConnectAttempts: options.requestConnectAttempts,
    resolvedRetentionMs: 60_000,
    ctx,
    logger: silentLogger,
    clock: clock.now,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });

  registry.add(header("t1"), clock.now());
  return { clock, events, registry, store, queue, sessions, payments, executor, sleeps, coordinator };
}

async function deliverAll(env: ReturnType<typeof setup>) {
  const round = env.queue.flush((result) => env.coordinator.deliverResult(result));
  return round.settled;
}

function submitS1(env: ReturnType<typeof setup>) {
  return env.coordinator.submitResult({
    subtaskId: "s1",
    taskId: "t1",
    payload: { answer: 42 },
    resultType: "data",
    ownerAddress: "10.0.0.5",
    ownerPort: 40200,
  });
}

// ── Task requests ──────────────────────────────────────────────────────────

test("coordinator: requestTask sends the request and tracks it", async () => {
  const env = setup();

  assert.deepEqual(await env.coordinator.requestTask("t1"), { ok: true, taskId: "t1" });

  assert.deepEqual(env.sessions.sent, [
    {
      kind: "requestTask",
      to: OWNER,
      message: { schemaVersion: "1.0", nodeId: "node-self", taskId: "t1", capabilities: CAPABILITIES },
    },
  ]);
  assert.equal(env.registry.activeEntry("t1")?.outstandingRequests, 1);
});

test("coordinator: an unreachable owner evicts the task and tells the executor", async () => {
  const env = setup();
  env.sessions.unreachable.add(OWNER);

  assert.deepEqual(await env.coordinator.requestTask("t1"), {
    ok: false,
    taskId: "t1",
    error: "connection_failed",
  });

  assert.deepEqual(env.executor.taskRejections, [{ taskId: "t1", reason: "Connection failed" }]);
  assert.equal(env.registry.has("t1"), false);
  assert.equal(env.registry.activeEntry("t1"), undefined);
  assert.equal(env.registry.isRecentlyRemoved("t1", env.clock.now()), true);
  assert.deepEqual(
    env.events.map((e) => e.type),
    ["task.added", "task.requested", "task.removed", "task.request_failed"]
  );
});

test("coordinator: extra connect attempts back off before giving up", async () => {
  const env = setup({ requestConnectAttempts: 3 });
  env.sessions.unreachable.add(OWNER);

  const outcome = await env.coordinator.requestTask("t1");

  assert.equal(outcome.ok, false);
  assert.deepEqual(env.sessions.opened, [OWNER, OWNER, OWNER]);
  assert.deepEqual(env.sleeps, [250, 500]);
  assert.equal(env.registry.has("t1"), false);
});

test("coordinator: a rejected send counts as a connection failure", async () => {
  const env = setup();
  env.sessions.failSends.add(OWNER);

  const outcome = await env.coordinator.requestTask("t1");

  assert.equal(outcome.ok, false);
  assert.equal(env.registry.has("t1"), false);
  assert.deepEqual(env.executor.taskRejections, [{ taskId: "t1", reason: "Connection failed" }]);
});

test("coordinator: requestTask for an unknown task has no side effects", async () => {
  const env = setup();

  assert.deepEqual(await env.coordinator.requestTask("nope"), {
    ok: false,
    taskId: "nope",
    error: "task_not_found",
  });
  assert.deepEqual(env.sessions.opened, []);
  assert.equal(env.registry.isRecentlyRemoved("nope", env.clock.now()), false);
});

test("coordinator: requestRandomTask reports when nothing is supported", async () => {
  const env = setup();
  env.registry.remove("t1", env.clock.now());

  assert.deepEqual(await env.coordinator.requestRandomTask(), { ok: false, error: "no_supported_task" });
});

// ── Resources ──────────────────────────────────────────────────────────────

test("coordinator: an unreachable owner during a resource request rejects the subtask", async () => {
  const env = setup();
  env.sessions.unreachable.add(OWNER);

  const ok = await env.coordinator.requestResource({
    subtaskId: "s1",
    taskId: "t1",
    resource: { files: ["input.bin"] },
    address: "10.0.0.5",
    port: 40200,
  });

  assert.equal(ok, false);
  assert.deepEqual(env.executor.resourceRejections, [{ subtaskId: "s1", reason: "Connection failed" }]);
  assert.equal(env.registry.has("t1"), false);
  assert.equal(env.coordinator.subtaskState("s1"), "resource_rejected");
});

test("coordinator: a granted resource request reaches the executor", async () => {
  const env = setup();

  const ok = await env.coordinator.requestResource({
    subtaskId: "s1",
    taskId: "t1",
    resource: { files: ["input.bin"], deltaSize: 128 },
    address: "10.0.0.5",
    port: 40200,
  });
  env.coordinator.onResourceRequestResult("s1", true);

  assert.equal(ok, true);
  assert.deepEqual(env.sessions.sent, [
    {
      kind: "requestResource",
      to: OWNER,
      message: { schemaVersion: "1.0", subtaskId: "s1", resource: { files: ["input.bin"], deltaSize: 128 } },
    },
  ]);
  assert.deepEqual(env.executor.granted, ["s1"]);
  assert.equal(env.coordinator.subtaskState("s1"), "resource_granted");
});

test("coordinator: an owner refusing resources passes its reason on", () => {
  const env = setup();

  env.coordinator.onResourceRequestResult("s1", false, "quota exceeded");

  assert.deepEqual(env.executor.resourceRejections, [{ subtaskId: "s1", reason: "quota exceeded" }]);
  assert.equal(env.registry.has("t1"), true);
});

// ── Results and verification ──────────────────────────────────────────────

test("coordinator: a delivered result waits for verification", async () => {
  const env = setup();
  submitS1(env);

  assert.deepEqual(await deliverAll(env), { delivered: ["s1"], failed: [] });

  const report = env.sessions.sent[0];
  assert.ok(report && report.kind === "reportResult");
  assert.deepEqual(report.message, {
    schemaVersion: "1.0",
    subtaskId: "s1",
    taskId: "t1",
    nodeId: "node-self",
    resultType: "data",
    payload: { answer: 42 },
    address: "127.0.0.1",
    port: 40103,
  });
  assert.deepEqual(env.coordinator.pendingVerifications(), [{ subtaskId: "s1", taskId: "t1" }]);
  assert.equal(env.coordinator.subtaskState("s1"), "result_submitted");
});

test("coordinator: a failed delivery keeps the result queued", async () => {
  const env = setup();
  env.sessions.unreachable.add(OWNER);
  submitS1(env);

  assert.deepEqual(await deliverAll(env), { delivered: [], failed: ["s1"] });
  assert.deepEqual(env.coordinator.pendingVerifications(), []);
  assert.equal(env.coordinator.subtaskState("s1"), "result_queued");
  assert.equal(env.queue.get("s1")?.retryDelayMs, 30_000);
  assert.equal(env.events.at(-1)?.type, "result.delivery_failed");
});

test("coordinator: a rejected report leaves the result queued and nothing pending", async () => {
  const env = setup();
  env.sessions.failSends.add(OWNER);
  submitS1(env);

  assert.deepEqual(await deliverAll(env), { delivered: [], failed: ["s1"] });
  assert.deepEqual(env.coordinator.pendingVerifications(), []);
  assert.equal(env.coordinator.subtaskState("s1"), "result_queued");
  assert.equal(await env.coordinator.verificationAccepted("s1", 5), false);
});

test("coordinator: a verdict arriving while the report is in flight is consumed", async () => {
  const env = setup();
  await env.coordinator.requestTask("t1");
  submitS1(env);
  const consumed: boolean[] = [];
  env.sessions.onSend = async (entry) => {
    if (entry.kind === "reportResult") {
      consumed.push(await env.coordinator.verificationAccepted("s1", 5));
    }
  };

  assert.deepEqual(await deliverAll(env), { delivered: ["s1"], failed: [] });

  assert.deepEqual(consumed, [true]);
  assert.equal(env.coordinator.subtaskState("s1"), "accepted");
  assert.deepEqual(env.coordinator.pendingVerifications(), []);
  assert.deepEqual(env.payments.collected, [{ subtaskId: "s1", amount: 5 }]);
  assert.equal(await env.store.getScore("owner-of-t1", "requesting"), 1);
});

test("coordinator: a report that fails after its verdict arrived still counts as delivered", async () => {
  const env = setup();
  await env.coordinator.requestTask("t1");
  submitS1(env);
  env.sessions.failSends.add(OWNER);
  env.sessions.onSend = async (entry) => {
    if (entry.kind === "reportResult") await env.coordinator.verificationRejected("s1", "bad");
  };

  assert.deepEqual(await deliverAll(env), { delivered: ["s1"], failed: [] });

  assert.equal(env.coordinator.subtaskState("s1"), "rejected");
  assert.equal(env.queue.size, 0);
  assert.equal(env.events.at(-1)?.type, "result.delivered");
});

test("coordinator: accepted verification collects the reward and credits the requester", async () => {
  const env = setup();
  await env.coordinator.requestTask("t1");
  submitS1(env);
  await deliverAll(env);

  assert.equal(await env.coordinator.verificationAccepted("s1", "12.5"), true);

  assert.deepEqual(env.payments.collected, [{ subtaskId: "s1", amount: 12.5 }]);
  assert.equal(await env.store.getScore("owner-of-t1", "requesting"), 1);
  assert.equal(env.registry.activeEntry("t1")?.outstandingRequests, 0);
  assert.deepEqual(env.coordinator.pendingVerifications(), []);
  assert.equal(env.coordinator.subtaskState("s1"), "accepted");
});

test("coordinator: a verification is consumed exactly once", async () => {
  const env = setup();
  await env.coordinator.requestTask("t1");
  submitS1(env);
  await deliverAll(env);

  await env.coordinator.verificationAccepted("s1", 5);

  await assert.rejects(() => env.coordinator.verificationAccepted("s1", 5), AlreadyResolvedError);
  await assert.rejects(
    () => env.coordinator.verificationRejected("s1"),
    (err: unknown) => err instanceof AlreadyResolvedError && err.resolution === "accepted"
  );
  assert.deepEqual(env.payments.collected, [{ subtaskId: "s1", amount: 5 }]);
  assert.equal(await env.store.getScore("owner-of-t1", "requesting"), 1);
});

test("coordinator: rejected verification penalises the requester and drops the task", async () => {
  const env = setup();
  await env.coordinator.requestTask("t1");
  submitS1(env);
  await deliverAll(env);

  assert.equal(await env.coordinator.verificationRejected("s1", "wrong output"), true);

  assert.equal(await env.store.getScore("owner-of-t1", "requesting"), 0);
  assert.equal(env.registry.has("t1"), false);
  assert.equal(env.registry.activeEntry("t1"), undefined);
  const last = env.events.at(-1);
  assert.equal(last?.type, "verification.rejected");
  assert.deepEqual(last?.detail, { reason: "wrong output" });
});

test("coordinator: accepting after a rejection throws", async () => {
  const env = setup();
  await env.coordinator.requestTask("t1");
  submitS1(env);
  await deliverAll(env);

  await env.coordinator.verificationRejected("s1");

  await assert.rejects(
    () => env.coordinator.verificationAccepted("s1", 5),
    (err: unknown) => err instanceof AlreadyResolvedError && err.resolution === "rejected"
  );
  assert.deepEqual(env.payments.collected, []);
});

test("coordinator: a verdict for a subtask that was never delivered is ignored", async () => {
  const env = setup();

  assert.equal(await env.coordinator.verificationAccepted("unknown", 3), false);
  assert.deepEqual(env.payments.collected, []);
  assert.deepEqual(await env.store.listPeers(), []);
});

test("coordinator: an invalid announced reward still credits the requester", async () => {
  const env = setup();
  await env.coordinator.requestTask("t1");
  submitS1(env);
  await deliverAll(env);

  assert.equal(await env.coordinator.onVerificationResult("s1", true, "lots"), true);

  assert.deepEqual(env.payments.collected, []);
  assert.equal(await env.store.getScore("owner-of-t1", "requesting"), 1);
});

// ── Requester side ────────────────────────────────────────────────────────

test("coordinator: accept credits the computing peer, pays, and notifies it", async () => {
  const env = setup();
  const peer = { nodeId: "peer-9", address: "10.0.0.9", port: 40300 };

  const outcome = await env.coordinator.accept("s9", peer);

  assert.deepEqual(outcome, {
    subtaskId: "s9",
    trustDelta: 0.5,
    payment: { paymentId: "pay-1", subtaskId: "s9", amount: 10 },
    peerNotified: true,
  });
  assert.deepEqual(env.sessions.sent, [{ kind: "reward", to: "10.0.0.9:40300", subtaskId: "s9", reward: 10 }]);
  assert.equal(await env.store.getScore("peer-9", "computing"), 1);
});

test("coordinator: accept and reject are mutually exclusive", async () => {
  const env = setup();
  const peer = { nodeId: "peer-9", address: "10.0.0.9", port: 40300 };

  await env.coordinator.accept("s9", peer);
  await assert.rejects(() => env.coordinator.reject("s9", peer), AlreadyResolvedError);
  await assert.rejects(() => env.coordinator.accept("s9", peer), AlreadyResolvedError);

  assert.equal(env.payments.payments.length, 1);
  assert.equal(await env.store.getScore("peer-9", "computing"), 1);
});

test("coordinator: reject penalises the peer and sends the reason", async () => {
  const env = setup();
  const peer = { nodeId: "peer-9", address: "10.0.0.9", port: 40300 };

  const outcome = await env.coordinator.reject("s9", peer);

  assert.deepEqual(outcome, { subtaskId: "s9", trustDelta: -0.5, peerNotified: true });
  assert.deepEqual(env.sessions.sent, [
    { kind: "resultRejected", to: "10.0.0.9:40300", subtaskId: "s9", reason: "Result rejected" },
  ]);
  assert.equal(await env.store.getScore("peer-9", "computing"), 0);
  await assert.rejects(() => env.coordinator.accept("s9", peer), AlreadyResolvedError);
  assert.deepEqual(env.payments.payments, []);
});

test("coordinator: an invalid reward skips payment but keeps the trust credit", async () => {
  const env = setup();

  const outcome = await env.coordinator.accept("s9", { nodeId: "peer-9" }, "-3");

  assert.deepEqual(outcome, { subtaskId: "s9", trustDelta: 0.5, peerNotified: false });
  assert.deepEqual(env.payments.payments, []);
});

test("coordinator: a peer without an endpoint is paid but not notified", async () => {
  const env = setup();

  const outcome = await env.coordinator.accept("s9", { nodeId: "peer-9" }, 7);

  assert.equal(outcome.peerNotified, false);
  assert.deepEqual(outcome.payment, { paymentId: "pay-1", subtaskId: "s9", amount: 7 });
  assert.deepEqual(env.sessions.opened, []);
});

class FlakyStore extends InMemoryReputationStore {
  down = true;

  async apply(peerId: string, role: TrustRole, delta: number): Promise<number> {
    if (this.down) throw new Error("redis down");
    return super.apply(peerId, role, delta);
  }
}

test("coordinator: a failed trust update leaves the subtask open and unpaid", async () => {
  const store = new FlakyStore({ initialScore: 0.5 });
  const env = setup({ store });
  const peer = { nodeId: "peer-9", address: "10.0.0.9", port: 40300 };

  await assert.rejects(() => env.coordinator.accept("s9", peer), /redis down/);
  await assert.rejects(() => env.coordinator.reject("s9", peer), /redis down/);

  assert.equal(env.coordinator.subtaskState("s9"), undefined);
  assert.deepEqual(env.payments.payments, []);
  assert.deepEqual(env.sessions.sent, []);

  store.down = false;
  const outcome = await env.coordinator.accept("s9", peer);
  assert.equal(outcome.trustDelta, 0.5);
  assert.deepEqual(outcome.payment, { paymentId: "pay-1", subtaskId: "s9", amount: 10 });
  assert.equal(env.coordinator.subtaskState("s9"), "accepted");
});

test("coordinator: prune forgets resolved subtasks after the retention window", async () => {
  const env = setup();
  const peer = { nodeId: "peer-9" };
  await env.coordinator.accept("s8", peer, 0);
  env.clock.advance(30_000);
  await env.coordinator.reject("s9", peer);
  submitS1(env);

  assert.deepEqual(env.coordinator.prune(1_000 + 60_000), []);
  assert.deepEqual(env.coordinator.prune(1_000 + 60_001), ["s8"]);
  assert.equal(env.coordinator.subtaskState("s8"), undefined);
  assert.equal(env.coordinator.subtaskState("s9"), "rejected");

  assert.deepEqual(env.coordinator.prune(1_000_000), ["s9"]);
  assert.equal(env.coordinator.subtaskState("s1"), "result_queued");
});

test("parseReward accepts numbers and numeric strings only", () => {
  assert.equal(parseReward("s", 3), 3);
  assert.equal(parseReward("s", " 4.5 "), 4.5);
  assert.throws(() => parseReward("s", ""), PaymentError);
  assert.throws(() => parseReward("s", "abc"), PaymentError);
  assert.throws(() => parseReward("s", -1), PaymentError);
  assert.throws(() => parseReward("s", Infinity), PaymentError);
});
