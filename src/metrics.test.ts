import test from "node:test";
import assert from "node:assert/strict";
import { buildPeerApi } from "./peer-api.js";
import { header, testNode } from "./testing.js";

test("GET /metrics returns 200 with Prometheus text content-type", async () => {
  const { node } = testNode();
  const app = buildPeerApi(node);
  await app.ready();

  const res = await app.inject({ method: "GET", url: "/metrics" });
  assert.equal(res.statusCode, 200);
  assert.ok(res.headers["content-type"]?.toString().includes("text/plain"));

  await app.close();
});

test("GET /metrics contains required metric names", async () => {
  const { node } = testNode();
  const app = buildPeerApi(node);
  await app.ready();

  const res = await app.inject({ method: "GET", url: "/metrics" });
  const body = res.body;

  const requiredMetrics = [
    "taskmesh_http_requests_total",
    "taskmesh_tasks_added_total",
    "taskmesh_tasks_removed_total",
    "taskmesh_results_delivered_total",
    "taskmesh_result_delivery_failures_total",
    "taskmesh_known_tasks",
    "taskmesh_supported_tasks",
    "taskmesh_active_tasks",
    "taskmesh_waiting_results",
    "taskmesh_pending_verifications",
  ];
  for (const metric of requiredMetrics) {
    assert.ok(body.includes(`# TYPE ${metric} `), `missing metric: ${metric}`);
  }

  await app.close();
});

test("GET /metrics gauges follow the registry and queue", async () => {
  const { node } = testNode();
  const app = buildPeerApi(node);
  await app.ready();

  await app.inject({ method: "POST", url: "/v1/headers", payload: header("t1") });
  await app.inject({
    method: "POST",
    url: "/v1/headers",
    payload: header("t2", { environment: "docker-gpu" }),
  });
  node.coordinator.submitResult({
    subtaskId: "s1",
    taskId: "t1",
    payload: null,
    resultType: "data",
    ownerAddress: "10.0.0.5",
    ownerPort: 40200,
  });

  const lines = (await app.inject({ method: "GET", url: "/metrics" })).body.split("\n");
  assert.ok(lines.includes("taskmesh_known_tasks 2"));
  assert.ok(lines.includes("taskmesh_supported_tasks 1"));
  assert.ok(lines.includes("taskmesh_waiting_results 1"));
  assert.ok(lines.includes("taskmesh_tasks_added_total 2"));
  assert.ok(lines.includes("taskmesh_pending_verifications 0"));

  await app.close();
});

test("GET /metrics counts delivery failures", async () => {
  const env = testNode();
  const app = buildPeerApi(env.node);
  await app.ready();
  env.sessions.unreachable.add("10.0.0.5:40200");
  env.node.coordinator.submitResult({
    subtaskId: "s1",
    taskId: "t1",
    payload: null,
    resultType: "data",
    ownerAddress: "10.0.0.5",
    ownerPort: 40200,
  });
  await (await env.node.tick()).deliveries;

  const lines = (await app.inject({ method: "GET", url: "/metrics" })).body.split("\n");
  assert.ok(lines.includes("taskmesh_result_delivery_failures_total 1"));
  assert.ok(lines.includes("taskmesh_results_delivered_total 0"));
  assert.ok(lines.includes("taskmesh_waiting_results 1"));

  await app.close();
});

test("GET /metrics without the telemetry plugin reports zero counters", async () => {
  const { node } = testNode();
  const app = buildPeerApi(node, { plugins: [] });
  await app.ready();

  node.onTaskHeaderReceived(header("t1"));
  const lines = (await app.inject({ method: "GET", url: "/metrics" })).body.split("\n");
  assert.ok(lines.includes("taskmesh_tasks_added_total 0"));
  assert.ok(lines.includes("taskmesh_known_tasks 1"));

  await app.close();
});
