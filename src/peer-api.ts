import Fastify from "fastify";
import type { FastifyInstance, FastifyReply } from "fastify";
import { loadMarketConfig } from "./config.js";
import type {
  ResourceRequestMessage,
  ResultReportMessage,
  TaskHeaderPayload,
  TaskRequestMessage,
} from "./contracts.js";
import { AlreadyResolvedError, ValidationError } from "./errors.js";
import { resolveLogLevel } from "./logger.js";
import { MarketplaceNode, type MarketplaceNodeOptions } from "./marketplace-node.js";
import type { MarketPlugin } from "./plugins/types.js";
import { createTelemetryPlugin, type TelemetryPlugin } from "./plugins/telemetry-plugin.js";

/**
 * Inbound messages addressed to the owner of a task. They belong to the local
 * task manager, which lives outside this node.
 */
export interface TaskOwnerHandler {
  onTaskRequest(message: TaskRequestMessage): Promise<void> | void;
  onResourceRequest(message: ResourceRequestMessage): Promise<void> | void;
  onResultReported(message: ResultReportMessage): Promise<void> | void;
}

export interface PeerApiOptions {
  plugins?: MarketPlugin[];
  owner?: TaskOwnerHandler;
  logLevel?: string;
}

const taskHeaderSchema = {
  type: "object",
  required: ["taskId", "ownerId", "address", "port", "environment", "ttlMs", "subtaskTimeoutMs"],
  properties: {
    taskId: { type: "string", minLength: 1 },
    ownerId: { type: "string", minLength: 1 },
    address: { type: "string", minLength: 1 },
    port: { type: "integer", minimum: 1, maximum: 65535 },
    environment: { type: "string", minLength: 1 },
    ttlMs: { type: "number", exclusiveMinimum: 0 },
    subtaskTimeoutMs: { type: "number", minimum: 0 },
    minVersion: { type: "string" },
  },
} as const;

function sendMarketError(reply: FastifyReply, err: unknown) {
  if (err instanceof AlreadyResolvedError) {
    return reply.code(409).send({ ok: false, error: err.code, resolution: err.resolution });
  }
  if (err instanceof ValidationError) {
    return reply.code(400).send({ ok: false, error: err.code, field: err.field ?? null });
  }
  throw err;
}

export function buildPeerApi(node: MarketplaceNode, options: PeerApiOptions = {}): FastifyInstance {
  const app = Fastify({ logger: { level: resolveLogLevel(options.logLevel ?? node.config.logLevel) } });
  const { ctx } = node;

  const defaultTelemetry: TelemetryPlugin | null = options.plugins ? null : createTelemetryPlugin();
  const plugins: MarketPlugin[] = options.plugins ?? (defaultTelemetry ? [defaultTelemetry] : []);
  for (const plugin of plugins) {
    plugin.register(app, ctx);
  }

  app.get("/health", async () => ({ ok: true, nodeId: node.config.nodeId }));

  app.get("/metrics", async (_req, reply) => {
    const stats = node.stats();
    const c = defaultTelemetry?.snapshot().counters ?? {};

    const lines: string[] = [
      "# HELP taskmesh_http_requests_total Total HTTP requests processed",
      "# TYPE taskmesh_http_requests_total counter",
      `taskmesh_http_requests_total ${c["http.requests.total"] ?? 0}`,
      "# HELP taskmesh_tasks_added_total Task headers added since startup",
      "# TYPE taskmesh_tasks_added_total counter",
      `taskmesh_tasks_added_total ${c["event.task.added"] ?? 0}`,
      "# HELP taskmesh_tasks_removed_total Task headers removed since startup",
      "# TYPE taskmesh_tasks_removed_total counter",
      `taskmesh_tasks_removed_total ${c["event.task.removed"] ?? 0}`,
      "# HELP taskmesh_results_delivered_total Results handed to task owners since startup",
      "# TYPE taskmesh_results_delivered_total counter",
      `taskmesh_results_delivered_total ${c["event.result.delivered"] ?? 0}`,
      "# HELP taskmesh_result_delivery_failures_total Failed result delivery attempts since startup",
      "# TYPE taskmesh_result_delivery_failures_total counter",
      `taskmesh_result_delivery_failures_total ${c["event.result.delivery_failed"] ?? 0}`,
      "# HELP taskmesh_known_tasks Current number of known remote task headers",
      "# TYPE taskmesh_known_tasks gauge",
      `taskmesh_known_tasks ${stats.knownTasks}`,
      "# HELP taskmesh_supported_tasks Current number of task headers this node can compute",
      "# TYPE taskmesh_supported_tasks gauge",
      `taskmesh_supported_tasks ${stats.supportedTasks}`,
      "# HELP taskmesh_active_tasks Current number of tasks with outstanding requests",
      "# TYPE taskmesh_active_tasks gauge",
      `taskmesh_active_tasks ${stats.activeTasks}`,
      "# HELP taskmesh_waiting_results Current number of results waiting for delivery",
      "# TYPE taskmesh_waiting_results gauge",
      `taskmesh_waiting_results ${stats.waitingResults}`,
      "# HELP taskmesh_pending_verifications Current number of delivered results awaiting a verdict",
      "# TYPE taskmesh_pending_verifications gauge",
      `taskmesh_pending_verifications ${stats.pendingVerifications}`,
      "",
    ];

    reply.header("content-type", "text/plain; version=0.0.4; charset=utf-8");
    return reply.send(lines.join("\n"));
  });

  // ── Task headers ──────────────────────────────────────────────────────────

  app.post<{ Body: TaskHeaderPayload }>(
    "/v1/headers",
    { schema: { body: taskHeaderSchema } },
    async (req) => ({ ok: true, added: node.onTaskHeaderReceived(req.body) })
  );

  app.delete<{ Params: { taskId: string } }>("/v1/headers/:taskId", async (req, reply) => {
    const removed = node.onTaskHeaderRetracted(req.params.taskId);
    if (!removed) return reply.code(404).send({ ok: false, error: "task_not_found" });
    return { ok: true };
  });

  app.get("/v1/tasks", async () => ({ ok: true, tasks: node.listKnownTasks() }));
  app.get("/v1/results", async () => ({ ok: true, results: node.waitingResults() }));
  app.get("/v1/stats", async () => ({ ok: true, ...node.stats() }));

  app.get<{ Params: { peerId: string } }>("/v1/trust/:peerId", async (req) => ({
    ok: true,
    peerId: req.params.peerId,
    scores: await node.reputation.listScores(req.params.peerId),
  }));

  // ── Computing side callbacks ──────────────────────────────────────────────

  app.post<{ Params: { subtaskId: string }; Body: { ok: boolean; reason?: string } }>(
    "/v1/subtasks/:subtaskId/resource-result",
    {
      schema: {
        body: {
          type: "object",
          required: ["ok"],
          properties: { ok: { type: "boolean" }, reason: { type: "string" } },
        },
      },
    },
    async (req, reply) => {
      try {
        node.onResourceRequestResult(req.params.subtaskId, req.body.ok, req.body.reason);
      } catch (err) {
        return sendMarketError(reply, err);
      }
      return { ok: true };
    }
  );

  app.post<{
    Params: { subtaskId: string };
    Body: { schemaVersion?: string; accepted: boolean; reward?: number | string; reason?: string };
  }>(
    "/v1/subtasks/:subtaskId/verification",
    {
      schema: {
        body: {
          type: "object",
          required: ["accepted"],
          properties: {
            schemaVersion: { type: "string" },
            accepted: { type: "boolean" },
            reward: { anyOf: [{ type: "number" }, { type: "string" }] },
            reason: { type: "string" },
          },
        },
      },
    },
    async (req, reply) => {
      const { accepted, reward, reason } = req.body;
      try {
        const consumed = await node.onVerificationResult(
          req.params.subtaskId,
          accepted,
          accepted ? reward : reason
        );
        return { ok: true, consumed };
      } catch (err) {
        return sendMarketError(reply, err);
      }
    }
  );

  // ── Owner side inbound ────────────────────────────────────────────────────

  const owner = options.owner;

  app.post<{ Params: { taskId: string }; Body: TaskRequestMessage }>(
    "/v1/tasks/:taskId/requests",
    {
      schema: {
        body: {
          type: "object",
          required: ["nodeId", "taskId", "capabilities"],
          properties: {
            nodeId: { type: "string", minLength: 1 },
            taskId: { type: "string", minLength: 1 },
            capabilities: { type: "object" },
          },
        },
      },
    },
    async (req, reply) => {
      if (!owner) return reply.code(501).send({ ok: false, error: "owner_handler_unavailable" });
      if (req.body.taskId !== req.params.taskId)
        return reply.code(400).send({ ok: false, error: "task_id_mismatch" });
      await owner.onTaskRequest(req.body);
      return { ok: true };
    }
  );

  app.post<{ Params: { subtaskId: string }; Body: ResourceRequestMessage }>(
    "/v1/subtasks/:subtaskId/resources",
    {
      schema: {
        body: {
          type: "object",
          required: ["subtaskId", "resource"],
          properties: {
            subtaskId: { type: "string", minLength: 1 },
            resource: { type: "object" },
          },
        },
      },
    },
    async (req, reply) => {
      if (!owner) return reply.code(501).send({ ok: false, error: "owner_handler_unavailable" });
      if (req.body.subtaskId !== req.params.subtaskId)
        return reply.code(400).send({ ok: false, error: "subtask_id_mismatch" });
      await owner.onResourceRequest(req.body);
      return { ok: true };
    }
  );

  app.post<{ Params: { subtaskId: string }; Body: ResultReportMessage }>(
    "/v1/subtasks/:subtaskId/results",
    {
      schema: {
        body: {
          type: "object",
          required: ["subtaskId", "taskId", "nodeId", "resultType", "address", "port"],
          properties: {
            subtaskId: { type: "string", minLength: 1 },
            taskId: { type: "string", minLength: 1 },
            nodeId: { type: "string", minLength: 1 },
            resultType: { type: "string", enum: ["data", "files"] },
            address: { type: "string", minLength: 1 },
            port: { type: "integer", minimum: 1, maximum: 65535 },
          },
        },
      },
    },
    async (req, reply) => {
      if (!owner) return reply.code(501).send({ ok: false, error: "owner_handler_unavailable" });
      if (req.body.subtaskId !== req.params.subtaskId)
        return reply.code(400).send({ ok: false, error: "subtask_id_mismatch" });
      await owner.onResultReported(req.body);
      return { ok: true };
    }
  );

  // Stop the sync loop with the server.
  app.addHook("onClose", async () => node.stop());

  return app;
}

export async function startPeerApi(
  options: Omit<MarketplaceNodeOptions, "config"> & PeerApiOptions & { env?: NodeJS.ProcessEnv }
) {
  const config = loadMarketConfig(options.env);
  const node = new MarketplaceNode({ ...options, config });
  const app = buildPeerApi(node, options);
  await app.listen({ host: config.host, port: config.port });
  node.start();
  app.log.info(`taskmesh node ${config.nodeId} listening on http://${config.host}:${config.port}`);
  return { app, node };
}
