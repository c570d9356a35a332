import type { FastifyInstance } from "fastify";

export type MarketEventType =
  | "task.added"
  | "task.removed"
  | "task.requested"
  | "task.request_failed"
  | "resource.requested"
  | "resource.granted"
  | "resource.rejected"
  | "result.queued"
  | "result.delivered"
  | "result.delivery_failed"
  | "subtask.accepted"
  | "subtask.rejected"
  | "verification.accepted"
  | "verification.rejected";

export interface MarketEvent {
  type: MarketEventType;
  at: number;
  taskId?: string;
  subtaskId?: string;
  peerId?: string;
  detail?: Record<string, unknown>;
}

export interface MarketPluginContext {
  emit(event: MarketEvent): void;
}

export interface MarketPlugin {
  name: string;
  register(app: FastifyInstance, ctx: MarketPluginContext): void;
}

export function createPluginContext(): MarketPluginContext {
  return { emit() {} };
}
