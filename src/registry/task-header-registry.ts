import type {
  ActiveTaskEntry,
  TaskHeader,
  TaskHeaderPayload,
} from "../contracts.js";
import { ValidationError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { MarketPluginContext } from "../plugins/types.js";

export interface CapabilityFilter {
  supports(header: TaskHeader): boolean;
}

/** Tasks published by this node. Their headers never enter the registry. */
export interface LocalTaskSource {
  hasTask(taskId: string): boolean;
  listHeaders(): TaskHeader[];
}

export interface TaskHeaderRegistryOptions {
  capabilityFilter: CapabilityFilter;
  localTasks?: LocalTaskSource;
  removedTaskCooldownMs?: number;
  ctx?: MarketPluginContext;
  logger?: Logger;
  random?: () => number;
}

const noLocalTasks: LocalTaskSource = {
  hasTask: () => false,
  listHeaders: () => [],
};

function requireString(raw: Record<string, unknown>, field: string): string {
  const value = raw[field];
  if (typeof value !== "string" || value.length === 0) {
    throw new ValidationError(`task header field "${field}" must be a non-empty string`, field);
  }
  return value;
}

function requireNumber(raw: Record<string, unknown>, field: string, min: number): number {
  const value = raw[field];
  if (typeof value !== "number" || !Number.isFinite(value) || value < min) {
    throw new ValidationError(`task header field "${field}" must be a number >= ${min}`, field);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseTaskHeader(raw: unknown, now: number): TaskHeader {
  if (!isRecord(raw)) {
    throw new ValidationError("task header must be an object");
  }

  const port = requireNumber(raw, "port", 1);
  if (!Number.isInteger(port) || port > 65535) {
    throw new ValidationError('task header field "port" must be a valid TCP port', "port");
  }
  const ttlMs = requireNumber(raw, "ttlMs", 0);
  if (ttlMs === 0) {
    throw new ValidationError('task header field "ttlMs" must be positive', "ttlMs");
  }
  const minVersion = raw.minVersion;
  if (minVersion !== undefined && typeof minVersion !== "string") {
    throw new ValidationError('task header field "minVersion" must be a string', "minVersion");
  }

  return {
    taskId: requireString(raw, "taskId"),
    ownerId: requireString(raw, "ownerId"),
    ownerAddress: requireString(raw, "address"),
    ownerPort: port,
    environment: requireString(raw, "environment"),
    ttlMs,
    lastCheckedAt: now,
    subtaskTimeoutMs: requireNumber(raw, "subtaskTimeoutMs", 0),
    minVersion,
  };
}

export function toHeaderPayload(header: TaskHeader): TaskHeaderPayload {
  return {
    taskId: header.taskId,
    ownerId: header.ownerId,
    address: header.ownerAddress,
    port: header.ownerPort,
    environment: header.environment,
    ttlMs: header.ttlMs,
    subtaskTimeoutMs: header.subtaskTimeoutMs,
    ...(header.minVersion !== undefined ? { minVersion: header.minVersion } : {}),
  };
}

/**
 * Known task advertisements, the supported subset this node may request from,
 * and the per-task outstanding request counters.
 *
 * Only the coordination loop mutates it; every accessor hands out copies.
 */
export class TaskHeaderRegistry {
  private readonly headers = new Map<string, TaskHeader>();
  private supported: string[] = [];
  private readonly removedAt = new Map<string, number>();
  private readonly active = new Map<string, ActiveTaskEntry>();
  private readonly capabilityFilter: CapabilityFilter;
  private readonly localTasks: LocalTaskSource;
  private readonly removedTaskCooldownMs: number;
  private readonly ctx?: MarketPluginContext;
  private readonly logger?: Logger;
  private readonly random: () => number;

  constructor(options: TaskHeaderRegistryOptions) {
    this.capabilityFilter = options.capabilityFilter;
    this.localTasks = options.localTasks ?? noLocalTasks;
    this.removedTaskCooldownMs = options.removedTaskCooldownMs ?? 240_000;
    this.ctx = options.ctx;
    this.logger = options.logger;
    this.random = options.random ?? Math.random;
  }

  /**
   * Throws ValidationError for a malformed payload. Returns false without
   * touching state when the task is known, local, or recently removed.
   */
  add(payload: unknown, now = Date.now()): boolean {
    const header = parseTaskHeader(payload, now);
    const { taskId } = header;

    if (this.headers.has(taskId)) return false;
    if (this.localTasks.hasTask(taskId)) return false;
    const removedAt = this.removedAt.get(taskId);
    if (removedAt !== undefined && now - removedAt <= this.removedTaskCooldownMs) return false;

    this.headers.set(taskId, header);
    const supported = this.capabilityFilter.supports(header);
    if (supported) this.supported.push(taskId);

    this.logger?.info({ taskId, ownerId: header.ownerId, supported }, "task header added");
    this.ctx?.emit({ type: "task.added", at: now, taskId, detail: { supported } });
    return true;
  }

  remove(taskId: string, now = Date.now()): boolean {
    const known = this.headers.delete(taskId);
    this.supported = this.supported.filter((id) => id !== taskId);
    this.removedAt.set(taskId, now);

    const entry = this.active.get(taskId);
    if (entry && entry.outstandingRequests <= 0) this.active.delete(taskId);

    if (known) {
      this.logger?.info({ taskId }, "task header removed");
      this.ctx?.emit({ type: "task.removed", at: now, taskId });
    }
    return known;
  }

  /** Ages every header by the time since it was last checked. Returns removed ids. */
  tick(now = Date.now()): string[] {
    const removed: string[] = [];

    for (const header of [...this.headers.values()]) {
      header.ttlMs -= Math.max(0, now - header.lastCheckedAt);
      header.lastCheckedAt = Math.max(now, header.lastCheckedAt);
      if (header.ttlMs <= 0) {
        this.logger?.warn({ taskId: header.taskId }, "task header expired");
        this.remove(header.taskId, now);
        removed.push(header.taskId);
      } else if (this.localTasks.hasTask(header.taskId)) {
        this.remove(header.taskId, now);
        removed.push(header.taskId);
      }
    }

    for (const [taskId, removedAt] of this.removedAt) {
      if (now - removedAt > this.removedTaskCooldownMs) this.removedAt.delete(taskId);
    }

    return removed;
  }

  pickRandomSupported(): string | undefined {
    if (this.supported.length === 0) return undefined;
    const index = Math.min(
      this.supported.length - 1,
      Math.floor(this.random() * this.supported.length)
    );
    return this.supported[index];
  }

  /** Counts one more outstanding request, creating the entry from the current header. */
  beginRequest(taskId: string): ActiveTaskEntry | undefined {
    let entry = this.active.get(taskId);
    if (!entry) {
      const header = this.headers.get(taskId);
      if (!header) return undefined;
      entry = { taskId, header: { ...header }, outstandingRequests: 0 };
      this.active.set(taskId, entry);
    }
    entry.outstandingRequests += 1;
    return this.copyEntry(entry);
  }

  /**
   * Drops one outstanding request. The entry is deleted once nothing is
   * outstanding and the header has left the registry. Returns the remaining
   * count, or undefined when the task was not being tracked.
   */
  endRequest(taskId: string): number | undefined {
    const entry = this.active.get(taskId);
    if (!entry) return undefined;
    entry.outstandingRequests = Math.max(0, entry.outstandingRequests - 1);
    if (entry.outstandingRequests <= 0 && !this.headers.has(taskId)) {
      this.active.delete(taskId);
    }
    return entry.outstandingRequests;
  }

  has(taskId: string): boolean {
    return this.headers.has(taskId);
  }

  get(taskId: string): TaskHeader | undefined {
    const header = this.headers.get(taskId);
    return header ? { ...header } : undefined;
  }

  isRecentlyRemoved(taskId: string, now = Date.now()): boolean {
    const removedAt = this.removedAt.get(taskId);
    return removedAt !== undefined && now - removedAt <= this.removedTaskCooldownMs;
  }

  activeEntry(taskId: string): ActiveTaskEntry | undefined {
    const entry = this.active.get(taskId);
    return entry ? this.copyEntry(entry) : undefined;
  }

  listHeaders(): TaskHeader[] {
    return [...this.headers.values()].map((header) => ({ ...header }));
  }

  listLocalHeaders(): TaskHeader[] {
    return this.localTasks.listHeaders().map((header) => ({ ...header }));
  }

  listActiveEntries(): ActiveTaskEntry[] {
    return [...this.active.values()].map((entry) => this.copyEntry(entry));
  }

  supportedTaskIds(): string[] {
    return [...this.supported];
  }

  get size(): number {
    return this.headers.size;
  }

  private copyEntry(entry: ActiveTaskEntry): ActiveTaskEntry {
    return { ...entry, header: { ...entry.header } };
  }
}
