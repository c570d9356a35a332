export type SchemaVersion = "1.0";

/** Wire form of a task advertisement as it travels between peers. */
export interface TaskHeaderPayload {
  taskId: string;
  ownerId: string;
  address: string;
  port: number;
  environment: string;
  ttlMs: number;
  subtaskTimeoutMs: number;
  minVersion?: string;
}

export interface TaskHeader {
  taskId: string;
  ownerId: string;
  ownerAddress: string;
  ownerPort: number;
  environment: string;
  ttlMs: number;
  lastCheckedAt: number;
  subtaskTimeoutMs: number;
  minVersion?: string;
}

export interface TaskHeaderSummary extends TaskHeaderPayload {
  /** True for tasks published by this node. */
  local: boolean;
}

export interface ActiveTaskEntry {
  taskId: string;
  header: TaskHeader;
  outstandingRequests: number;
}

export type ResultType = "data" | "files";

export interface WaitingTaskResult {
  subtaskId: string;
  taskId: string;
  payload: unknown;
  resultType: ResultType;
  lastSendAttemptAt: number;
  retryDelayMs: number;
  ownerAddress: string;
  ownerPort: number;
  inFlight: boolean;
}

export type TrustRole = "computing" | "requesting";

export interface ComputeCapabilities {
  estimatedPerformance: number;
  maxResourceSize: number;
  maxMemorySize: number;
  numCores: number;
}

export interface PeerRef {
  nodeId: string;
  /** Known only when the peer left a reachable endpoint with its result. */
  address?: string;
  port?: number;
}

export type SubtaskState =
  | "resource_requested"
  | "resource_granted"
  | "resource_rejected"
  | "result_queued"
  | "result_submitted"
  | "accepted"
  | "rejected";

export interface ResourceDescriptor {
  files: string[];
  deltaSize?: number;
}

// ── Session messages ──────────────────────────────────────────────────────

export interface TaskRequestMessage {
  schemaVersion: SchemaVersion;
  nodeId: string;
  taskId: string;
  capabilities: ComputeCapabilities;
}

export interface ResourceRequestMessage {
  schemaVersion: SchemaVersion;
  subtaskId: string;
  resource: ResourceDescriptor;
}

export interface ResultReportMessage {
  schemaVersion: SchemaVersion;
  subtaskId: string;
  taskId: string;
  nodeId: string;
  resultType: ResultType;
  payload: unknown;
  /** Where the owner reaches this node with the verification verdict. */
  address: string;
  port: number;
}

export interface VerificationMessage {
  schemaVersion: SchemaVersion;
  accepted: boolean;
  reward?: number | string;
  reason?: string;
}
