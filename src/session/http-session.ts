import type {
  ResourceRequestMessage,
  ResultReportMessage,
  TaskRequestMessage,
  VerificationMessage,
} from "../contracts.js";
import { ConnectionFailure, errorMessage } from "../errors.js";
import type { PeerSession, SessionOpener, SessionOpenResult } from "./types.js";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpSessionOptions {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

const SCHEMA_VERSION = "1.0" as const;

async function httpJson(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<unknown> {
  const res = await fetchImpl(url, {
    ...init,
    signal: AbortSignal.timeout(timeoutMs),
    headers: {
      "content-type": "application/json",
      ...(init.headers ?? {}),
    },
  });
  if (!res.ok) {
    const text = await res.text();
    throw new Error(`HTTP ${res.status} ${res.statusText}: ${text}`);
  }
  const text = await res.text();
  return text ? JSON.parse(text) : undefined;
}

class HttpPeerSession implements PeerSession {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchImpl: FetchLike,
    private readonly timeoutMs: number
  ) {}

  async requestTask(message: TaskRequestMessage): Promise<void> {
    await this.post(`/v1/tasks/${encodeURIComponent(message.taskId)}/requests`, message);
  }

  async requestResource(message: ResourceRequestMessage): Promise<void> {
    await this.post(`/v1/subtasks/${encodeURIComponent(message.subtaskId)}/resources`, message);
  }

  async reportResult(message: ResultReportMessage): Promise<void> {
    await this.post(`/v1/subtasks/${encodeURIComponent(message.subtaskId)}/results`, message);
  }

  sendReward(subtaskId: string, reward: number): Promise<void> {
    return this.sendVerdict(subtaskId, { schemaVersion: SCHEMA_VERSION, accepted: true, reward });
  }

  sendResultRejected(subtaskId: string, reason: string): Promise<void> {
    return this.sendVerdict(subtaskId, { schemaVersion: SCHEMA_VERSION, accepted: false, reason });
  }

  /** A peer that answers `consumed: false` had nothing pending for the subtask. */
  private async sendVerdict(subtaskId: string, body: VerificationMessage): Promise<void> {
    const reply = await this.post(`/v1/subtasks/${encodeURIComponent(subtaskId)}/verification`, body);
    const consumed =
      typeof reply === "object" && reply !== null && "consumed" in reply ? reply.consumed : true;
    if (consumed === false) {
      throw new Error(`peer did not consume the verdict for subtask ${subtaskId}`);
    }
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    return httpJson(
      this.fetchImpl,
      `${this.baseUrl}${path}`,
      { method: "POST", body: JSON.stringify(body) },
      this.timeoutMs
    );
  }
}

/** Opens sessions against another node's peer API. The health probe stands in for connecting. */
export class HttpSessionOpener implements SessionOpener {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(options: HttpSessionOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  async open(address: string, port: number): Promise<SessionOpenResult> {
    const baseUrl = `http://${address}:${port}`;
    try {
      const res = await this.fetchImpl(`${baseUrl}/health`, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!res.ok) {
        return { ok: false, failure: new ConnectionFailure(address, port, `HTTP ${res.status}`) };
      }
    } catch (err) {
      return { ok: false, failure: new ConnectionFailure(address, port, errorMessage(err)) };
    }
    return { ok: true, session: new HttpPeerSession(baseUrl, this.fetchImpl, this.timeoutMs) };
  }
}
