import type {
  ResourceRequestMessage,
  ResultReportMessage,
  TaskRequestMessage,
} from "../contracts.js";
import type { ConnectionFailure } from "../errors.js";

/** A request/response channel to one peer. Any rejection counts as a send failure. */
export interface PeerSession {
  requestTask(message: TaskRequestMessage): Promise<void>;
  requestResource(message: ResourceRequestMessage): Promise<void>;
  reportResult(message: ResultReportMessage): Promise<void>;
  sendReward(subtaskId: string, reward: number): Promise<void>;
  sendResultRejected(subtaskId: string, reason: string): Promise<void>;
}

export type SessionOpenResult =
  | { ok: true; session: PeerSession }
  | { ok: false; failure: ConnectionFailure };

export interface SessionOpener {
  open(address: string, port: number): Promise<SessionOpenResult>;
}

export interface PaymentHandle {
  paymentId: string;
  subtaskId: string;
  amount: number;
}

export interface PaymentService {
  /** Requester side: pays the computing peer for an accepted subtask. */
  pay(subtaskId: string, amount: number): Promise<PaymentHandle>;
  rewardFor(subtaskId: string): number;
  /** Computing side: books the reward the requester announced. */
  collectReward(subtaskId: string, amount: number): Promise<void> | void;
}

/** The local scheduler/executor that decided to request work. */
export interface LocalExecutor {
  taskRequestRejected(taskId: string, reason: string): void;
  resourceRequestRejected(subtaskId: string, reason: string): void;
  resourceGranted(subtaskId: string): void;
}
