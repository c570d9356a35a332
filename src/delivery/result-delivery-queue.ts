import type { ResultType, WaitingTaskResult } from "../contracts.js";
import { resendDelayAfterFailure } from "../control/retry-policy.js";
import { DuplicateResultError, errorMessage, ValidationError } from "../errors.js";
import type { Logger } from "../logger.js";

export interface EnqueueResultInput {
  subtaskId: string;
  taskId: string;
  payload: unknown;
  resultType: ResultType;
  ownerAddress: string;
  ownerPort: number;
}

/** Resolves true once the owner has the result; false or a rejection means retry later. */
export type DeliverFn = (result: Readonly<WaitingTaskResult>) => Promise<boolean>;

export interface FlushOutcome {
  delivered: string[];
  failed: string[];
}

export interface FlushRound {
  attempted: string[];
  /** Never rejects. */
  settled: Promise<FlushOutcome>;
}

export class ResultDeliveryQueue {
  private readonly results = new Map<string, WaitingTaskResult>();
  private readonly maxResendDelayMs: number;
  private readonly clock: () => number;
  private readonly logger?: Logger;

  constructor(options: { maxResendDelayMs?: number; clock?: () => number; logger?: Logger } = {}) {
    this.maxResendDelayMs = options.maxResendDelayMs ?? 30_000;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger;
  }

  enqueue(input: EnqueueResultInput): WaitingTaskResult {
    if (!input.subtaskId) throw new ValidationError("subtaskId is required", "subtaskId");
    if (!input.ownerAddress) throw new ValidationError("ownerAddress is required", "ownerAddress");
    if (!Number.isInteger(input.ownerPort) || input.ownerPort < 1 || input.ownerPort > 65535) {
      throw new ValidationError("ownerPort must be a valid TCP port", "ownerPort");
    }
    if (this.results.has(input.subtaskId)) throw new DuplicateResultError(input.subtaskId);

    const entry: WaitingTaskResult = {
      ...input,
      lastSendAttemptAt: 0,
      retryDelayMs: 0,
      inFlight: false,
    };
    this.results.set(input.subtaskId, entry);
    return { ...entry };
  }

  /**
   * Starts one delivery attempt for every due entry that is not already in
   * flight. Returns without waiting for the attempts to finish.
   */
  flush(deliver: DeliverFn, now = this.clock()): FlushRound {
    const due = [...this.results.values()].filter(
      (entry) => !entry.inFlight && now - entry.lastSendAttemptAt > entry.retryDelayMs
    );

    const attempts = due.map((entry) => {
      entry.inFlight = true;
      return this.attempt(entry, deliver, now);
    });

    const settled = Promise.all(attempts).then((outcomes) => {
      const result: FlushOutcome = { delivered: [], failed: [] };
      due.forEach((entry, i) => {
        (outcomes[i] ? result.delivered : result.failed).push(entry.subtaskId);
      });
      return result;
    });

    return { attempted: due.map((entry) => entry.subtaskId), settled };
  }

  acknowledge(subtaskId: string): boolean {
    return this.results.delete(subtaskId);
  }

  markFailed(subtaskId: string, at = this.clock()): void {
    const entry = this.results.get(subtaskId);
    if (!entry) return;
    entry.inFlight = false;
    entry.lastSendAttemptAt = at;
    entry.retryDelayMs = resendDelayAfterFailure(this.maxResendDelayMs);
  }

  get(subtaskId: string): WaitingTaskResult | undefined {
    const entry = this.results.get(subtaskId);
    return entry ? { ...entry } : undefined;
  }

  has(subtaskId: string): boolean {
    return this.results.has(subtaskId);
  }

  list(): WaitingTaskResult[] {
    return [...this.results.values()].map((entry) => ({ ...entry }));
  }

  get size(): number {
    return this.results.size;
  }

  private async attempt(entry: WaitingTaskResult, deliver: DeliverFn, now: number): Promise<boolean> {
    let delivered = false;
    try {
      delivered = await deliver({ ...entry });
    } catch (err) {
      this.logger?.warn(
        { subtaskId: entry.subtaskId, err: errorMessage(err) },
        "result delivery attempt threw"
      );
    }

    if (delivered) {
      this.acknowledge(entry.subtaskId);
    } else {
      this.markFailed(entry.subtaskId, now);
    }
    return delivered;
  }
}
