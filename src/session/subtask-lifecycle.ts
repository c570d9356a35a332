import type { SubtaskState } from "../contracts.js";
import { AlreadyResolvedError } from "../errors.js";

type Resolution = Extract<SubtaskState, "accepted" | "rejected">;

export interface SubtaskRecord {
  subtaskId: string;
  taskId?: string;
  state: SubtaskState;
  updatedAt: number;
}

function isTerminal(state: SubtaskState): state is Resolution {
  return state === "accepted" || state === "rejected";
}

/** Current state per subtask. Terminal states are final: any later move throws. */
export class SubtaskLifecycle {
  private readonly records = new Map<string, SubtaskRecord>();

  constructor(private readonly clock: () => number = Date.now) {}

  state(subtaskId: string): SubtaskState | undefined {
    return this.records.get(subtaskId)?.state;
  }

  get(subtaskId: string): SubtaskRecord | undefined {
    const record = this.records.get(subtaskId);
    return record ? { ...record } : undefined;
  }

  taskIdOf(subtaskId: string): string | undefined {
    return this.records.get(subtaskId)?.taskId;
  }

  advance(subtaskId: string, next: SubtaskState, taskId?: string): SubtaskRecord {
    const current = this.records.get(subtaskId);
    if (current && isTerminal(current.state)) {
      throw new AlreadyResolvedError(subtaskId, current.state);
    }
    const record: SubtaskRecord = {
      subtaskId,
      taskId: taskId ?? current?.taskId,
      state: next,
      updatedAt: this.clock(),
    };
    this.records.set(subtaskId, record);
    return { ...record };
  }

  resolve(subtaskId: string, resolution: Resolution): SubtaskRecord {
    return this.advance(subtaskId, resolution);
  }

  /** Puts back a record taken with `get`, or forgets the subtask when there was none. */
  restore(subtaskId: string, previous: SubtaskRecord | undefined): void {
    if (previous) {
      this.records.set(subtaskId, { ...previous });
    } else {
      this.records.delete(subtaskId);
    }
  }

  /** Drops accepted and rejected records last updated more than `retentionMs` before `now`. */
  prune(now: number, retentionMs: number): string[] {
    const dropped: string[] = [];
    for (const [subtaskId, record] of this.records) {
      if (isTerminal(record.state) && now - record.updatedAt > retentionMs) {
        this.records.delete(subtaskId);
        dropped.push(subtaskId);
      }
    }
    return dropped;
  }

  list(): SubtaskRecord[] {
    return [...this.records.values()].map((record) => ({ ...record }));
  }
}
