export class MarketError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = "MarketError";
    this.code = code;
  }
}

/** Malformed header, result or configuration value. No state was changed. */
export class ValidationError extends MarketError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, "validation_failed");
    this.name = "ValidationError";
    this.field = field;
  }
}

export class ConnectionFailure extends MarketError {
  public readonly address: string;
  public readonly port: number;

  constructor(address: string, port: number, reason: string) {
    super(`cannot connect to ${address}:${port}: ${reason}`, "connection_failed");
    this.name = "ConnectionFailure";
    this.address = address;
    this.port = port;
  }
}

export class DuplicateResultError extends MarketError {
  public readonly subtaskId: string;

  constructor(subtaskId: string) {
    super(`result for subtask ${subtaskId} is already queued`, "duplicate_result");
    this.name = "DuplicateResultError";
    this.subtaskId = subtaskId;
  }
}

export class AlreadyResolvedError extends MarketError {
  public readonly subtaskId: string;
  public readonly resolution: "accepted" | "rejected";

  constructor(subtaskId: string, resolution: "accepted" | "rejected") {
    super(`subtask ${subtaskId} was already ${resolution}`, "already_resolved");
    this.name = "AlreadyResolvedError";
    this.subtaskId = subtaskId;
    this.resolution = resolution;
  }
}

export class PaymentError extends MarketError {
  public readonly subtaskId: string;

  constructor(subtaskId: string, reward: unknown) {
    super(`invalid reward ${String(reward)} for subtask ${subtaskId}`, "invalid_reward");
    this.name = "PaymentError";
    this.subtaskId = subtaskId;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
