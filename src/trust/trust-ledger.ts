import type { TrustRole } from "../contracts.js";
import { ValidationError } from "../errors.js";
import type { Logger } from "../logger.js";

export interface ReputationSink {
  apply(peerId: string, role: TrustRole, delta: number): Promise<unknown> | void;
}

/** Per-subtask trust weight, typically derived from the estimated task size. */
export interface TrustModifierSource {
  trustModFor(subtaskId: string): number;
}

export interface TrustBounds {
  minTrust: number;
  maxTrust: number;
}

export class TrustLedger {
  readonly minTrust: number;
  readonly maxTrust: number;
  private readonly sink: ReputationSink;
  private readonly trustMods: TrustModifierSource;
  private readonly logger?: Logger;

  constructor(
    sink: ReputationSink,
    trustMods: TrustModifierSource,
    options: Partial<TrustBounds> & { logger?: Logger } = {}
  ) {
    this.minTrust = options.minTrust ?? 0;
    this.maxTrust = options.maxTrust ?? 1;
    if (!(this.minTrust <= this.maxTrust)) {
      throw new ValidationError(
        `minTrust (${this.minTrust}) must not exceed maxTrust (${this.maxTrust})`,
        "minTrust"
      );
    }
    this.sink = sink;
    this.trustMods = trustMods;
    this.logger = options.logger;
  }

  boundedDelta(raw: number): number {
    if (Number.isNaN(raw)) return this.minTrust;
    return Math.min(Math.max(raw, this.minTrust), this.maxTrust);
  }

  increaseComputing(peerId: string, subtaskId: string): Promise<number> {
    return this.forward(peerId, "computing", this.computingDelta(subtaskId));
  }

  decreaseComputing(peerId: string, subtaskId: string): Promise<number> {
    return this.forward(peerId, "computing", -this.computingDelta(subtaskId));
  }

  // Requester trust swings by the full maxTrust: a requester either paid fairly or not.
  increaseRequesting(peerId: string): Promise<number> {
    return this.forward(peerId, "requesting", this.maxTrust);
  }

  decreaseRequesting(peerId: string): Promise<number> {
    return this.forward(peerId, "requesting", -this.maxTrust);
  }

  private computingDelta(subtaskId: string): number {
    return this.boundedDelta(this.trustMods.trustModFor(subtaskId));
  }

  private async forward(peerId: string, role: TrustRole, delta: number): Promise<number> {
    await this.sink.apply(peerId, role, delta);
    this.logger?.debug({ peerId, role, delta }, "trust adjusted");
    return delta;
  }
}
