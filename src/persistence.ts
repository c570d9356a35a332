import type { TrustRole } from "./contracts.js";
import type { ReputationSink, TrustBounds } from "./trust/trust-ledger.js";

export type TrustScores = Record<TrustRole, number>;

export interface ReputationStore extends ReputationSink {
  /** Applies a delta and resolves with the clamped score now stored. */
  apply(peerId: string, role: TrustRole, delta: number): Promise<number>;
  getScore(peerId: string, role: TrustRole): Promise<number>;
  listScores(peerId: string): Promise<TrustScores>;
  listPeers(): Promise<string[]>;
}

export function clampScore(score: number, bounds: TrustBounds): number {
  if (Number.isNaN(score)) return bounds.minTrust;
  return Math.min(Math.max(score, bounds.minTrust), bounds.maxTrust);
}

export class InMemoryReputationStore implements ReputationStore {
  private scores = new Map<string, TrustScores>();
  private readonly bounds: TrustBounds;
  private readonly initialScore: number;

  constructor(options: Partial<TrustBounds> & { initialScore?: number } = {}) {
    this.bounds = { minTrust: options.minTrust ?? 0, maxTrust: options.maxTrust ?? 1 };
    this.initialScore = clampScore(options.initialScore ?? this.bounds.minTrust, this.bounds);
  }

  async apply(peerId: string, role: TrustRole, delta: number): Promise<number> {
    const scores = this.scores.get(peerId) ?? {
      computing: this.initialScore,
      requesting: this.initialScore,
    };
    scores[role] = clampScore(scores[role] + delta, this.bounds);
    this.scores.set(peerId, scores);
    return scores[role];
  }

  async getScore(peerId: string, role: TrustRole): Promise<number> {
    return this.scores.get(peerId)?.[role] ?? this.initialScore;
  }

  async listScores(peerId: string): Promise<TrustScores> {
    const scores = this.scores.get(peerId);
    return scores
      ? { ...scores }
      : { computing: this.initialScore, requesting: this.initialScore };
  }

  async listPeers(): Promise<string[]> {
    return [...this.scores.keys()];
  }
}
