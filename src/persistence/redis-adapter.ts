import { Redis } from "ioredis";
import type { TrustRole } from "../contracts.js";
import { clampScore, type ReputationStore, type TrustScores } from "../persistence.js";
import type { TrustBounds } from "../trust/trust-ledger.js";

/**
 * Reputation scores kept in Redis: one hash per peer (`trust:<peerId>`, fields
 * per role) plus the `trust:peers` set. Writes are read-modify-write; the
 * coordination loop is the only writer.
 */
export class RedisReputationStore implements ReputationStore {
  private readonly redis: Redis;
  private readonly bounds: TrustBounds;
  private readonly initialScore: number;

  constructor(
    redisOrUrl: Redis | string,
    options: Partial<TrustBounds> & { initialScore?: number } = {}
  ) {
    this.redis = typeof redisOrUrl === "string" ? new Redis(redisOrUrl) : redisOrUrl;
    this.bounds = { minTrust: options.minTrust ?? 0, maxTrust: options.maxTrust ?? 1 };
    this.initialScore = clampScore(options.initialScore ?? this.bounds.minTrust, this.bounds);
  }

  async apply(peerId: string, role: TrustRole, delta: number): Promise<number> {
    const current = await this.getScore(peerId, role);
    const next = clampScore(current + delta, this.bounds);
    await this.redis.hset(`trust:${peerId}`, role, String(next));
    await this.redis.sadd("trust:peers", peerId);
    return next;
  }

  async getScore(peerId: string, role: TrustRole): Promise<number> {
    const raw = await this.redis.hget(`trust:${peerId}`, role);
    return this.parseScore(raw);
  }

  async listScores(peerId: string): Promise<TrustScores> {
    const raw = await this.redis.hgetall(`trust:${peerId}`);
    return {
      computing: this.parseScore(raw.computing ?? null),
      requesting: this.parseScore(raw.requesting ?? null),
    };
  }

  async listPeers(): Promise<string[]> {
    return this.redis.smembers("trust:peers");
  }

  async quit(): Promise<void> {
    await this.redis.quit();
  }

  private parseScore(raw: string | null): number {
    if (raw === null) return this.initialScore;
    const value = Number(raw);
    return Number.isFinite(value) ? clampScore(value, this.bounds) : this.initialScore;
  }
}
