/**
 * Sliding window rate limiter for mutating calls, using Redis sorted sets
 * when a client is given and an in-memory map otherwise. Check-and-record
 * runs behind one mutex shared by every session.
 */
import type { Redis } from "ioredis";
import type { Logger } from "../utils/logger.js";
import { Mutex } from "./mutex.js";

export interface RateLimitConfig {
  maxRequests: number;
  windowSeconds: number;
  /** How long `acquire` may wait for budget before giving up. */
  maxWaitSeconds: number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  retryAfterMs?: number;
  waitedMs?: number;
}

export class RateLimiter {
  private inMemory = new Map<string, number[]>();
  private mutex = new Mutex();
  private lastSweep = 0;

  constructor(
    private redis: Redis | null,
    private logger: Logger,
    private config: RateLimitConfig
  ) {}

  /** Scope keys currently held by the in-memory window. */
  get trackedKeys(): number {
    return this.inMemory.size;
  }

  /** Record one request if the window has budget for it. */
  async check(scope: string, identifier: string): Promise<RateLimitResult> {
    const key = `ratelimit:${scope}:${identifier}`;

    return this.mutex.runExclusive(async () => {
      const now = Date.now();
      const windowStart = now - this.config.windowSeconds * 1000;

      if (this.redis) {
        try {
          return await this.checkRedis(this.redis, key, now, windowStart);
        } catch (err) {
          this.logger.debug({ error: err }, "Redis rate limit check failed, falling back to in-memory");
        }
      }
      return this.checkInMemory(key, now, windowStart);
    });
  }

  /**
   * Like `check`, but paces the caller: while the window is full and the
   * next slot opens within the configured max wait, sleep and try again.
   */
  async acquire(scope: string, identifier: string): Promise<RateLimitResult> {
    const deadline = Date.now() + this.config.maxWaitSeconds * 1000;
    const startedAt = Date.now();

    for (;;) {
      const result = await this.check(scope, identifier);
      if (result.allowed) {
        return { ...result, waitedMs: Date.now() - startedAt };
      }

      const retryAfterMs = result.retryAfterMs ?? this.config.windowSeconds * 1000;
      if (Date.now() + retryAfterMs > deadline) {
        this.logger.warn({ scope, identifier, retryAfterMs }, "Rate limit exhausted");
        return result;
      }

      this.logger.debug({ scope, identifier, retryAfterMs }, "Pacing mutating call");
      await new Promise((resolve) => setTimeout(resolve, retryAfterMs));
    }
  }

  private async checkRedis(
    redis: Redis,
    key: string,
    now: number,
    windowStart: number
  ): Promise<RateLimitResult> {
    const results = await redis.pipeline().zremrangebyscore(key, 0, windowStart).zcard(key).exec();
    const cardinality = results?.[1]?.[1];
    const count = typeof cardinality === "number" ? cardinality : 0;

    if (count >= this.config.maxRequests) {
      const oldest = await redis.zrange(key, 0, 0, "WITHSCORES");
      const oldestTime = oldest[1] ? parseInt(oldest[1], 10) : now;
      return this.denied(oldestTime, now);
    }

    await redis
      .pipeline()
      .zadd(key, now, `${now}:${Math.random()}`)
      .expire(key, Math.ceil(this.config.windowSeconds))
      .exec();

    return { allowed: true, remaining: this.config.maxRequests - count - 1 };
  }

  private checkInMemory(key: string, now: number, windowStart: number): RateLimitResult {
    this.sweepInMemory(now, windowStart);
    const timestamps = (this.inMemory.get(key) ?? []).filter((t) => t > windowStart);

    if (timestamps.length >= this.config.maxRequests) {
      this.inMemory.set(key, timestamps);
      return this.denied(timestamps[0] ?? now, now);
    }

    timestamps.push(now);
    this.inMemory.set(key, timestamps);
    return { allowed: true, remaining: this.config.maxRequests - timestamps.length };
  }

  /** Drop keys whose requests have all left the window; runs at most once per window. */
  private sweepInMemory(now: number, windowStart: number): void {
    if (now - this.lastSweep < this.config.windowSeconds * 1000) return;
    this.lastSweep = now;

    for (const [key, timestamps] of this.inMemory) {
      const newest = timestamps[timestamps.length - 1];
      if (newest === undefined || newest <= windowStart) this.inMemory.delete(key);
    }
  }

  private denied(oldestTime: number, now: number): RateLimitResult {
    const retryAfterMs = Math.max(1, oldestTime + this.config.windowSeconds * 1000 - now);
    return { allowed: false, remaining: 0, retryAfterMs };
  }
}
