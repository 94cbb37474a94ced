import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import IORedis, { Redis as RedisClient } from 'ioredis';
import { securityConfig } from '../config/security.config';

type WindowRecord = { count: number; resetAtMs: number };

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetAtMs: number;
}

const CLEANUP_THRESHOLD = 10_000;

/**
 * Fixed-window request counter keyed by client. Uses Redis when REDIS_URL is
 * set so limits hold across replicas, otherwise an in-memory map.
 */
@Injectable()
export class RateLimitService implements OnModuleDestroy {
  private readonly logger = new Logger(RateLimitService.name);
  private readonly memoryWindows = new Map<string, WindowRecord>();
  private redis?: RedisClient;
  private readonly redisUrl?: string;
  private readonly limit: number;
  private readonly windowMs: number;

  constructor(
    @Inject(securityConfig.KEY)
    config: ConfigType<typeof securityConfig>,
  ) {
    this.limit = config.rateLimit.max;
    this.windowMs = config.rateLimit.windowMs;
    this.redisUrl = config.redisUrl;
    if (!this.redisUrl) {
      this.logger.warn('REDIS_URL not set; rate limiter will use in-memory store');
    }
  }

  private ensureRedisInitialized(): void {
    if (!this.redisUrl) return;
    if (this.isRedis(this.redis)) return;
    try {
      this.redis = new IORedis(this.redisUrl, {
        maxRetriesPerRequest: 1,
        lazyConnect: false,
        enableAutoPipelining: true,
      });
      this.redis.on('error', (err: unknown) => {
        this.logger.error(
          `Redis error in rate limiter: ${err instanceof Error ? err.message : String(err)}`,
        );
      });
      this.redis.on('ready', () => {
        this.logger.log('Rate limiter is using Redis backend');
      });
    } catch (err) {
      this.logger.error(
        `Failed to initialize Redis for rate limiter, falling back to in-memory: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  private isRedis(client: unknown): client is RedisClient {
    return client instanceof IORedis;
  }

  async hit(clientKey: string): Promise<RateLimitDecision> {
    const now = Date.now();
    const windowStart = now - (now % this.windowMs);
    const resetAtMs = windowStart + this.windowMs;

    this.ensureRedisInitialized();
    if (this.isRedis(this.redis)) {
      try {
        const key = this.buildKey(clientKey, windowStart);
        const count = await this.redis.incr(key);
        if (count === 1) {
          await this.redis.pexpire(key, this.windowMs);
        }
        return this.decide(count, resetAtMs);
      } catch (err) {
        this.logger.error(
          `Redis rate limit failed, using memory fallback: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }

    let record = this.memoryWindows.get(clientKey);
    if (!record || record.resetAtMs <= now) {
      if (this.memoryWindows.size >= CLEANUP_THRESHOLD) this.cleanupExpired(now);
      record = { count: 0, resetAtMs };
      this.memoryWindows.set(clientKey, record);
    }
    record.count += 1;
    return this.decide(record.count, record.resetAtMs);
  }

  cleanupExpired(now = Date.now()): void {
    for (const [key, record] of this.memoryWindows.entries()) {
      if (record.resetAtMs <= now) this.memoryWindows.delete(key);
    }
  }

  private decide(count: number, resetAtMs: number): RateLimitDecision {
    return {
      allowed: count <= this.limit,
      limit: this.limit,
      remaining: Math.max(0, this.limit - count),
      resetAtMs,
    };
  }

  private buildKey(clientKey: string, windowStart: number): string {
    return `ratelimit:${clientKey}:${windowStart}`;
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.isRedis(this.redis)) return;
    try {
      await this.redis.quit();
    } catch (err) {
      this.logger.warn(
        `Redis quit failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}
