import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import type { RateLimitStore } from '../domain/rate-limit-store.interface';

@Injectable()
export class RedisRateLimitStore implements RateLimitStore, OnModuleDestroy {
  private readonly logger = new Logger(RedisRateLimitStore.name);
  private readonly redis: Redis;

  constructor(private readonly configService: ConfigService) {
    const redisUrl = this.configService.get<string>('redis.url') || 'redis://localhost:6379';
    this.redis = new Redis(redisUrl, {
      lazyConnect: true,
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => Math.min(times * 100, 3000),
    });

    this.redis.on('error', (err) => {
      this.logger.error(`Redis connection error: ${err.message}`);
    });

    this.redis.on('connect', () => {
      this.logger.log('Redis connected for rate limiting');
    });
  }

  async onModuleDestroy() {
    await this.redis.quit();
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const results = await this.redis.multi().incr(key).expire(key, ttlSeconds).exec();
    const [counted] = results ?? [];
    if (!counted) {
      throw new Error(`Rate limit transaction for ${key} was discarded`);
    }

    const [error, value] = counted;
    if (error) throw error;
    if (typeof value !== 'number') {
      throw new Error(`Unexpected INCR reply for ${key}: ${String(value)}`);
    }
    return value;
  }
}
