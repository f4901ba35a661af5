import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { toError } from '../../../common/utils/concurrency';
import {
  COUNTER_TTL_SECONDS,
  DEFAULT_REQUESTS_PER_MINUTE,
  RATE_LIMIT_REDIS_PREFIX,
  WINDOW_MS,
} from '../domain/rate-limiter.constants';
import { RATE_LIMIT_STORE, type RateLimitStore } from '../domain/rate-limit-store.interface';

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Milliseconds until the current window closes. */
  resetMs: number;
}

/**
 * Fixed one-minute windows counted per client and route. When the counter
 * store is unreachable the request is let through and the failure logged.
 */
@Injectable()
export class RateLimiterService {
  private readonly logger = new Logger(RateLimiterService.name);
  readonly enabled: boolean;
  readonly defaultLimit: number;

  constructor(
    @Inject(RATE_LIMIT_STORE) private readonly store: RateLimitStore,
    configService: ConfigService,
  ) {
    this.enabled = configService.get<boolean>('rateLimit.enabled') ?? true;
    this.defaultLimit =
      configService.get<number>('rateLimit.requestsPerMinute') ?? DEFAULT_REQUESTS_PER_MINUTE;
  }

  async consume(
    clientId: string,
    route: string,
    limit: number = this.defaultLimit,
    now: number = Date.now(),
  ): Promise<RateLimitDecision> {
    const window = Math.floor(now / WINDOW_MS);
    const resetMs = (window + 1) * WINDOW_MS - now;
    const key = `${RATE_LIMIT_REDIS_PREFIX}:${route}:${clientId}:${window}`;

    let current: number;
    try {
      current = await this.store.increment(key, COUNTER_TTL_SECONDS);
    } catch (error) {
      this.logger.warn(`Rate limit check skipped for ${route}: ${toError(error).message}`);
      return { allowed: true, limit, remaining: limit, resetMs };
    }

    if (current > limit) {
      this.logger.warn(`Rate limit reached for ${clientId} on ${route} (${current}/${limit})`);
    }

    return {
      allowed: current <= limit,
      limit,
      remaining: Math.max(0, limit - current),
      resetMs,
    };
  }
}
