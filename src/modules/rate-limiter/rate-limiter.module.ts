import { Global, Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { RateLimiterService } from './application/rate-limiter.service';
import { RATE_LIMIT_STORE } from './domain/rate-limit-store.interface';
import { RedisRateLimitStore } from './infrastructure/redis-rate-limit.store';
import { RateLimitGuard } from './interfaces/rate-limit.guard';

@Global()
@Module({
  providers: [
    { provide: RATE_LIMIT_STORE, useClass: RedisRateLimitStore },
    RateLimiterService,
    { provide: APP_GUARD, useClass: RateLimitGuard },
  ],
  exports: [RateLimiterService],
})
export class RateLimiterModule {}
