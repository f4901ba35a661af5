import { SetMetadata } from '@nestjs/common';
import { RATE_LIMIT_METADATA } from '../domain/rate-limiter.constants';

export interface RateLimitOptions {
  requestsPerMinute?: number;
  skip?: boolean;
}

/** Overrides the global per-minute limit for a controller or route. */
export const RateLimit = (requestsPerMinute: number) =>
  SetMetadata<string, RateLimitOptions>(RATE_LIMIT_METADATA, { requestsPerMinute });

/** For callers that are not browsers, such as signed webhooks. */
export const SkipRateLimit = () =>
  SetMetadata<string, RateLimitOptions>(RATE_LIMIT_METADATA, { skip: true });
