export const RATE_LIMIT_REDIS_PREFIX = 'ratelimit';

/** Per client IP and route, when a route sets no limit of its own. */
export const DEFAULT_REQUESTS_PER_MINUTE = 200;

export const WINDOW_MS = 60 * 1000;

/** TTL for per-minute counters in seconds (2 minutes for safety) */
export const COUNTER_TTL_SECONDS = 120;

export const RATE_LIMIT_METADATA = 'rate-limit';
