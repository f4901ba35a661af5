export interface RateLimitStore {
  /** Adds one to the counter and returns the new value. */
  increment(key: string, ttlSeconds: number): Promise<number>;
}

export const RATE_LIMIT_STORE = Symbol('RateLimitStore');
