import { StoreUnavailable, formatError } from '../errors';
import { createLogger } from '../logger';
import { KeyValueBackend } from './backend';
import { keys } from './keys';

const log = createLogger('RATELIMIT');

export type RateLimitDecision = {
  allowed: boolean;
  count: number;
  limit: number;
  retryAfterSeconds: number; // 0 when allowed
};

/** Fixed-window counter per client; an unreachable store lets requests through. */
export class RateLimiter {
  private readonly backend: KeyValueBackend;
  readonly limit: number;
  readonly windowSeconds: number;

  constructor(backend: KeyValueBackend, limit: number, windowSeconds: number) {
    this.backend = backend;
    this.limit = limit;
    this.windowSeconds = windowSeconds;
  }

  async consume(client: string): Promise<RateLimitDecision> {
    try {
      const r = await this.backend.incrementCapped(keys.rateLimit(client), this.limit, this.windowSeconds);
      return {
        allowed: r.allowed,
        count: r.count,
        limit: this.limit,
        retryAfterSeconds: r.allowed ? 0 : Math.max(r.ttlSeconds, 1),
      };
    } catch (e) {
      if (!(e instanceof StoreUnavailable)) throw e;
      log.warn('Rate limit check skipped:', formatError(e));
      return { allowed: true, count: 0, limit: this.limit, retryAfterSeconds: 0 };
    }
  }
}
