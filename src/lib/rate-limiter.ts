import type { BucketConfig, RateLimitConfig } from './config.ts';
import { RateLimitBlockedError } from './errors.ts';
import { getLogger } from './log.ts';
import { sleep, type Sleeper } from './time.ts';
import type { ProviderKey } from './types.ts';

export type Clock = () => number;

export type Permit = {
  provider: ProviderKey;
  grantedAt: number;
  remaining: number;
};

export type AcquireResult =
  | { ok: true; permit: Permit }
  | { ok: false; provider: ProviderKey; retryAfterMs: number };

type RateBucket = {
  capacity: number;
  refillPerMs: number;
  tokens: number;
  lastRefillMs: number;
};

type WaitOptions = {
  maxWaitMs: number;
  signal?: AbortSignal;
};

const log = getLogger().child({ module: 'rate_limiter' });

// Refill arithmetic leaves float residue; a bucket this close to a whole
// token counts as holding it, so an advertised retry-after is always enough.
const TOKEN_EPSILON = 1e-9;

/**
 * Token bucket per external provider. Buckets refill lazily on each acquire;
 * nothing outside this class touches token counts.
 */
export class RateLimiter {
  private readonly buckets = new Map<ProviderKey, RateBucket>();

  constructor(
    config: RateLimitConfig,
    private readonly now: Clock = Date.now,
    private readonly wait: Sleeper = sleep,
  ) {
    const entries: Array<[ProviderKey, BucketConfig]> = [
      ['geocoding', config.geocoding],
      ['llm', config.llm],
      ['email', config.email],
    ];
    const startedAt = this.now();
    for (const [provider, bucket] of entries) {
      this.buckets.set(provider, {
        capacity: bucket.capacity,
        refillPerMs: bucket.refill_tokens / bucket.refill_interval_ms,
        tokens: bucket.capacity,
        lastRefillMs: startedAt,
      });
    }
  }

  acquire(provider: ProviderKey): AcquireResult {
    const bucket = this.buckets.get(provider);
    if (!bucket) {
      throw new Error(`No rate limit bucket configured for provider "${provider}"`);
    }

    const now = this.now();
    const elapsed = Math.max(0, now - bucket.lastRefillMs);
    bucket.tokens = Math.min(bucket.capacity, bucket.tokens + elapsed * bucket.refillPerMs);
    bucket.lastRefillMs = now;

    if (bucket.tokens >= 1 - TOKEN_EPSILON) {
      bucket.tokens = Math.max(0, bucket.tokens - 1);
      return {
        ok: true,
        permit: { provider, grantedAt: now, remaining: Math.floor(bucket.tokens) },
      };
    }

    const retryAfterMs = Math.max(1, Math.ceil((1 - bucket.tokens) / bucket.refillPerMs));
    log.debug({ provider, retry_after_ms: retryAfterMs }, 'Provider call blocked by rate limit.');
    return { ok: false, provider, retryAfterMs };
  }

  /**
   * Waits at most once for the advertised retry-after, then either returns a
   * permit or throws RateLimitBlockedError.
   */
  async acquireOrWait(provider: ProviderKey, options: WaitOptions): Promise<Permit> {
    const first = this.acquire(provider);
    if (first.ok) {
      return first.permit;
    }
    if (first.retryAfterMs > options.maxWaitMs) {
      throw new RateLimitBlockedError(provider, first.retryAfterMs);
    }

    await this.wait(first.retryAfterMs, options.signal);

    const second = this.acquire(provider);
    if (second.ok) {
      return second.permit;
    }
    throw new RateLimitBlockedError(provider, second.retryAfterMs);
  }

  snapshot(provider: ProviderKey): { tokens: number; capacity: number } | undefined {
    const bucket = this.buckets.get(provider);
    return bucket ? { tokens: bucket.tokens, capacity: bucket.capacity } : undefined;
  }
}
