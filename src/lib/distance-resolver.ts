import type { DistanceConfig } from './config.ts';
import { RateLimitBlockedError, ResolutionError } from './errors.ts';
import { getLogger } from './log.ts';
import type { RateLimiter } from './rate-limiter.ts';
import type { ProviderRoute, RouteProvider } from './route-provider.ts';
import { sleep, type Sleeper } from './time.ts';
import type { RouteDistance } from './types.ts';

const MAX_TRANSIT_DAYS = 7;

export type ResolveOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
};

type ResolverHooks = {
  random?: () => number;
  sleep?: Sleeper;
  now?: () => number;
};

class DeadlineExceeded extends Error {
  constructor(timeoutMs: number) {
    super(`Distance resolution exceeded ${timeoutMs}ms`);
    this.name = 'DeadlineExceeded';
  }
}

const log = getLogger().child({ module: 'distance_resolver' });

export function routeKey(originZip: string, destinationZip: string): string {
  return `${originZip}->${destinationZip}`;
}

export function transitDaysFor(durationHours: number, drivingHoursPerDay: number): number {
  const days = Math.ceil(durationHours / drivingHoursPerDay);
  return Math.min(MAX_TRANSIT_DAYS, Math.max(1, days));
}

type Flight = {
  promise: Promise<RouteDistance>;
  controller: AbortController;
  waiters: number;
};

/**
 * Resolves ZIP pairs to road distance. Results are cached for the life of the
 * process and concurrent lookups of one pair share a single provider call.
 *
 * The shared call is bounded by the configured timeout only. Each caller's
 * own `timeoutMs` and `signal` end that caller's wait; the upstream call is
 * aborted once no caller is left waiting on it.
 */
export class DistanceResolver {
  private readonly cache = new Map<string, RouteDistance>();
  private readonly inflight = new Map<string, Flight>();
  private readonly random: () => number;
  private readonly sleep: Sleeper;
  private readonly now: () => number;

  constructor(
    private readonly provider: RouteProvider,
    private readonly limiter: RateLimiter,
    private readonly settings: DistanceConfig,
    hooks: ResolverHooks = {},
  ) {
    this.random = hooks.random ?? Math.random;
    this.sleep = hooks.sleep ?? sleep;
    this.now = hooks.now ?? Date.now;
  }

  cached(originZip: string, destinationZip: string): RouteDistance | undefined {
    return this.cache.get(routeKey(originZip, destinationZip));
  }

  async resolve(
    originZip: string,
    destinationZip: string,
    options: ResolveOptions = {},
  ): Promise<RouteDistance> {
    const key = routeKey(originZip, destinationZip);
    const hit = this.cache.get(key);
    if (hit) {
      return hit;
    }

    const existing = this.inflight.get(key);
    if (existing && !existing.controller.signal.aborted) {
      log.debug({ route: key }, 'Joining in-flight distance lookup.');
      return this.wait(existing, key, options);
    }

    const controller = new AbortController();
    const flight: Flight = {
      controller,
      waiters: 0,
      promise: this.runFlight(key, originZip, destinationZip, controller).finally(() => {
        if (this.inflight.get(key) === flight) {
          this.inflight.delete(key);
        }
      }),
    };
    this.inflight.set(key, flight);
    return this.wait(flight, key, options);
  }

  /** Configured stand-in for pairs no provider can route. Never cached. */
  estimate(): RouteDistance {
    const { miles, duration_hours } = this.settings.fallback_estimate;
    return Object.freeze({
      miles,
      duration_hours,
      transit_days: transitDaysFor(duration_hours, this.settings.driving_hours_per_day),
      source: 'estimate' as const,
    });
  }

  private async runFlight(
    key: string,
    originZip: string,
    destinationZip: string,
    controller: AbortController,
  ): Promise<RouteDistance> {
    const timeoutMs = this.settings.timeout_ms;
    const deadlineAt = this.now() + timeoutMs;
    const timer = setTimeout(() => controller.abort(new DeadlineExceeded(timeoutMs)), timeoutMs);

    try {
      return await this.fetchWithRetry(key, originZip, destinationZip, controller.signal, deadlineAt);
    } catch (error) {
      if (error instanceof ResolutionError || error instanceof RateLimitBlockedError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new ResolutionError(
          'provider_timeout',
          `Distance lookup for ${key} did not finish within ${timeoutMs}ms`,
          key,
          error,
        );
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  private async fetchWithRetry(
    key: string,
    originZip: string,
    destinationZip: string,
    signal: AbortSignal,
    deadlineAt: number,
  ): Promise<RouteDistance> {
    let lastError: unknown;
    const acquire = async () => {
      await this.limiter.acquireOrWait('geocoding', {
        maxWaitMs: Math.max(0, deadlineAt - this.now()),
        signal,
      });
      signal.throwIfAborted();
    };

    for (let attempt = 0; attempt <= this.settings.max_retries; attempt += 1) {
      if (attempt > 0) {
        const delay =
          this.settings.backoff_base_ms * this.settings.backoff_factor ** (attempt - 1) +
          this.random() * this.settings.backoff_jitter_ms;
        await this.sleep(delay, signal);
      }
      signal.throwIfAborted();

      try {
        const distance = this.toRouteDistance(
          await this.provider.route(originZip, destinationZip, { signal, acquire }),
        );
        this.cache.set(key, distance);
        log.info(
          { route: key, provider: this.provider.name, miles: distance.miles, attempt },
          'Route distance resolved.',
        );
        return distance;
      } catch (error) {
        if (signal.aborted || error instanceof RateLimitBlockedError) {
          throw error;
        }
        lastError = error;
        log.warn(
          { route: key, provider: this.provider.name, attempt, err: error },
          'Route provider attempt failed.',
        );
      }
    }

    throw new ResolutionError(
      'distance_unavailable',
      `No distance available for ${key} after ${this.settings.max_retries + 1} attempts`,
      key,
      lastError,
    );
  }

  private toRouteDistance(route: ProviderRoute): RouteDistance {
    if (!Number.isFinite(route.miles) || route.miles <= 0) {
      throw new Error(`Provider returned non-positive distance ${route.miles}`);
    }
    const durationHours =
      Number.isFinite(route.duration_hours) && route.duration_hours > 0
        ? route.duration_hours
        : route.miles / this.settings.average_speed_mph;
    return Object.freeze({
      miles: route.miles,
      duration_hours: durationHours,
      transit_days: transitDaysFor(durationHours, this.settings.driving_hours_per_day),
      source: 'provider' as const,
    });
  }

  private wait(flight: Flight, key: string, options: ResolveOptions): Promise<RouteDistance> {
    const { signal, timeoutMs } = options;
    flight.waiters += 1;

    return new Promise<RouteDistance>((resolve, reject) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const detach = () => {
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        flight.waiters -= 1;
      };
      const leave = (error: ResolutionError) => {
        if (settled) {
          return;
        }
        detach();
        if (flight.waiters === 0) {
          flight.controller.abort(error);
        }
        reject(error);
      };
      const onAbort = () =>
        leave(
          new ResolutionError(
            'provider_timeout',
            `Caller cancelled the distance lookup for ${key}`,
            key,
            signal?.reason,
          ),
        );

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      if (timeoutMs !== undefined) {
        timer = setTimeout(
          () =>
            leave(
              new ResolutionError(
                'provider_timeout',
                `Distance lookup for ${key} did not finish within ${timeoutMs}ms`,
                key,
              ),
            ),
          timeoutMs,
        );
      }

      void flight.promise.then(
        (value) => {
          if (!settled) {
            detach();
            resolve(value);
          }
        },
        (error: unknown) => {
          if (!settled) {
            detach();
            reject(error);
          }
        },
      );
    });
  }
}
