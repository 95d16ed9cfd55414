import process from 'node:process';

import { MapboxRouteProvider } from '../adapters/mapbox.ts';
import { ConfigStore, loadQuoteConfig, type QuoteConfig } from './config.ts';
import { DistanceResolver } from './distance-resolver.ts';
import { InboundIntake, type IntakeDeps } from './inbound-intake.ts';
import { getLogger } from './log.ts';
import { QuotePipeline } from './quote-pipeline.ts';
import { InMemoryQuoteStore, type QuoteRepository } from './quote-store.ts';
import { RateLimiter } from './rate-limiter.ts';
import { ReviewQueue } from './review-queue.ts';
import { GreatCircleRouteProvider, type RouteProvider } from './route-provider.ts';
import type { ZipDirectory } from './zip-reference.ts';

export type AppServices = {
  config: ConfigStore;
  zips: ZipDirectory;
  limiter: RateLimiter;
  resolver: DistanceResolver;
  queue: ReviewQueue;
  store: QuoteRepository;
  pipeline: QuotePipeline;
  intake: InboundIntake;
};

export type ServiceOverrides = {
  provider?: RouteProvider;
  store?: QuoteRepository;
  clock?: () => number;
  reloadConfig?: () => Promise<QuoteConfig>;
  newQuoteId?: (now: Date) => string;
  extract?: IntakeDeps['extract'];
  send?: IntakeDeps['send'];
};

const log = getLogger().child({ module: 'services' });

export function selectRouteProvider(config: QuoteConfig, zips: ZipDirectory): RouteProvider {
  const token = process.env.MAPBOX_API_KEY;
  if (token) {
    return new MapboxRouteProvider(token, zips);
  }
  log.warn('MAPBOX_API_KEY not set; using great-circle distances over the ZIP reference.');
  return new GreatCircleRouteProvider(zips, config.distance);
}

/**
 * Wires the engine from one configuration snapshot. Distance, rate-limit and
 * queue-capacity settings are read here once; pricing and routing follow
 * config reloads.
 */
export function createServices(
  initial: QuoteConfig,
  zips: ZipDirectory,
  overrides: ServiceOverrides = {},
): AppServices {
  const clock = overrides.clock ?? Date.now;
  const config = new ConfigStore(initial, overrides.reloadConfig ?? (() => loadQuoteConfig()));
  const limiter = new RateLimiter(initial.rate_limits, clock);
  const resolver = new DistanceResolver(
    overrides.provider ?? selectRouteProvider(initial, zips),
    limiter,
    initial.distance,
    { now: clock },
  );
  const queue = new ReviewQueue(initial.review_queue.capacity);
  const store = overrides.store ?? new InMemoryQuoteStore();
  const pipeline = new QuotePipeline({
    config,
    zips,
    resolver,
    queue,
    store,
    now: () => new Date(clock()),
    newQuoteId: overrides.newQuoteId,
  });
  const intake = new InboundIntake({
    pipeline,
    limiter,
    config,
    zips,
    extract: overrides.extract,
    send: overrides.send,
  });

  return { config, zips, limiter, resolver, queue, store, pipeline, intake };
}
