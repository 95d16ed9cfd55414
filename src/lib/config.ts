import { readFile } from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';

import { IANAZone } from 'luxon';
import { z } from 'zod';

import { getLogger } from './log.ts';

const DEFAULT_CONFIG_PATH = path.join(process.cwd(), 'config', 'freight.json');
const DEFAULT_BUSINESS_TIME_ZONE = 'America/Chicago';

const log = getLogger().child({ module: 'config' });

const fraction = z.number().min(0).max(1);
const money = z.number().finite().min(0);

const weightTierSchema = z.object({
  name: z.string().min(1),
  min_lbs: z.number().min(0),
  rate_per_mile: z.number().positive(),
  minimum_charge: money,
});

const equipmentRuleSchema = z.object({
  multiplier: z.number().positive(),
  short_haul_multiplier: z.number().positive().optional(),
});

const bucketSchema = z.object({
  capacity: z.number().int().positive(),
  refill_tokens: z.number().positive(),
  refill_interval_ms: z.number().int().positive(),
});

const pricingSchema = z.object({
  weight_tiers: z
    .array(weightTierSchema)
    .min(1)
    .refine((tiers) => tiers[0]?.min_lbs === 0, {
      message: 'first weight tier must start at 0 lbs',
    })
    .refine(
      (tiers) => tiers.every((tier, index) => index === 0 || tier.min_lbs > tiers[index - 1].min_lbs),
      { message: 'weight tiers must be listed in ascending min_lbs order' },
    ),
  weight_surcharge_per_cwt: money,
  equipment: z.object({
    dry_van: equipmentRuleSchema,
    flatbed: equipmentRuleSchema,
    box_truck: equipmentRuleSchema,
    reefer: equipmentRuleSchema,
    step_deck: equipmentRuleSchema,
  }),
  short_haul_max_miles: z.number().positive(),
  service_fees: z.object({
    liftgate: money,
    inside_delivery: money,
    residential: money,
    appointment: money,
    limited_access: money,
    climate_control: money,
    notify_before_delivery: money,
  }),
  hazmat: z.object({
    flat_fee: money,
    declared_value_pct: fraction,
  }),
  fuel_index_pct: fraction,
  margin_pct: fraction,
  minimum_margin_pct: fraction,
  quote_validity_days: z.number().int().positive(),
});

const routingSchema = z.object({
  auto_approve: z.object({
    min_confidence: fraction,
    max_total: money,
    max_declared_value: money,
  }),
  review: z.object({
    low_confidence: fraction,
    urgent_total: money,
    urgent_declared_value: money,
  }),
});

const distanceSchema = z.object({
  timeout_ms: z.number().int().positive(),
  max_retries: z.number().int().min(0),
  backoff_base_ms: z.number().int().min(0),
  backoff_factor: z.number().min(1),
  backoff_jitter_ms: z.number().int().min(0),
  driving_hours_per_day: z.number().positive(),
  circuity_factor: z.number().min(1),
  average_speed_mph: z.number().positive(),
  fallback_estimate: z.object({
    miles: z.number().positive(),
    duration_hours: z.number().positive(),
  }),
});

export const quoteConfigSchema = z.object({
  business_time_zone: z
    .string()
    .default(DEFAULT_BUSINESS_TIME_ZONE)
    .refine((zone) => IANAZone.isValidZone(zone), { message: 'unknown IANA time zone' }),
  pricing: pricingSchema,
  routing: routingSchema,
  review_queue: z.object({ capacity: z.number().int().positive() }),
  distance: distanceSchema,
  rate_limits: z.object({
    geocoding: bucketSchema,
    llm: bucketSchema,
    email: bucketSchema,
  }),
});

export type QuoteConfig = z.infer<typeof quoteConfigSchema>;
export type PricingConfig = QuoteConfig['pricing'];
export type RoutingConfig = QuoteConfig['routing'];
export type DistanceConfig = QuoteConfig['distance'];
export type RateLimitConfig = QuoteConfig['rate_limits'];
export type BucketConfig = z.infer<typeof bucketSchema>;

type EnvSource = Record<string, string | undefined>;

export class ConfigLoadError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigLoadError';
  }
}

function normalizeString(value?: string | null): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function normalizeNumber(value?: string): number | undefined {
  const normalized = normalizeString(value);
  if (!normalized) {
    return undefined;
  }
  const parsed = Number(normalized);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function applyEnvOverrides(raw: unknown, env: EnvSource): unknown {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    return raw;
  }
  const record: Record<string, unknown> = { ...raw };

  const timeZone = normalizeString(env.BUSINESS_TIME_ZONE);
  if (timeZone) {
    record.business_time_zone = timeZone;
  }

  const fuelIndex = normalizeNumber(env.FUEL_INDEX_PCT);
  const pricing = record.pricing;
  if (typeof fuelIndex === 'number' && pricing && typeof pricing === 'object') {
    record.pricing = { ...pricing, fuel_index_pct: fuelIndex };
  }

  return record;
}

export function parseQuoteConfig(raw: unknown, env: EnvSource = process.env): QuoteConfig {
  const result = quoteConfigSchema.safeParse(applyEnvOverrides(raw, env));
  if (!result.success) {
    throw new ConfigLoadError(
      'Invalid quote configuration',
      result.error.issues.map((issue) => `${issue.path.join('.') || '$'} - ${issue.message}`),
    );
  }
  return deepFreeze(result.data);
}

export async function loadQuoteConfig(
  configPath: string = process.env.QUOTE_CONFIG_PATH ?? DEFAULT_CONFIG_PATH,
  env: EnvSource = process.env,
): Promise<QuoteConfig> {
  const contents = await readFile(configPath, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new ConfigLoadError(
      `Config file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseQuoteConfig(raw, env);
}

/**
 * Holds the active configuration snapshot. Readers take the reference once per
 * operation, so a reload never changes numbers halfway through a quote.
 */
export class ConfigStore {
  private snapshot: QuoteConfig;
  private version = 1;

  constructor(
    initial: QuoteConfig,
    private readonly source: () => Promise<QuoteConfig> = () => loadQuoteConfig(),
  ) {
    this.snapshot = initial;
  }

  current(): QuoteConfig {
    return this.snapshot;
  }

  currentVersion(): number {
    return this.version;
  }

  async reload(): Promise<QuoteConfig> {
    const next = await this.source();
    this.snapshot = next;
    this.version += 1;
    log.info({ version: this.version }, 'Quote configuration reloaded.');
    return next;
  }
}
