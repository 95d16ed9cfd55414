import { addDays } from 'date-fns';

import type { PricingConfig } from './config.ts';
import { hashJson } from './hash.ts';
import {
  SPECIAL_SERVICES,
  type ChargeLine,
  type ExtractionConfidence,
  type Quote,
  type RouteDistance,
  type ShipmentRequest,
  type ValidationWarning,
} from './types.ts';

type WeightTier = PricingConfig['weight_tiers'][number];

export type QuotePricing = {
  lines: ChargeLine[];
  cost_basis: number;
  total: number;
  tier: string;
  fingerprint: string;
};

type PriceShipmentInput = {
  id: string;
  shipment: ShipmentRequest;
  distance: RouteDistance;
  confidence: ExtractionConfidence;
  warnings: ValidationWarning[];
  pricing: PricingConfig;
  now: Date;
  supersedes?: string | null;
  actor?: string;
};

// Tolerance for binary representations of x.xx5 landing a hair off the midpoint.
const HALF_EPSILON = 1e-8;

export function roundHalfEven(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const remainder = scaled - floor;

  let rounded: number;
  if (Math.abs(remainder - 0.5) < HALF_EPSILON) {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  } else {
    rounded = Math.round(scaled);
  }

  const result = rounded / factor;
  return Object.is(result, -0) ? 0 : result;
}

export function selectWeightTier(tiers: readonly WeightTier[], weightLbs: number): WeightTier {
  let selected = tiers[0];
  for (const tier of tiers) {
    if (weightLbs >= tier.min_lbs) {
      selected = tier;
    }
  }
  return selected;
}

function equipmentMultiplier(
  shipment: ShipmentRequest,
  miles: number,
  pricing: PricingConfig,
): number {
  const rule = pricing.equipment[shipment.equipment_type];
  if (rule.short_haul_multiplier !== undefined && miles <= pricing.short_haul_max_miles) {
    return rule.short_haul_multiplier;
  }
  return rule.multiplier;
}

const humanize = (value: string) => value.replaceAll('_', ' ');

const sum = (lines: readonly ChargeLine[]) =>
  lines.reduce((total, line) => total + line.amount, 0);

/**
 * Prices a validated shipment over a resolved distance. Pure: the same
 * shipment, distance and pricing snapshot always produce the same lines,
 * total and fingerprint.
 */
export function computeQuote(
  shipment: ShipmentRequest,
  distance: RouteDistance,
  pricing: PricingConfig,
): QuotePricing {
  const lines: ChargeLine[] = [];
  const miles = distance.miles;

  const tier = selectWeightTier(pricing.weight_tiers, shipment.weight_lbs);
  const linehaul = Math.max(miles * tier.rate_per_mile, tier.minimum_charge);
  lines.push({
    kind: 'base_linehaul',
    label: `Linehaul (${tier.name} tier, ${miles.toFixed(1)} mi)`,
    amount: linehaul,
  });

  lines.push({
    kind: 'weight_surcharge',
    label: `Weight surcharge (${shipment.weight_lbs} lbs)`,
    amount: (shipment.weight_lbs / 100) * pricing.weight_surcharge_per_cwt,
  });

  const multiplier = equipmentMultiplier(shipment, miles, pricing);
  const equipmentAdjustment = linehaul * (multiplier - 1);
  if (multiplier !== 1) {
    lines.push({
      kind: 'equipment_adjustment',
      label: `Equipment (${humanize(shipment.equipment_type)} x${multiplier})`,
      amount: equipmentAdjustment,
    });
  }

  for (const service of SPECIAL_SERVICES) {
    if (shipment.special_services.includes(service)) {
      lines.push({
        kind: 'special_service',
        label: humanize(service),
        amount: pricing.service_fees[service],
      });
    }
  }

  if (shipment.hazmat) {
    lines.push({
      kind: 'hazmat_surcharge',
      label: `Hazmat (${shipment.hazmat_class ?? 'classified commodity'})`,
      amount:
        pricing.hazmat.flat_fee + shipment.declared_value * pricing.hazmat.declared_value_pct,
    });
  }

  lines.push({
    kind: 'fuel_adjustment',
    label: `Fuel (${roundHalfEven(pricing.fuel_index_pct * 100, 1)}%)`,
    amount: (linehaul + equipmentAdjustment) * pricing.fuel_index_pct,
  });

  const costBasis = sum(lines);
  const margin = costBasis * pricing.margin_pct;
  lines.push({ kind: 'margin', label: 'Margin', amount: margin });

  const floor = costBasis * (1 + pricing.minimum_margin_pct);
  if (costBasis + margin < floor) {
    lines.push({
      kind: 'margin_floor_adjustment',
      label: 'Minimum margin adjustment',
      amount: floor - (costBasis + margin),
    });
  }

  return {
    lines,
    cost_basis: roundHalfEven(costBasis),
    total: roundHalfEven(sum(lines)),
    tier: tier.name,
    fingerprint: hashJson({
      shipment,
      distance: { miles: distance.miles, duration_hours: distance.duration_hours },
      pricing,
    }),
  };
}

/** Builds a pending quote; routing moves it on from there. */
export function priceShipment(input: PriceShipmentInput): Quote {
  const priced = computeQuote(input.shipment, input.distance, input.pricing);
  const createdAt = input.now.toISOString();

  return {
    id: input.id,
    shipment: input.shipment,
    distance: input.distance,
    confidence: input.confidence,
    warnings: [...input.warnings],
    lines: priced.lines,
    cost_basis: priced.cost_basis,
    total: priced.total,
    status: 'pending',
    created_at: createdAt,
    valid_until: addDays(input.now, input.pricing.quote_validity_days).toISOString(),
    supersedes: input.supersedes ?? null,
    superseded_by: null,
    pricing_fingerprint: priced.fingerprint,
    history: [{ from: null, to: 'pending', at: createdAt, actor: input.actor ?? 'system' }],
  };
}
