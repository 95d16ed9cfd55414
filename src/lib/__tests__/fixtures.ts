import { readFileSync } from 'node:fs';
import path from 'node:path';
import process from 'node:process';

import { parseQuoteConfig, type QuoteConfig } from '../config.ts';
import type { ProviderRoute, RouteProvider, RouteRequest } from '../route-provider.ts';
import type { ShipmentRequest } from '../types.ts';
import { createZipDirectory } from '../zip-reference.ts';

export const NOW = new Date('2026-06-10T15:00:00.000Z');
export const PICKUP_DATE = '2026-06-16';

export function rawConfig(): Record<string, unknown> {
  const contents = readFileSync(path.join(process.cwd(), 'config', 'freight.json'), 'utf8');
  const parsed: unknown = JSON.parse(contents);
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('config/freight.json must hold an object');
  }
  return { ...parsed };
}

export function testConfig(patch: Record<string, unknown> = {}): QuoteConfig {
  return parseQuoteConfig({ ...rawConfig(), ...patch }, {});
}

export const zips = createZipDirectory([
  { zip: '90021', city: 'Los Angeles', state: 'CA', lat: 34.0407, lon: -118.2468 },
  { zip: '60601', city: 'Chicago', state: 'IL', lat: 41.8781, lon: -87.6298 },
  { zip: '77002', city: 'Houston', state: 'TX', lat: 29.7589, lon: -95.3677 },
  { zip: '30303', city: 'Atlanta', state: 'GA', lat: 33.749, lon: -84.388 },
]);

export function a1Payload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    origin_zip: '90021',
    destination_zip: '60601',
    weight_lbs: 800,
    pieces: 2,
    dimensions: { length: 48, width: 40, height: 60 },
    commodity: 'electronics',
    special_services: ['liftgate'],
    equipment_type: 'dry_van',
    pickup_date: PICKUP_DATE,
    hazmat: false,
    declared_value: 50000,
    ...overrides,
  };
}

export const a1Shipment: ShipmentRequest = {
  origin_zip: '90021',
  destination_zip: '60601',
  weight_lbs: 800,
  pieces: 2,
  dimensions: { length: 48, width: 40, height: 60 },
  commodity: 'electronics',
  special_services: ['liftgate'],
  equipment_type: 'dry_van',
  pickup_date: PICKUP_DATE,
  hazmat: false,
  hazmat_class: null,
  declared_value: 50000,
};

export class FixedRouteProvider implements RouteProvider {
  readonly name = 'fixed';
  calls: Array<[string, string]> = [];

  constructor(private readonly result: ProviderRoute = { miles: 2000, duration_hours: 33 }) {}

  async route(originZip: string, destinationZip: string, request: RouteRequest): Promise<ProviderRoute> {
    await request.acquire();
    this.calls.push([originZip, destinationZip]);
    return this.result;
  }
}

export function sequentialIds(prefix: string): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}
