import process from 'node:process';

import { z } from 'zod';

import { getLogger, maskText } from '../lib/log.ts';
import {
  RouteLookupError,
  type ProviderRoute,
  type RouteProvider,
  type RouteRequest,
} from '../lib/route-provider.ts';
import type { ZipDirectory } from '../lib/zip-reference.ts';

const MAPBOX_BASE_URL = process.env.MAPBOX_BASE_URL ?? 'https://api.mapbox.com';
const METERS_PER_MILE = 1609.344;

const log = getLogger().child({ module: 'mapbox_adapter' });

const directionsResponseSchema = z.object({
  code: z.string(),
  routes: z
    .array(
      z.object({
        distance: z.number(),
        duration: z.number(),
      }),
    )
    .default([]),
});

const geocodeResponseSchema = z.object({
  features: z
    .array(
      z.object({
        center: z.tuple([z.number(), z.number()]),
      }),
    )
    .default([]),
});

type Coordinates = { lat: number; lon: number };

type FetchLike = typeof fetch;

export class MapboxRouteProvider implements RouteProvider {
  readonly name = 'mapbox';
  private readonly geocoded = new Map<string, Coordinates>();

  constructor(
    private readonly accessToken: string,
    private readonly zips: ZipDirectory,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async route(originZip: string, destinationZip: string, request: RouteRequest): Promise<ProviderRoute> {
    const origin = await this.locate(originZip, request);
    const destination = await this.locate(destinationZip, request);

    // Mapbox expects lon,lat pairs.
    const coordinates = `${origin.lon},${origin.lat};${destination.lon},${destination.lat}`;
    const url = new URL(`/directions/v5/mapbox/driving/${coordinates}`, MAPBOX_BASE_URL);
    url.searchParams.set('overview', 'false');
    url.searchParams.set('access_token', this.accessToken);

    const body = await this.getJson(url, request);
    const parsed = directionsResponseSchema.safeParse(body);
    if (!parsed.success || parsed.data.code !== 'Ok' || parsed.data.routes.length === 0) {
      throw new RouteLookupError(
        `Mapbox returned no route for ${originZip} -> ${destinationZip}`,
      );
    }

    const [route] = parsed.data.routes;
    return {
      miles: route.distance / METERS_PER_MILE,
      duration_hours: route.duration / 3600,
    };
  }

  private async locate(zip: string, request: RouteRequest): Promise<Coordinates> {
    const known = this.zips.lookup(zip) ?? this.geocoded.get(zip);
    if (known) {
      return { lat: known.lat, lon: known.lon };
    }

    const url = new URL(`/geocoding/v5/mapbox.places/${encodeURIComponent(zip)}.json`, MAPBOX_BASE_URL);
    url.searchParams.set('country', 'us');
    url.searchParams.set('types', 'postcode');
    url.searchParams.set('limit', '1');
    url.searchParams.set('access_token', this.accessToken);

    const parsed = geocodeResponseSchema.safeParse(await this.getJson(url, request));
    const feature = parsed.success ? parsed.data.features[0] : undefined;
    if (!feature) {
      throw new RouteLookupError(`Mapbox could not geocode ZIP ${zip}`, zip);
    }
    const [lon, lat] = feature.center;
    const coordinates = { lat, lon };
    this.geocoded.set(zip, coordinates);
    log.info({ zip }, 'Geocoded ZIP outside the reference directory.');
    return coordinates;
  }

  private async getJson(url: URL, request: RouteRequest): Promise<unknown> {
    await request.acquire();
    const response = await this.fetchImpl(url, { method: 'GET', signal: request.signal });
    if (!response.ok) {
      const detail = await response.text();
      log.warn(
        {
          url: url.toString(),
          status: response.status,
          detail: maskText(detail, 'mapbox_error'),
        },
        'Mapbox request failed.',
      );
      throw new RouteLookupError(`Mapbox request failed: ${response.status} ${response.statusText}`);
    }
    return response.json();
  }
}
