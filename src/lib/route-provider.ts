import type { DistanceConfig } from './config.ts';
import type { ZipDirectory, ZipLocation } from './zip-reference.ts';

export type ProviderRoute = {
  miles: number;
  duration_hours: number;
};

export type RouteRequest = {
  signal: AbortSignal;
  /** Spends one geocoding permit. Await it before every outbound HTTP request. */
  acquire: () => Promise<void>;
};

/**
 * External geocoding/routing capability. Implementations must honour the
 * signal: once it aborts, the returned promise rejects.
 */
export interface RouteProvider {
  readonly name: string;
  route(originZip: string, destinationZip: string, request: RouteRequest): Promise<ProviderRoute>;
}

export class RouteLookupError extends Error {
  constructor(message: string, readonly zip?: string) {
    super(message);
    this.name = 'RouteLookupError';
  }
}

const EARTH_RADIUS_MILES = 3958.8;

export function milesBetween(
  a: { lat: number; lon: number },
  b: { lat: number; lon: number },
): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;

  const dLat = toRad(b.lat - a.lat);
  const dLon = toRad(b.lon - a.lon);

  const lat1 = toRad(a.lat);
  const lat2 = toRad(b.lat);

  const sinLat = Math.sin(dLat / 2);
  const sinLon = Math.sin(dLon / 2);

  const haversine = sinLat * sinLat + Math.cos(lat1) * Math.cos(lat2) * sinLon * sinLon;
  const c = 2 * Math.atan2(Math.sqrt(haversine), Math.sqrt(1 - haversine));
  return EARTH_RADIUS_MILES * c;
}

function requireLocation(zips: ZipDirectory, zip: string): ZipLocation {
  const location = zips.lookup(zip);
  if (!location) {
    throw new RouteLookupError(`ZIP ${zip} has no reference coordinates`, zip);
  }
  return location;
}

/**
 * Straight-line distance stretched by a road circuity factor. Used when no
 * routing API credentials are configured.
 */
export class GreatCircleRouteProvider implements RouteProvider {
  readonly name = 'great_circle';

  constructor(
    private readonly zips: ZipDirectory,
    private readonly settings: Pick<DistanceConfig, 'circuity_factor' | 'average_speed_mph'>,
  ) {}

  // Local arithmetic only, so no permit is spent.
  async route(originZip: string, destinationZip: string, request: RouteRequest): Promise<ProviderRoute> {
    request.signal.throwIfAborted();
    const origin = requireLocation(this.zips, originZip);
    const destination = requireLocation(this.zips, destinationZip);
    const miles = milesBetween(origin, destination) * this.settings.circuity_factor;
    return {
      miles,
      duration_hours: miles / this.settings.average_speed_mph,
    };
  }
}
