import type { CityState, Coord, RouteInfo } from '../types';
import type { ReverseGeocoder } from '../geoCache';
import type { Location } from '../io/parse';
import { formatLocation } from '../io/parse';
import { decodePolyline } from '../io/polyline';
import { PlanningError } from '../errors';
import { roundTo } from '../cost';

export const DIRECTIONS_API_URL = 'https://maps.googleapis.com/maps/api/directions/json';
export const GEOCODE_API_URL = 'https://maps.googleapis.com/maps/api/geocode/json';

const MILES_PER_METER = 0.000621371;

export interface RoutingProvider {
  getRoute(origin: Location, destination: Location): Promise<RouteInfo>;
}

export interface GoogleClientOptions {
  apiKey: string;
  timeoutMs?: number;
  /** injectable for tests */
  fetchFn?: typeof fetch;
}

type PlainObj = Record<string, unknown>;

function isPlainObj(v: unknown): v is PlainObj {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function asArray(v: unknown): unknown[] {
  return Array.isArray(v) ? v : [];
}

async function getJson(
  fetchFn: typeof fetch,
  url: string,
  params: Record<string, string>,
  timeoutMs: number,
): Promise<unknown> {
  const query = new URLSearchParams(params);
  const res = await fetchFn(`${url}?${query}`, {
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (!res.ok) {
    throw new Error(`Request failed with status ${res.status}`);
  }
  return res.json();
}

function apiError(data: PlainObj): string {
  const msg = data.error_message ?? data.status;
  return typeof msg === 'string' ? msg : 'no data received';
}

/** Driving route between two locations via the Directions API. */
export class GoogleDirectionsProvider implements RoutingProvider {
  private readonly fetchFn: typeof fetch;
  private readonly timeoutMs: number;

  constructor(private readonly opts: GoogleClientOptions) {
    this.fetchFn = opts.fetchFn ?? fetch;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
  }

  async getRoute(origin: Location, destination: Location): Promise<RouteInfo> {
    const from = formatLocation(origin);
    const to = formatLocation(destination);
    let data: unknown;
    try {
      data = await getJson(
        this.fetchFn,
        DIRECTIONS_API_URL,
        { origin: from, destination: to, mode: 'driving', key: this.opts.apiKey },
        this.timeoutMs,
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new PlanningError('RouteUnavailable', `No route from ${from} to ${to}: ${message}`, {
        cause: err,
      });
    }
    return parseDirections(data, from, to);
  }
}

/** Extract distance, duration and geometry from a Directions API response. */
export function parseDirections(data: unknown, from = 'origin', to = 'destination'): RouteInfo {
  const unavailable = (reason: string) =>
    new PlanningError('RouteUnavailable', `No route from ${from} to ${to}: ${reason}`);
  if (!isPlainObj(data)) throw unavailable('malformed response');

  const route = asArray(data.routes)[0];
  if (!isPlainObj(route)) throw unavailable(apiError(data));
  const leg = asArray(route.legs)[0];
  if (!isPlainObj(leg)) throw unavailable('route has no legs');

  const distance = isPlainObj(leg.distance) ? Number(leg.distance.value) : NaN;
  if (!Number.isFinite(distance)) throw unavailable('route has no distance');
  const duration = isPlainObj(leg.duration) ? leg.duration.text : undefined;

  const overview = isPlainObj(route.overview_polyline) ? route.overview_polyline.points : undefined;
  if (typeof overview !== 'string') throw unavailable('route has no polyline');
  let waypoints: Coord[];
  try {
    waypoints = decodePolyline(overview);
  } catch {
    throw unavailable('route polyline could not be decoded');
  }

  return {
    totalDistanceMiles: roundTo(distance * MILES_PER_METER),
    estimatedTravelTime: typeof duration === 'string' ? duration : '',
    waypoints,
  };
}

/** Pull locality and state short name out of a Geocoding API response. */
export function parseReverseGeocode(data: unknown): CityState | null {
  if (!isPlainObj(data) || data.status !== 'OK') return null;
  const first = asArray(data.results)[0];
  if (!isPlainObj(first)) return null;

  let city: string | undefined;
  let state: string | undefined;
  for (const component of asArray(first.address_components)) {
    if (!isPlainObj(component)) continue;
    const types = asArray(component.types);
    if (types.includes('locality') && typeof component.long_name === 'string') {
      city = component.long_name;
    }
    if (
      types.includes('administrative_area_level_1') &&
      typeof component.short_name === 'string'
    ) {
      state = component.short_name;
    }
  }
  return city && state ? { city, state } : null;
}

export class GoogleReverseGeocoder implements ReverseGeocoder {
  private readonly fetchFn: typeof fetch;
  private readonly timeoutMs: number;

  constructor(private readonly opts: GoogleClientOptions) {
    this.fetchFn = opts.fetchFn ?? fetch;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
  }

  async reverse(coord: Coord): Promise<CityState | null> {
    const data = await getJson(
      this.fetchFn,
      GEOCODE_API_URL,
      { latlng: `${coord[0]},${coord[1]}`, key: this.opts.apiKey },
      this.timeoutMs,
    );
    const place = parseReverseGeocode(data);
    if (!place && isPlainObj(data) && data.status !== 'OK') {
      console.warn(`Geocoding API error for ${coord[0]},${coord[1]}: ${apiError(data)}`);
    }
    return place;
  }
}
