import { readFileSync } from 'node:fs';
import type { Coord, PlannerConfig, RouteInfo, Station } from '../types';
import { PlanningError } from '../errors';
import { normalizeCity, normalizeState } from '../places';
import { parsePlannerConfig } from '../config';
import { decodePolyline } from './polyline';

type PlainObj = Record<string, unknown>;

function invalid(message: string): PlanningError {
  return new PlanningError('InvalidInput', message);
}

function isPlainObj(v: unknown): v is PlainObj {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function ensureValidCoord(lat: number, lon: number): Coord {
  if (
    Number.isNaN(lat) ||
    Number.isNaN(lon) ||
    lat < -90 ||
    lat > 90 ||
    lon < -180 ||
    lon > 180
  ) {
    throw invalid(`Invalid coordinates: ${lat},${lon}`);
  }
  return [lat, lon];
}

/** Route endpoint: either coordinates or a free-form place the router resolves. */
export type Location = { kind: 'coord'; coord: Coord } | { kind: 'place'; query: string };

/**
 * Parse an origin/destination. Supports `lat,lon` and Google Maps URLs
 * containing `@lat,lon`; anything else (a city, an address, a Plus Code) is
 * handed to the routing provider as-is.
 */
export function parseLocation(input: string): Location {
  const str = input.trim();
  if (!str) {
    throw invalid('Location must not be empty');
  }

  const latLon = str.match(/^(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)$/);
  if (latLon) {
    return {
      kind: 'coord',
      coord: ensureValidCoord(parseFloat(latLon[1]), parseFloat(latLon[2])),
    };
  }

  const urlMatch = str.match(/@(-?\d+(?:\.\d+)?),(-?\d+(?:\.\d+)?)/);
  if (urlMatch) {
    return {
      kind: 'coord',
      coord: ensureValidCoord(parseFloat(urlMatch[1]), parseFloat(urlMatch[2])),
    };
  }

  return { kind: 'place', query: str };
}

export function formatLocation(loc: Location): string {
  return loc.kind === 'coord' ? `${loc.coord[0]},${loc.coord[1]}` : loc.query;
}

/** Split one CSV line, honoring double-quoted fields and `""` escapes. */
export function parseCsvLine(line: string): string[] {
  const values: string[] = [];
  let current = '';
  let inQuotes = false;
  for (let i = 0; i < line.length; i += 1) {
    const char = line[i];
    if (char === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }
    if (char === ',' && !inQuotes) {
      values.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  values.push(current);
  return values.map((value) => value.trim());
}

const COLUMN_ALIASES = {
  id: ['opis truckstop id', 'truckstop id', 'id'],
  name: ['truckstop name', 'name'],
  address: ['address'],
  city: ['city'],
  state: ['state'],
  price: ['retail price', 'price', 'price per gallon'],
  lat: ['latitude', 'lat'],
  lon: ['longitude', 'lon', 'lng'],
} as const;

type Column = keyof typeof COLUMN_ALIASES;

function optionalNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Parse the station catalog CSV. Header names are matched case-insensitively;
 * rows repeating an earlier station name are dropped with a warning.
 */
export function parseStationsCsv(csv: string): Station[] {
  const lines = csv
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter((l) => l.trim().length > 0);
  if (lines.length === 0) return [];

  const headers = parseCsvLine(lines[0]).map((h) => h.toLowerCase());
  const columnIndex = (col: Column): number => {
    const aliases: readonly string[] = COLUMN_ALIASES[col];
    return headers.findIndex((h) => aliases.includes(h));
  };
  const idx = {
    id: columnIndex('id'),
    name: columnIndex('name'),
    address: columnIndex('address'),
    city: columnIndex('city'),
    state: columnIndex('state'),
    price: columnIndex('price'),
    lat: columnIndex('lat'),
    lon: columnIndex('lon'),
  };
  for (const required of ['name', 'city', 'state'] as const) {
    if (idx[required] === -1) {
      throw invalid(`Stations CSV is missing required column: ${required}`);
    }
  }

  const stations: Station[] = [];
  const seen = new Set<string>();
  for (let row = 1; row < lines.length; row++) {
    const values = parseCsvLine(lines[row]);
    const get = (col: Column): string | undefined =>
      idx[col] === -1 ? undefined : values[idx[col]];

    const name = get('name');
    const city = get('city');
    const state = get('state');
    if (!name || !city || !state) {
      throw invalid(`Stations CSV row ${row + 1} needs a name, city and state`);
    }
    if (seen.has(name)) {
      console.warn(`Dropping station ${name} on row ${row + 1} as duplicate`);
      continue;
    }
    seen.add(name);

    const station: Station = {
      name,
      address: get('address') ?? '',
      city: normalizeCity(city),
      state: normalizeState(state),
    };
    const id = get('id');
    if (id) station.id = id;
    const price = optionalNumber(get('price'));
    if (price !== undefined && price >= 0) station.pricePerGallon = price;
    const lat = optionalNumber(get('lat'));
    const lon = optionalNumber(get('lon'));
    if (lat !== undefined && lon !== undefined) {
      station.coord = ensureValidCoord(lat, lon);
    }
    stations.push(station);
  }
  return stations;
}

function parseWaypoint(value: unknown, i: number): Coord {
  if (Array.isArray(value) && value.length >= 2) {
    return ensureValidCoord(Number(value[0]), Number(value[1]));
  }
  if (isPlainObj(value)) {
    const lon = value.lon ?? value.lng;
    return ensureValidCoord(Number(value.lat), Number(lon));
  }
  throw invalid(`Waypoint ${i} must be [lat, lon] or {lat, lon}`);
}

/**
 * Parse a route document: `total_distance_miles`, optional
 * `estimated_travel_time`, and `waypoints` or an encoded `polyline`.
 */
export function parseRoute(json: unknown): RouteInfo {
  if (!isPlainObj(json)) {
    throw invalid('Route JSON must be an object');
  }
  const total = Number(json.total_distance_miles ?? json.totalDistanceMiles);
  if (!Number.isFinite(total) || total < 0) {
    throw invalid(`Invalid total_distance_miles: ${String(json.total_distance_miles)}`);
  }
  const time = json.estimated_travel_time ?? json.estimatedTravelTime;

  let waypoints: Coord[];
  if (Array.isArray(json.waypoints)) {
    waypoints = json.waypoints.map(parseWaypoint);
  } else if (typeof json.polyline === 'string') {
    try {
      waypoints = decodePolyline(json.polyline);
    } catch (err) {
      throw new PlanningError('InvalidInput', 'Route polyline could not be decoded', {
        cause: err,
      });
    }
  } else {
    throw invalid('Route JSON needs waypoints or a polyline');
  }

  return {
    totalDistanceMiles: total,
    estimatedTravelTime: typeof time === 'string' ? time : '',
    waypoints,
  };
}

export function loadStations(path: string): Station[] {
  return parseStationsCsv(readFileSync(path, 'utf8'));
}

function readJson(path: string, label: string): unknown {
  const raw = readFileSync(path, 'utf8');
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new PlanningError('InvalidInput', `${label} ${path} is not valid JSON`, {
      cause: err,
    });
  }
}

export function loadRouteFile(path: string): RouteInfo {
  return parseRoute(readJson(path, 'Route file'));
}

export function loadPlannerConfig(path: string): Partial<PlannerConfig> {
  return parsePlannerConfig(readJson(path, 'Config file'));
}
