import type { PlannerConfig, RouteInfo, Station, TripPlan } from '../types';
import type { ProgressFn } from '../planner';
import { GeoCache, type ReverseGeocoder } from '../geoCache';
import { StationCatalog } from '../catalog';
import { resolveConfig } from '../config';
import { PlanningError } from '../errors';
import { loadPlannerConfig, loadRouteFile, loadStations, parseLocation } from '../io/parse';
import { emitPlan, type EmitResult } from '../io/emit';
import { GoogleDirectionsProvider, GoogleReverseGeocoder, type RoutingProvider } from '../providers/google';
import { CatalogReverseGeocoder } from '../providers/catalogGeocoder';
import { buildTripPlan } from './planCommon';

export interface PlanTripOptions {
  stationsPath: string;
  /** route JSON file; takes precedence over from/to */
  routePath?: string;
  from?: string;
  to?: string;
  configPath?: string;
  /** command line overrides, applied over the config file */
  overrides?: Partial<PlannerConfig>;
  apiKey?: string;
  markdown?: boolean;
  verbose?: boolean;
  progress?: ProgressFn;
  /** shared across calls; created per call when omitted */
  cache?: GeoCache;
  routingProvider?: RoutingProvider;
}

export interface PlanTripResult extends EmitResult {
  plan: TripPlan;
  route: RouteInfo;
  config: PlannerConfig;
}

function defaultGeocoder(
  apiKey: string | undefined,
  stations: readonly Station[],
  config: PlannerConfig,
): ReverseGeocoder {
  if (apiKey) {
    return new GoogleReverseGeocoder({ apiKey, timeoutMs: config.requestTimeoutMs });
  }
  return new CatalogReverseGeocoder(stations);
}

async function acquireRoute(
  opts: PlanTripOptions,
  apiKey: string | undefined,
  config: PlannerConfig,
): Promise<RouteInfo> {
  if (opts.routePath) {
    return loadRouteFile(opts.routePath);
  }
  if (!opts.from || !opts.to) {
    throw new PlanningError('InvalidInput', 'Provide --route, or both --from and --to');
  }
  const provider =
    opts.routingProvider ??
    (apiKey
      ? new GoogleDirectionsProvider({ apiKey, timeoutMs: config.requestTimeoutMs })
      : undefined);
  if (!provider) {
    throw new PlanningError(
      'RouteUnavailable',
      'GOOGLE_MAPS_API_KEY is not set; pass --route with a route file instead',
    );
  }
  return provider.getRoute(parseLocation(opts.from), parseLocation(opts.to));
}

function formatSummary(plan: TripPlan): string {
  return [
    `distance=${plan.totalDistanceMiles.toFixed(1)} mi`,
    `stops=${plan.stops.length}`,
    `gallons=${plan.totalFuelGallons.toFixed(1)}`,
    `cost=$${plan.totalFuelCost.toFixed(2)}`,
    `complete=${plan.complete}`,
  ].join(' | ');
}

/** Load inputs, plan fuel stops and serialize the result. */
export async function planTrip(opts: PlanTripOptions): Promise<PlanTripResult> {
  const config = resolveConfig(
    opts.configPath ? loadPlannerConfig(opts.configPath) : undefined,
    opts.overrides,
  );
  const apiKey = opts.apiKey ?? process.env.GOOGLE_MAPS_API_KEY;
  const stations = loadStations(opts.stationsPath);
  const catalog = StationCatalog.fromStations(stations);
  const cache = opts.cache ?? new GeoCache(defaultGeocoder(apiKey, stations, config));

  const route = await acquireRoute(opts, apiKey, config);
  const plan = await buildTripPlan({
    route,
    catalog,
    cache,
    config,
    verbose: opts.verbose,
    progress: opts.progress,
  });

  const runTimestamp = new Date().toISOString();
  const emit = emitPlan(plan, runTimestamp, { markdown: opts.markdown });
  console.log(formatSummary(plan));
  if (opts.verbose) {
    const s = cache.stats();
    console.log(`geocache hits=${s.hits} misses=${s.misses} unresolved=${s.unresolved}`);
  }
  return { ...emit, plan, route, config };
}
