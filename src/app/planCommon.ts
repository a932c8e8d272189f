import type { PlannerConfig, RouteInfo, TripPlan } from '../types';
import type { GeoCache } from '../geoCache';
import type { StationCatalog } from '../catalog';
import { cumulativeDistances } from '../distance';
import { planFuelStops, type ProgressFn } from '../planner';
import { checkFuelBalance, totalCost, totalGallons } from '../cost';

export interface BuildTripPlanCtx {
  route: RouteInfo;
  catalog: StationCatalog;
  cache: GeoCache;
  config: PlannerConfig;
  verbose?: boolean;
  progress?: ProgressFn;
}

/**
 * One planning call: prefilter the catalog against the route, pick stops,
 * then total the cost. Fatal conditions surface as PlanningError; a plan cut
 * short mid-route comes back with `complete: false` and a warning.
 */
export async function buildTripPlan(ctx: BuildTripPlanCtx): Promise<TripPlan> {
  const { route, config } = ctx;
  // fail fast on a degenerate route before any geocoding happens
  cumulativeDistances(route.waypoints);

  const filtered = await ctx.catalog.prefilter(
    route.waypoints,
    ctx.cache,
    config.prefilterProximityMiles,
  );
  if (ctx.verbose) {
    console.log(
      `prefilter kept ${filtered.size} of ${ctx.catalog.size} stations within ${config.prefilterProximityMiles} mi`,
    );
  }

  const { stops, complete, warnings } = await planFuelStops({
    totalDistanceMiles: route.totalDistanceMiles,
    waypoints: route.waypoints,
    catalog: filtered,
    cache: ctx.cache,
    config,
    verbose: ctx.verbose,
    progress: ctx.progress,
  });

  const allWarnings = [...warnings];
  const balance = checkFuelBalance(stops, route.totalDistanceMiles, config);
  if (balance) allWarnings.push(balance);

  return {
    totalDistanceMiles: route.totalDistanceMiles,
    estimatedTravelTime: route.estimatedTravelTime,
    stops,
    totalFuelCost: totalCost(stops),
    totalFuelGallons: totalGallons(stops),
    complete,
    warnings: allWarnings,
  };
}
