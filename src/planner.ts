import type { Coord, FuelStop, PlannerConfig, Station } from './types';
import type { GeoCache } from './geoCache';
import type { StationCatalog } from './catalog';
import { cumulativeDistances } from './distance';
import { PlanningError } from './errors';
import { roundTo } from './cost';
import { formatPlace } from './places';

export type ProgressFn = (stop: FuelStop, index: number) => void;

export interface PlanStopsCtx {
  totalDistanceMiles: number;
  waypoints: readonly Coord[];
  /** usually the prefiltered catalog */
  catalog: StationCatalog;
  cache: GeoCache;
  config: PlannerConfig;
  verbose?: boolean;
  progress?: ProgressFn;
}

export interface StopPlanResult {
  stops: FuelStop[];
  /** false when the plan was truncated before the destination */
  complete: boolean;
  warnings: string[];
}

interface Match {
  station: Station;
  index: number;
  miles: number;
}

/**
 * Walk the route from `fromIdx`, looking at waypoints whose cumulative
 * distance lies in (milesTraveled, maxReach]. The first waypoint that
 * resolves to a city/state with an unused station wins.
 */
async function firstMatch(
  ctx: PlanStopsCtx,
  cumulative: readonly number[],
  fromIdx: number,
  milesTraveled: number,
  maxReach: number,
  used: ReadonlySet<string>,
): Promise<Match | undefined> {
  for (let i = fromIdx; i < cumulative.length; i++) {
    const miles = cumulative[i];
    if (miles <= milesTraveled) continue;
    if (miles > maxReach) break;
    const place = await ctx.cache.resolve(ctx.waypoints[i]);
    if (!place) continue;
    const station = ctx.catalog.findUnused(place, used);
    if (station) {
      return { station, index: i, miles };
    }
    if (ctx.verbose) {
      console.log(`no unused station in ${formatPlace(place)} at mile ${miles.toFixed(1)}`);
    }
  }
  return undefined;
}

/**
 * Greedy fuel-stop selection. From the current position the planner takes
 * the first station found along the route within vehicle range, refuels the
 * distance driven since the previous stop, and repeats until the destination
 * is reached or no station is in range.
 */
export async function planFuelStops(ctx: PlanStopsCtx): Promise<StopPlanResult> {
  const { totalDistanceMiles: total, config } = ctx;
  const cumulative = cumulativeDistances(ctx.waypoints);
  const stops: FuelStop[] = [];
  const warnings: string[] = [];
  const used = new Set<string>();
  let milesTraveled = 0;
  let cursor = 0;
  let complete = true;

  while (milesTraveled < total) {
    const maxReach = Math.min(milesTraveled + config.vehicleRangeMiles, total);
    if (ctx.verbose) {
      console.log(`scan (${milesTraveled.toFixed(1)}, ${maxReach.toFixed(1)}]`);
    }
    const match = await firstMatch(ctx, cumulative, cursor, milesTraveled, maxReach, used);

    if (!match) {
      if (milesTraveled === 0) {
        throw new PlanningError(
          'NoStationNearOrigin',
          `No fuel station found within ${config.vehicleRangeMiles} miles of the origin`,
        );
      }
      if (maxReach >= total) {
        // destination is within range of the last stop
        break;
      }
      const message = `no station within ${config.vehicleRangeMiles} miles after mile ${milesTraveled.toFixed(
        1,
      )}; plan ends ${(total - milesTraveled).toFixed(1)} miles short of the destination`;
      if (config.gapPolicy === 'fail') {
        throw new PlanningError('MidRouteGap', message);
      }
      const warning = `PartialPlan: ${message}`;
      console.warn(warning);
      warnings.push(warning);
      complete = false;
      break;
    }

    const { station } = match;
    used.add(station.name);
    const legMiles = match.miles - milesTraveled;
    const fuelGallons = legMiles / config.milesPerGallon;
    const pricePerGallon = station.pricePerGallon ?? config.fallbackPricePerGallon;
    const stop: FuelStop = {
      station,
      milesFromOrigin: match.miles,
      legMiles,
      fuelGallons,
      pricePerGallon,
      cost: roundTo(fuelGallons * pricePerGallon),
      coord: ctx.waypoints[match.index],
    };
    stops.push(stop);
    if (ctx.verbose) {
      console.log(
        `stop ${stops.length}: ${station.name} (${formatPlace(station)}) at mile ${match.miles.toFixed(1)}`,
      );
    }
    ctx.progress?.(stop, stops.length - 1);

    milesTraveled = match.miles;
    cursor = match.index + 1;
  }

  return { stops, complete, warnings };
}
