import type { CityState, Coord, Station, TripPlan } from '../src/types';
import type { ReverseGeocoder } from '../src/geoCache';
import { haversineMiles } from '../src/distance';
import { PlanningError, type PlanningErrorCode } from '../src/errors';

/** Miles per degree of longitude along the equator. */
export const MI_PER_DEG = haversineMiles([0, 0], [0, 1]);

/** Waypoints along the equator, one every `stepMiles`, from mile 0 to `totalMiles`. */
export function equatorRoute(totalMiles: number, stepMiles = 10): Coord[] {
  const out: Coord[] = [];
  for (let m = 0; m <= totalMiles + 1e-9; m += stepMiles) {
    out.push([0, m / MI_PER_DEG]);
  }
  return out;
}

export function mileOf(coord: Coord): number {
  return Math.round(coord[1] * MI_PER_DEG);
}

/** Geocoder that resolves equator waypoints by their mile marker. */
export class MileGeocoder implements ReverseGeocoder {
  calls = 0;

  constructor(private readonly places: Record<number, CityState>) {}

  async reverse(coord: Coord): Promise<CityState | null> {
    this.calls++;
    return this.places[mileOf(coord)] ?? null;
  }
}

export function station(name: string, city: string, state: string, extra: Partial<Station> = {}): Station {
  return { name, address: `${name} address`, city, state, ...extra };
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected promise to reject');
}

export function codeOf(err: unknown): PlanningErrorCode | undefined {
  return err instanceof PlanningError ? err.code : undefined;
}

/** Two-stop plan with one priced and one fallback-priced station. */
export function samplePlan(overrides: Partial<TripPlan> = {}): TripPlan {
  const leg = 6 * MI_PER_DEG;
  return {
    totalDistanceMiles: 900,
    estimatedTravelTime: '13 hours 30 mins',
    stops: [
      {
        station: station('ALPHA FUEL #1', 'alpha', 'TX', {
          id: '1',
          address: 'I-40, EXIT 10',
          pricePerGallon: 3,
          coord: [0, 6],
        }),
        milesFromOrigin: leg,
        legMiles: leg,
        fuelGallons: leg / 10,
        pricePerGallon: 3,
        cost: 124.37,
        coord: [0, 6],
      },
      {
        station: station('BRAVO & SONS <1>', 'bravo', 'TX', { address: 'Main "St"' }),
        milesFromOrigin: 2 * leg,
        legMiles: leg,
        fuelGallons: leg / 10,
        pricePerGallon: 3.5,
        cost: 145.1,
        coord: [0, 12],
      },
    ],
    totalFuelCost: 269.47,
    totalFuelGallons: 82.91,
    complete: true,
    warnings: [],
    ...overrides,
  };
}
