import type { CityState, Coord, Station } from './types';
import type { GeoCache } from './geoCache';
import { minDistanceToRoute } from './distance';
import { placeKey } from './places';

/**
 * Normalized, read-only set of stations indexed by city/state. Lookups return
 * stations in catalog order.
 */
export class StationCatalog {
  private readonly byPlace = new Map<string, Station[]>();

  private constructor(readonly stations: readonly Station[]) {
    for (const s of stations) {
      const key = placeKey(s);
      const list = this.byPlace.get(key);
      if (list) {
        list.push(s);
      } else {
        this.byPlace.set(key, [s]);
      }
    }
  }

  static fromStations(stations: readonly Station[]): StationCatalog {
    return new StationCatalog([...stations]);
  }

  get size(): number {
    return this.stations.length;
  }

  isEmpty(): boolean {
    return this.stations.length === 0;
  }

  inPlace(place: CityState): readonly Station[] {
    return this.byPlace.get(placeKey(place)) ?? [];
  }

  /** First station in the city/state whose name has not been used yet. */
  findUnused(place: CityState, used: ReadonlySet<string>): Station | undefined {
    return this.inPlace(place).find((s) => !used.has(s.name));
  }

  /** Distinct city/state pairs, in catalog order. */
  locations(): CityState[] {
    const seen = new Set<string>();
    const out: CityState[] = [];
    for (const s of this.stations) {
      const key = placeKey(s);
      if (seen.has(key)) continue;
      seen.add(key);
      out.push({ city: s.city, state: s.state });
    }
    return out;
  }

  /**
   * Reduce the catalog to stations plausibly reachable from the route.
   *
   * Stations with coordinates are kept when they lie within `proximityMiles`
   * of some waypoint. Stations without coordinates fall back to an exact
   * city/state match against the resolved waypoints, which warms `cache`
   * for the planner. Waypoints are only resolved when such stations exist.
   */
  async prefilter(
    waypoints: readonly Coord[],
    cache: GeoCache,
    proximityMiles: number,
  ): Promise<StationCatalog> {
    const unlocated = this.stations.filter((s) => !s.coord);
    const routePlaces = new Set<string>();
    if (unlocated.length > 0) {
      for (const wp of waypoints) {
        const place = await cache.resolve(wp);
        if (place) routePlaces.add(placeKey(place));
      }
    }

    const kept = this.stations.filter((s) =>
      s.coord
        ? minDistanceToRoute(s.coord, waypoints) <= proximityMiles
        : routePlaces.has(placeKey(s)),
    );
    return new StationCatalog(kept);
  }
}
