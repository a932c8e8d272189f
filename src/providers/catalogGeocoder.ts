import type { CityState, Coord, Station } from '../types';
import type { ReverseGeocoder } from '../geoCache';
import { haversineMiles } from '../distance';

/**
 * Offline reverse geocoder backed by the station catalog: coordinates resolve
 * to the city/state of the nearest located station within `radiusMiles`.
 * Used when no geocoding API key is configured.
 */
export class CatalogReverseGeocoder implements ReverseGeocoder {
  private readonly located: (Station & { coord: Coord })[];

  constructor(
    stations: readonly Station[],
    private readonly radiusMiles = 25,
  ) {
    this.located = stations.filter(
      (s): s is Station & { coord: Coord } => s.coord !== undefined,
    );
  }

  async reverse(coord: Coord): Promise<CityState | null> {
    let best: (Station & { coord: Coord }) | undefined;
    let bestDist = Infinity;
    for (const s of this.located) {
      const d = haversineMiles(coord, s.coord);
      if (d < bestDist) {
        bestDist = d;
        best = s;
      }
    }
    if (!best || bestDist > this.radiusMiles) return null;
    return { city: best.city, state: best.state };
  }
}
