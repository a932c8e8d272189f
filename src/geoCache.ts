import type { CityState, Coord } from './types';
import { normalizePlace } from './places';

/**
 * Reverse geocoding collaborator. `null` means the coordinates could not be
 * resolved to a city/state; implementations may also throw or reject, which
 * the cache treats the same way.
 */
export interface ReverseGeocoder {
  reverse(coord: Coord): Promise<CityState | null>;
}

export interface GeoCacheStats {
  hits: number;
  misses: number;
  unresolved: number;
}

export function cacheKey(coord: Coord): string {
  return `${coord[0].toFixed(4)},${coord[1].toFixed(4)}`;
}

/**
 * Memoizes coordinate -> city/state lookups for the life of the process.
 * Entries are write-once; an unresolved coordinate is cached as `null` so it
 * is never queried again.
 */
export class GeoCache {
  private readonly entries = new Map<string, CityState | null>();
  private readonly pending = new Map<string, Promise<CityState | null>>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly geocoder: ReverseGeocoder) {}

  get size(): number {
    return this.entries.size;
  }

  has(coord: Coord): boolean {
    return this.entries.has(cacheKey(coord));
  }

  async resolve(coord: Coord): Promise<CityState | null> {
    const key = cacheKey(coord);
    const cached = this.entries.get(key);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }
    const inflight = this.pending.get(key);
    if (inflight) {
      this.hits++;
      return inflight;
    }

    this.misses++;
    const lookup = this.lookup(coord).then((value) => {
      this.entries.set(key, value);
      this.pending.delete(key);
      return value;
    });
    this.pending.set(key, lookup);
    return lookup;
  }

  stats(): GeoCacheStats {
    let unresolved = 0;
    for (const value of this.entries.values()) {
      if (value === null) unresolved++;
    }
    return { hits: this.hits, misses: this.misses, unresolved };
  }

  private async lookup(coord: Coord): Promise<CityState | null> {
    try {
      const place = await this.geocoder.reverse(coord);
      if (!place || !place.city || !place.state) return null;
      return normalizePlace(place.city, place.state);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(
        `Reverse geocoding failed for ${coord[0]},${coord[1]}: ${message}`,
      );
      return null;
    }
  }
}
