import type { Coord } from './types';
import { PlanningError } from './errors';

// Haversine formula to compute great-circle distance between two points on Earth in miles
export function haversineMiles(a: Coord, b: Coord): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;
  const lat1: number = toRad(a[0]);
  const lon1: number = toRad(a[1]);
  const lat2: number = toRad(b[0]);
  const lon2: number = toRad(b[1]);
  const dLat = lat2 - lat1;
  const dLon = lon2 - lon1;
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
  const R = 3958.8; // Earth radius in miles
  return 2 * R * Math.asin(Math.sqrt(h));
}

function ensureRoute(waypoints: readonly Coord[]): void {
  if (waypoints.length < 2) {
    throw new PlanningError(
      'InsufficientWaypoints',
      `Route needs at least 2 waypoints, got ${waypoints.length}`,
    );
  }
}

/**
 * Running great-circle distance along the route. The first entry is always 0
 * and the last is the length of the whole polyline.
 */
export function cumulativeDistances(waypoints: readonly Coord[]): number[] {
  ensureRoute(waypoints);
  const totals: number[] = [0];
  for (let i = 1; i < waypoints.length; i++) {
    totals.push(totals[i - 1] + haversineMiles(waypoints[i - 1], waypoints[i]));
  }
  return totals;
}

/**
 * Index of the last waypoint whose cumulative distance is <= `targetMiles`.
 * Targets past the end of the route return the last index.
 */
export function indexAtOrBefore(
  targetMiles: number,
  waypoints: readonly Coord[],
  cumulative: readonly number[] = cumulativeDistances(waypoints),
): number {
  ensureRoute(waypoints);
  if (targetMiles <= 0) return 0;
  let idx = 0;
  for (let i = 1; i < cumulative.length; i++) {
    if (cumulative[i] > targetMiles) break;
    idx = i;
  }
  return idx;
}

export function coordAtDistance(
  targetMiles: number,
  waypoints: readonly Coord[],
): Coord {
  return waypoints[indexAtOrBefore(targetMiles, waypoints)];
}

/** Distance in miles from `point` to the closest waypoint of the route. */
export function minDistanceToRoute(
  point: Coord,
  waypoints: readonly Coord[],
): number {
  let best = Infinity;
  for (const wp of waypoints) {
    const d = haversineMiles(point, wp);
    if (d < best) best = d;
  }
  return best;
}
