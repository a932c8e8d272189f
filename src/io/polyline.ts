import type { Coord } from '../types';

/**
 * Decode a Google encoded polyline. Directions API overview polylines use
 * precision 5; pass 6 for polyline6 geometry.
 */
export function decodePolyline(encoded: string, precision = 5): Coord[] {
  const factor = 10 ** precision;
  const len = encoded.length;
  const coords: Coord[] = [];
  let index = 0;
  let lat = 0;
  let lon = 0;

  const nextValue = (): number => {
    let b: number;
    let shift = 0;
    let result = 0;
    do {
      if (index >= len) {
        throw new Error('Truncated polyline');
      }
      b = encoded.charCodeAt(index++) - 63;
      result |= (b & 0x1f) << shift;
      shift += 5;
    } while (b >= 0x20);
    return result & 1 ? ~(result >> 1) : result >> 1;
  };

  while (index < len) {
    lat += nextValue();
    lon += nextValue();
    coords.push([lat / factor, lon / factor]);
  }

  return coords;
}
