import type { Coord, TripPlan } from '../types';
import { roundTo } from '../cost';
import { titleCase } from '../places';

function escapeXml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Serialize fuel stops and the route line to KML. */
export function emitKml(plan: TripPlan, waypoints: readonly Coord[]): string {
  const placemarks: string[] = [];
  for (const stop of plan.stops) {
    const s = stop.station;
    const details: [string, string | number | undefined][] = [
      ['id', s.id],
      ['address', s.address || undefined],
      ['city', titleCase(s.city)],
      ['state', s.state],
      ['milesTraveled', roundTo(stop.milesFromOrigin)],
      ['legMiles', roundTo(stop.legMiles)],
      ['pricePerGallon', roundTo(stop.pricePerGallon)],
      ['gallons', roundTo(stop.fuelGallons)],
      ['cost', stop.cost],
    ];
    const data = details
      .filter(([, value]) => value !== undefined)
      .map(
        ([name, value]) =>
          `<Data name="${name}"><value>${escapeXml(String(value))}</value></Data>`,
      )
      .join('');
    const extended = data ? `<ExtendedData>${data}</ExtendedData>` : '';
    const [lat, lon] = s.coord ?? stop.coord;
    placemarks.push(
      `<Placemark><name>${escapeXml(s.name)}</name>${extended}<Point><coordinates>${lon},${lat},0</coordinates></Point></Placemark>`,
    );
  }
  const routeCoords = waypoints.map(([lat, lon]) => `${lon},${lat},0`);
  const route = `<Placemark><name>Route</name><LineString><coordinates>${routeCoords.join(' ')}</coordinates></LineString></Placemark>`;
  const doc = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<kml xmlns="http://www.opengis.net/kml/2.2">',
    '<Document>',
    ...placemarks,
    route,
    '</Document>',
    '</kml>',
  ];
  return doc.join('\n');
}

export default emitKml;
