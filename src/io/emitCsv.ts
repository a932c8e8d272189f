import type { FuelStop, TripPlan } from '../types';
import { roundTo } from '../cost';
import { titleCase } from '../places';

function escapeCsv(value: string): string {
  if (/[",\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function stopToRow(runTs: string, index: number, stop: FuelStop): string {
  const s = stop.station;
  const cols = [
    runTs,
    String(index + 1),
    escapeCsv(s.name),
    escapeCsv(s.address),
    escapeCsv(titleCase(s.city)),
    s.state,
    String(roundTo(stop.milesFromOrigin)),
    String(roundTo(stop.legMiles)),
    String(roundTo(stop.pricePerGallon)),
    String(roundTo(stop.fuelGallons)),
    String(stop.cost),
    String(stop.coord[0]),
    String(stop.coord[1]),
  ];
  return cols.join(',');
}

/** Serialize fuel stops to CSV. */
export function emitCsv(plan: TripPlan, runTimestamp: string): string {
  const header = [
    'run_timestamp',
    'stop',
    'name',
    'address',
    'city',
    'state',
    'miles_traveled',
    'leg_miles',
    'fuel_price_per_gallon',
    'fuel_needed_gallons',
    'total_cost',
    'lat',
    'lon',
  ];
  const lines = [header.join(',')];
  plan.stops.forEach((stop, i) => {
    lines.push(stopToRow(runTimestamp, i, stop));
  });
  return lines.join('\n');
}

export default emitCsv;
