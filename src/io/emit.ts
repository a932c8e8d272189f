import type { TripPlan, TripPlanResponse } from '../types';
import { roundTo } from '../cost';
import { titleCase } from '../places';

export interface EmitOptions {
  /** include Markdown summary */
  markdown?: boolean;
}

export interface EmitResult {
  json: string;
  runTimestamp: string;
  response: TripPlanResponse;
  markdown?: string;
}

/** Shape a TripPlan into the response document. */
export function toResponse(plan: TripPlan): TripPlanResponse {
  return {
    total_distance_miles: roundTo(plan.totalDistanceMiles),
    estimated_travel_time: plan.estimatedTravelTime,
    fuel_stops: plan.stops.map((stop) => ({
      name: stop.station.name,
      address: stop.station.address,
      city: titleCase(stop.station.city),
      state: stop.station.state,
      fuel_price_per_gallon: roundTo(stop.pricePerGallon),
      fuel_needed_gallons: roundTo(stop.fuelGallons),
      total_cost: stop.cost,
      miles_traveled: roundTo(stop.milesFromOrigin),
    })),
    total_fuel_cost: plan.totalFuelCost,
    complete: plan.complete,
    warnings: plan.warnings,
  };
}

function toMarkdown(plan: TripPlan): string {
  const res = toResponse(plan);
  const lines: string[] = [
    '# Fuel Plan',
    '',
    `Distance: ${res.total_distance_miles.toFixed(2)} mi` +
      (res.estimated_travel_time ? ` (${res.estimated_travel_time})` : ''),
    '',
    '| # | Station | City | Mile | Gallons | Price | Cost |',
    '| -:| ------- | ---- | ----:| -------:| -----:| ----:|',
  ];
  res.fuel_stops.forEach((s, i) => {
    lines.push(
      `| ${i + 1} | ${s.name} | ${s.city}, ${s.state} | ${s.miles_traveled.toFixed(
        1,
      )} | ${s.fuel_needed_gallons.toFixed(2)} | ${s.fuel_price_per_gallon.toFixed(
        2,
      )} | ${s.total_cost.toFixed(2)} |`,
    );
  });
  lines.push('', `**Total fuel cost:** $${res.total_fuel_cost.toFixed(2)}`, '');
  if (res.warnings.length) {
    lines.push('## Warnings', '');
    for (const w of res.warnings) lines.push(`- ${w}`);
    lines.push('');
  }
  return lines.join('\n');
}

/** Serialize a trip plan to the JSON response document and optional Markdown. */
export function emitPlan(
  plan: TripPlan,
  runTimestamp = new Date().toISOString(),
  opts: EmitOptions = {},
): EmitResult {
  const response = toResponse(plan);
  const json = JSON.stringify({ runTimestamp, ...response }, null, 2);
  const result: EmitResult = { json, runTimestamp, response };
  if (opts.markdown) {
    result.markdown = toMarkdown(plan);
  }
  return result;
}

export { toMarkdown as emitMarkdown };
