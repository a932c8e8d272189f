import { readFileSync } from 'node:fs';
import Mustache from 'mustache';
import type { TripPlan } from '../types';
import { toResponse } from './emit';

const defaultTemplate = readFileSync(
  new URL('./templates/plan.mustache', import.meta.url),
  'utf8',
);
const defaultPartials = {
  stop: readFileSync(new URL('./templates/stop.mustache', import.meta.url), 'utf8'),
};

export interface EmitHtmlOptions {
  /** Override the base template */
  template?: string;
  /** Override or add partials */
  partials?: Record<string, string>;
}

interface ViewModel {
  distance: string;
  travelTime?: string;
  totalCost: string;
  warnings: string[];
  stops: {
    index: number;
    name: string;
    address: string;
    city: string;
    state: string;
    miles: string;
    gallons: string;
    price: string;
    cost: string;
  }[];
}

export function emitHtml(plan: TripPlan, opts: EmitHtmlOptions = {}): string {
  const res = toResponse(plan);
  const view: ViewModel = {
    distance: res.total_distance_miles.toFixed(2),
    travelTime: res.estimated_travel_time || undefined,
    totalCost: res.total_fuel_cost.toFixed(2),
    warnings: res.warnings,
    stops: res.fuel_stops.map((s, i) => ({
      index: i + 1,
      name: s.name,
      address: s.address,
      city: s.city,
      state: s.state,
      miles: s.miles_traveled.toFixed(1),
      gallons: s.fuel_needed_gallons.toFixed(2),
      price: s.fuel_price_per_gallon.toFixed(2),
      cost: s.total_cost.toFixed(2),
    })),
  };
  const template = opts.template ?? defaultTemplate;
  const partials = { ...defaultPartials, ...opts.partials };
  return Mustache.render(template, view, partials);
}

export default emitHtml;
