import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import Ajv from 'ajv';
import { emitMarkdown, emitPlan, toResponse } from '../src/io/emit';
import { samplePlan } from './helpers';

const schema = JSON.parse(
  readFileSync(new URL('../schema/trip-plan.schema.json', import.meta.url), 'utf8'),
);

describe('toResponse', () => {
  it('rounds values and title-cases cities', () => {
    const res = toResponse(samplePlan());

    expect(res.total_distance_miles).toBe(900);
    expect(res.estimated_travel_time).toBe('13 hours 30 mins');
    expect(res.fuel_stops[0]).toEqual({
      name: 'ALPHA FUEL #1',
      address: 'I-40, EXIT 10',
      city: 'Alpha',
      state: 'TX',
      fuel_price_per_gallon: 3,
      fuel_needed_gallons: 41.46,
      total_cost: 124.37,
      miles_traveled: 414.56,
    });
    expect(res.fuel_stops[1].miles_traveled).toBe(829.13);
    expect(res.fuel_stops[1].fuel_price_per_gallon).toBe(3.5);
    expect(res.total_fuel_cost).toBe(269.47);
    expect(res.complete).toBe(true);
    expect(res.warnings).toEqual([]);
  });

  it('returns an empty stop list for a plan without stops', () => {
    const res = toResponse(samplePlan({ stops: [], totalFuelCost: 0, totalFuelGallons: 0 }));
    expect(res.fuel_stops).toEqual([]);
    expect(res.total_fuel_cost).toBe(0);
  });
});

describe('emitPlan', () => {
  it('serializes the response with the run timestamp', () => {
    const result = emitPlan(samplePlan(), '2026-01-02T03:04:05.000Z');
    const parsed: unknown = JSON.parse(result.json);

    expect(parsed).toEqual({ runTimestamp: '2026-01-02T03:04:05.000Z', ...result.response });
    expect(result.json.split('\n')[1]).toBe('  "runTimestamp": "2026-01-02T03:04:05.000Z",');
    expect(result.markdown).toBeUndefined();
  });

  it('matches the response schema', () => {
    const ajv = new Ajv({ strict: false, allErrors: true });
    const validate = ajv.compile(schema);
    const partial = samplePlan({
      complete: false,
      warnings: ['PartialPlan: no station within 450 miles after mile 414.6'],
    });

    for (const plan of [samplePlan(), partial]) {
      const parsed: unknown = JSON.parse(emitPlan(plan, '2026-01-02T03:04:05.000Z').json);
      expect(validate(parsed), JSON.stringify(validate.errors)).toBe(true);
    }
  });

  it('includes markdown when requested', () => {
    const result = emitPlan(samplePlan(), '2026-01-02T03:04:05.000Z', { markdown: true });
    expect(result.markdown).toBe(emitMarkdown(samplePlan()));
  });
});

describe('emitMarkdown', () => {
  it('renders a stop table and total', () => {
    const lines = emitMarkdown(samplePlan()).split('\n');

    expect(lines[0]).toBe('# Fuel Plan');
    expect(lines[2]).toBe('Distance: 900.00 mi (13 hours 30 mins)');
    expect(lines[6]).toBe('| 1 | ALPHA FUEL #1 | Alpha, TX | 414.6 | 41.46 | 3.00 | 124.37 |');
    expect(lines[7]).toBe('| 2 | BRAVO & SONS <1> | Bravo, TX | 829.1 | 41.46 | 3.50 | 145.10 |');
    expect(lines).toContain('**Total fuel cost:** $269.47');
    expect(lines).not.toContain('## Warnings');
  });

  it('lists warnings', () => {
    const md = emitMarkdown(samplePlan({ warnings: ['first', 'second'] }));
    expect(md.endsWith('## Warnings\n\n- first\n- second\n')).toBe(true);
  });
});
