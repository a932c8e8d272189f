import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { fileURLToPath } from 'node:url';
import { planTrip } from '../src/app/planTrip';
import type { RoutingProvider } from '../src/providers/google';
import type { RouteInfo } from '../src/types';
import { codeOf, equatorRoute, rejectionOf } from './helpers';

const fixture = (name: string): string => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

const stationsPath = fixture('stations.csv');
const routePath = fixture('route-equator.json');

let log: MockInstance<typeof console.log>;
let warn: MockInstance<typeof console.warn>;

beforeEach(() => {
  log = vi.spyOn(console, 'log').mockImplementation(() => {});
  warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('planTrip', () => {
  it('plans the fixture route with the offline geocoder', async () => {
    const result = await planTrip({ stationsPath, routePath, apiKey: '' });

    expect(result.response.fuel_stops.map((s) => [s.name, s.city, s.total_cost])).toEqual([
      ['ALPHA FUEL #1', 'Alpha', 124.37],
      ['BRAVO FUEL', 'Bravo', 134.73],
    ]);
    expect(result.response.fuel_stops[0].miles_traveled).toBe(414.56);
    expect(result.response.total_fuel_cost).toBe(259.1);
    expect(result.response.complete).toBe(true);
    expect(result.response.warnings).toEqual([]);
    expect(result.config.vehicleRangeMiles).toBe(500);
    expect(log).toHaveBeenCalledWith(
      'distance=900.0 mi | stops=2 | gallons=82.9 | cost=$259.10 | complete=true',
    );
    expect(warn).not.toHaveBeenCalled();
  });

  it('layers overrides over the config file', async () => {
    const fromFile = await planTrip({
      stationsPath,
      routePath,
      apiKey: '',
      configPath: fixture('planner-config.json'),
    });
    expect(fromFile.config.vehicleRangeMiles).toBe(450);

    const overridden = await planTrip({
      stationsPath,
      routePath,
      apiKey: '',
      configPath: fixture('planner-config.json'),
      overrides: { vehicleRangeMiles: 480, milesPerGallon: undefined },
    });
    expect(overridden.config.vehicleRangeMiles).toBe(480);
    expect(overridden.config.milesPerGallon).toBe(10);
  });

  it('truncates at a mid-route gap with warnings', async () => {
    const result = await planTrip({
      stationsPath: fixture('stations-gap.csv'),
      routePath,
      apiKey: '',
      overrides: { vehicleRangeMiles: 450 },
    });

    expect(result.plan.complete).toBe(false);
    expect(result.response.fuel_stops).toHaveLength(1);
    expect(result.response.warnings).toEqual([
      'PartialPlan: no station within 450 miles after mile 414.6; plan ends 485.4 miles short of the destination',
      'fuel balance off: purchased 41.46 gal for a route needing 90.00 gal (tank 45.00 gal)',
    ]);
  });

  it('fails at a mid-route gap under the fail policy', async () => {
    const err = await rejectionOf(
      planTrip({
        stationsPath: fixture('stations-gap.csv'),
        routePath,
        apiKey: '',
        overrides: { vehicleRangeMiles: 450, gapPolicy: 'fail' },
      }),
    );
    expect(codeOf(err)).toBe('MidRouteGap');
  });

  it('asks the routing provider when no route file is given', async () => {
    const route: RouteInfo = {
      totalDistanceMiles: 900,
      estimatedTravelTime: '13 hours 30 mins',
      waypoints: equatorRoute(900, 50),
    };
    const getRoute = vi.fn<RoutingProvider['getRoute']>(async () => route);

    const result = await planTrip({
      stationsPath,
      from: '0,0',
      to: 'Bravo, TX',
      apiKey: '',
      routingProvider: { getRoute },
    });

    expect(getRoute).toHaveBeenCalledWith(
      { kind: 'coord', coord: [0, 0] },
      { kind: 'place', query: 'Bravo, TX' },
    );
    expect(result.route).toBe(route);
  });

  it('requires a route or both endpoints', async () => {
    const err = await rejectionOf(planTrip({ stationsPath, from: '0,0', apiKey: '' }));
    expect(codeOf(err)).toBe('InvalidInput');
  });

  it('needs an API key to route between places', async () => {
    const err = await rejectionOf(planTrip({ stationsPath, from: '0,0', to: '0,13', apiKey: '' }));
    expect(codeOf(err)).toBe('RouteUnavailable');
  });

  it('reports cache stats when verbose', async () => {
    await planTrip({ stationsPath, routePath, apiKey: '', verbose: true });
    const lines = log.mock.calls.map((call) => String(call[0]));
    expect(lines.some((line) => line.startsWith('geocache hits='))).toBe(true);
    expect(lines.some((line) => line.startsWith('prefilter kept 3 of 4 stations'))).toBe(true);
  });
});
