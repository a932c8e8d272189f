import type { FuelStop, PlannerConfig } from './types';

export function roundTo(value: number, decimals = 2): number {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
}

export function totalCost(stops: readonly FuelStop[]): number {
  let sum = 0;
  for (const stop of stops) sum += stop.cost;
  return roundTo(sum);
}

export function totalGallons(stops: readonly FuelStop[]): number {
  let sum = 0;
  for (const stop of stops) sum += stop.fuelGallons;
  return sum;
}

/**
 * Compare purchased fuel with what the whole route burns. The last leg is
 * never refueled, so a shortfall of up to one tank is expected; anything
 * beyond that means the plan stops short of the destination.
 *
 * Returns a warning message, or `undefined` when the balance is plausible.
 */
export function checkFuelBalance(
  stops: readonly FuelStop[],
  totalDistanceMiles: number,
  config: Pick<PlannerConfig, 'vehicleRangeMiles' | 'milesPerGallon'>,
): string | undefined {
  const needed = totalDistanceMiles / config.milesPerGallon;
  const bought = totalGallons(stops);
  const tank = config.vehicleRangeMiles / config.milesPerGallon;
  const diff = needed - bought;
  if (diff < -1e-6 || diff > tank + 1e-6) {
    const warning = `fuel balance off: purchased ${bought.toFixed(
      2,
    )} gal for a route needing ${needed.toFixed(2)} gal (tank ${tank.toFixed(2)} gal)`;
    console.warn(warning);
    return warning;
  }
  return undefined;
}
