import type { GapPolicy, PlannerConfig } from './types';
import { PlanningError } from './errors';

export const DEFAULT_CONFIG: Readonly<PlannerConfig> = {
  vehicleRangeMiles: 500,
  milesPerGallon: 10,
  fallbackPricePerGallon: 3.5,
  prefilterProximityMiles: 100,
  gapPolicy: 'truncate',
  requestTimeoutMs: 10_000,
};

type PlainObj = Record<string, unknown>;

function isPlainObj(v: unknown): v is PlainObj {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

const KEY_ALIASES: Record<keyof PlannerConfig, string[]> = {
  vehicleRangeMiles: ['vehicleRangeMiles', 'vehicle_range_miles'],
  milesPerGallon: ['milesPerGallon', 'miles_per_gallon', 'mpg'],
  fallbackPricePerGallon: ['fallbackPricePerGallon', 'fallback_price_per_gallon'],
  prefilterProximityMiles: ['prefilterProximityMiles', 'prefilter_proximity_miles'],
  gapPolicy: ['gapPolicy', 'gap_policy'],
  requestTimeoutMs: ['requestTimeoutMs', 'request_timeout_ms'],
};

function pick(obj: PlainObj, key: keyof PlannerConfig): unknown {
  for (const alias of KEY_ALIASES[key]) {
    if (obj[alias] !== undefined) return obj[alias];
  }
  return undefined;
}

export function parseGapPolicy(value: unknown): GapPolicy {
  if (value === 'truncate' || value === 'fail') return value;
  throw new PlanningError(
    'InvalidInput',
    `gapPolicy must be "truncate" or "fail", got ${JSON.stringify(value)}`,
  );
}

/**
 * Parse a planner config object (camelCase or snake_case keys). Only keys
 * present in the input appear in the result.
 */
export function parsePlannerConfig(obj: unknown): Partial<PlannerConfig> {
  if (obj === undefined || obj === null) return {};
  if (!isPlainObj(obj)) {
    throw new PlanningError('InvalidInput', 'Planner config must be an object');
  }
  const src = obj;
  const cfg: Partial<PlannerConfig> = {};
  const num = (key: keyof PlannerConfig): number | undefined => {
    const v = pick(src, key);
    if (v === undefined) return undefined;
    const n = Number(v);
    if (!Number.isFinite(n)) {
      throw new PlanningError('InvalidInput', `Invalid ${key}: ${String(v)}`);
    }
    return n;
  };

  const range = num('vehicleRangeMiles');
  if (range !== undefined) cfg.vehicleRangeMiles = range;
  const mpg = num('milesPerGallon');
  if (mpg !== undefined) cfg.milesPerGallon = mpg;
  const price = num('fallbackPricePerGallon');
  if (price !== undefined) cfg.fallbackPricePerGallon = price;
  const proximity = num('prefilterProximityMiles');
  if (proximity !== undefined) cfg.prefilterProximityMiles = proximity;
  const timeout = num('requestTimeoutMs');
  if (timeout !== undefined) cfg.requestTimeoutMs = timeout;
  const policy = pick(src, 'gapPolicy');
  if (policy !== undefined) cfg.gapPolicy = parseGapPolicy(policy);
  return cfg;
}

/**
 * Merge config layers; later layers win. Undefined values never override.
 */
export function resolveConfig(
  ...layers: (Partial<PlannerConfig> | undefined)[]
): PlannerConfig {
  let cfg: PlannerConfig = { ...DEFAULT_CONFIG };
  for (const layer of layers) {
    if (!layer) continue;
    cfg = {
      vehicleRangeMiles: layer.vehicleRangeMiles ?? cfg.vehicleRangeMiles,
      milesPerGallon: layer.milesPerGallon ?? cfg.milesPerGallon,
      fallbackPricePerGallon:
        layer.fallbackPricePerGallon ?? cfg.fallbackPricePerGallon,
      prefilterProximityMiles:
        layer.prefilterProximityMiles ?? cfg.prefilterProximityMiles,
      gapPolicy: layer.gapPolicy ?? cfg.gapPolicy,
      requestTimeoutMs: layer.requestTimeoutMs ?? cfg.requestTimeoutMs,
    };
  }
  validateConfig(cfg);
  return cfg;
}

export function validateConfig(cfg: PlannerConfig): void {
  const positive: (keyof PlannerConfig)[] = [
    'vehicleRangeMiles',
    'milesPerGallon',
    'requestTimeoutMs',
  ];
  for (const key of positive) {
    const v = cfg[key];
    if (typeof v !== 'number' || !(v > 0)) {
      throw new PlanningError('InvalidInput', `${key} must be greater than 0: ${String(v)}`);
    }
  }
  if (!(cfg.fallbackPricePerGallon >= 0)) {
    throw new PlanningError(
      'InvalidInput',
      `fallbackPricePerGallon must not be negative: ${cfg.fallbackPricePerGallon}`,
    );
  }
  if (!(cfg.prefilterProximityMiles >= 0)) {
    throw new PlanningError(
      'InvalidInput',
      `prefilterProximityMiles must not be negative: ${cfg.prefilterProximityMiles}`,
    );
  }
  parseGapPolicy(cfg.gapPolicy);
}
