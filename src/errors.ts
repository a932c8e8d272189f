export type PlanningErrorCode =
  | 'InsufficientWaypoints'
  | 'RouteUnavailable'
  | 'NoStationNearOrigin'
  | 'MidRouteGap'
  | 'InvalidInput';

/**
 * Fatal planning failure. Anything that does not abort a plan is reported as
 * a warning on the TripPlan instead.
 */
export class PlanningError extends Error {
  readonly code: PlanningErrorCode;

  constructor(code: PlanningErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlanningError';
    this.code = code;
  }
}

export function isPlanningError(err: unknown): err is PlanningError {
  return err instanceof PlanningError;
}

/** One-line description used by the CLI. */
export function describeError(err: unknown): string {
  if (isPlanningError(err)) {
    return `error [${err.code}]: ${err.message}`;
  }
  const message = err instanceof Error ? err.message : String(err);
  return `error: ${message}`;
}
