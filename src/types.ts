/** `[lat, lon]` in decimal degrees. */
export type Coord = readonly [number, number];

export interface CityState {
  city: string; // lowercase
  state: string; // two-letter, uppercase
}

export interface Station {
  id?: string;
  name: string;
  address: string;
  city: string;
  state: string;
  pricePerGallon?: number;
  coord?: Coord;
}

export type GapPolicy = 'truncate' | 'fail';

export interface PlannerConfig {
  vehicleRangeMiles: number;
  milesPerGallon: number;
  fallbackPricePerGallon: number;
  prefilterProximityMiles: number;
  gapPolicy: GapPolicy;
  requestTimeoutMs: number;
}

export interface RouteInfo {
  totalDistanceMiles: number;
  estimatedTravelTime: string;
  waypoints: Coord[];
}

export interface FuelStop {
  station: Station;
  milesFromOrigin: number;
  legMiles: number;
  fuelGallons: number;
  pricePerGallon: number;
  cost: number;
  /** waypoint at which the station was matched */
  coord: Coord;
}

export interface TripPlan {
  totalDistanceMiles: number;
  estimatedTravelTime: string;
  stops: FuelStop[];
  totalFuelCost: number;
  totalFuelGallons: number;
  complete: boolean;
  warnings: string[];
}

export interface FuelStopResponse {
  name: string;
  address: string;
  city: string;
  state: string;
  fuel_price_per_gallon: number;
  fuel_needed_gallons: number;
  total_cost: number;
  miles_traveled: number;
}

export interface TripPlanResponse {
  total_distance_miles: number;
  estimated_travel_time: string;
  fuel_stops: FuelStopResponse[];
  total_fuel_cost: number;
  complete: boolean;
  warnings: string[];
}
