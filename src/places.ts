import type { CityState } from './types';

export function normalizeCity(city: string): string {
  return city.trim().toLowerCase();
}

export function normalizeState(state: string): string {
  return state.trim().toUpperCase();
}

export function normalizePlace(city: string, state: string): CityState {
  return { city: normalizeCity(city), state: normalizeState(state) };
}

export function placeKey(place: CityState): string {
  return `${place.city}|${place.state}`;
}

/** "san antonio" -> "San Antonio" */
export function titleCase(s: string): string {
  return s.replace(/\S+/g, (word) => word[0].toUpperCase() + word.slice(1).toLowerCase());
}

export function formatPlace(place: CityState): string {
  return `${titleCase(place.city)}, ${place.state}`;
}
