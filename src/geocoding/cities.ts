import { type Coordinate, makeCoordinate } from '../types/weather.js';

export interface CityEntry {
  readonly name: string;
  readonly coordinate: Coordinate;
}

// Order matters: the first name found in the input wins
export const MAJOR_CITIES: readonly CityEntry[] = Object.freeze([
  { name: 'london', coordinate: makeCoordinate(51.5074, -0.1278) },
  { name: 'new york', coordinate: makeCoordinate(40.7128, -74.006) },
  { name: 'paris', coordinate: makeCoordinate(48.8566, 2.3522) },
  { name: 'tokyo', coordinate: makeCoordinate(35.6762, 139.6503) },
  { name: 'sydney', coordinate: makeCoordinate(-33.8688, 151.2093) },
  { name: 'berlin', coordinate: makeCoordinate(52.52, 13.405) },
  { name: 'madrid', coordinate: makeCoordinate(40.4168, -3.7038) },
  { name: 'rome', coordinate: makeCoordinate(41.9028, 12.4964) },
  { name: 'kyiv', coordinate: makeCoordinate(50.44973, 30.52474) },
  { name: 'beijing', coordinate: makeCoordinate(39.9042, 116.4074) },
]);

export const DEFAULT_COORDINATE: Coordinate = MAJOR_CITIES[0].coordinate;

export function findCity(location: string, cities: readonly CityEntry[] = MAJOR_CITIES): CityEntry | null {
  const lowered = location.toLowerCase();
  return cities.find(city => lowered.includes(city.name)) ?? null;
}
