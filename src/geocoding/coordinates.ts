import { type Coordinate, isValidCoordinate, makeCoordinate } from '../types/weather.js';

// "lat,lon", "lat lon" or "(lat, lon)"; nothing may trail the second number
const COORDINATE_PATTERN = /^(-?\d+\.?\d*)[,\s]+(-?\d+\.?\d*)$/;

/**
 * Recognise an input that is already a latitude/longitude pair.
 * Returns null for anything else, including pairs outside the valid ranges.
 */
export function parseCoordinatePair(input: string): Coordinate | null {
  const cleaned = input.trim().replace(/[()]/g, '').trim();
  const match = COORDINATE_PATTERN.exec(cleaned);
  if (!match) return null;

  const latitude = Number(match[1]);
  const longitude = Number(match[2]);
  if (!isValidCoordinate(latitude, longitude)) return null;

  return makeCoordinate(latitude, longitude);
}

export function formatCoordinate(coordinate: Coordinate): string {
  return `${coordinate.latitude}, ${coordinate.longitude}`;
}
