import { errorMessage } from '../errors.js';
import type { Coordinate, Resolution, ResolutionSource } from '../types/weather.js';
import { DEFAULT_COORDINATE, findCity } from './cities.js';
import { parseCoordinatePair } from './coordinates.js';
import type { NominatimClient } from './nominatim.js';

export type StrategySource = Exclude<ResolutionSource, 'default'>;

export interface GeocodingStrategy {
  source: StrategySource;
  lookup(location: string): Promise<Coordinate | null>;
}

export function coordinateStrategy(): GeocodingStrategy {
  return {
    source: 'input',
    lookup: async (location) => parseCoordinatePair(location),
  };
}

export function geocoderStrategy(geocoder: Pick<NominatimClient, 'search'>): GeocodingStrategy {
  return {
    source: 'geocoder',
    lookup: (location) => geocoder.search(location),
  };
}

export function cityTableStrategy(): GeocodingStrategy {
  return {
    source: 'city-table',
    lookup: async (location) => findCity(location)?.coordinate ?? null,
  };
}

export function defaultStrategies(geocoder: Pick<NominatimClient, 'search'>): GeocodingStrategy[] {
  return [coordinateStrategy(), geocoderStrategy(geocoder), cityTableStrategy()];
}

/**
 * Turns a location string into coordinates by trying each strategy in order.
 * Never rejects: when every strategy comes up empty the result is London,
 * with a notice for the user.
 */
export class GeocodingResolver {
  private strategies: readonly GeocodingStrategy[];

  constructor(strategies: readonly GeocodingStrategy[]) {
    this.strategies = strategies;
  }

  async resolve(location: string): Promise<Resolution> {
    for (const strategy of this.strategies) {
      let coordinate: Coordinate | null;
      try {
        coordinate = await strategy.lookup(location);
      } catch (err) {
        console.error(`[Geocoding] ${strategy.source} lookup failed for "${location}": ${errorMessage(err)}`);
        continue;
      }
      if (coordinate) {
        return { coordinate, source: strategy.source };
      }
    }

    const notice = `Location '${location}' not found, defaulting to London`;
    console.warn(`[Geocoding] ${notice}`);
    return { coordinate: DEFAULT_COORDINATE, source: 'default', notice };
  }
}
