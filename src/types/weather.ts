export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}

export type WeatherType = 'current' | 'forecast';

export interface WeatherRequest {
  location: string;
  latitude: number | null;
  longitude: number | null;
  weatherType: WeatherType;
  specificRequirements: string;
  // Only set when the model reply could not be decoded
  rawLlmResponse?: string;
}

export type ResolutionSource = 'input' | 'geocoder' | 'city-table' | 'default';

export interface Resolution {
  coordinate: Coordinate;
  source: ResolutionSource;
  notice?: string;
}

export interface ResolvedWeatherRequest extends WeatherRequest {
  latitude: number;
  longitude: number;
  resolution: Resolution;
}

export function isValidCoordinate(latitude: number, longitude: number): boolean {
  return (
    Number.isFinite(latitude) &&
    Number.isFinite(longitude) &&
    latitude >= -90 &&
    latitude <= 90 &&
    longitude >= -180 &&
    longitude <= 180
  );
}

export function makeCoordinate(latitude: number, longitude: number): Coordinate {
  return Object.freeze({ latitude, longitude });
}
