import { describe, it, expect } from 'vitest';
import { formatCoordinate, parseCoordinatePair } from '../src/geocoding/coordinates.js';

describe('parseCoordinatePair', () => {
  it('accepts a comma separated pair', () => {
    expect(parseCoordinatePair('40.7128, -74.0060')).toEqual({ latitude: 40.7128, longitude: -74.006 });
  });

  it('accepts a whitespace separated pair', () => {
    expect(parseCoordinatePair('51.5 -0.12')).toEqual({ latitude: 51.5, longitude: -0.12 });
  });

  it('strips parentheses and surrounding whitespace', () => {
    expect(parseCoordinatePair('  (35.6762, 139.6503)  ')).toEqual({ latitude: 35.6762, longitude: 139.6503 });
  });

  it('accepts integers and trailing decimal points', () => {
    expect(parseCoordinatePair('10,20')).toEqual({ latitude: 10, longitude: 20 });
    expect(parseCoordinatePair('10., -20.')).toEqual({ latitude: 10, longitude: -20 });
  });

  it('accepts the range boundaries', () => {
    expect(parseCoordinatePair('-90, 180')).toEqual({ latitude: -90, longitude: 180 });
    expect(parseCoordinatePair('90 -180')).toEqual({ latitude: 90, longitude: -180 });
  });

  it('rejects out of range values', () => {
    expect(parseCoordinatePair('91, 0')).toBeNull();
    expect(parseCoordinatePair('-90.5, 0')).toBeNull();
    expect(parseCoordinatePair('0, 180.1')).toBeNull();
    expect(parseCoordinatePair('0 -181')).toBeNull();
  });

  it('rejects trailing text and other separators', () => {
    expect(parseCoordinatePair('40.7, -74.0 NYC')).toBeNull();
    expect(parseCoordinatePair('40.7; -74.0')).toBeNull();
    expect(parseCoordinatePair('40.7')).toBeNull();
    expect(parseCoordinatePair('+40.7, 74.0')).toBeNull();
  });

  it('returns null for place names and empty input', () => {
    expect(parseCoordinatePair('weather in Tokyo')).toBeNull();
    expect(parseCoordinatePair('')).toBeNull();
  });

  it('returns a frozen coordinate', () => {
    const coordinate = parseCoordinatePair('1, 2');
    expect(Object.isFrozen(coordinate)).toBe(true);
  });
});

describe('formatCoordinate', () => {
  it('joins latitude and longitude', () => {
    expect(formatCoordinate({ latitude: 40.7128, longitude: -74.006 })).toBe('40.7128, -74.006');
  });
});
