import { z } from 'zod';
import { type WeatherRequest, type WeatherType, isValidCoordinate } from '../types/weather.js';

const JSON_FENCE = '```json';
const FENCE = '```';

function sliceFence(text: string, marker: string): string {
  const start = text.indexOf(marker) + marker.length;
  const end = text.indexOf(FENCE, start);
  return (end === -1 ? text.slice(start) : text.slice(start, end)).trim();
}

/**
 * Pull the JSON object out of a model reply that may be wrapped in
 * markdown fences or surrounded by prose. The result is not parsed.
 */
export function extractJson(reply: string): string {
  let cleaned = reply.trim();

  if (cleaned.includes(JSON_FENCE)) {
    cleaned = sliceFence(cleaned, JSON_FENCE);
  } else if (cleaned.includes(FENCE)) {
    cleaned = sliceFence(cleaned, FENCE);
  }

  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start >= 0 && end > start) {
    cleaned = cleaned.slice(start, end + 1);
  }

  return cleaned;
}

const coordinateField = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' && value.trim() === '') return null;
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  });

const modelReplySchema = z.object({
  location: z.string().nullish(),
  latitude: coordinateField,
  longitude: coordinateField,
  weather_type: z.unknown().optional(),
  specific_requirements: z.string().nullish(),
});

function toWeatherType(value: unknown): WeatherType {
  return typeof value === 'string' && value.trim().toLowerCase() === 'forecast' ? 'forecast' : 'current';
}

/**
 * Decode extracted JSON into a WeatherRequest. Returns null when the text
 * is not a JSON object of the expected shape.
 */
export function decodeWeatherRequest(text: string, userInput: string): WeatherRequest | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }

  const parsed = modelReplySchema.safeParse(value);
  if (!parsed.success) return null;

  const reply = parsed.data;
  let latitude = reply.latitude;
  let longitude = reply.longitude;
  // Half a coordinate, or one out of range, is as good as none
  if (latitude === null || longitude === null || !isValidCoordinate(latitude, longitude)) {
    latitude = null;
    longitude = null;
  }

  return {
    // Left blank so resolution applies its own default
    location: reply.location?.trim() ?? '',
    latitude,
    longitude,
    weatherType: toWeatherType(reply.weather_type),
    specificRequirements: reply.specific_requirements ?? userInput,
  };
}
