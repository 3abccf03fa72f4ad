import axios, { type AxiosInstance } from 'axios';
import { toServiceRequestError } from '../errors.js';

export interface OpenMeteoOptions {
  apiUrl: string;
  timeoutMs: number;
}

export const DEFAULT_CURRENT_FIELDS: readonly string[] = Object.freeze([
  'temperature_2m',
  'relative_humidity_2m',
  'weather_code',
]);

export const DEFAULT_DAILY_FIELDS: readonly string[] = Object.freeze([
  'temperature_2m_max',
  'temperature_2m_min',
  'precipitation_sum',
]);

export type WeatherPayload = Record<string, unknown>;

export interface WeatherSource {
  getWeatherData(
    latitude: number,
    longitude: number,
    current?: readonly string[],
    daily?: readonly string[]
  ): Promise<WeatherPayload>;
}

function isRecord(value: unknown): value is WeatherPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Open-Meteo forecast client. The payload is handed to the summarizer as is.
 */
export class OpenMeteoClient implements WeatherSource {
  private client: AxiosInstance;
  private options: OpenMeteoOptions;

  constructor(options: OpenMeteoOptions, client: AxiosInstance = axios.create()) {
    this.options = options;
    this.client = client;
  }

  async getWeatherData(
    latitude: number,
    longitude: number,
    current: readonly string[] = DEFAULT_CURRENT_FIELDS,
    daily: readonly string[] = DEFAULT_DAILY_FIELDS
  ): Promise<WeatherPayload> {
    let data: unknown;
    try {
      const response = await this.client.get(this.options.apiUrl, {
        params: {
          latitude,
          longitude,
          current: current.join(','),
          daily: daily.join(','),
          timezone: 'auto',
        },
        timeout: this.options.timeoutMs,
      });
      data = response.data;
    } catch (err) {
      const error = toServiceRequestError('weather', err);
      console.error(`[Weather] lat=${latitude} lon=${longitude} error=${error.message}`);
      throw error;
    }

    if (!isRecord(data)) {
      throw toServiceRequestError('weather', new Error('unexpected response body'));
    }
    return data;
  }
}
