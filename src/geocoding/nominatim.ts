import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { toServiceRequestError } from '../errors.js';
import { type Coordinate, isValidCoordinate, makeCoordinate } from '../types/weather.js';

export interface NominatimOptions {
  apiUrl: string;
  userAgent: string;
  timeoutMs: number;
}

// Blank strings would otherwise become 0
const numeric = z
  .union([z.string(), z.number()])
  .transform((value) => (typeof value === 'string' && value.trim() === '' ? NaN : Number(value)));

const searchResultSchema = z.array(
  z.object({
    lat: numeric,
    lon: numeric,
    display_name: z.string().optional(),
  })
);

/**
 * Client for the OpenStreetMap Nominatim search endpoint.
 */
export class NominatimClient {
  private client: AxiosInstance;
  private options: NominatimOptions;

  constructor(options: NominatimOptions, client: AxiosInstance = axios.create()) {
    this.options = options;
    this.client = client;
  }

  /**
   * Look up a free-text place. Resolves to null when nothing was found,
   * rejects with a ServiceRequestError when the lookup itself failed.
   */
  async search(query: string): Promise<Coordinate | null> {
    let data: unknown;
    try {
      const response = await this.client.get(this.options.apiUrl, {
        params: { q: query, format: 'json', limit: 1 },
        headers: {
          'User-Agent': this.options.userAgent,
          'Accept': 'application/json',
        },
        timeout: this.options.timeoutMs,
      });
      data = response.data;
    } catch (err) {
      throw toServiceRequestError('geocoding', err);
    }

    const parsed = searchResultSchema.safeParse(data);
    if (!parsed.success) {
      throw toServiceRequestError('geocoding', new Error('unexpected response body'));
    }

    const first = parsed.data[0];
    if (!first || !isValidCoordinate(first.lat, first.lon)) return null;
    return makeCoordinate(first.lat, first.lon);
  }
}
