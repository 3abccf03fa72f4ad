import { errorMessage } from '../errors.js';
import { formatCoordinate, parseCoordinatePair } from '../geocoding/coordinates.js';
import type { GeocodingResolver } from '../geocoding/resolver.js';
import { decodeWeatherRequest, extractJson } from '../llm/json-extract.js';
import type { ChatProvider } from '../llm/ollama.js';
import { systemMessage, userMessage } from '../types/message.js';
import { type ResolvedWeatherRequest, type WeatherRequest, makeCoordinate } from '../types/weather.js';

export const COORDINATE_REQUIREMENTS = 'weather information for coordinates';

const PARSE_PROMPT = `Extract location and weather info from user input. Respond ONLY with valid JSON:

{
    "location": "city name or coordinates",
    "latitude": null,
    "longitude": null,
    "weather_type": "current or forecast",
    "specific_requirements": "what they want"
}

Do NOT include markdown formatting, backticks, or explanations. Only pure JSON.`;

/**
 * Turns one user utterance into a WeatherRequest with coordinates filled in.
 */
export class RequestInterpreter {
  private llm: ChatProvider;
  private resolver: GeocodingResolver;

  constructor(llm: ChatProvider, resolver: GeocodingResolver) {
    this.llm = llm;
    this.resolver = resolver;
  }

  async parse(userInput: string): Promise<WeatherRequest> {
    const coordinate = parseCoordinatePair(userInput);
    if (coordinate) {
      return {
        location: formatCoordinate(coordinate),
        latitude: coordinate.latitude,
        longitude: coordinate.longitude,
        weatherType: 'current',
        specificRequirements: COORDINATE_REQUIREMENTS,
      };
    }

    let reply: string;
    try {
      reply = await this.llm.chat([
        systemMessage(PARSE_PROMPT),
        userMessage(`Parse this: ${userInput}`),
      ]);
    } catch (err) {
      reply = `Error generating response: ${errorMessage(err)}`;
    }

    const decoded = decodeWeatherRequest(extractJson(reply), userInput);
    if (decoded) return decoded;

    console.warn(`[Interpreter] Could not decode model reply, falling back to raw input`);
    return {
      location: 'unknown',
      latitude: null,
      longitude: null,
      weatherType: 'current',
      specificRequirements: userInput,
      rawLlmResponse: reply,
    };
  }

  async resolve(request: WeatherRequest): Promise<ResolvedWeatherRequest> {
    const { latitude, longitude } = request;
    if (latitude !== null && longitude !== null) {
      return {
        ...request,
        latitude,
        longitude,
        resolution: { coordinate: makeCoordinate(latitude, longitude), source: 'input' },
      };
    }

    const resolution = await this.resolver.resolve(request.location || 'London');
    return {
      ...request,
      latitude: resolution.coordinate.latitude,
      longitude: resolution.coordinate.longitude,
      resolution,
    };
  }

  async interpret(userInput: string): Promise<ResolvedWeatherRequest> {
    return this.resolve(await this.parse(userInput));
  }
}
