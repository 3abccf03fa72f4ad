import axios, { type AxiosInstance } from 'axios';
import type { Config } from './config.js';
import { NominatimClient } from './geocoding/nominatim.js';
import { GeocodingResolver, defaultStrategies } from './geocoding/resolver.js';
import { OllamaProvider } from './llm/ollama.js';
import { RequestInterpreter } from './orchestrator/interpreter.js';
import { WeatherAssistant } from './orchestrator/service.js';
import { WeatherSummarizer } from './orchestrator/summarizer.js';
import { OpenMeteoClient } from './weather/open-meteo.js';

/**
 * Build every service client once and wire them into an assistant.
 */
export function createAssistant(config: Config, http: AxiosInstance = axios.create()): WeatherAssistant {
  const llm = new OllamaProvider(config.ollama, http);
  const geocoder = new NominatimClient(
    { ...config.geocoding, timeoutMs: config.requestTimeoutMs },
    http
  );
  const weather = new OpenMeteoClient(
    { ...config.weather, timeoutMs: config.requestTimeoutMs },
    http
  );

  const resolver = new GeocodingResolver(defaultStrategies(geocoder));
  return new WeatherAssistant({
    interpreter: new RequestInterpreter(llm, resolver),
    weather,
    summarizer: new WeatherSummarizer(llm),
  });
}
