import dotenv from 'dotenv';

dotenv.config();

export interface Config {
  ollama: {
    apiUrl: string;
    model: string;
    timeoutMs: number;
  };
  geocoding: {
    apiUrl: string;
    userAgent: string;
  };
  weather: {
    apiUrl: string;
  };
  requestTimeoutMs: number;
}

export const DEFAULT_OLLAMA_API_URL = 'http://localhost:11434/api/chat';
export const DEFAULT_OLLAMA_MODEL = 'llama3.2';
export const DEFAULT_GEOCODING_API_URL = 'https://nominatim.openstreetmap.org/search';
export const DEFAULT_GEOCODING_USER_AGENT = 'Weather-Summarizer/1.0';
export const DEFAULT_WEATHER_API_URL = 'https://api.open-meteo.com/v1/forecast';

function parseTimeout(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const requestTimeoutMs = parseTimeout('REQUEST_TIMEOUT_MS', env.REQUEST_TIMEOUT_MS, 10000);
  // Local models routinely take longer than a web API to answer
  const ollamaTimeoutMs = parseTimeout('OLLAMA_TIMEOUT_MS', env.OLLAMA_TIMEOUT_MS, 60000);

  return Object.freeze({
    ollama: Object.freeze({
      apiUrl: env.OLLAMA_API_URL || DEFAULT_OLLAMA_API_URL,
      model: env.OLLAMA_MODEL || DEFAULT_OLLAMA_MODEL,
      timeoutMs: ollamaTimeoutMs,
    }),
    geocoding: Object.freeze({
      apiUrl: env.GEOCODING_API_URL || DEFAULT_GEOCODING_API_URL,
      userAgent: env.GEOCODING_USER_AGENT || DEFAULT_GEOCODING_USER_AGENT,
    }),
    weather: Object.freeze({
      apiUrl: env.WEATHER_API_URL || DEFAULT_WEATHER_API_URL,
    }),
    requestTimeoutMs,
  });
}
