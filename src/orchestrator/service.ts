import { errorMessage } from '../errors.js';
import type { ResolvedWeatherRequest } from '../types/weather.js';
import type { WeatherPayload, WeatherSource } from '../weather/open-meteo.js';
import { RequestInterpreter } from './interpreter.js';
import { WeatherSummarizer } from './summarizer.js';

export type TurnResult =
  | { ok: true; request: ResolvedWeatherRequest; summary: string; notice?: string }
  | { ok: false; error: string; request?: ResolvedWeatherRequest; notice?: string };

export function formatTurnError(err: unknown, action = 'fetch weather data'): string {
  return `**Error**: Unable to ${action}. ${errorMessage(err)}`;
}

/**
 * One question in, one summary out: interpret, fetch, summarize.
 */
export class WeatherAssistant {
  private interpreter: RequestInterpreter;
  private weather: WeatherSource;
  private summarizer: WeatherSummarizer;

  constructor(deps: { interpreter: RequestInterpreter; weather: WeatherSource; summarizer: WeatherSummarizer }) {
    this.interpreter = deps.interpreter;
    this.weather = deps.weather;
    this.summarizer = deps.summarizer;
  }

  async greet(): Promise<string> {
    try {
      return await this.summarizer.greet();
    } catch (err) {
      return `Error generating response: ${errorMessage(err)}`;
    }
  }

  async runTurn(userInput: string): Promise<TurnResult> {
    let request: ResolvedWeatherRequest;
    try {
      request = await this.interpreter.interpret(userInput);
    } catch (err) {
      return { ok: false, error: formatTurnError(err) };
    }
    const notice = request.resolution.notice;

    let weatherData: WeatherPayload;
    try {
      weatherData = await this.weather.getWeatherData(request.latitude, request.longitude);
    } catch (err) {
      return { ok: false, error: formatTurnError(err), request, notice };
    }

    try {
      const summary = await this.summarizer.summarize(weatherData, request.specificRequirements || userInput);
      return { ok: true, request, summary, notice };
    } catch (err) {
      return { ok: false, error: formatTurnError(err, 'summarize weather data'), request, notice };
    }
  }
}
