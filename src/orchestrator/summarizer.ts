import type { ChatProvider } from '../llm/ollama.js';
import { systemMessage, userMessage } from '../types/message.js';
import type { WeatherPayload } from '../weather/open-meteo.js';

const GREETING_PROMPT = 'You are a helpful weather assistant. Provide a brief, friendly greeting and ask the user for their location and what weather information they need. Keep it concise - no more than 3 sentences.';

const SUMMARY_PROMPT = `You are a weather data summarizer. Provide a clear, concise weather summary.

Format requirements:
- Use simple headers (# ## ###)
- Keep it brief and conversational
- Include current temperature, conditions, and forecast
- Don't repeat information
- No excessive formatting or decorative elements
- Maximum 150 words

Example format:
# Weather in [City]

## Current Conditions
Temperature: X°C, Condition details

## Today's Forecast
High/Low temperatures and key details`;

export class WeatherSummarizer {
  private llm: ChatProvider;

  constructor(llm: ChatProvider) {
    this.llm = llm;
  }

  async greet(): Promise<string> {
    return this.llm.chat([
      systemMessage(GREETING_PROMPT),
      userMessage('Greet the user and ask for their weather needs.'),
    ]);
  }

  /**
   * Summarize a forecast payload with the user's wording in view
   */
  async summarize(weatherData: WeatherPayload, userRequirements: string): Promise<string> {
    return this.llm.chat([
      systemMessage(SUMMARY_PROMPT),
      userMessage(`User requested: ${userRequirements}\n\nWeather data: ${JSON.stringify(weatherData, null, 2)}`),
    ]);
  }
}
