import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { ServiceRequestError } from '../src/errors.js';
import { NominatimClient } from '../src/geocoding/nominatim.js';
import { GeocodingResolver, defaultStrategies } from '../src/geocoding/resolver.js';
import type { ChatProvider } from '../src/llm/ollama.js';
import { COORDINATE_REQUIREMENTS, RequestInterpreter } from '../src/orchestrator/interpreter.js';
import { type ChatMessage, Role } from '../src/types/message.js';
import { stubHttp, timeoutError } from './helpers/http.js';

function fakeLlm(reply: string | Error) {
  const chat = vi.fn(async (_messages: ChatMessage[]): Promise<string> => {
    if (reply instanceof Error) throw reply;
    return reply;
  });
  const llm: ChatProvider = { chat };
  return { llm, chat };
}

function offlineResolver() {
  const http = stubHttp((config) => timeoutError(config));
  const resolver = new GeocodingResolver(
    defaultStrategies(new NominatimClient({ apiUrl: 'https://geo.test/search', userAgent: 'test', timeoutMs: 100 }, http.client))
  );
  return { resolver, requests: http.requests };
}

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('RequestInterpreter.parse', () => {
  it('builds a request straight from coordinate input without asking the model', async () => {
    const { llm, chat } = fakeLlm('unused');
    const interpreter = new RequestInterpreter(llm, offlineResolver().resolver);

    const request = await interpreter.parse('(48.8566, 2.3522)');

    expect(request).toEqual({
      location: '48.8566, 2.3522',
      latitude: 48.8566,
      longitude: 2.3522,
      weatherType: 'current',
      specificRequirements: COORDINATE_REQUIREMENTS,
    });
    expect(chat).not.toHaveBeenCalled();
  });

  it('asks the model for bare JSON and decodes a fenced reply', async () => {
    const { llm, chat } = fakeLlm(
      'Sure!\n```json\n{"location":"Tokyo","latitude":null,"longitude":null,"weather_type":"forecast","specific_requirements":"weekend outlook"}\n```'
    );
    const interpreter = new RequestInterpreter(llm, offlineResolver().resolver);

    const request = await interpreter.parse('what is the weekend looking like in Tokyo?');

    expect(request).toEqual({
      location: 'Tokyo',
      latitude: null,
      longitude: null,
      weatherType: 'forecast',
      specificRequirements: 'weekend outlook',
    });

    const [messages] = chat.mock.calls[0];
    expect(messages).toHaveLength(2);
    expect(messages[0].role).toBe(Role.System);
    expect(messages[0].content).toContain('Respond ONLY with valid JSON');
    expect(messages[0].content).toContain('Do NOT include markdown formatting');
    expect(messages[1]).toEqual({ role: Role.User, content: 'Parse this: what is the weekend looking like in Tokyo?' });
  });

  it('falls back to a current-weather request carrying the raw reply when it cannot be decoded', async () => {
    const reply = 'Sorry, I am not sure what you mean.';
    const { llm } = fakeLlm(reply);
    const interpreter = new RequestInterpreter(llm, offlineResolver().resolver);

    const request = await interpreter.parse('how about it?');

    expect(request).toEqual({
      location: 'unknown',
      latitude: null,
      longitude: null,
      weatherType: 'current',
      specificRequirements: 'how about it?',
      rawLlmResponse: reply,
    });
  });

  it('falls back when the reply holds a broken object', async () => {
    const { llm } = fakeLlm('{"location": "Paris",');
    const request = await new RequestInterpreter(llm, offlineResolver().resolver).parse('paris');

    expect(request.rawLlmResponse).toBe('{"location": "Paris",');
    expect(request.weatherType).toBe('current');
  });

  it('falls back instead of throwing when the chat call fails', async () => {
    const { llm } = fakeLlm(new ServiceRequestError('chat', 'Chat request failed: connect ECONNREFUSED'));
    const interpreter = new RequestInterpreter(llm, offlineResolver().resolver);

    const request = await interpreter.parse('weather in Rome');

    expect(request).toEqual({
      location: 'unknown',
      latitude: null,
      longitude: null,
      weatherType: 'current',
      specificRequirements: 'weather in Rome',
      rawLlmResponse: 'Error generating response: Chat request failed: connect ECONNREFUSED',
    });
  });
});

describe('RequestInterpreter.resolve', () => {
  it('keeps coordinates the model already supplied', async () => {
    const { llm } = fakeLlm('');
    const { resolver, requests } = offlineResolver();

    const resolved = await new RequestInterpreter(llm, resolver).resolve({
      location: 'Sydney',
      latitude: -33.87,
      longitude: 151.21,
      weatherType: 'current',
      specificRequirements: 'today',
    });

    expect(resolved.latitude).toBe(-33.87);
    expect(resolved.longitude).toBe(151.21);
    expect(resolved.resolution).toEqual({ coordinate: { latitude: -33.87, longitude: 151.21 }, source: 'input' });
    expect(requests).toHaveLength(0);
  });

  it('geocodes the location when coordinates are missing', async () => {
    const { llm } = fakeLlm('');
    const resolved = await new RequestInterpreter(llm, offlineResolver().resolver).resolve({
      location: 'Berlin',
      latitude: null,
      longitude: null,
      weatherType: 'forecast',
      specificRequirements: 'rain?',
    });

    expect(resolved).toMatchObject({
      location: 'Berlin',
      latitude: 52.52,
      longitude: 13.405,
      weatherType: 'forecast',
      specificRequirements: 'rain?',
      resolution: { source: 'city-table' },
    });
  });

  it('resolves an empty location as London', async () => {
    const { llm } = fakeLlm('');
    const resolved = await new RequestInterpreter(llm, offlineResolver().resolver).resolve({
      location: '',
      latitude: null,
      longitude: null,
      weatherType: 'current',
      specificRequirements: '',
    });

    expect(resolved.resolution).toEqual({ coordinate: { latitude: 51.5074, longitude: -0.1278 }, source: 'city-table' });
  });
});

describe('RequestInterpreter.interpret', () => {
  it('geocodes London when the model reply names no location', async () => {
    const { llm } = fakeLlm('{"weather_type":"current","specific_requirements":"weather"}');
    const http = stubHttp((config) =>
      config.params.q === 'London' ? { data: [{ lat: '51.5073', lon: '-0.1276' }] } : { data: [{ lat: '10', lon: '20' }] }
    );
    const resolver = new GeocodingResolver(
      defaultStrategies(new NominatimClient({ apiUrl: 'https://geo.test/search', userAgent: 'test', timeoutMs: 100 }, http.client))
    );

    const resolved = await new RequestInterpreter(llm, resolver).interpret('what is it like outside?');

    expect(http.requests.map(request => request.params.q)).toEqual(['London']);
    expect(resolved.resolution).toEqual({ coordinate: { latitude: 51.5073, longitude: -0.1276 }, source: 'geocoder' });
  });

  it('resolves "weather in Tokyo" through the city table when geocoding is unreachable', async () => {
    const { llm } = fakeLlm('{"location":"Tokyo","latitude":null,"longitude":null,"weather_type":"current","specific_requirements":"current weather"}');
    const { resolver, requests } = offlineResolver();

    const resolved = await new RequestInterpreter(llm, resolver).interpret('weather in Tokyo');

    expect(resolved.latitude).toBe(35.6762);
    expect(resolved.longitude).toBe(139.6503);
    expect(resolved.resolution.source).toBe('city-table');
    expect(requests).toHaveLength(1);
    expect(requests[0].params).toEqual({ q: 'Tokyo', format: 'json', limit: 1 });
  });

  it('ends at the London default with a notice when the model reply is unusable', async () => {
    const { llm } = fakeLlm('no idea');

    const resolved = await new RequestInterpreter(llm, offlineResolver().resolver).interpret('somewhere nice');

    expect(resolved.rawLlmResponse).toBe('no idea');
    expect(resolved.resolution).toEqual({
      coordinate: { latitude: 51.5074, longitude: -0.1278 },
      source: 'default',
      notice: "Location 'unknown' not found, defaulting to London",
    });
  });
});
