import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { toServiceRequestError } from '../errors.js';
import type { ChatMessage } from '../types/message.js';

export interface OllamaOptions {
  apiUrl: string;
  model: string;
  timeoutMs: number;
}

export interface ChatProvider {
  chat(messages: ChatMessage[]): Promise<string>;
}

const chatResponseSchema = z.object({
  message: z
    .object({
      role: z.string().optional(),
      content: z.string().optional(),
    })
    .optional(),
});

/**
 * Non-streaming client for an Ollama-compatible /api/chat endpoint.
 */
export class OllamaProvider implements ChatProvider {
  private client: AxiosInstance;
  private options: OllamaOptions;

  constructor(options: OllamaOptions, client: AxiosInstance = axios.create()) {
    this.options = options;
    this.client = client;
  }

  async chat(messages: ChatMessage[]): Promise<string> {
    const payload = {
      model: this.options.model,
      messages: messages.map(msg => ({ role: msg.role, content: msg.content })),
      stream: false,
    };

    let data: unknown;
    try {
      const response = await this.client.post(this.options.apiUrl, payload, {
        headers: { 'Content-Type': 'application/json' },
        timeout: this.options.timeoutMs,
      });
      data = response.data;
    } catch (err) {
      const error = toServiceRequestError('chat', err);
      console.error(`[Ollama] model=${this.options.model} error=${error.message}`);
      throw error;
    }

    const parsed = chatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw toServiceRequestError('chat', new Error('unexpected response body'));
    }

    return parsed.data.message?.content ?? '';
  }
}
