import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';
export const DEFAULT_OLLAMA_MODEL = 'mistral';

const generateResponseSchema = z.object({
  response: z.string(),
});

export interface OllamaClientOptions {
  baseUrl?: string;
  model?: string;
  /** 0 or unset waits indefinitely */
  timeoutMs?: number;
  /** Pre-built axios instance, mainly for tests */
  http?: AxiosInstance;
}

/** Minimal client for a local Ollama server's non-streaming generate endpoint */
export class OllamaClient {
  readonly model: string;
  private readonly http: AxiosInstance;

  constructor(options: OllamaClientOptions = {}) {
    this.model = options.model ?? DEFAULT_OLLAMA_MODEL;
    this.http =
      options.http ??
      axios.create({
        baseURL: (options.baseUrl ?? DEFAULT_OLLAMA_URL).replace(/\/+$/, ''),
        timeout: options.timeoutMs ?? 0,
        headers: { 'Content-Type': 'application/json' },
      });
  }

  async generate(prompt: string): Promise<string> {
    const response = await this.http.post<unknown>(
      '/api/generate',
      { model: this.model, prompt, stream: false },
      { validateStatus: () => true }
    );

    if (response.status >= 400) {
      throw new Error(`Ollama request failed with status code ${response.status}`);
    }

    const parse = generateResponseSchema.safeParse(response.data);
    if (!parse.success) {
      throw new Error('Ollama response is missing a "response" field');
    }
    return parse.data.response;
  }
}
