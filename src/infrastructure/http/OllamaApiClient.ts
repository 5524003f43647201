import fetch, { Response } from 'node-fetch';
import { StringDecoder } from 'string_decoder';
import { z } from 'zod';
import { BackendHttpError, IOllamaClient, OllamaModelInfo } from '../../core/interfaces/IOllamaClient.js';
import { ChatMessage } from '../../core/templates/types.js';

/**
 * Sampling options sent with every generate/chat call
 */
export interface OllamaGenerationOptions {
  temperature: number;
  top_k: number;
  top_p: number;
  repeat_penalty: number;
  num_predict?: number;
  num_ctx?: number;
}

export const DEFAULT_GENERATION_OPTIONS: OllamaGenerationOptions = {
  temperature: 0.7,
  top_k: 40,
  top_p: 0.9,
  repeat_penalty: 1.1,
};

const KEEP_ALIVE = '10m';

const GenerateResponseSchema = z.object({ response: z.string() });
const ChatResponseSchema = z.object({ message: z.object({ content: z.string() }) });
const EmbeddingResponseSchema = z.object({ embedding: z.array(z.number()).min(1) });
const TagsResponseSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        model: z.string().optional(),
        size: z.number().optional(),
        modified_at: z.string().optional(),
      })
    )
    .default([]),
});

const StreamLineSchema = z.object({
  response: z.string().optional(),
  message: z.object({ content: z.string() }).optional(),
  done: z.boolean().optional(),
  error: z.string().optional(),
});

/**
 * Split a byte stream of newline-delimited JSON into parsed values
 */
export async function* parseNdjsonStream(source: AsyncIterable<Buffer | string>): AsyncGenerator<unknown> {
  // Characters may be split across chunks
  const decoder = new StringDecoder('utf8');
  let pending = '';
  for await (const chunk of source) {
    pending += typeof chunk === 'string' ? chunk : decoder.write(chunk);
    let newline = pending.indexOf('\n');
    while (newline >= 0) {
      const line = pending.slice(0, newline).trim();
      pending = pending.slice(newline + 1);
      if (line) {
        yield JSON.parse(line);
      }
      newline = pending.indexOf('\n');
    }
  }
  const rest = (pending + decoder.end()).trim();
  if (rest) {
    yield JSON.parse(rest);
  }
}

/**
 * Text fragments of an Ollama streaming response, in emission order
 */
async function* streamFragments(response: Response): AsyncGenerator<string> {
  for await (const value of parseNdjsonStream(response.body)) {
    const line = StreamLineSchema.parse(value);
    if (line.error) {
      throw new Error(`Ollama stream error: ${line.error}`);
    }
    const text = line.message?.content ?? line.response ?? '';
    if (text) {
      yield text;
    }
    if (line.done) {
      return;
    }
  }
}

/**
 * Ollama API Client implementation.
 * Plain HTTP; timeouts, retries and the circuit breaker live in the InferenceGateway.
 */
export class OllamaApiClient implements IOllamaClient {
  private apiUrl: string;

  constructor(
    apiUrl: string,
    private generationOptions: OllamaGenerationOptions = DEFAULT_GENERATION_OPTIONS
  ) {
    this.apiUrl = apiUrl.replace(/\/+$/, '');
  }

  async generate(model: string, prompt: string, systemPrompt?: string, abortSignal?: AbortSignal): Promise<string> {
    const res = await this.post('/api/generate', { model, prompt, system: systemPrompt, stream: false }, abortSignal);
    return GenerateResponseSchema.parse(await res.json()).response;
  }

  async chat(model: string, messages: ChatMessage[], abortSignal?: AbortSignal): Promise<string> {
    const res = await this.post('/api/chat', { model, messages, stream: false }, abortSignal);
    return ChatResponseSchema.parse(await res.json()).message.content;
  }

  async generateStream(
    model: string,
    prompt: string,
    systemPrompt: string | undefined,
    abortSignal: AbortSignal
  ): Promise<AsyncIterable<string>> {
    const res = await this.post('/api/generate', { model, prompt, system: systemPrompt, stream: true }, abortSignal);
    return streamFragments(res);
  }

  async chatStream(model: string, messages: ChatMessage[], abortSignal: AbortSignal): Promise<AsyncIterable<string>> {
    const res = await this.post('/api/chat', { model, messages, stream: true }, abortSignal);
    return streamFragments(res);
  }

  async embed(model: string, text: string, abortSignal?: AbortSignal): Promise<number[]> {
    const res = await this.request('/api/embeddings', {
      method: 'POST',
      body: JSON.stringify({ model, prompt: text }),
      signal: abortSignal,
    });
    return EmbeddingResponseSchema.parse(await res.json()).embedding;
  }

  async listModels(abortSignal?: AbortSignal): Promise<OllamaModelInfo[]> {
    const res = await this.request('/api/tags', { method: 'GET', signal: abortSignal });
    return TagsResponseSchema.parse(await res.json()).models;
  }

  private post(path: string, body: Record<string, unknown>, abortSignal?: AbortSignal): Promise<Response> {
    return this.request(path, {
      method: 'POST',
      body: JSON.stringify({ ...body, keep_alive: KEEP_ALIVE, options: this.generationOptions }),
      signal: abortSignal,
    });
  }

  private async request(
    path: string,
    init: { method: 'GET' | 'POST'; body?: string; signal?: AbortSignal }
  ): Promise<Response> {
    const res = await fetch(`${this.apiUrl}${path}`, {
      method: init.method,
      headers: { 'Content-Type': 'application/json' },
      body: init.body,
      signal: init.signal,
    });

    if (!res.ok) {
      throw new BackendHttpError(res.status, await res.text());
    }
    return res;
  }
}
