import { ChatMessage } from '../templates/types.js';

export interface OllamaModelInfo {
  name: string;
  model?: string;
  size?: number;
  modified_at?: string;
}

/**
 * Raised by backend clients for a non-2xx HTTP response
 */
export class BackendHttpError extends Error {
  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`HTTP error! status: ${status}${body ? ` - ${body.slice(0, 200)}` : ''}`);
    this.name = 'BackendHttpError';
  }
}

/**
 * Interface for Ollama API client
 */
export interface IOllamaClient {
  /**
   * Generate a response from a model using text prompt
   */
  generate(
    model: string,
    prompt: string,
    systemPrompt?: string,
    abortSignal?: AbortSignal
  ): Promise<string>;

  /**
   * Chat with a model using structured messages
   */
  chat(model: string, messages: ChatMessage[], abortSignal?: AbortSignal): Promise<string>;

  /**
   * Open a streaming generate call. Resolves once the backend accepted the
   * request; the iterable yields text fragments in emission order.
   */
  generateStream(
    model: string,
    prompt: string,
    systemPrompt: string | undefined,
    abortSignal: AbortSignal
  ): Promise<AsyncIterable<string>>;

  chatStream(
    model: string,
    messages: ChatMessage[],
    abortSignal: AbortSignal
  ): Promise<AsyncIterable<string>>;

  /**
   * Embed a text with an embedding model
   */
  embed(model: string, text: string, abortSignal?: AbortSignal): Promise<number[]>;

  /**
   * List available models
   */
  listModels(abortSignal?: AbortSignal): Promise<OllamaModelInfo[]>;
}
