import { ChatMessage } from '../../src/core/templates/types.js';
import { IOllamaClient, OllamaModelInfo } from '../../src/core/interfaces/IOllamaClient.js';

export function abortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

function waitFor(gate: Promise<void>, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    signal?.addEventListener('abort', () => reject(abortError()), { once: true });
    gate.then(resolve, reject);
  });
}

export interface RecordedCall {
  method: 'generate' | 'chat' | 'generateStream' | 'chatStream' | 'embed';
  model: string;
  prompt?: string;
  system?: string;
  messages?: ChatMessage[];
}

/**
 * In-process stand-in for the Ollama HTTP API
 */
export class FakeOllamaClient implements IOllamaClient {
  models: OllamaModelInfo[] = [{ name: 'test-model:latest', model: 'test-model:latest' }];
  reply = 'Hello from the model';
  fragments = ['Hello', ' from', ' the model'];
  embedding = [1, 0];
  /** Thrown, one per call, before any other behavior */
  failures: unknown[] = [];
  /** While set, completions and stream fragments wait for it (or for an abort) */
  gate: Promise<void> | null = null;
  calls: RecordedCall[] = [];
  listModelsCalls = 0;
  lastSignal: AbortSignal | undefined;

  async generate(model: string, prompt: string, system?: string, signal?: AbortSignal): Promise<string> {
    this.calls.push({ method: 'generate', model, prompt, system });
    return this.complete(signal);
  }

  async chat(model: string, messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
    this.calls.push({ method: 'chat', model, messages });
    return this.complete(signal);
  }

  async generateStream(
    model: string,
    prompt: string,
    system: string | undefined,
    signal: AbortSignal
  ): Promise<AsyncIterable<string>> {
    this.calls.push({ method: 'generateStream', model, prompt, system });
    this.lastSignal = signal;
    this.failNext();
    return this.streamFragments(signal);
  }

  async chatStream(model: string, messages: ChatMessage[], signal: AbortSignal): Promise<AsyncIterable<string>> {
    this.calls.push({ method: 'chatStream', model, messages });
    this.lastSignal = signal;
    this.failNext();
    return this.streamFragments(signal);
  }

  async embed(model: string, _text: string): Promise<number[]> {
    this.calls.push({ method: 'embed', model });
    this.failNext();
    return this.embedding;
  }

  async listModels(): Promise<OllamaModelInfo[]> {
    this.listModelsCalls++;
    this.failNext();
    return this.models;
  }

  private async complete(signal: AbortSignal | undefined): Promise<string> {
    this.lastSignal = signal;
    this.failNext();
    if (this.gate) {
      await waitFor(this.gate, signal);
    }
    return this.reply;
  }

  private async *streamFragments(signal: AbortSignal): AsyncGenerator<string> {
    for (const fragment of this.fragments) {
      if (this.gate) {
        await waitFor(this.gate, signal);
      }
      if (signal.aborted) {
        throw abortError();
      }
      yield fragment;
    }
  }

  private failNext(): void {
    if (this.failures.length > 0) {
      throw this.failures.shift();
    }
  }
}

/**
 * A promise that settles only when `open` is called
 */
export function createGate(): { gate: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { gate, open };
}
