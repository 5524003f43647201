import {
  ChatError,
  InferenceTimeoutError,
  InferenceUnavailableError,
  ModelNotFoundError,
  isChatError,
} from '../../core/errors.js';
import { BackendHttpError, IOllamaClient, OllamaModelInfo } from '../../core/interfaces/IOllamaClient.js';
import { PromptPayload } from '../../core/templates/types.js';
import { AsyncChannel } from '../../utils/AsyncChannel.js';
import { createLogger } from '../../utils/logger.js';
import {
  CircuitBreaker,
  CircuitOpenError,
  RetryConfig,
  TimeoutError,
  isRetryableError,
  withRetry,
} from '../../utils/retry.js';

export interface InferenceGatewayOptions {
  requestTimeoutMs: number;
  streamTimeoutMs: number;
  modelListTtlMs: number;
  retryAttempts: number;
  streamBufferSize: number;
  circuitFailureThreshold?: number;
  circuitResetMs?: number;
}

function isModelMissing(error: unknown): boolean {
  if (error instanceof ModelNotFoundError) {
    return true;
  }
  if (error instanceof BackendHttpError) {
    return error.status === 404 || /model .*not found/i.test(error.body);
  }
  return false;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Single entry point to the inference backend. Every call is bounded by a
 * timeout, retried on connection errors and guarded by a circuit breaker;
 * failures come out as typed ChatErrors.
 */
export class InferenceGateway {
  private logger = createLogger('inference');
  private breaker: CircuitBreaker;
  private modelCache: { names: Set<string>; fetchedAt: number } | null = null;

  constructor(
    private readonly client: IOllamaClient,
    private readonly options: InferenceGatewayOptions,
    private readonly now: () => number = Date.now
  ) {
    this.breaker = new CircuitBreaker(options.circuitFailureThreshold ?? 5, options.circuitResetMs ?? 60_000, now);
  }

  /**
   * Installed models, cached for `modelListTtlMs`
   */
  async listModels(forceRefresh = false): Promise<string[]> {
    const cache = this.modelCache;
    if (!forceRefresh && cache && this.now() - cache.fetchedAt < this.options.modelListTtlMs) {
      return [...cache.names];
    }

    let models: OllamaModelInfo[];
    try {
      models = await this.guarded((signal) => this.client.listModels(signal), this.options.requestTimeoutMs);
    } catch (error) {
      throw this.normalizeError(error, this.options.requestTimeoutMs);
    }

    const names = new Set<string>();
    for (const model of models) {
      names.add(model.name);
      if (model.model) names.add(model.model);
    }
    this.modelCache = { names, fetchedAt: this.now() };
    return [...names];
  }

  /**
   * @throws ModelNotFoundError when the backend does not have the model
   */
  async ensureModel(modelId: string): Promise<void> {
    const matches = (names: Iterable<string>) => {
      for (const name of names) {
        if (name === modelId || name === `${modelId}:latest`) return true;
      }
      return false;
    };

    const cache = this.modelCache;
    if (cache && this.now() - cache.fetchedAt < this.options.modelListTtlMs && matches(cache.names)) {
      return;
    }
    // A stale or negative cache entry is refreshed once; the model may have just been pulled
    const names = await this.listModels(true);
    if (!matches(names)) {
      throw new ModelNotFoundError(modelId);
    }
  }

  /**
   * Run a prompt to completion
   */
  async complete(payload: PromptPayload, modelId: string, signal?: AbortSignal): Promise<string> {
    const startTime = this.now();
    try {
      const text = await this.guarded(
        (attemptSignal) =>
          payload.type === 'chat'
            ? this.client.chat(modelId, payload.messages, attemptSignal)
            : this.client.generate(modelId, payload.prompt, payload.system, attemptSignal),
        this.options.requestTimeoutMs,
        signal
      );
      this.logger.info('Completion finished', {
        model: modelId,
        durationMs: this.now() - startTime,
        chars: text.length,
      });
      return text;
    } catch (error) {
      throw this.normalizeError(error, this.options.requestTimeoutMs, modelId);
    }
  }

  /**
   * Stream a completion. Fragments arrive in emission order through a
   * bounded channel; leaving the loop early or aborting `signal` aborts the
   * upstream request.
   */
  stream(payload: PromptPayload, modelId: string, signal?: AbortSignal): AsyncIterableIterator<string> {
    const controller = new AbortController();
    const channel = new AsyncChannel<string>(this.options.streamBufferSize, () => controller.abort());

    const onAbort = () => channel.cancel();
    if (signal?.aborted) {
      channel.cancel();
      return channel;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    this.pump(payload, modelId, channel, controller)
      .catch((error: unknown) => {
        this.logger.error('Stream producer failed', { model: modelId, error });
        channel.fail(error);
      })
      .finally(() => signal?.removeEventListener('abort', onAbort));

    return channel;
  }

  getCircuitStats() {
    return this.breaker.getStats();
  }

  /**
   * Map any failure to the error taxonomy
   */
  normalizeError(error: unknown, timeoutMs: number, modelId?: string): ChatError {
    if (isChatError(error)) {
      return error;
    }
    if (error instanceof TimeoutError) {
      return new InferenceTimeoutError(timeoutMs, { cause: error });
    }
    if (error instanceof CircuitOpenError) {
      return new InferenceUnavailableError(
        `Inference backend is failing; retrying in ${Math.ceil(error.retryInMs / 1000)}s`,
        { cause: error }
      );
    }
    if (modelId && isModelMissing(error)) {
      return new ModelNotFoundError(modelId, { cause: error });
    }
    if (error instanceof BackendHttpError) {
      return new InferenceUnavailableError(`Inference backend responded with status ${error.status}`, {
        cause: error,
      });
    }
    if (isAbortError(error)) {
      return new InferenceUnavailableError('Inference request was cancelled', { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new InferenceUnavailableError(`Cannot reach the inference backend: ${reason}`, { cause: error });
  }

  /**
   * Retry, per-attempt timeout and circuit breaker around a backend call
   */
  private guarded<T>(fn: (signal: AbortSignal) => Promise<T>, timeoutMs: number, signal?: AbortSignal): Promise<T> {
    const config: RetryConfig = {
      maxAttempts: this.options.retryAttempts,
      initialDelayMs: 500,
      maxDelayMs: 4000,
      multiplier: 2,
      timeoutMs,
    };

    return this.breaker.execute(
      () =>
        withRetry(fn, config, {
          signal,
          shouldRetry: (error) => !isModelMissing(error) && isRetryableError(error),
          onLog: (log) => {
            if (!log.success) {
              this.logger.warn('Backend attempt failed', {
                attempt: log.attempt,
                error: log.error,
                nextRetryInMs: log.nextRetryInMs,
              });
            }
          },
        }),
      (error) => !isModelMissing(error) && !signal?.aborted
    );
  }

  private async pump(
    payload: PromptPayload,
    modelId: string,
    channel: AsyncChannel<string>,
    controller: AbortController
  ): Promise<void> {
    const { streamTimeoutMs, requestTimeoutMs } = this.options;
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, streamTimeoutMs);
    const startTime = this.now();
    let fragments = 0;

    try {
      const upstream = await this.guarded((attemptSignal) => {
        const requestSignal = AbortSignal.any([controller.signal, attemptSignal]);
        return payload.type === 'chat'
          ? this.client.chatStream(modelId, payload.messages, requestSignal)
          : this.client.generateStream(modelId, payload.prompt, payload.system, requestSignal);
      }, requestTimeoutMs, controller.signal);

      for await (const fragment of upstream) {
        if (!(await channel.push(fragment))) {
          break;
        }
        fragments++;
      }

      if (channel.isCancelled) {
        this.logger.info('Stream cancelled by consumer', { model: modelId, fragments });
      } else {
        this.logger.info('Stream finished', { model: modelId, fragments, durationMs: this.now() - startTime });
      }
      channel.close();
    } catch (error) {
      if (channel.isCancelled) {
        this.logger.debug('Upstream closed after cancellation', { model: modelId, error });
        return;
      }
      channel.fail(
        timedOut
          ? new InferenceTimeoutError(streamTimeoutMs, { cause: error })
          : this.normalizeError(error, requestTimeoutMs, modelId)
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
