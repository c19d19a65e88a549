import { generateText, LanguageModel } from 'ai';
import type { CircuitBreakerSettings } from '../config';
import type { ModelGateway, StructuredRecord } from '../domain/interfaces/modelGateway';
import {
  PipelineCancelledError,
  ProviderError,
  ProviderTimeoutError,
  toError,
} from '../domain/services/exceptions';
import { createLogger } from '../utils/logger';
import { CircuitBreaker, CircuitBreakerState, CircuitOpenError } from './circuitBreaker';
import { extractStructured } from './jsonExtraction';

const logger = createLogger('llm');

export interface CompletionRequest {
  prompt: string;
  temperature: number;
  maxOutputTokens: number;
  abortSignal: AbortSignal;
}

/** One provider round trip. Implementations should stop once `abortSignal` fires; the gateway stops waiting either way. */
export type CompletionFn = (request: CompletionRequest) => Promise<string>;

export function aiSdkCompletion(model: LanguageModel): CompletionFn {
  return async ({ prompt, temperature, maxOutputTokens, abortSignal }) => {
    const { text } = await generateText({
      model,
      prompt,
      temperature,
      maxTokens: maxOutputTokens,
      // Retrying is the caller's decision.
      maxRetries: 0,
      abortSignal,
    });
    return text;
  };
}

export interface LlmGatewayOptions {
  provider: string;
  model: string;
  complete: CompletionFn;
  timeoutMs: number;
  maxOutputTokens: number;
  circuitBreaker: CircuitBreakerSettings;
  now?: () => number;
}

export interface GatewayStatus {
  provider: string;
  model: string;
  circuit: CircuitBreakerState;
}

export class LlmGateway implements ModelGateway {
  readonly provider: string;
  readonly model: string;
  private readonly complete: CompletionFn;
  private readonly timeoutMs: number;
  private readonly maxOutputTokens: number;
  private readonly breaker: CircuitBreaker;

  constructor(options: LlmGatewayOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.complete = options.complete;
    this.timeoutMs = options.timeoutMs;
    this.maxOutputTokens = options.maxOutputTokens;
    this.breaker = new CircuitBreaker(options.circuitBreaker, options.now);
  }

  async generate(prompt: string, temperature: number, signal?: AbortSignal): Promise<string> {
    if (!prompt.trim()) {
      throw new ProviderError(this.provider, this.model, 'prompt must be a non-empty string');
    }
    if (signal?.aborted) {
      throw new PipelineCancelledError();
    }

    try {
      return await this.breaker.execute(
        () => this.callProvider(prompt, temperature, signal),
        error => !(error instanceof PipelineCancelledError)
      );
    } catch (error) {
      if (error instanceof CircuitOpenError) {
        throw new ProviderError(this.provider, this.model, error.message, error);
      }
      throw error;
    }
  }

  extractStructured(responseText: string): StructuredRecord {
    return extractStructured(responseText);
  }

  getStatus(): GatewayStatus {
    return { provider: this.provider, model: this.model, circuit: this.breaker.getState() };
  }

  private async callProvider(prompt: string, temperature: number, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    // Settles the call at the deadline or on cancellation even if the provider keeps running.
    let interrupt: (error: Error) => void = () => undefined;
    const interrupted = new Promise<never>((_resolve, reject) => {
      interrupt = reject;
    });
    const stop = (error: Error) => {
      interrupt(error);
      controller.abort();
    };
    const timer = setTimeout(
      () => stop(new ProviderTimeoutError(this.provider, this.model, this.timeoutMs)),
      this.timeoutMs
    );
    const forwardAbort = () => stop(new PipelineCancelledError());
    signal?.addEventListener('abort', forwardAbort, { once: true });

    const startTime = process.hrtime.bigint();
    try {
      const text = await Promise.race([
        this.complete({
          prompt,
          temperature,
          maxOutputTokens: this.maxOutputTokens,
          abortSignal: controller.signal,
        }),
        interrupted,
      ]);
      const durationMs = Number(process.hrtime.bigint() - startTime) / 1_000_000;
      logger.debug(`${this.provider}/${this.model} answered in ${durationMs.toFixed(0)}ms (${text.length} chars)`);
      return text;
    } catch (error) {
      if (error instanceof ProviderTimeoutError || error instanceof PipelineCancelledError) {
        throw error;
      }
      throw new ProviderError(this.provider, this.model, toError(error).message, error);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
