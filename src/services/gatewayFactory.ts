import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModel } from 'ai';
import { hasProviderCredentials, LlmSettings, providerApiKey, RuntimeSettings, StageModelConfig } from '../config';
import { STAGE_ORDER, StageId, isStageId } from '../domain/models/stageTypes';
import { UnknownProviderError, UnknownStageError } from '../domain/services/exceptions';
import { aiSdkCompletion, CompletionFn, GatewayStatus, LlmGateway } from './llmGateway';

export const DEEPSEEK_BASE_URL = 'https://api.deepseek.com';

type LanguageModelFactory = (model: string, env: NodeJS.ProcessEnv) => LanguageModel;

const PROVIDERS: Record<string, LanguageModelFactory> = {
  gemini: (model, env) => createGoogleGenerativeAI({ apiKey: providerApiKey('gemini', env) })(model),
  claude: (model, env) => createAnthropic({ apiKey: providerApiKey('claude', env) })(model),
  openai: (model, env) => createOpenAI({ apiKey: providerApiKey('openai', env) }).chat(model),
  deepseek: (model, env) =>
    createOpenAI({ apiKey: providerApiKey('deepseek', env), baseURL: DEEPSEEK_BASE_URL, compatibility: 'compatible' }).chat(model),
};

export function isKnownProvider(provider: string): boolean {
  return Object.prototype.hasOwnProperty.call(PROVIDERS, provider);
}

export type CompletionResolver = (provider: string, model: string) => CompletionFn;

export function defaultCompletionResolver(env: NodeJS.ProcessEnv = process.env): CompletionResolver {
  return (provider, model) => {
    if (!isKnownProvider(provider)) {
      throw new UnknownProviderError(provider);
    }
    return aiSdkCompletion(PROVIDERS[provider](model, env));
  };
}

/**
 * Builds one gateway per provider/model pair and reuses it, so stages that
 * share a model also share its circuit breaker.
 */
export class GatewayFactory {
  private readonly gateways = new Map<string, LlmGateway>();

  constructor(
    private readonly llm: LlmSettings,
    private readonly resolveCompletion: CompletionResolver = defaultCompletionResolver()
  ) {}

  create(config: StageModelConfig): LlmGateway {
    if (!isKnownProvider(config.provider)) {
      throw new UnknownProviderError(config.provider);
    }
    const key = `${config.provider}:${config.model}`;
    const cached = this.gateways.get(key);
    if (cached) {
      return cached;
    }
    const gateway = new LlmGateway({
      provider: config.provider,
      model: config.model,
      complete: this.resolveCompletion(config.provider, config.model),
      timeoutMs: this.llm.timeout_ms,
      maxOutputTokens: this.llm.max_output_tokens,
      circuitBreaker: this.llm.circuit_breaker,
    });
    this.gateways.set(key, gateway);
    return gateway;
  }

  forStage(stages: RuntimeSettings['stages'], stageId: StageId): LlmGateway {
    const config = stages[stageId];
    if (config === undefined) {
      throw new UnknownStageError(stageId);
    }
    return this.create(config);
  }

  /** The secondary perspective gateway, or null when it is not configured or has no credentials. */
  secondary(config: StageModelConfig | null, env: NodeJS.ProcessEnv = process.env): LlmGateway | null {
    if (config === null || !hasProviderCredentials(config.provider, env)) {
      return null;
    }
    return this.create(config);
  }

  statuses(): GatewayStatus[] {
    return [...this.gateways.values()].map(gateway => gateway.getStatus());
  }
}

/** Rejects mappings that name stages the pipeline does not have, or omit one it does. */
export function validateStageMapping(stages: RuntimeSettings['stages']): void {
  for (const name of Object.keys(stages)) {
    if (!isStageId(name)) {
      throw new UnknownStageError(name, 'is not a pipeline stage');
    }
  }
  for (const stageId of STAGE_ORDER) {
    if (stages[stageId] === undefined) {
      throw new UnknownStageError(stageId);
    }
  }
}
