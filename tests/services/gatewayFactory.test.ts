import { describe, expect, test } from '@jest/globals';
import { STAGE_ORDER } from '../../src/domain/models/stageTypes';
import { UnknownProviderError, UnknownStageError } from '../../src/domain/services/exceptions';
import { CompletionResolver, GatewayFactory, validateStageMapping } from '../../src/services/gatewayFactory';

const llm = {
  timeout_ms: 1000,
  max_output_tokens: 128,
  circuit_breaker: { failure_threshold: 3, recovery_timeout_ms: 1000, half_open_success_threshold: 1 },
};

const resolver: CompletionResolver = (provider, model) => async () => `${provider}:${model}`;

function fullMapping(provider = 'gemini', model = 'flash') {
  return Object.fromEntries(STAGE_ORDER.map(stageId => [stageId, { provider, model }]));
}

describe('GatewayFactory', () => {
  test('reuses one gateway per provider and model', () => {
    const factory = new GatewayFactory(llm, resolver);
    const first = factory.create({ provider: 'gemini', model: 'flash' });
    const second = factory.create({ provider: 'gemini', model: 'flash' });
    const other = factory.create({ provider: 'claude', model: 'sonnet' });

    expect(second).toBe(first);
    expect(other).not.toBe(first);
    expect(factory.statuses().map(status => `${status.provider}/${status.model}`)).toEqual(['gemini/flash', 'claude/sonnet']);
  });

  test('routes calls through the resolved completion', async () => {
    const factory = new GatewayFactory(llm, resolver);
    await expect(factory.create({ provider: 'deepseek', model: 'chat' }).generate('hi', 0.2)).resolves.toBe('deepseek:chat');
  });

  test('rejects unknown providers', () => {
    const factory = new GatewayFactory(llm, resolver);
    expect(() => factory.create({ provider: 'mystery', model: 'm1' })).toThrow(UnknownProviderError);
    expect(() => factory.create({ provider: 'mystery', model: 'm1' })).toThrow('Unknown provider: mystery');
  });

  test('forStage throws for an unmapped stage', () => {
    const factory = new GatewayFactory(llm, resolver);
    expect(() => factory.forStage({}, 'hod')).toThrow(UnknownStageError);
  });

  test('secondary is null without a configuration or credentials', () => {
    const factory = new GatewayFactory(llm, resolver);
    const config = { provider: 'deepseek', model: 'deepseek-chat' };

    expect(factory.secondary(null, {})).toBeNull();
    expect(factory.secondary(config, {})).toBeNull();
    expect(factory.secondary(config, { DEEPSEEK_API_KEY: 'test-secret' })?.model).toBe('deepseek-chat');
  });
});

describe('validateStageMapping', () => {
  test('accepts a mapping for every stage', () => {
    expect(() => validateStageMapping(fullMapping())).not.toThrow();
  });

  test('rejects a missing stage', () => {
    const mapping = fullMapping();
    delete mapping.yesod;
    expect(() => validateStageMapping(mapping)).toThrow("Unknown stage 'yesod': has no model mapping");
  });

  test('rejects a stage the pipeline does not have', () => {
    const mapping = { ...fullMapping(), daat: { provider: 'gemini', model: 'flash' } };
    expect(() => validateStageMapping(mapping)).toThrow("Unknown stage 'daat': is not a pipeline stage");
  });
});
