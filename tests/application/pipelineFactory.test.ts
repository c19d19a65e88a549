import { describe, expect, test } from '@jest/globals';
import { createPipelineStages } from '../../src/application/pipelineFactory';
import { PipelineOrchestrator } from '../../src/application/pipelineOrchestrator';
import { RuntimeSettingsSchema } from '../../src/config';
import { PipelineContext } from '../../src/domain/models/pipelineContext';
import { isStageId, STAGE_ORDER } from '../../src/domain/models/stageTypes';
import { UnknownStageError } from '../../src/domain/services/exceptions';
import { CompletionResolver, GatewayFactory } from '../../src/services/gatewayFactory';
import { richResponses, SCENARIO } from '../fixtures/stageResponses';
import { json } from '../mocks/scriptedGateway';

// Each stage gets its own model, named after the stage; the completion answers for that stage.
const stageMapping = Object.fromEntries(STAGE_ORDER.map(stageId => [stageId, { provider: 'gemini', model: `${stageId}-model` }]));

const resolver: CompletionResolver = (_provider, model) => async () => {
  const stageId = model.replace(/-model$/, '');
  if (!isStageId(stageId)) {
    throw new Error(`no scripted answer for ${model}`);
  }
  return json(richResponses[stageId]);
};

function settingsWith(overrides: Record<string, unknown> = {}) {
  return RuntimeSettingsSchema.parse({
    stages: stageMapping,
    dual_perspective: { mode: 'never' },
    ...overrides,
  });
}

describe('createPipelineStages', () => {
  test('builds a complete pipeline from settings', async () => {
    const gateways = new GatewayFactory(settingsWith().llm, resolver);
    const pipeline = PipelineOrchestrator.fromSettings(settingsWith(), [], { gateways });

    const result = await pipeline.process(SCENARIO);

    expect(result.pipeline_metrics.successful_count).toBe(10);
    expect(result.pipeline_metrics.average_score).toBe(98.75);
    expect(result.stage_results.hod.model_identifier).toBe('hod-model');
    expect(gateways.statuses()).toHaveLength(10);
  });

  test('passes the ethical threshold to the first stage', async () => {
    const settings = settingsWith({ keter: { alignment_threshold: 0.96 } });
    const stages = createPipelineStages(settings, [], new GatewayFactory(settings.llm, resolver), {});

    const keter = await stages.keter.process(SCENARIO, PipelineContext.empty('t'));

    expect(keter).toMatchObject({ status: 'ok', derived_metrics: { threshold: 0.96, threshold_met: false } });
  });

  test('leaves out the second perspective without its credentials', async () => {
    const settings = settingsWith({ dual_perspective: { mode: 'always', secondary: { provider: 'deepseek', model: 'binah-model' } } });
    const gateways = new GatewayFactory(settings.llm, resolver);
    const stages = createPipelineStages(settings, [], gateways, {});

    const binah = await stages.binah.process(SCENARIO, PipelineContext.empty('t'));

    expect(binah).toMatchObject({ status: 'ok', mode: 'single' });
  });

  test('rejects a mapping that names an unknown stage', () => {
    const settings = settingsWith({ stages: { ...stageMapping, daat: { provider: 'gemini', model: 'x' } } });
    expect(() => createPipelineStages(settings, [], new GatewayFactory(settings.llm, resolver))).toThrow(UnknownStageError);
  });

  test('rejects a mapping that omits a stage', () => {
    const partial = Object.fromEntries(Object.entries(stageMapping).filter(([stageId]) => stageId !== 'malchut'));
    const settings = settingsWith({ stages: partial });
    expect(() => createPipelineStages(settings, [], new GatewayFactory(settings.llm, resolver))).toThrow("Unknown stage 'malchut': has no model mapping");
  });
});
