import { describe, expect, test } from '@jest/globals';
import { PipelineContext } from '../../../src/domain/models/pipelineContext';
import { ProviderError } from '../../../src/domain/services/exceptions';
import { KeterStage } from '../../../src/domain/stages/keterStage';
import { richResponses, SCENARIO } from '../../fixtures/stageResponses';
import { json, ScriptedGateway } from '../../mocks/scriptedGateway';

const context = () => PipelineContext.empty('keter-run');

function scores(values: [unknown, unknown, unknown, unknown, unknown]) {
  const [reduces_suffering, respects_free_will, promotes_harmony, justice_mercy_balance, aligned_with_truth] = values;
  return { reduces_suffering, respects_free_will, promotes_harmony, justice_mercy_balance, aligned_with_truth };
}

describe('KeterStage', () => {
  test('scores a well-aligned scenario as exceptional', async () => {
    const gateway = new ScriptedGateway(json(richResponses.keter));
    const result = await new KeterStage(gateway).process(SCENARIO, context());

    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.derived_metrics).toMatchObject({
      total_score: 45,
      alignment_score: 0.95,
      alignment_percentage: 95,
      threshold: 0.6,
      threshold_met: true,
      corruption_count: 0,
      corruption_severity: 'none',
      manifestation_valid: true,
      attempts: 1,
    });
    expect(result.quality_label).toBe('exceptional');
    expect(result.position).toBe(1);
    expect(result.model_identifier).toBe('scripted-model');
    expect(gateway.calls[0].temperature).toBe(0.3);
    expect(gateway.calls[0].prompt).toContain(SCENARIO);
  });

  test('coerces numeric strings and clamps out-of-range scores', async () => {
    const gateway = new ScriptedGateway(json({
      scores: scores([12, '-3', '+4', ' 8 ', 0]),
      corruptions: [{ type: 'manipulation', severity: 'minor', description: 'framing' }],
    }));
    const result = await new KeterStage(gateway).process(SCENARIO, context());

    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.derived_metrics.scores).toEqual(scores([10, -3, 4, 8, 0]));
    expect(result.derived_metrics.alignment_percentage).toBe(69);
    expect(result.derived_metrics.corruption_severity).toBe('minor');
    expect(result.quality_label).toBe('moderate');
  });

  test('a critical corruption invalidates the scenario despite a high score', async () => {
    const gateway = new ScriptedGateway(json({
      scores: scores([8, 8, 8, 8, 8]),
      corruptions: [
        { type: 'deception', severity: 'moderate', description: 'hidden fees' },
        { type: 'coercion', severity: 'CRITICAL', description: 'forced enrolment' },
      ],
    }));
    const result = await new KeterStage(gateway).process(SCENARIO, context());

    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.derived_metrics.alignment_percentage).toBe(90);
    expect(result.derived_metrics.threshold_met).toBe(true);
    expect(result.derived_metrics.corruption_severity).toBe('critical');
    expect(result.derived_metrics.manifestation_valid).toBe(false);
    expect(result.quality_label).toBe('low');
  });

  test('a score below the threshold fails the gate', async () => {
    const gateway = new ScriptedGateway(json({ scores: scores([1, 1, 1, 1, 1]) }));
    const result = await new KeterStage(gateway, { alignmentThreshold: 0.6 }).process(SCENARIO, context());

    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.derived_metrics.alignment_score).toBe(0.55);
    expect(result.derived_metrics.threshold_met).toBe(false);
    expect(result.derived_metrics.manifestation_valid).toBe(false);
  });

  test('retries an unparseable answer and records the attempt count', async () => {
    const gateway = new ScriptedGateway(['Sorry, let me think about that.', json(richResponses.keter)]);
    const result = await new KeterStage(gateway).process(SCENARIO, context());

    expect(gateway.calls).toHaveLength(2);
    expect(result.status).toBe('ok');
    expect(result.attempts).toBe(2);
    if (result.status === 'ok') {
      expect(result.derived_metrics.attempts).toBe(2);
    }
  });

  test('gives up after the configured number of attempts', async () => {
    const gateway = new ScriptedGateway('garbage');
    const result = await new KeterStage(gateway, { maxAttempts: 3 }).process(SCENARIO, context());

    expect(gateway.calls).toHaveLength(3);
    expect(result).toMatchObject({
      status: 'error',
      error_type: 'RetryExhaustedError',
      error: 'Failed after 3 attempts: Could not extract JSON from model response. Response: garbage',
      attempts: 3,
    });
  });

  test('retries answers that do not match the expected shape', async () => {
    const gateway = new ScriptedGateway([json({ reasoning: 'no scores' }), json(richResponses.keter)]);
    const result = await new KeterStage(gateway).process(SCENARIO, context());

    expect(result.status).toBe('ok');
    expect(result.attempts).toBe(2);
  });

  test('does not retry provider failures', async () => {
    const gateway = new ScriptedGateway(new ProviderError('gemini', 'flash', 'quota exceeded'));
    const result = await new KeterStage(gateway).process(SCENARIO, context());

    expect(gateway.calls).toHaveLength(1);
    expect(result).toMatchObject({ status: 'error', error_type: 'ProviderError', attempts: 1 });
  });

  test('does not retry a score that cannot be read as a number', async () => {
    const gateway = new ScriptedGateway(json({ scores: scores(['high', 5, 5, 5, 5]) }));
    const result = await new KeterStage(gateway).process(SCENARIO, context());

    expect(gateway.calls).toHaveLength(1);
    expect(result).toMatchObject({
      status: 'error',
      error_type: 'ScoreCoercionError',
      error: 'Field \'scores.reduces_suffering\' is not numeric: "high"',
    });
  });
});
