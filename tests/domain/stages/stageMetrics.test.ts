import { describe, expect, test } from '@jest/globals';
import { PipelineContext } from '../../../src/domain/models/pipelineContext';
import { BinahStage, temporalHorizon } from '../../../src/domain/stages/binahStage';
import { ChesedStage } from '../../../src/domain/stages/chesedStage';
import { ChochmahStage } from '../../../src/domain/stages/chochmahStage';
import { GevurahStage } from '../../../src/domain/stages/gevurahStage';
import { HodStage } from '../../../src/domain/stages/hodStage';
import { MalchutStage } from '../../../src/domain/stages/malchutStage';
import { NetzachStage } from '../../../src/domain/stages/netzachStage';
import { balanceRatio, TiferetStage } from '../../../src/domain/stages/tiferetStage';
import { normalizeDecision, YesodStage } from '../../../src/domain/stages/yesodStage';
import { minimalResponses, richResponses, SCENARIO } from '../../fixtures/stageResponses';
import { json, ScriptedGateway } from '../../mocks/scriptedGateway';

const empty = () => PipelineContext.empty('metrics-run');
const rich = (stageId: keyof typeof richResponses) => new ScriptedGateway(json(richResponses[stageId]));
const minimal = (stageId: keyof typeof minimalResponses) => new ScriptedGateway(json(minimalResponses[stageId]));

describe('stage metrics on complete answers', () => {
  test('chochmah', async () => {
    const result = await new ChochmahStage(rich('chochmah')).process(SCENARIO, empty());
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.derived_metrics).toEqual({
      insight_depth_score: 100,
      insight_count: 5,
      uncertainty_count: 4,
      precedent_count: 2,
      pattern_recognition_count: 2,
      epistemic_humility_ratio: 44.44,
      confidence_level: 80,
    });
    expect(result.quality_label).toBe('exceptional');
  });

  test('binah', async () => {
    const result = await new BinahStage(rich('binah')).process(SCENARIO, empty());
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.mode).toBe('single');
    expect(result.derived_metrics).toEqual({
      contextual_depth_score: 100,
      dimension_count: 9,
      stakeholder_coverage: 5,
      systemic_risk_count: 2,
      effects_mapped: { first_order: 3, second_order: 2, third_order: 2 },
      temporal_horizon: 'comprehensive (0-20 years)',
    });
    expect(result.quality_label).toBe('exceptional');
  });

  test('chesed', async () => {
    const result = await new ChesedStage(rich('chesed')).process(SCENARIO, empty());
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.derived_metrics).toEqual({
      expansion_score: 100,
      opportunity_count: 5,
      high_impact_count: 2,
      benefit_count: 9,
      benefit_coverage: 'broad (3-4 groups)',
      growth_area_count: 2,
      synergy_count: 2,
    });
    expect(result.quality_label).toBe('exceptional');
  });

  test('gevurah counts severities across every horizon', async () => {
    const result = await new GevurahStage(rich('gevurah')).process(SCENARIO, empty());
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.derived_metrics).toEqual({
      severity_score: 99.99,
      risk_count: 7,
      critical_risk_count: 3,
      high_risk_count: 3,
      red_line_count: 3,
      boundary_strength: 'strong (7-9 boundaries)',
    });
    expect(result.quality_label).toBe('exceptional');
  });

  test('tiferet reads the stage 4 and 5 scores for its balance ratio', async () => {
    const chesed = await new ChesedStage(rich('chesed')).process(SCENARIO, empty());
    const gevurah = await new GevurahStage(rich('gevurah')).process(SCENARIO, empty());
    const context = empty().with('chesed', chesed).with('gevurah', gevurah);

    const result = await new TiferetStage(rich('tiferet')).process(SCENARIO, context);
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.derived_metrics).toEqual({
      harmony_score: 100,
      synthesis_point_count: 4,
      recommendation_count: 4,
      trade_off_count: 3,
      balance_ratio: 'well-balanced (50:50)',
    });
    expect(result.quality_label).toBe('exceptional');
  });

  test('netzach', async () => {
    const result = await new NetzachStage(rich('netzach')).process(SCENARIO, empty());
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.derived_metrics).toEqual({
      persistence_score: 100,
      phase_count: 4,
      milestone_count: 4,
      obstacle_count: 3,
      resilience_rating: 'very high',
    });
    expect(result.quality_label).toBe('exceptional');
  });

  test('hod', async () => {
    const result = await new HodStage(rich('hod')).process(SCENARIO, empty());
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.derived_metrics).toEqual({
      splendor_score: 99.98,
      message_count: 4,
      stakeholder_message_count: 4,
      channel_count: 4,
      clarity_rating: 'exceptional clarity',
    });
    expect(result.quality_label).toBe('exceptional');
  });

  test('yesod', async () => {
    const result = await new YesodStage(rich('yesod')).process(SCENARIO, empty());
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.derived_metrics).toEqual({
      readiness_score: 100,
      ready_count: 4,
      aligned_count: 3,
      gap_count: 1,
      strength_count: 3,
      decision: 'GO',
      integration_quality: 'exceptional integration',
      foundation_strength: 'rock solid',
    });
    expect(result.quality_label).toBe('exceptional');
  });

  test('malchut', async () => {
    const result = await new MalchutStage(rich('malchut')).process(SCENARIO, empty());
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.derived_metrics).toEqual({
      manifestation_score: 99.99,
      action_count: 4,
      owner_count: 4,
      resource_category_count: 4,
      milestone_count: 3,
      feasibility_rating: 'immediately executable',
    });
    expect(result.quality_label).toBe('exceptional');
  });

  test('the same answer on the same context yields the same metrics', async () => {
    const chesed = await new ChesedStage(rich('chesed')).process(SCENARIO, empty());
    const gevurah = await new GevurahStage(minimal('gevurah')).process(SCENARIO, empty());
    const context = empty().with('chesed', chesed).with('gevurah', gevurah);
    const stage = new TiferetStage(rich('tiferet'));

    const first = await stage.process(SCENARIO, context);
    const second = await stage.process(SCENARIO, context);

    expect([first.status, second.status]).toEqual(['ok', 'ok']);
    if (first.status !== 'ok' || second.status !== 'ok') return;
    expect(second.derived_metrics).toEqual(first.derived_metrics);
    expect(second.quality_label).toBe(first.quality_label);
    expect(second.raw_fields).toEqual(first.raw_fields);
  });
});

describe('stage metrics on empty answers', () => {
  test('missing lists and texts default to empty and score zero', async () => {
    const chochmah = await new ChochmahStage(minimal('chochmah')).process(SCENARIO, empty());
    const binah = await new BinahStage(minimal('binah')).process(SCENARIO, empty());
    const tiferet = await new TiferetStage(minimal('tiferet')).process(SCENARIO, empty());
    const malchut = await new MalchutStage(minimal('malchut')).process(SCENARIO, empty());

    expect(chochmah).toMatchObject({ status: 'ok', quality_label: 'low', derived_metrics: { insight_depth_score: 0, confidence_level: 0 } });
    expect(binah).toMatchObject({ status: 'ok', quality_label: 'low', derived_metrics: { contextual_depth_score: 0, temporal_horizon: 'limited' } });
    expect(tiferet).toMatchObject({ status: 'ok', derived_metrics: { harmony_score: 0, balance_ratio: 'unknown' } });
    expect(malchut).toMatchObject({ status: 'ok', derived_metrics: { manifestation_score: 0, feasibility_rating: 'needs further planning' } });
  });

  test('yesod with no strengths or gaps still earns the balance points', async () => {
    const result = await new YesodStage(minimal('yesod')).process(SCENARIO, empty());
    expect(result).toMatchObject({
      status: 'ok',
      quality_label: 'low',
      derived_metrics: { readiness_score: 10, decision: '', integration_quality: 'fragmented integration', foundation_strength: 'weak' },
    });
  });

  test('a field of the wrong shape is a schema error', async () => {
    const result = await new ChesedStage(new ScriptedGateway(json({ opportunities: 'many' }))).process(SCENARIO, empty());
    expect(result).toMatchObject({ status: 'error', error_type: 'ResponseSchemaError' });
  });

  test('a non-numeric confidence level fails the stage', async () => {
    const gateway = new ScriptedGateway(json({ confidence_level: 'quite sure' }));
    const result = await new ChochmahStage(gateway).process(SCENARIO, empty());
    expect(result).toMatchObject({ status: 'error', error_type: 'ScoreCoercionError' });
  });
});

describe('secondary metric helpers', () => {
  test('balanceRatio treats a missing side as neutral', () => {
    expect(balanceRatio(undefined, undefined)).toBe('unknown');
    expect(balanceRatio(90, undefined)).toBe('expansion-leaning (64:36)');
    expect(balanceRatio(20, 80)).toBe('constraint-leaning (20:80)');
    expect(balanceRatio(0, 0)).toBe('balanced (50:50)');
  });

  test('temporalHorizon follows the deepest order of effects mapped', () => {
    expect(temporalHorizon({ first_order: 2, second_order: 1, third_order: 0 })).toBe('medium-term (0-5 years)');
    expect(temporalHorizon({ first_order: 1, second_order: 0, third_order: 4 })).toBe('short-term (0-2 years)');
  });

  test('normalizeDecision accepts spacing and hyphen variants', () => {
    expect(normalizeDecision(' conditional go ')).toBe('CONDITIONAL_GO');
    expect(normalizeDecision('No-Go')).toBe('NO_GO');
  });
});

describe('prompt context', () => {
  test('upstream stages that did not run are marked unavailable', async () => {
    const gateway = rich('gevurah');
    await new GevurahStage(gateway).process(SCENARIO, empty());
    expect(gateway.calls[0].prompt).toContain('BINAH: unavailable (stage did not run)');
    expect(gateway.calls[0].prompt).toContain('CHESED: unavailable (stage did not run)');
  });

  test('failed upstream stages are reported with their error', async () => {
    const binah = await new BinahStage(new ScriptedGateway(new Error('upstream down'))).process(SCENARIO, empty());
    const gateway = rich('chesed');
    await new ChesedStage(gateway).process(SCENARIO, empty().with('binah', binah));
    expect(gateway.calls[0].prompt).toContain('BINAH: unavailable (stage failed: upstream down)');
  });

  test('only declared dependencies reach the prompt', async () => {
    const chochmah = await new ChochmahStage(rich('chochmah')).process(SCENARIO, empty());
    const chesed = await new ChesedStage(rich('chesed')).process(SCENARIO, empty());
    const gateway = rich('netzach');
    await new NetzachStage(gateway).process(SCENARIO, empty().with('chochmah', chochmah).with('chesed', chesed));

    const prompt = gateway.calls[0].prompt;
    expect(prompt).toContain('TIFERET: unavailable (stage did not run)');
    expect(prompt).not.toContain('CHESED (opportunities');
    expect(prompt).not.toContain('CHOCHMAH (deep reasoning');
  });
});
