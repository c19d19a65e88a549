import type { PipelineContext } from '../models/pipelineContext';
import { describeItem, FlexibleItem } from '../models/rawFields';
import type { AnyStageResult, StageId } from '../models/stageTypes';
import { bulletList, truncate } from './promptBuilder';

// Every helper tolerates an absent or failed upstream stage.

function unavailable(stageId: StageId, result: AnyStageResult | undefined): string {
  const reason = result === undefined ? 'stage did not run' : `stage failed: ${result.status === 'error' ? result.error : 'unknown'}`;
  return `${stageId.toUpperCase()}: unavailable (${truncate(reason, 200)})`;
}

function labels(entries: readonly FlexibleItem[], keys: readonly string[]): string[] {
  return entries.map(entry => describeItem(entry, keys));
}

export function summarizeKeter(context: PipelineContext): string {
  const keter = context.get('keter');
  if (keter === undefined || keter.status !== 'ok') {
    return unavailable('keter', keter);
  }
  const metrics = keter.derived_metrics;
  return [
    'KETER (ethical alignment):',
    `- alignment: ${metrics.alignment_percentage}% (threshold met: ${metrics.threshold_met ? 'yes' : 'no'})`,
    `- corruption severity: ${metrics.corruption_severity}`,
    `- reasoning: ${truncate(keter.raw_fields.reasoning, 300) || '(none)'}`,
  ].join('\n');
}

export function summarizeChochmah(context: PipelineContext): string {
  const chochmah = context.get('chochmah');
  if (chochmah === undefined || chochmah.status !== 'ok') {
    return unavailable('chochmah', chochmah);
  }
  const raw = chochmah.raw_fields;
  return [
    `CHOCHMAH (deep reasoning, insight depth ${chochmah.derived_metrics.insight_depth_score}):`,
    'Key insights:',
    bulletList(labels(raw.insights, ['insight', 'description']), 3),
    'Patterns:',
    bulletList(labels(raw.patterns, ['pattern_name', 'name']), 2),
  ].join('\n');
}

export interface BinahView {
  stakeholders: string[];
  synthesis: string;
  systemicRisks: string[];
  depthScore: number;
}

/** Stage 3 reduced to the fields downstream stages read, in either perspective mode. */
export function binahView(context: PipelineContext): BinahView | undefined {
  const binah = context.get('binah');
  if (binah === undefined || binah.status !== 'ok') {
    return undefined;
  }
  if (binah.mode === 'dual') {
    const { perspective_a, perspective_b, synthesis } = binah.raw_fields;
    const names = labels([...perspective_a.stakeholders, ...perspective_b.stakeholders], ['name', 'stakeholder']);
    return {
      stakeholders: [...new Set(names)],
      synthesis: synthesis.integrated_synthesis,
      systemicRisks: [],
      depthScore: binah.derived_metrics.contextual_depth_score,
    };
  }
  return {
    stakeholders: labels(binah.raw_fields.stakeholders, ['name', 'stakeholder']),
    synthesis: binah.raw_fields.synthesis,
    systemicRisks: labels(binah.raw_fields.systemic_risks, ['risk', 'description']),
    depthScore: binah.derived_metrics.contextual_depth_score,
  };
}

export function summarizeBinah(context: PipelineContext): string {
  const view = binahView(context);
  if (view === undefined) {
    return unavailable('binah', context.get('binah'));
  }
  return [
    `BINAH (contextual understanding, depth ${view.depthScore}):`,
    'Key stakeholders:',
    bulletList(view.stakeholders, 3),
    `Synthesis: ${truncate(view.synthesis, 400) || '(none)'}`,
  ].join('\n');
}

export function summarizeChesed(context: PipelineContext): string {
  const chesed = context.get('chesed');
  if (chesed === undefined || chesed.status !== 'ok') {
    return unavailable('chesed', chesed);
  }
  return [
    `CHESED (opportunities, expansion score ${chesed.derived_metrics.expansion_score}):`,
    bulletList(labels(chesed.raw_fields.opportunities, ['opportunity', 'description']), 3),
  ].join('\n');
}

export function summarizeGevurah(context: PipelineContext): string {
  const gevurah = context.get('gevurah');
  if (gevurah === undefined || gevurah.status !== 'ok') {
    return unavailable('gevurah', gevurah);
  }
  const raw = gevurah.raw_fields;
  return [
    `GEVURAH (risks, severity score ${gevurah.derived_metrics.severity_score}, ${gevurah.derived_metrics.risk_count} risks):`,
    'Red lines:',
    bulletList(labels(raw.red_lines, ['red_line', 'description']), 3),
    'Short-term risks:',
    bulletList(labels(raw.risks.short_term, ['risk', 'description']), 3),
  ].join('\n');
}

export function summarizeTiferet(context: PipelineContext): string {
  const tiferet = context.get('tiferet');
  if (tiferet === undefined || tiferet.status !== 'ok') {
    return unavailable('tiferet', tiferet);
  }
  const raw = tiferet.raw_fields;
  return [
    `TIFERET (synthesis, harmony score ${tiferet.derived_metrics.harmony_score}, balance ${tiferet.derived_metrics.balance_ratio}):`,
    'Balanced recommendations:',
    bulletList(labels(raw.balanced_recommendations, ['recommendation', 'description']), 3),
    `Strategic direction: ${truncate(raw.optimal_path.strategic_direction, 300) || '(none)'}`,
  ].join('\n');
}

export function summarizeNetzach(context: PipelineContext): string {
  const netzach = context.get('netzach');
  if (netzach === undefined || netzach.status !== 'ok') {
    return unavailable('netzach', netzach);
  }
  return [
    `NETZACH (implementation, persistence score ${netzach.derived_metrics.persistence_score}, resilience ${netzach.derived_metrics.resilience_rating}):`,
    'Phases:',
    bulletList(labels(netzach.raw_fields.implementation_phases, ['phase', 'name', 'description']), 3),
  ].join('\n');
}

export function summarizeHod(context: PipelineContext): string {
  const hod = context.get('hod');
  if (hod === undefined || hod.status !== 'ok') {
    return unavailable('hod', hod);
  }
  const messages = hod.raw_fields.key_messages.map(message => typeof message === 'string' ? message : message.message);
  return [
    `HOD (communication, splendor score ${hod.derived_metrics.splendor_score}, ${hod.derived_metrics.clarity_rating}):`,
    'Key messages:',
    bulletList(messages, 3),
  ].join('\n');
}

export function summarizeYesod(context: PipelineContext): string {
  const yesod = context.get('yesod');
  if (yesod === undefined || yesod.status !== 'ok') {
    return unavailable('yesod', yesod);
  }
  const raw = yesod.raw_fields;
  const metrics = yesod.derived_metrics;
  return [
    `YESOD (integration, readiness score ${metrics.readiness_score}, ${metrics.integration_quality}):`,
    `- recommendation: ${metrics.decision || 'undecided'} (confidence: ${raw.go_no_go_recommendation.confidence ?? 'n/a'})`,
    'Strengths confirmed:',
    bulletList(labels(raw.strengths_confirmed, ['strength', 'description']), 3),
    'Gaps identified:',
    bulletList(labels(raw.gaps_identified, ['gap', 'description']), 3),
    `Final synthesis: ${truncate(raw.final_synthesis, 400) || '(none)'}`,
  ].join('\n');
}

const SUMMARIZERS: Record<Exclude<StageId, 'malchut'>, (context: PipelineContext) => string> = {
  keter: summarizeKeter,
  chochmah: summarizeChochmah,
  binah: summarizeBinah,
  chesed: summarizeChesed,
  gevurah: summarizeGevurah,
  tiferet: summarizeTiferet,
  netzach: summarizeNetzach,
  hod: summarizeHod,
  yesod: summarizeYesod,
};

export function summarizeStages(context: PipelineContext, stageIds: readonly Exclude<StageId, 'malchut'>[]): string[] {
  return stageIds.map(stageId => SUMMARIZERS[stageId](context));
}
