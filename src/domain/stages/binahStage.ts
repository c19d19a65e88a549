import type { ModelGateway } from '../interfaces/modelGateway';
import type { PipelineContext } from '../models/pipelineContext';
import { BinahRawFields, BinahRawFieldsSchema } from '../models/rawFields';
import type { BinahMetrics, EffectsMapped, QualityLabel } from '../models/stageTypes';
import { cappedTerm, compositeScore, firstQualityBand, lengthTier } from '../utils/scoring';
import { BaseStage } from './baseStage';
import { summarizeStages } from './contextSummaries';
import { renderPrompt } from './promptBuilder';

export const CONTEXT_DIMENSIONS = 9;

function stakeholderPoints(count: number): number {
  if (count >= 5) return 20;
  if (count >= 3) return 15;
  if (count >= 1) return 10;
  return 0;
}

function effectsPoints({ first_order, second_order, third_order }: EffectsMapped): number {
  if (first_order >= 3 && second_order >= 2 && third_order >= 2) return 20;
  if (first_order >= 3 && second_order >= 2) return 15;
  if (first_order >= 3) return 10;
  return 0;
}

export function temporalHorizon({ first_order, second_order, third_order }: EffectsMapped): string {
  if (first_order > 0 && second_order > 0 && third_order > 0) return 'comprehensive (0-20 years)';
  if (first_order > 0 && second_order > 0) return 'medium-term (0-5 years)';
  if (first_order > 0) return 'short-term (0-2 years)';
  return 'limited';
}

/** Stage 3, single perspective: nine contextual dimensions, stakeholders and the cascade of effects. */
export class BinahStage extends BaseStage<'binah', BinahRawFields, BinahMetrics> {
  constructor(gateway: ModelGateway) {
    super('binah', BinahRawFieldsSchema, gateway);
  }

  protected buildPrompt(scenario: string, context: PipelineContext): string {
    return renderPrompt({
      role: 'You are a systems analyst mapping the full context in which a decision will play out.',
      scenario,
      context: summarizeStages(context, ['keter', 'chochmah']),
      instructions: [
        `Analyse ${CONTEXT_DIMENSIONS} dimensions: historical, cultural, economic, political, social, technological, environmental, psychological, spiritual.`,
        'Identify the stakeholders, what each needs and how each is affected.',
        'Trace first, second and third order effects.',
        'List systemic risks and ethical considerations.',
        'Close with a synthesis that ties the context together, and rate its complexity from 1 to 10.',
      ],
      responseShape: `{
  "context_9d": [{ "dimension": "", "analysis": "", "key_factors": [""], "relevance_score": 0 }],
  "stakeholders": [{ "name": "", "interests": "", "power": "", "impact": "" }],
  "effects_cascade": { "first_order": [""], "second_order": [""], "third_order": [""] },
  "systemic_risks": [{ "risk": "", "likelihood": "", "impact": "" }],
  "ethical_considerations": [""],
  "synthesis": "",
  "contextual_complexity_rating": 0
}`,
    });
  }

  computeMetrics(raw: BinahRawFields): BinahMetrics {
    const dimensions = raw.context_9d.length;
    const stakeholders = raw.stakeholders.length;
    const effects: EffectsMapped = {
      first_order: raw.effects_cascade.first_order.length,
      second_order: raw.effects_cascade.second_order.length,
      third_order: raw.effects_cascade.third_order.length,
    };

    return {
      contextual_depth_score: compositeScore([
        Math.min((dimensions / CONTEXT_DIMENSIONS) * 40, 40),
        stakeholderPoints(stakeholders),
        effectsPoints(effects),
        lengthTier(raw.synthesis.length, [[800, 10], [500, 7], [300, 5]]),
        cappedTerm(raw.systemic_risks.length, 5, 10),
      ]),
      dimension_count: dimensions,
      stakeholder_coverage: stakeholders,
      systemic_risk_count: raw.systemic_risks.length,
      effects_mapped: effects,
      temporal_horizon: temporalHorizon(effects),
    };
  }

  assessQuality(_raw: BinahRawFields, metrics: BinahMetrics): QualityLabel {
    const score = metrics.contextual_depth_score;
    const dimensions = metrics.dimension_count;
    const stakeholders = metrics.stakeholder_coverage;
    return firstQualityBand([
      { label: 'exceptional', when: score >= 80 && dimensions >= CONTEXT_DIMENSIONS && stakeholders >= 4 },
      { label: 'high', when: score >= 65 && dimensions >= 7 && stakeholders >= 3 },
      { label: 'moderate', when: score >= 50 && dimensions >= 5 },
    ]);
  }
}
