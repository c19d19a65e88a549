import type { ModelGateway } from '../interfaces/modelGateway';
import type { PipelineContext } from '../models/pipelineContext';
import { ChesedRawFields, ChesedRawFieldsSchema, itemField } from '../models/rawFields';
import type { ChesedMetrics, QualityLabel } from '../models/stageTypes';
import { cappedTerm, compositeScore, firstQualityBand } from '../utils/scoring';
import { BaseStage } from './baseStage';
import { summarizeStages } from './contextSummaries';
import { renderPrompt } from './promptBuilder';

export function benefitCoverage(groups: number): string {
  if (groups >= 5) return 'comprehensive (5+ groups)';
  if (groups >= 3) return 'broad (3-4 groups)';
  if (groups >= 1) return 'focused (1-2 groups)';
  return 'limited';
}

export class ChesedStage extends BaseStage<'chesed', ChesedRawFields, ChesedMetrics> {
  constructor(gateway: ModelGateway) {
    super('chesed', ChesedRawFieldsSchema, gateway);
  }

  protected buildPrompt(scenario: string, context: PipelineContext): string {
    return renderPrompt({
      role: 'You look for everything that could go right: opportunities, benefits and room to grow.',
      scenario,
      context: summarizeStages(context, ['binah']),
      instructions: [
        'List concrete opportunities, each with its potential impact (high, medium or low).',
        'For each stakeholder group, list the specific benefits it would receive.',
        'Describe areas for growth and the abundance-oriented mindsets that would unlock them.',
        'Point out synergies between opportunities and the generative possibilities they open.',
      ],
      responseShape: `{
  "opportunities": [{ "opportunity": "", "description": "", "potential_impact": "high|medium|low" }],
  "benefits_by_stakeholder": [{ "stakeholder": "", "specific_benefits": [""] }],
  "expansion_potential": { "areas_for_growth": [""] },
  "abundance_mindset": [""],
  "synergies": [""],
  "generative_possibilities": ""
}`,
    });
  }

  computeMetrics(raw: ChesedRawFields): ChesedMetrics {
    const opportunities = raw.opportunities.length;
    const highImpact = raw.opportunities
      .filter(opportunity => itemField(opportunity, 'potential_impact').trim().toLowerCase() === 'high')
      .length;
    const benefits = raw.benefits_by_stakeholder
      .reduce((sum, group) => sum + group.specific_benefits.length, 0);
    const growthAreas = raw.expansion_potential.areas_for_growth.length;

    return {
      expansion_score: compositeScore([
        cappedTerm(opportunities, 5, 20),
        cappedTerm(highImpact, 5, 10),
        cappedTerm(benefits, 3, 25),
        cappedTerm(growthAreas, 10, 20),
        cappedTerm(raw.abundance_mindset.length, 3.75, 15),
        cappedTerm(raw.synergies.length, 5, 10),
      ]),
      opportunity_count: opportunities,
      high_impact_count: highImpact,
      benefit_count: benefits,
      benefit_coverage: benefitCoverage(raw.benefits_by_stakeholder.length),
      growth_area_count: growthAreas,
      synergy_count: raw.synergies.length,
    };
  }

  assessQuality(_raw: ChesedRawFields, metrics: ChesedMetrics): QualityLabel {
    const score = metrics.expansion_score;
    const opportunities = metrics.opportunity_count;
    return firstQualityBand([
      { label: 'exceptional', when: score >= 80 && opportunities >= 5 && metrics.synergy_count >= 2 },
      { label: 'high', when: score >= 65 && opportunities >= 4 },
      { label: 'moderate', when: score >= 50 && opportunities >= 3 },
    ]);
  }
}
