import type { ModelGateway } from '../interfaces/modelGateway';
import type { PipelineContext } from '../models/pipelineContext';
import { ChochmahRawFields, ChochmahRawFieldsSchema } from '../models/rawFields';
import type { ChochmahMetrics, QualityLabel } from '../models/stageTypes';
import { cappedTerm, coerceNumber, compositeScore, firstQualityBand, lengthTier, round } from '../utils/scoring';
import { BaseStage } from './baseStage';
import { summarizeStages } from './contextSummaries';
import { renderPrompt } from './promptBuilder';

export class ChochmahStage extends BaseStage<'chochmah', ChochmahRawFields, ChochmahMetrics> {
  constructor(gateway: ModelGateway) {
    super('chochmah', ChochmahRawFieldsSchema, gateway);
  }

  protected buildPrompt(scenario: string, context: PipelineContext): string {
    return renderPrompt({
      role: 'You are a strategic analyst looking for the deep structure of a situation, beyond its surface facts.',
      scenario,
      context: summarizeStages(context, ['keter']),
      instructions: [
        'Explain your core understanding of what is really at stake.',
        'List non-obvious insights and the recurring patterns they belong to, with historical examples.',
        'Name relevant precedents and how they turned out.',
        'Be explicit about what you do not know: list genuine uncertainties.',
        'Give a confidence level from 0 to 100 and a short reflection on the limits of this analysis.',
      ],
      responseShape: `{
  "understanding": "",
  "insights": [""],
  "patterns": [{ "pattern_name": "", "description": "", "historical_examples": [""] }],
  "uncertainties": [""],
  "implications": [""],
  "precedents": [{ "name": "", "relevance": "", "outcome": "" }],
  "confidence_level": 0,
  "meta_reflection": ""
}`,
    });
  }

  computeMetrics(raw: ChochmahRawFields): ChochmahMetrics {
    const insights = raw.insights.length;
    const uncertainties = raw.uncertainties.length;
    const totalClaims = insights + uncertainties;

    return {
      insight_depth_score: compositeScore([
        cappedTerm(insights, 6, 30),
        cappedTerm(raw.patterns.length, 12.5, 25),
        cappedTerm(raw.precedents.length, 10, 20),
        lengthTier(raw.understanding.length, [[500, 15], [300, 10], [150, 5]]),
        raw.meta_reflection.trim() ? 10 : 0,
      ]),
      insight_count: insights,
      uncertainty_count: uncertainties,
      precedent_count: raw.precedents.length,
      pattern_recognition_count: raw.patterns.length,
      epistemic_humility_ratio: totalClaims > 0 ? round((uncertainties / totalClaims) * 100) : 0,
      confidence_level: raw.confidence_level === undefined ? 0 : coerceNumber(raw.confidence_level, 'confidence_level'),
    };
  }

  assessQuality(_raw: ChochmahRawFields, metrics: ChochmahMetrics): QualityLabel {
    const depth = metrics.insight_depth_score;
    const uncertainties = metrics.uncertainty_count;
    return firstQualityBand([
      { label: 'exceptional', when: depth >= 80 && uncertainties >= 3 && metrics.pattern_recognition_count >= 2 },
      { label: 'high', when: depth >= 60 && uncertainties >= 2 },
      { label: 'moderate', when: depth >= 40 || uncertainties >= 2 },
    ]);
  }
}
