import type { ModelGateway } from '../interfaces/modelGateway';
import type { PipelineContext } from '../models/pipelineContext';
import { hasContent, TiferetRawFields, TiferetRawFieldsSchema } from '../models/rawFields';
import type { QualityLabel, TiferetMetrics } from '../models/stageTypes';
import { cappedTerm, compositeScore, firstQualityBand, lengthTier } from '../utils/scoring';
import { BaseStage } from './baseStage';
import { summarizeStages } from './contextSummaries';
import { renderPrompt } from './promptBuilder';

const NEUTRAL_SCORE = 50;

/**
 * Describes how the expansion (stage 4) and constraint (stage 5) scores weigh
 * against each other. A missing side counts as neutral.
 */
export function balanceRatio(expansion: number | undefined, severity: number | undefined): string {
  if (expansion === undefined && severity === undefined) {
    return 'unknown';
  }
  const chesed = expansion ?? NEUTRAL_SCORE;
  const gevurah = severity ?? NEUTRAL_SCORE;
  const total = chesed + gevurah;
  if (total === 0) {
    return 'balanced (50:50)';
  }
  const chesedPct = Math.trunc((chesed / total) * 100);
  const gevurahPct = 100 - chesedPct;
  if (Math.abs(chesedPct - gevurahPct) < 10) return `well-balanced (${chesedPct}:${gevurahPct})`;
  if (chesedPct > gevurahPct) return `expansion-leaning (${chesedPct}:${gevurahPct})`;
  return `constraint-leaning (${chesedPct}:${gevurahPct})`;
}

export class TiferetStage extends BaseStage<'tiferet', TiferetRawFields, TiferetMetrics> {
  constructor(gateway: ModelGateway) {
    super('tiferet', TiferetRawFieldsSchema, gateway);
  }

  protected buildPrompt(scenario: string, context: PipelineContext): string {
    return renderPrompt({
      role: 'You integrate the case for expansion with the case for restraint into one balanced course of action.',
      scenario,
      context: summarizeStages(context, ['chesed', 'gevurah']),
      instructions: [
        'State the points where opportunity and risk analysis meet.',
        'Give balanced recommendations and make each trade-off explicit.',
        'Lay out an optimal path in three phases and a strategic direction.',
        'Describe the integration strategy and assess the overall harmony of the plan.',
      ],
      responseShape: `{
  "synthesis_points": [""],
  "balanced_recommendations": [""],
  "trade_offs": [{ "trade_off": "", "resolution": "" }],
  "optimal_path": { "phase_1": "", "phase_2": "", "phase_3": "", "strategic_direction": "" },
  "integration_strategy": "",
  "harmony_assessment": ""
}`,
    });
  }

  computeMetrics(raw: TiferetRawFields, context: PipelineContext): TiferetMetrics {
    const path = raw.optimal_path;
    const phases = [path.phase_1, path.phase_2, path.phase_3].filter(hasContent).length;

    const chesed = context.get('chesed');
    const gevurah = context.get('gevurah');

    return {
      harmony_score: compositeScore([
        cappedTerm(raw.synthesis_points.length, 7.5, 30),
        cappedTerm(raw.balanced_recommendations.length, 8.33, 25),
        cappedTerm(raw.trade_offs.length, 6.67, 20),
        cappedTerm(phases, 5, 15),
        lengthTier(raw.integration_strategy.length, [[600, 10], [400, 7], [200, 4]]),
      ]),
      synthesis_point_count: raw.synthesis_points.length,
      recommendation_count: raw.balanced_recommendations.length,
      trade_off_count: raw.trade_offs.length,
      balance_ratio: balanceRatio(
        chesed?.status === 'ok' ? chesed.derived_metrics.expansion_score : undefined,
        gevurah?.status === 'ok' ? gevurah.derived_metrics.severity_score : undefined
      ),
    };
  }

  assessQuality(_raw: TiferetRawFields, metrics: TiferetMetrics): QualityLabel {
    const score = metrics.harmony_score;
    const synthesis = metrics.synthesis_point_count;
    return firstQualityBand([
      { label: 'exceptional', when: score >= 80 && synthesis >= 4 && metrics.trade_off_count >= 3 },
      { label: 'high', when: score >= 65 && synthesis >= 3 },
      { label: 'moderate', when: score >= 50 && synthesis >= 2 },
    ]);
  }
}
