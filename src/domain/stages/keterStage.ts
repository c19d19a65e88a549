import type { ModelGateway } from '../interfaces/modelGateway';
import type { PipelineContext } from '../models/pipelineContext';
import { KETER_DIMENSIONS, KeterDimension, KeterRawFields, KeterRawFieldsSchema } from '../models/rawFields';
import type { CorruptionSeverity, KeterMetrics, QualityLabel } from '../models/stageTypes';
import { MalformedResponseError, ResponseSchemaError } from '../services/exceptions';
import { RetryPolicy } from '../services/retryPolicy';
import { clamp, coerceNumber, firstQualityBand, round } from '../utils/scoring';
import { BaseStage } from './baseStage';
import { renderPrompt } from './promptBuilder';

export interface KeterOptions {
  alignmentThreshold?: number;
  maxAttempts?: number;
}

const SEVERITY_RANK: Record<CorruptionSeverity, number> = { none: 0, minor: 1, moderate: 2, critical: 3 };

function normalizeSeverity(severity: string | undefined): Exclude<CorruptionSeverity, 'none'> {
  const value = (severity ?? '').trim().toLowerCase();
  if (value === 'critical' || value === 'moderate') {
    return value;
  }
  return 'minor';
}

/**
 * Stage 1: the ethical gate. Five dimensions scored -10..10 are folded into an
 * alignment score in [0, 1]; a critical corruption invalidates the scenario
 * regardless of score.
 */
export class KeterStage extends BaseStage<'keter', KeterRawFields, KeterMetrics> {
  private readonly alignmentThreshold: number;

  constructor(gateway: ModelGateway, options: KeterOptions = {}) {
    super(
      'keter',
      KeterRawFieldsSchema,
      gateway,
      // Only unparseable answers are worth asking again; provider failures are not.
      new RetryPolicy(options.maxAttempts ?? 3, [MalformedResponseError, ResponseSchemaError])
    );
    this.alignmentThreshold = options.alignmentThreshold ?? 0.6;
  }

  protected buildPrompt(scenario: string): string {
    return renderPrompt({
      role: 'You are the ethical gate of a ten-step decision analysis. Judge whether the scenario deserves to proceed.',
      scenario,
      instructions: [
        'Score each dimension as an integer from -10 (strongly violates) to 10 (strongly fulfils).',
        'Dimensions: reduces_suffering, respects_free_will, promotes_harmony, justice_mercy_balance, aligned_with_truth.',
        'List every ethical corruption you detect (manipulation, coercion, deception, exploitation, harm) with severity minor, moderate or critical.',
        'Explain your reasoning briefly.',
      ],
      responseShape: `{
  "scores": {
    "reduces_suffering": 0,
    "respects_free_will": 0,
    "promotes_harmony": 0,
    "justice_mercy_balance": 0,
    "aligned_with_truth": 0
  },
  "corruptions": [{ "type": "", "severity": "minor|moderate|critical", "description": "" }],
  "reasoning": ""
}`,
    });
  }

  computeMetrics(raw: KeterRawFields, _context: PipelineContext, attempts: number): KeterMetrics {
    const score = (dimension: KeterDimension): number =>
      clamp(coerceNumber(raw.scores[dimension], `scores.${dimension}`), -10, 10);
    const scores: Record<KeterDimension, number> = {
      reduces_suffering: score('reduces_suffering'),
      respects_free_will: score('respects_free_will'),
      promotes_harmony: score('promotes_harmony'),
      justice_mercy_balance: score('justice_mercy_balance'),
      aligned_with_truth: score('aligned_with_truth'),
    };
    const totalScore = KETER_DIMENSIONS.reduce((sum, dimension) => sum + scores[dimension], 0);
    const alignmentScore = round((totalScore + 50) / 100, 4);

    const corruptionSeverity = raw.corruptions.reduce<CorruptionSeverity>((worst, corruption) => {
      const severity = normalizeSeverity(corruption.severity);
      return SEVERITY_RANK[severity] > SEVERITY_RANK[worst] ? severity : worst;
    }, 'none');

    const thresholdMet = alignmentScore >= this.alignmentThreshold;

    return {
      scores,
      total_score: totalScore,
      alignment_score: alignmentScore,
      alignment_percentage: round(alignmentScore * 100),
      threshold: this.alignmentThreshold,
      threshold_met: thresholdMet,
      corruption_count: raw.corruptions.length,
      corruption_severity: corruptionSeverity,
      manifestation_valid: thresholdMet && corruptionSeverity !== 'critical',
      attempts,
    };
  }

  assessQuality(_raw: KeterRawFields, metrics: KeterMetrics): QualityLabel {
    const severity = metrics.corruption_severity;
    return firstQualityBand([
      { label: 'exceptional', when: metrics.alignment_percentage >= 85 && severity === 'none' },
      { label: 'high', when: metrics.alignment_percentage >= 70 && SEVERITY_RANK[severity] <= SEVERITY_RANK.minor },
      { label: 'moderate', when: metrics.alignment_percentage >= 60 && severity !== 'critical' },
    ]);
  }
}
