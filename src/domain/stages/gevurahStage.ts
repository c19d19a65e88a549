import type { ModelGateway } from '../interfaces/modelGateway';
import type { PipelineContext } from '../models/pipelineContext';
import { FlexibleItem, GevurahRawFields, GevurahRawFieldsSchema, itemField } from '../models/rawFields';
import type { GevurahMetrics, QualityLabel } from '../models/stageTypes';
import { cappedTerm, compositeScore, firstQualityBand } from '../utils/scoring';
import { BaseStage } from './baseStage';
import { summarizeStages } from './contextSummaries';
import { renderPrompt } from './promptBuilder';

export function boundaryStrength(total: number): string {
  if (total >= 10) return 'very strong (10+ boundaries)';
  if (total >= 7) return 'strong (7-9 boundaries)';
  if (total >= 5) return 'moderate (5-6 boundaries)';
  return 'weak (< 5 boundaries)';
}

function countSeverity(risks: readonly FlexibleItem[], severity: string): number {
  return risks.filter(risk => itemField(risk, 'severity').trim().toLowerCase() === severity).length;
}

/** Stage 5: the counterweight to stage 4. Higher scores mean a more thorough map of what can go wrong. */
export class GevurahStage extends BaseStage<'gevurah', GevurahRawFields, GevurahMetrics> {
  constructor(gateway: ModelGateway) {
    super('gevurah', GevurahRawFieldsSchema, gateway);
  }

  protected buildPrompt(scenario: string, context: PipelineContext): string {
    return renderPrompt({
      role: 'You are a rigorous risk analyst. Your job is to find limits, dangers and the lines that must not be crossed.',
      scenario,
      context: summarizeStages(context, ['binah', 'chesed']),
      instructions: [
        'List short, medium and long term risks, each with severity critical, high, medium or low.',
        'State hard constraints, boundaries and absolute red lines.',
        'Describe the most plausible failure modes.',
        'List the mitigations and guardrails that would be required before proceeding.',
      ],
      responseShape: `{
  "risks": {
    "short_term": [{ "risk": "", "severity": "critical|high|medium|low", "probability": "" }],
    "medium_term": [{ "risk": "", "severity": "", "probability": "" }],
    "long_term": [{ "risk": "", "severity": "", "probability": "" }]
  },
  "constraints": [""],
  "boundaries": [""],
  "red_lines": [""],
  "failure_modes": [""],
  "mitigation_requirements": [""],
  "guardrails": [""],
  "overall_risk_level": "critical|high|medium|low"
}`,
    });
  }

  computeMetrics(raw: GevurahRawFields): GevurahMetrics {
    const allRisks = [...raw.risks.short_term, ...raw.risks.medium_term, ...raw.risks.long_term];
    const critical = countSeverity(allRisks, 'critical');
    const high = countSeverity(allRisks, 'high');

    return {
      severity_score: compositeScore([
        cappedTerm(critical, 10, 25),
        cappedTerm(high, 5, 15),
        cappedTerm(raw.red_lines.length, 6.67, 20),
        cappedTerm(raw.constraints.length, 5, 15),
        cappedTerm(raw.failure_modes.length, 7.5, 15),
        cappedTerm(raw.mitigation_requirements.length, 3.33, 10),
      ]),
      risk_count: allRisks.length,
      critical_risk_count: critical,
      high_risk_count: high,
      red_line_count: raw.red_lines.length,
      boundary_strength: boundaryStrength(raw.boundaries.length + raw.red_lines.length + raw.constraints.length),
    };
  }

  assessQuality(_raw: GevurahRawFields, metrics: GevurahMetrics): QualityLabel {
    const score = metrics.severity_score;
    const risks = metrics.risk_count;
    return firstQualityBand([
      { label: 'exceptional', when: score >= 75 && risks >= 7 && metrics.red_line_count >= 3 },
      { label: 'high', when: score >= 60 && risks >= 5 },
      { label: 'moderate', when: score >= 45 && risks >= 3 },
    ]);
  }
}
