import type { ModelGateway } from '../interfaces/modelGateway';
import type { PipelineContext } from '../models/pipelineContext';
import { GO_NO_GO_DECISIONS, YesodRawFields, YesodRawFieldsSchema } from '../models/rawFields';
import type { QualityLabel, YesodMetrics } from '../models/stageTypes';
import { compositeScore, firstQualityBand } from '../utils/scoring';
import { BaseStage } from './baseStage';
import { summarizeStages } from './contextSummaries';
import { renderPrompt } from './promptBuilder';

function normalizeStatus(status: string): string {
  return status.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

export function normalizeDecision(decision: string): string {
  return decision.trim().toUpperCase().replace(/[\s-]+/g, '_');
}

function isClearDecision(decision: string): boolean {
  return GO_NO_GO_DECISIONS.some(option => option === decision);
}

export function integrationQuality(coherence: string): string {
  switch (normalizeStatus(coherence)) {
    case 'highly_coherent': return 'exceptional integration';
    case 'moderately_coherent': return 'good integration';
    default: return 'fragmented integration';
  }
}

export function foundationStrength(readiness: number, gaps: number, decision: string): string {
  if (readiness >= 80 && gaps <= 1 && decision === 'GO') return 'rock solid';
  if (readiness >= 60 && gaps <= 2) return 'strong';
  if (readiness >= 40) return 'moderate';
  return 'weak';
}

/** Stage 9: checks that stages 1-8 hold together and issues the go/no-go call. */
export class YesodStage extends BaseStage<'yesod', YesodRawFields, YesodMetrics> {
  constructor(gateway: ModelGateway) {
    super('yesod', YesodRawFieldsSchema, gateway);
  }

  protected buildPrompt(scenario: string, context: PipelineContext): string {
    return renderPrompt({
      role: 'You verify that a complete analysis holds together before anything is executed.',
      scenario,
      context: summarizeStages(context, ['keter', 'chochmah', 'binah', 'chesed', 'gevurah', 'tiferet', 'netzach', 'hod']),
      instructions: [
        'Write an integrated assessment of all the analysis above.',
        'Check alignment between ethics, reasoning and context; between opportunity, risk and synthesis; and between implementation and communication.',
        'Verify ethical, strategic, communication and resource readiness.',
        'List the gaps you find and the strengths you can confirm.',
        'Give a final synthesis and a GO, CONDITIONAL_GO or NO_GO recommendation with a confidence from 0 to 100.',
      ],
      responseShape: `{
  "integrated_assessment": "",
  "sefirot_alignment": {
    "keter_chochmah_binah": { "alignment_status": "aligned|partial|misaligned", "notes": "" },
    "chesed_gevurah_tiferet": { "alignment_status": "", "notes": "" },
    "netzach_hod": { "alignment_status": "", "notes": "" },
    "overall_coherence": { "status": "highly_coherent|moderately_coherent|fragmented", "notes": "" }
  },
  "readiness_verification": {
    "ethical_readiness": { "status": "ready|needs_work|not_ready", "notes": "" },
    "strategic_readiness": { "status": "", "notes": "" },
    "communication_readiness": { "status": "", "notes": "" },
    "resource_readiness": { "status": "", "notes": "" }
  },
  "gaps_identified": [""],
  "strengths_confirmed": [""],
  "final_synthesis": "",
  "go_no_go_recommendation": { "decision": "GO|CONDITIONAL_GO|NO_GO", "confidence": 0, "rationale": "" }
}`,
    });
  }

  computeMetrics(raw: YesodRawFields): YesodMetrics {
    const readiness = raw.readiness_verification;
    const alignment = raw.sefirot_alignment;
    const ready = [
      readiness.ethical_readiness,
      readiness.strategic_readiness,
      readiness.communication_readiness,
      readiness.resource_readiness,
    ].filter(entry => normalizeStatus(entry.status) === 'ready').length;
    const aligned = [
      alignment.keter_chochmah_binah,
      alignment.chesed_gevurah_tiferet,
      alignment.netzach_hod,
    ].filter(entry => normalizeStatus(entry.alignment_status) === 'aligned').length;

    const gaps = raw.gaps_identified.length;
    const strengths = raw.strengths_confirmed.length;
    const decision = normalizeDecision(raw.go_no_go_recommendation.decision);

    let balance = 0;
    if (strengths > gaps) balance = 20;
    else if (strengths === gaps) balance = 10;

    let decisionPoints = 0;
    if (decision === 'GO') decisionPoints = 10;
    else if (decision === 'CONDITIONAL_GO') decisionPoints = 5;

    const readinessScore = compositeScore([ready * 10, aligned * 10, balance, decisionPoints]);

    return {
      readiness_score: readinessScore,
      ready_count: ready,
      aligned_count: aligned,
      gap_count: gaps,
      strength_count: strengths,
      decision,
      integration_quality: integrationQuality(alignment.overall_coherence.status),
      foundation_strength: foundationStrength(readinessScore, gaps, decision),
    };
  }

  assessQuality(raw: YesodRawFields, metrics: YesodMetrics): QualityLabel {
    const score = metrics.readiness_score;
    const clearDecision = isClearDecision(metrics.decision);
    const thoroughText = raw.integrated_assessment.length > 600 && raw.final_synthesis.length > 400;
    return firstQualityBand([
      { label: 'exceptional', when: score >= 80 && thoroughText && clearDecision },
      { label: 'high', when: score >= 60 && (thoroughText || clearDecision) },
      { label: 'moderate', when: score >= 40 || raw.integrated_assessment.length > 300 },
    ]);
  }
}
