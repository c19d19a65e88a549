import type { ModelGateway } from '../interfaces/modelGateway';
import type { PipelineContext } from '../models/pipelineContext';
import { NetzachRawFields, NetzachRawFieldsSchema } from '../models/rawFields';
import type { NetzachMetrics, QualityLabel } from '../models/stageTypes';
import { cappedTerm, compositeScore, firstQualityBand } from '../utils/scoring';
import { BaseStage } from './baseStage';
import { summarizeStages } from './contextSummaries';
import { renderPrompt } from './promptBuilder';

const DETAILED_TEXT = 100;

export function resilienceRating(raw: NetzachRawFields): string {
  const planning = raw.resilience_planning;
  const obstacles = planning.common_obstacles.length;
  const detailedRecovery = planning.setback_recovery.length > DETAILED_TEXT;
  const detailedAdaptation = planning.adaptation_mechanisms.length > DETAILED_TEXT;

  if (obstacles >= 3 && detailedRecovery && detailedAdaptation) return 'very high';
  if (obstacles >= 2 && (detailedRecovery || detailedAdaptation)) return 'high';
  if (obstacles >= 1) return 'moderate';
  return 'low';
}

export class NetzachStage extends BaseStage<'netzach', NetzachRawFields, NetzachMetrics> {
  constructor(gateway: ModelGateway) {
    super('netzach', NetzachRawFieldsSchema, gateway);
  }

  protected buildPrompt(scenario: string, context: PipelineContext): string {
    return renderPrompt({
      role: 'You plan how a chosen course of action is carried through over time, against friction and setbacks.',
      scenario,
      context: summarizeStages(context, ['tiferet']),
      instructions: [
        'Describe the implementation strategy and break it into phases.',
        'Define measurable milestones.',
        'State what sustained effort requires: people, attention, resources.',
        'Anticipate common obstacles and explain how to recover from setbacks and adapt.',
        'List what builds momentum and what keeps the effort sustainable in the long run.',
      ],
      responseShape: `{
  "implementation_strategy": "",
  "implementation_phases": [{ "phase": "", "duration": "", "objectives": [""] }],
  "milestones": [{ "milestone": "", "target_date": "", "success_criteria": "" }],
  "persistence_requirements": [""],
  "resilience_planning": {
    "common_obstacles": [""],
    "setback_recovery": "",
    "adaptation_mechanisms": ""
  },
  "momentum_builders": [""],
  "long_term_sustainability": ""
}`,
    });
  }

  computeMetrics(raw: NetzachRawFields): NetzachMetrics {
    const phases = raw.implementation_phases.length;
    const milestones = raw.milestones.length;
    const obstacles = raw.resilience_planning.common_obstacles.length;

    return {
      persistence_score: compositeScore([
        cappedTerm(phases, 6.25, 25),
        cappedTerm(milestones, 6.25, 25),
        cappedTerm(raw.persistence_requirements.length, 6.67, 20),
        cappedTerm(obstacles, 6.67, 20),
        cappedTerm(raw.momentum_builders.length, 2, 10),
      ]),
      phase_count: phases,
      milestone_count: milestones,
      obstacle_count: obstacles,
      resilience_rating: resilienceRating(raw),
    };
  }

  assessQuality(_raw: NetzachRawFields, metrics: NetzachMetrics): QualityLabel {
    const score = metrics.persistence_score;
    const phases = metrics.phase_count;
    return firstQualityBand([
      { label: 'exceptional', when: score >= 80 && phases >= 4 && metrics.milestone_count >= 4 },
      { label: 'high', when: score >= 65 && phases >= 3 },
      { label: 'moderate', when: score >= 50 && phases >= 2 },
    ]);
  }
}
