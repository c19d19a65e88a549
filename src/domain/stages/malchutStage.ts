import type { ModelGateway } from '../interfaces/modelGateway';
import type { PipelineContext } from '../models/pipelineContext';
import { hasContent, itemField, MalchutRawFields, MalchutRawFieldsSchema, RESOURCE_CATEGORIES } from '../models/rawFields';
import type { MalchutMetrics, QualityLabel } from '../models/stageTypes';
import { cappedTerm, compositeScore, firstQualityBand, lengthTier } from '../utils/scoring';
import { BaseStage } from './baseStage';
import { summarizeStages } from './contextSummaries';
import { renderPrompt } from './promptBuilder';

export function feasibilityRating(actions: number, resourceCategories: number, firstStepLength: number, owners: number): string {
  const concreteFirstStep = firstStepLength > 50;
  if (actions >= 4 && resourceCategories >= 2 && concreteFirstStep && owners >= 3) return 'immediately executable';
  if (actions >= 3 && (resourceCategories > 0 || concreteFirstStep)) return 'executable with minor preparation';
  if (actions >= 2) return 'requires preparation';
  return 'needs further planning';
}

/** Stage 10: turns the verified analysis into an executable plan. */
export class MalchutStage extends BaseStage<'malchut', MalchutRawFields, MalchutMetrics> {
  constructor(gateway: ModelGateway) {
    super('malchut', MalchutRawFieldsSchema, gateway);
  }

  protected buildPrompt(scenario: string, context: PipelineContext): string {
    return renderPrompt({
      role: 'You turn a verified analysis into a concrete plan that people can start executing this week.',
      scenario,
      context: summarizeStages(context, ['yesod']),
      instructions: [
        'Summarise the decision for executives and restate the go/no-go call.',
        'List immediate actions, each with an owner and a deadline, then the phased action plan.',
        `Specify resource requirements by category: ${RESOURCE_CATEGORIES.join(', ')}.`,
        'Give a timeline with key milestones, success metrics and a governance structure.',
        'Explain how the identified risks will be mitigated in execution, and describe the very first step.',
      ],
      responseShape: `{
  "executive_summary": "",
  "go_no_go_decision": { "decision": "GO|CONDITIONAL_GO|NO_GO", "conditions": [""] },
  "immediate_actions": [{ "action": "", "owner": "", "deadline": "" }],
  "action_plan": [{ "phase": "", "actions": [""], "duration": "" }],
  "resource_requirements": { ${RESOURCE_CATEGORIES.map(category => `"${category}": [""]`).join(', ')} },
  "timeline": { "key_milestones": [{ "milestone": "", "date": "" }] },
  "success_metrics": [""],
  "governance_structure": { "decision_makers": [""], "review_cadence": "" },
  "risk_mitigation_execution": [""],
  "first_step": ""
}`,
    });
  }

  computeMetrics(raw: MalchutRawFields): MalchutMetrics {
    const actions = raw.immediate_actions.length;
    const owners = raw.immediate_actions.filter(action => itemField(action, 'owner').trim()).length;
    const resourceCategories = RESOURCE_CATEGORIES
      .filter(category => hasContent(raw.resource_requirements[category]))
      .length;
    const milestones = raw.timeline.key_milestones.length;

    return {
      manifestation_score: compositeScore([
        cappedTerm(actions, 6.25, 25),
        cappedTerm(raw.action_plan.length, 6.67, 20),
        cappedTerm(resourceCategories, 5, 20),
        cappedTerm(milestones, 5, 15),
        cappedTerm(raw.success_metrics.length, 3.33, 10),
        lengthTier(raw.first_step.length, [[100, 10], [50, 6], [20, 3]]),
      ]),
      action_count: actions,
      owner_count: owners,
      resource_category_count: resourceCategories,
      milestone_count: milestones,
      feasibility_rating: feasibilityRating(actions, resourceCategories, raw.first_step.length, owners),
    };
  }

  assessQuality(_raw: MalchutRawFields, metrics: MalchutMetrics): QualityLabel {
    const score = metrics.manifestation_score;
    const actions = metrics.action_count;
    return firstQualityBand([
      { label: 'exceptional', when: score >= 85 && actions >= 4 && metrics.milestone_count >= 3 },
      { label: 'high', when: score >= 70 && actions >= 3 },
      { label: 'moderate', when: score >= 55 && actions >= 2 },
    ]);
  }
}
