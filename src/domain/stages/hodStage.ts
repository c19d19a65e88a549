import type { ModelGateway } from '../interfaces/modelGateway';
import type { PipelineContext } from '../models/pipelineContext';
import { hasContent, HodRawFields, HodRawFieldsSchema, NARRATIVE_COMPONENTS } from '../models/rawFields';
import type { HodMetrics, QualityLabel } from '../models/stageTypes';
import { cappedTerm, compositeScore, firstQualityBand } from '../utils/scoring';
import { BaseStage } from './baseStage';
import { summarizeStages } from './contextSummaries';
import { renderPrompt } from './promptBuilder';

function talkingPointCount(message: HodRawFields['key_messages'][number]): number {
  return typeof message === 'string' ? 0 : message.talking_points.length;
}

export function clarityRating(raw: HodRawFields): string {
  const messages = raw.key_messages.length;
  const stakeholders = raw.messaging_by_stakeholder.length;
  const developed = raw.key_messages.filter(message => talkingPointCount(message) >= 2).length;

  if (messages >= 4 && stakeholders >= 4 && developed >= 3) return 'exceptional clarity';
  if (messages >= 3 && stakeholders >= 3) return 'high clarity';
  if (messages >= 2) return 'moderate clarity';
  return 'low clarity';
}

export class HodStage extends BaseStage<'hod', HodRawFields, HodMetrics> {
  constructor(gateway: ModelGateway) {
    super('hod', HodRawFieldsSchema, gateway);
  }

  protected buildPrompt(scenario: string, context: PipelineContext): string {
    return renderPrompt({
      role: 'You design how a plan is explained: to whom, in which words, through which channels.',
      scenario,
      context: summarizeStages(context, ['netzach']),
      instructions: [
        'Define the overall communication strategy.',
        'Write the key messages, each with its supporting talking points.',
        'Tailor messaging to each stakeholder group.',
        `Build a narrative arc with these parts: ${NARRATIVE_COMPONENTS.join(', ')}.`,
        'List the documentation, channels and transparency commitments the plan needs.',
      ],
      responseShape: `{
  "communication_strategy": "",
  "key_messages": [{ "message": "", "talking_points": [""] }],
  "messaging_by_stakeholder": [{ "stakeholder": "", "message": "", "channel": "" }],
  "narrative_arc": { ${NARRATIVE_COMPONENTS.map(component => `"${component}": ""`).join(', ')} },
  "documentation_requirements": [""],
  "communication_channels": [""],
  "transparency_framework": ""
}`,
    });
  }

  computeMetrics(raw: HodRawFields): HodMetrics {
    const messages = raw.key_messages.length;
    const stakeholders = raw.messaging_by_stakeholder.length;
    const narrative = NARRATIVE_COMPONENTS.filter(component => hasContent(raw.narrative_arc[component])).length;

    return {
      splendor_score: compositeScore([
        cappedTerm(messages, 6.25, 25),
        cappedTerm(stakeholders, 6.25, 25),
        cappedTerm(narrative, 3.33, 20),
        cappedTerm(raw.documentation_requirements.length, 5, 20),
        cappedTerm(raw.communication_channels.length, 2.5, 10),
      ]),
      message_count: messages,
      stakeholder_message_count: stakeholders,
      channel_count: raw.communication_channels.length,
      clarity_rating: clarityRating(raw),
    };
  }

  assessQuality(_raw: HodRawFields, metrics: HodMetrics): QualityLabel {
    const score = metrics.splendor_score;
    const messages = metrics.message_count;
    return firstQualityBand([
      { label: 'exceptional', when: score >= 80 && messages >= 4 && metrics.channel_count >= 4 },
      { label: 'high', when: score >= 65 && messages >= 3 },
      { label: 'moderate', when: score >= 50 && messages >= 2 },
    ]);
  }
}
