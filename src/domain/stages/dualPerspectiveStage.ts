import type { DualMode } from '../../config';
import { createLogger } from '../../utils/logger';
import type { ModelGateway } from '../interfaces/modelGateway';
import type { PipelineStage, StageRunOptions } from '../interfaces/pipelineStage';
import type { PipelineContext } from '../models/pipelineContext';
import {
  describeItem,
  DualPerspectiveRawFields,
  PerspectiveAnalysis,
  PerspectiveAnalysisSchema,
  PerspectiveSynthesisSchema,
} from '../models/rawFields';
import {
  DualPerspectiveMetrics,
  DualPerspectiveResult,
  QualityLabel,
  STAGE_DEFINITIONS,
  StageId,
  StageResultsById,
} from '../models/stageTypes';
import { MissingDependencyError, ResponseSchemaError, toError } from '../services/exceptions';
import { cappedTerm, compositeScore, divergenceLevel, firstQualityBand, jaccardDivergence } from '../utils/scoring';
import { failedResult } from './baseStage';
import type { BinahStage } from './binahStage';
import { summarizeStages } from './contextSummaries';
import { bulletList, renderPrompt, truncate } from './promptBuilder';

const logger = createLogger('dual-perspective');

const PERSPECTIVE_TEMPERATURE = 0.6;
const SYNTHESIS_TEMPERATURE = 0.5;

export const PERSPECTIVE_A_LABEL = 'Individual rights and democratic institutions';
export const PERSPECTIVE_B_LABEL = 'Collective welfare and social stability';

export interface DualPerspectiveOptions {
  mode: DualMode;
  keywords: readonly string[];
}

export interface DualStageRunOptions extends StageRunOptions {
  /** Forces the dual (true) or single (false) analysis regardless of mode and keywords. */
  useDual?: boolean;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function keywordPattern(keyword: string): RegExp {
  const phrase = keyword.trim().split(/\s+/).map(escapeRegExp).join('\\s+');
  return new RegExp(`(?<![\\p{L}\\p{N}])${phrase}(?![\\p{L}\\p{N}])`, 'iu');
}

function sideDepth(analysis: PerspectiveAnalysis): number {
  return Math.min(analysis.stakeholders.length * 5 + analysis.key_insights.length * 3, 25);
}

/**
 * Stage 3 for politically or geopolitically charged scenarios: two contrasting
 * framings, each on its own gateway, reconciled by a synthesis call. Falls back
 * to the plain single-perspective stage when the second framing is unavailable.
 */
export class DualPerspectiveStage implements PipelineStage<'binah'> {
  readonly stageId = 'binah';
  private readonly patterns: RegExp[];

  constructor(
    private readonly fallback: BinahStage,
    private readonly primary: ModelGateway,
    private readonly secondary: ModelGateway | null,
    private readonly options: DualPerspectiveOptions
  ) {
    this.patterns = options.keywords.filter(keyword => keyword.trim()).map(keywordPattern);
  }

  get dependencies(): readonly StageId[] {
    return STAGE_DEFINITIONS.binah.dependencies;
  }

  shouldUseDual(scenario: string): boolean {
    return this.patterns.some(pattern => pattern.test(scenario));
  }

  async process(scenario: string, context: PipelineContext, options: DualStageRunOptions = {}): Promise<StageResultsById['binah']> {
    if (!this.selectsDual(scenario, options.useDual)) {
      return this.fallback.process(scenario, context, options);
    }

    if (this.secondary === null) {
      const missing = new MissingDependencyError(this.stageId, 'secondary perspective gateway');
      logger.warn(`${missing.message}; using single-perspective analysis`);
      return this.fallback.process(scenario, context, options);
    }

    const scoped = context.only(this.dependencies);
    const modelIdentifier = `${this.primary.model}+${this.secondary.model}`;
    logger.info(`[binah] Dual-perspective analysis with ${modelIdentifier} (run ${context.runId})`);

    const [perspectiveA, perspectiveB] = await Promise.allSettled([
      this.analyze(this.primary, this.perspectivePrompt(scenario, scoped, PERSPECTIVE_A_LABEL), options.signal),
      this.analyze(this.secondary, this.perspectivePrompt(scenario, scoped, PERSPECTIVE_B_LABEL), options.signal),
    ]);

    if (perspectiveB.status === 'rejected') {
      logger.warn(`Secondary perspective failed (${toError(perspectiveB.reason).message}); using single-perspective analysis`);
      return this.fallback.process(scenario, context, options);
    }
    if (perspectiveA.status === 'rejected') {
      const error = toError(perspectiveA.reason);
      logger.error(`[binah] Primary perspective failed: ${error.message}`);
      return failedResult(this.stageId, error, modelIdentifier, 1);
    }

    try {
      const raw: DualPerspectiveRawFields = {
        perspective_a: { ...perspectiveA.value, label: PERSPECTIVE_A_LABEL },
        perspective_b: { ...perspectiveB.value, label: PERSPECTIVE_B_LABEL },
        synthesis: await this.synthesize(scenario, perspectiveA.value, perspectiveB.value, options.signal),
      };
      const metrics = this.computeMetrics(raw, this.primary.model, this.secondary.model);
      const result: DualPerspectiveResult = {
        stage_id: this.stageId,
        position: STAGE_DEFINITIONS.binah.position,
        status: 'ok',
        mode: 'dual',
        raw_fields: raw,
        derived_metrics: metrics,
        quality_label: this.assessQuality(metrics),
        timestamp: new Date().toISOString(),
        model_identifier: modelIdentifier,
        attempts: 1,
      };
      logger.info(`[binah] Divergence ${metrics.divergence}% (${metrics.divergence_level})`);
      return result;
    } catch (caught) {
      const error = toError(caught);
      logger.error(`[binah] Perspective synthesis failed: ${error.message}`);
      return failedResult(this.stageId, error, modelIdentifier, 1);
    }
  }

  computeMetrics(raw: DualPerspectiveRawFields, modelA: string, modelB: string): DualPerspectiveMetrics {
    const { perspective_a, perspective_b, synthesis } = raw;
    const blindSpots = synthesis.a_blind_spots.length + synthesis.b_blind_spots.length;
    const convergence = synthesis.convergence_points.length;
    const divergence = jaccardDivergence(perspective_a.key_insights, perspective_b.key_insights);

    return {
      contextual_depth_score: compositeScore([
        sideDepth(perspective_a),
        sideDepth(perspective_b),
        cappedTerm(blindSpots, 5, 20),
        cappedTerm(convergence, 5, 20),
        Math.min(synthesis.integrated_synthesis.length / 20, 10),
      ]),
      divergence,
      divergence_level: divergenceLevel(divergence),
      blind_spots_detected: blindSpots,
      convergence_points: convergence,
      perspective_a_model: modelA,
      perspective_b_model: modelB,
    };
  }

  assessQuality(metrics: DualPerspectiveMetrics): QualityLabel {
    const score = metrics.contextual_depth_score;
    return firstQualityBand([
      { label: 'exceptional', when: score >= 80 && metrics.blind_spots_detected >= 2 && metrics.convergence_points >= 2 },
      { label: 'high', when: score >= 65 && metrics.convergence_points >= 1 },
      { label: 'moderate', when: score >= 50 },
    ]);
  }

  private selectsDual(scenario: string, override: boolean | undefined): boolean {
    if (override !== undefined) return override;
    if (this.options.mode === 'always') return true;
    if (this.options.mode === 'never') return false;
    return this.shouldUseDual(scenario);
  }

  private async analyze(gateway: ModelGateway, prompt: string, signal?: AbortSignal): Promise<PerspectiveAnalysis> {
    const response = await gateway.generate(prompt, PERSPECTIVE_TEMPERATURE, signal);
    const parsed = PerspectiveAnalysisSchema.safeParse(gateway.extractStructured(response));
    if (!parsed.success) {
      throw new ResponseSchemaError(this.stageId, parsed.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`));
    }
    return parsed.data;
  }

  private async synthesize(
    scenario: string,
    a: PerspectiveAnalysis,
    b: PerspectiveAnalysis,
    signal?: AbortSignal
  ): Promise<DualPerspectiveRawFields['synthesis']> {
    const response = await this.primary.generate(this.synthesisPrompt(scenario, a, b), SYNTHESIS_TEMPERATURE, signal);
    const parsed = PerspectiveSynthesisSchema.safeParse(this.primary.extractStructured(response));
    if (!parsed.success) {
      throw new ResponseSchemaError(this.stageId, parsed.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`));
    }
    return parsed.data;
  }

  private perspectivePrompt(scenario: string, context: PipelineContext, framing: string): string {
    return renderPrompt({
      role: `You analyse situations from the standpoint of ${framing.toLowerCase()}. Reason faithfully from within that tradition.`,
      scenario,
      context: summarizeStages(context, ['keter', 'chochmah']),
      instructions: [
        'Identify the stakeholders that matter most from this standpoint.',
        'Describe the contextual dimensions this tradition considers decisive.',
        'State your key insights as short, self-contained sentences.',
      ],
      responseShape: `{
  "stakeholders": [{ "name": "", "interests": "" }],
  "contextual_dimensions": { "dimension": "analysis" },
  "key_insights": [""]
}`,
    });
  }

  private synthesisPrompt(scenario: string, a: PerspectiveAnalysis, b: PerspectiveAnalysis): string {
    const render = (label: string, analysis: PerspectiveAnalysis) => [
      `${label.toUpperCase()}:`,
      'Stakeholders:',
      bulletList(analysis.stakeholders.map(item => describeItem(item, ['name', 'stakeholder'])), 5),
      'Key insights:',
      bulletList(analysis.key_insights, 6),
    ].join('\n');

    return renderPrompt({
      role: 'You reconcile two opposed analyses of the same situation without taking either side.',
      scenario: truncate(scenario, 2000),
      context: [render(PERSPECTIVE_A_LABEL, a), render(PERSPECTIVE_B_LABEL, b)],
      instructions: [
        'Name the blind spots of each perspective.',
        'List the points on which both converge.',
        'Write an integrated synthesis that goes beyond both, and recommend a balance between them.',
      ],
      responseShape: `{
  "a_blind_spots": [""],
  "b_blind_spots": [""],
  "convergence_points": [""],
  "integrated_synthesis": "",
  "recommended_balance": ""
}`,
    });
  }
}
