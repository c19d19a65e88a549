import { z } from 'zod';
import type { ModelGateway, StructuredRecord } from '../interfaces/modelGateway';
import type { StageRunOptions } from '../interfaces/pipelineStage';
import type { PipelineContext } from '../models/pipelineContext';
import {
  FailedStageResult,
  QualityLabel,
  STAGE_DEFINITIONS,
  StageId,
  StageResult,
  SuccessfulStageResult,
} from '../models/stageTypes';
import { ResponseSchemaError, toError } from '../services/exceptions';
import { RetryPolicy } from '../services/retryPolicy';
import { createLogger } from '../../utils/logger';

const logger = createLogger('stage');

export type RawFieldsSchema<Raw> = z.ZodType<Raw, z.ZodTypeDef, unknown>;

/**
 * Shared request/parse/score cycle of a pipeline stage.
 *
 * `process` never rejects: every failure, from the provider call to metric
 * computation, is reported as an error result so the run can continue.
 */
export abstract class BaseStage<Id extends StageId, Raw, Metrics> {
  constructor(
    readonly stageId: Id,
    private readonly schema: RawFieldsSchema<Raw>,
    protected readonly gateway: ModelGateway,
    protected readonly retryPolicy: RetryPolicy = RetryPolicy.none()
  ) {}

  get dependencies(): readonly StageId[] {
    return STAGE_DEFINITIONS[this.stageId].dependencies;
  }

  get position(): number {
    return STAGE_DEFINITIONS[this.stageId].position;
  }

  protected get temperature(): number {
    return STAGE_DEFINITIONS[this.stageId].temperature;
  }

  async process(scenario: string, context: PipelineContext, options: StageRunOptions = {}): Promise<StageResult<Id, Raw, Metrics>> {
    const scoped = context.only(this.dependencies);
    let attempts = 0;
    logger.info(`[${this.stageId}] Starting (run ${context.runId})`);

    try {
      const prompt = this.buildPrompt(scenario, scoped);
      const outcome = await this.retryPolicy.execute(
        async attempt => {
          attempts = attempt;
          const response = await this.gateway.generate(prompt, this.temperature, options.signal);
          return this.parseRawFields(this.gateway.extractStructured(response));
        },
        (error, attempt, maxAttempts) => {
          logger.warn(`[${this.stageId}] Attempt ${attempt}/${maxAttempts} failed: ${error.message}. Retrying.`);
        }
      );
      const metrics = this.computeMetrics(outcome.value, scoped, outcome.attempts);
      const result = this.success(outcome.value, metrics, outcome.attempts);
      logger.info(`[${this.stageId}] Completed with quality '${result.quality_label}'`);
      return result;
    } catch (caught) {
      const error = toError(caught);
      logger.error(`[${this.stageId}] Failed: ${error.message}`);
      return this.failure(error, attempts);
    }
  }

  parseRawFields(record: StructuredRecord): Raw {
    const parsed = this.schema.safeParse(record);
    if (!parsed.success) {
      throw new ResponseSchemaError(
        this.stageId,
        parsed.error.errors.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
    }
    return parsed.data;
  }

  /** Pure function of the parsed fields (and, for some stages, upstream scores). */
  abstract computeMetrics(raw: Raw, context: PipelineContext, attempts: number): Metrics;

  abstract assessQuality(raw: Raw, metrics: Metrics): QualityLabel;

  protected abstract buildPrompt(scenario: string, context: PipelineContext): string;

  protected get modelIdentifier(): string {
    return this.gateway.model;
  }

  private success(raw: Raw, metrics: Metrics, attempts: number): SuccessfulStageResult<Id, Raw, Metrics> {
    return {
      stage_id: this.stageId,
      position: this.position,
      status: 'ok',
      mode: 'single',
      raw_fields: raw,
      derived_metrics: metrics,
      quality_label: this.assessQuality(raw, metrics),
      timestamp: new Date().toISOString(),
      model_identifier: this.modelIdentifier,
      attempts,
    };
  }

  protected failure(error: Error, attempts: number): FailedStageResult<Id> {
    return failedResult(this.stageId, error, this.modelIdentifier, attempts);
  }
}

export function failedResult<Id extends StageId>(
  stageId: Id,
  error: Error,
  modelIdentifier: string,
  attempts: number
): FailedStageResult<Id> {
  return {
    stage_id: stageId,
    position: STAGE_DEFINITIONS[stageId].position,
    status: 'error',
    error: error.message,
    error_type: error.name,
    timestamp: new Date().toISOString(),
    model_identifier: modelIdentifier,
    attempts,
  };
}
