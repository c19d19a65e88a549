import { v4 as uuidv4 } from 'uuid';
import type { RuntimeSettings } from '../config';
import type { AnyPipelineStage, PipelineStages } from '../domain/interfaces/pipelineStage';
import { PipelineContext } from '../domain/models/pipelineContext';
import type {
  PipelineProcessor,
  PipelineResult,
  PipelineRunOptions,
} from '../domain/models/pipelineTypes';
import {
  AnyStageResult,
  keyScoreOf,
  STAGE_ORDER,
  StageId,
} from '../domain/models/stageTypes';
import { PipelineCancelledError, StageExecutionError, toError } from '../domain/services/exceptions';
import { failedResult } from '../domain/stages/baseStage';
import { StageInitializationError } from '../domain/stages/exceptions';
import { GatewayFactory } from '../services/gatewayFactory';
import { createLogger } from '../utils/logger';
import { collectErrors, computePipelineMetrics } from './pipelineMetrics';
import { createPipelineStages } from './pipelineFactory';

const logger = createLogger('orchestrator');

/** Process-wide count of pipeline runs; shared by every orchestrator the composition root builds. */
export class ExecutionCounter {
  private count = 0;

  next(): number {
    this.count += 1;
    return this.count;
  }

  get total(): number {
    return this.count;
  }
}

export interface OrchestratorOptions {
  generateRunId?: () => string;
  counter?: ExecutionCounter;
}

export interface OrchestratorMetrics {
  total_executions: number;
  stage_count: number;
  stage_ids: StageId[];
}

function elapsedSeconds(start: bigint): number {
  return Number(process.hrtime.bigint() - start) / 1_000_000_000;
}

function throwIfCancelled(signal: AbortSignal | undefined, runId: string): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError(`Pipeline run ${runId} was cancelled`);
  }
}

export class PipelineOrchestrator implements PipelineProcessor {
  private readonly generateRunId: () => string;
  private readonly counter: ExecutionCounter;

  constructor(private readonly stages: PipelineStages, options: OrchestratorOptions = {}) {
    for (const stageId of STAGE_ORDER) {
      const stage: AnyPipelineStage | undefined = stages[stageId];
      if (stage === undefined) {
        throw new StageInitializationError(stageId, 'no stage provided');
      }
      if (stage.stageId !== stageId) {
        throw new StageInitializationError(stageId, `slot holds stage '${stage.stageId}'`);
      }
    }
    this.generateRunId = options.generateRunId ?? uuidv4;
    this.counter = options.counter ?? new ExecutionCounter();
    logger.info(`Pipeline initialized with ${STAGE_ORDER.length} stages`);
  }

  static fromSettings(
    settings: RuntimeSettings,
    keywords: readonly string[],
    options: OrchestratorOptions & { gateways?: GatewayFactory } = {}
  ): PipelineOrchestrator {
    const gateways = options.gateways ?? new GatewayFactory(settings.llm);
    return new PipelineOrchestrator(createPipelineStages(settings, keywords, gateways), options);
  }

  async process(scenario: string, options: PipelineRunOptions = {}): Promise<PipelineResult> {
    const runId = options.runId ?? this.generateRunId();
    const caseName = options.caseName ?? 'unnamed';
    const executionNumber = this.counter.next();
    const startedAt = new Date().toISOString();
    const { signal } = options;
    const runStart = process.hrtime.bigint();

    logger.info(`Run ${runId} (#${executionNumber}) started for case '${caseName}'`);

    let context = PipelineContext.empty(runId);
    const durations: Partial<Record<StageId, number>> = {};

    for (const stageId of STAGE_ORDER) {
      throwIfCancelled(signal, runId);
      const stage: AnyPipelineStage = this.stages[stageId];
      const position = STAGE_ORDER.indexOf(stageId) + 1;
      options.onStageStart?.({ run_id: runId, stage_id: stageId, position, total: STAGE_ORDER.length });

      const stageStart = process.hrtime.bigint();
      const result = await this.runStage(stage, scenario, context, signal);
      const seconds = elapsedSeconds(stageStart);
      durations[stageId] = seconds;

      // A cancelled gateway call surfaces as an error result; the run itself is what was cancelled.
      throwIfCancelled(signal, runId);

      context = context.with(stageId, result);
      this.logStage(position, result);
      options.onStageComplete?.({
        run_id: runId,
        stage_id: stageId,
        position,
        total: STAGE_ORDER.length,
        status: result.status,
        duration_seconds: seconds,
      });
    }

    const stageResults = context.toCompleteRecord();
    const metrics = computePipelineMetrics(stageResults, durations, elapsedSeconds(runStart));
    const result: PipelineResult = {
      run_id: runId,
      case_name: caseName,
      execution_number: executionNumber,
      started_at: startedAt,
      status: metrics.successful_count === 0 ? 'failed' : 'completed',
      scenario,
      stage_results: stageResults,
      pipeline_metrics: metrics,
      errors: collectErrors(stageResults),
    };

    logger.info(
      `Run ${runId} ${result.status}: ${metrics.successful_count}/${metrics.total_stages} stages, ` +
      `average score ${metrics.average_score}, quality '${metrics.overall_quality_label}', ${metrics.total_duration}s`
    );
    return result;
  }

  getMetrics(): OrchestratorMetrics {
    return {
      total_executions: this.counter.total,
      stage_count: STAGE_ORDER.length,
      stage_ids: [...STAGE_ORDER],
    };
  }

  private async runStage(
    stage: AnyPipelineStage,
    scenario: string,
    context: PipelineContext,
    signal: AbortSignal | undefined
  ): Promise<AnyStageResult> {
    try {
      return await stage.process(scenario, context, { signal });
    } catch (caught) {
      const error = new StageExecutionError(stage.stageId, toError(caught), { run_id: context.runId });
      logger.error(error.message);
      return failedResult(stage.stageId, error, 'unknown', 0);
    }
  }

  private logStage(position: number, result: AnyStageResult): void {
    const label = `${position}/${STAGE_ORDER.length} ${result.stage_id}`;
    if (result.status === 'error') {
      logger.warn(`[${label}] error: ${result.error}`);
      return;
    }
    logger.info(`[${label}] key score ${keyScoreOf(result) ?? 'n/a'} (${result.quality_label})`);
  }
}
