import { v4 as uuidv4 } from 'uuid';
import { fileTimestamp } from '../application/reportExport';
import type { PipelineProcessor, PipelineResult } from '../domain/models/pipelineTypes';
import { STAGE_ORDER, StageId } from '../domain/models/stageTypes';
import { toError } from '../domain/services/exceptions';
import { createLogger } from '../utils/logger';

const logger = createLogger('jobs');

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface JobRecord {
  job_id: string;
  case_name: string;
  scenario: string;
  status: JobStatus;
  completed_stages: number;
  current_stage: StageId | null;
  created_at: Date;
  started_at?: Date;
  completed_at?: Date;
  result?: PipelineResult;
  error?: string;
}

export interface JobStatusView {
  job_id: string;
  status: JobStatus;
  progress: number;
  current_stage: StageId | null;
  elapsed_time_seconds: number | null;
  estimated_remaining_seconds: number | null;
}

export interface JobSummary {
  alignment_percentage: number | null;
  manifestation_valid: boolean;
  recommendation: string;
  recommendation_confidence: number | string;
  execution_time_seconds: number;
}

export interface JobListEntry {
  job_id: string;
  case_name: string;
  status: JobStatus;
  created_at: string;
}

export interface JobRunnerOptions {
  estimatedTimeSeconds?: number;
  now?: () => Date;
  generateJobId?: () => string;
}

export function progressOf(job: JobRecord): number {
  if (job.status === 'completed') return 100;
  return Math.round((job.completed_stages / STAGE_ORDER.length) * 100);
}

export function executionSeconds(job: JobRecord): number {
  if (!job.started_at || !job.completed_at) return 0;
  return Math.round((job.completed_at.getTime() - job.started_at.getTime()) / 10) / 100;
}

export function summarizeResult(job: JobRecord): JobSummary {
  const keter = job.result?.stage_results.keter;
  const yesod = job.result?.stage_results.yesod;
  const keterMetrics = keter?.status === 'ok' ? keter.derived_metrics : undefined;
  const recommendation = yesod?.status === 'ok' ? yesod.raw_fields.go_no_go_recommendation : undefined;
  const decision = yesod?.status === 'ok' ? yesod.derived_metrics.decision : '';

  return {
    alignment_percentage: keterMetrics?.alignment_percentage ?? null,
    manifestation_valid: keterMetrics?.manifestation_valid ?? false,
    recommendation: decision || 'UNKNOWN',
    recommendation_confidence: recommendation?.confidence ?? 'unknown',
    execution_time_seconds: executionSeconds(job),
  };
}

/**
 * In-memory background execution of pipeline runs. Each submitted job runs on
 * its own; deleting a running job aborts it.
 */
export class JobRunner {
  private readonly jobs = new Map<string, JobRecord>();
  private readonly executions = new Map<string, Promise<void>>();
  private readonly controllers = new Map<string, AbortController>();
  private readonly estimatedTimeSeconds: number;
  private readonly now: () => Date;
  private readonly generateJobId: () => string;

  constructor(private readonly processor: PipelineProcessor, options: JobRunnerOptions = {}) {
    this.estimatedTimeSeconds = options.estimatedTimeSeconds ?? 180;
    this.now = options.now ?? (() => new Date());
    this.generateJobId = options.generateJobId ?? (() => `job-${uuidv4()}`);
  }

  get estimatedTime(): number {
    return this.estimatedTimeSeconds;
  }

  submit(scenario: string, caseName?: string): JobRecord {
    const createdAt = this.now();
    const job: JobRecord = {
      job_id: this.generateJobId(),
      case_name: caseName || `Analysis_${fileTimestamp(createdAt)}`,
      scenario,
      status: 'pending',
      completed_stages: 0,
      current_stage: null,
      created_at: createdAt,
    };
    this.jobs.set(job.job_id, job);
    logger.info(`Job ${job.job_id} submitted for case '${job.case_name}'`);

    const controller = new AbortController();
    this.controllers.set(job.job_id, controller);
    this.executions.set(job.job_id, this.execute(job, controller.signal));
    return job;
  }

  get(jobId: string): JobRecord | undefined {
    return this.jobs.get(jobId);
  }

  list(): JobListEntry[] {
    return [...this.jobs.values()].map(job => ({
      job_id: job.job_id,
      case_name: job.case_name,
      status: job.status,
      created_at: job.created_at.toISOString(),
    }));
  }

  delete(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job) {
      return false;
    }
    this.controllers.get(jobId)?.abort();
    this.jobs.delete(jobId);
    logger.info(`Job ${jobId} deleted (was ${job.status})`);
    return true;
  }

  status(jobId: string): JobStatusView | undefined {
    const job = this.jobs.get(jobId);
    if (!job) {
      return undefined;
    }
    const progress = progressOf(job);
    let elapsed: number | null = null;
    let remaining: number | null = null;

    if (job.started_at) {
      const end = job.completed_at ?? this.now();
      elapsed = Math.floor((end.getTime() - job.started_at.getTime()) / 1000);
      if (job.status === 'completed' || job.status === 'failed') {
        remaining = 0;
      } else if (progress > 0) {
        remaining = Math.max(Math.round(elapsed / (progress / 100) - elapsed), 0);
      } else {
        remaining = Math.max(this.estimatedTimeSeconds - elapsed, 0);
      }
    }

    return {
      job_id: job.job_id,
      status: job.status,
      progress,
      current_stage: job.current_stage,
      elapsed_time_seconds: elapsed,
      estimated_remaining_seconds: remaining,
    };
  }

  /** Resolves once the job's run has settled; undefined for unknown jobs. */
  async waitFor(jobId: string): Promise<JobRecord | undefined> {
    await this.executions.get(jobId);
    return this.jobs.get(jobId);
  }

  private async execute(job: JobRecord, signal: AbortSignal): Promise<void> {
    // Let submit() return before the run starts.
    await Promise.resolve();
    job.status = 'running';
    job.started_at = this.now();

    try {
      const result = await this.processor.process(job.scenario, {
        caseName: job.case_name,
        signal,
        onStageStart: event => {
          job.current_stage = event.stage_id;
        },
        onStageComplete: () => {
          job.completed_stages += 1;
        },
      });
      job.result = result;
      job.status = result.status === 'completed' ? 'completed' : 'failed';
      if (job.status === 'failed') {
        job.error = 'Every stage failed';
      }
      logger.info(`Job ${job.job_id} ${job.status} (quality '${result.pipeline_metrics.overall_quality_label}')`);
    } catch (caught) {
      const error = toError(caught);
      job.status = 'failed';
      job.error = error.message;
      logger.error(`Job ${job.job_id} failed: ${error.message}`);
    } finally {
      job.completed_at = this.now();
      job.current_stage = null;
      this.controllers.delete(job.job_id);
      this.executions.delete(job.job_id);
    }
  }
}
