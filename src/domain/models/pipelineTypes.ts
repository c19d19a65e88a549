import type { QualityLabel, StageId, StageResultsById } from './stageTypes';

export type PipelineQualityLabel = QualityLabel | 'incomplete';

export type RunStatus = 'completed' | 'failed';

export interface AveragedKeyScores {
  keter_alignment?: number;
  binah_depth?: number;
  tiferet_harmony?: number;
  yesod_readiness?: number;
}

export interface PipelineMetrics {
  total_stages: number;
  successful_count: number;
  failed_count: number;
  success_rate: number;
  total_duration: number;
  avg_duration_per_stage: number;
  per_stage_duration: Partial<Record<StageId, number>>;
  key_scores: Partial<Record<StageId, number>>;
  averaged_key_scores: AveragedKeyScores;
  average_score: number;
  overall_quality_label: PipelineQualityLabel;
}

export interface PipelineError {
  stage_id: StageId;
  error_type: string;
  message: string;
}

export interface PipelineResult {
  run_id: string;
  case_name: string;
  execution_number: number;
  started_at: string;
  status: RunStatus;
  scenario: string;
  stage_results: StageResultsById;
  pipeline_metrics: PipelineMetrics;
  errors: PipelineError[];
}

export interface StageProgressEvent {
  run_id: string;
  stage_id: StageId;
  position: number;
  total: number;
}

export interface StageCompletedEvent extends StageProgressEvent {
  status: 'ok' | 'error';
  duration_seconds: number;
}

export interface PipelineRunOptions {
  caseName?: string;
  runId?: string;
  signal?: AbortSignal;
  onStageStart?: (event: StageProgressEvent) => void;
  onStageComplete?: (event: StageCompletedEvent) => void;
}

/** What the job runner and CLI need from an orchestrator. */
export interface PipelineProcessor {
  process(scenario: string, options?: PipelineRunOptions): Promise<PipelineResult>;
}
