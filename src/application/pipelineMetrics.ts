import type {
  AveragedKeyScores,
  PipelineError,
  PipelineMetrics,
  PipelineQualityLabel,
} from '../domain/models/pipelineTypes';
import {
  AnyStageResult,
  keyScoreOf,
  STAGE_ORDER,
  StageId,
  StageResultsById,
} from '../domain/models/stageTypes';
import { round } from '../domain/utils/scoring';

function orderedResults(results: Partial<StageResultsById>): AnyStageResult[] {
  const ordered: AnyStageResult[] = [];
  for (const stageId of STAGE_ORDER) {
    const result = results[stageId];
    if (result !== undefined) {
      ordered.push(result);
    }
  }
  return ordered;
}

/** The four headline scores averaged into the run's overall score, one from each pillar of the analysis. */
export function averagedKeyScores(results: Partial<StageResultsById>): AveragedKeyScores {
  const scores: AveragedKeyScores = {};
  const keter = results.keter;
  const binah = results.binah;
  const tiferet = results.tiferet;
  const yesod = results.yesod;
  if (keter?.status === 'ok') scores.keter_alignment = keter.derived_metrics.alignment_percentage;
  if (binah?.status === 'ok') scores.binah_depth = binah.derived_metrics.contextual_depth_score;
  if (tiferet?.status === 'ok') scores.tiferet_harmony = tiferet.derived_metrics.harmony_score;
  if (yesod?.status === 'ok') scores.yesod_readiness = yesod.derived_metrics.readiness_score;
  return scores;
}

export function overallQualityLabel(
  successful: number,
  averageScore: number,
  results: readonly AnyStageResult[]
): PipelineQualityLabel {
  if (successful < STAGE_ORDER.length) {
    return 'incomplete';
  }
  const everyStageExceptional = results.every(result => result.status === 'ok' && result.quality_label === 'exceptional');
  if (averageScore >= 85 && everyStageExceptional) return 'exceptional';
  if (averageScore >= 70) return 'high';
  if (averageScore >= 55) return 'moderate';
  return 'low';
}

export function computePipelineMetrics(
  results: Partial<StageResultsById>,
  durations: Partial<Record<StageId, number>>,
  totalDurationSeconds: number
): PipelineMetrics {
  const ordered = orderedResults(results);
  const total = STAGE_ORDER.length;
  const successful = ordered.filter(result => result.status === 'ok').length;

  const keyScores: Partial<Record<StageId, number>> = {};
  for (const result of ordered) {
    const score = keyScoreOf(result);
    if (score !== undefined) {
      keyScores[result.stage_id] = score;
    }
  }

  const averaged = averagedKeyScores(results);
  const averagedValues = Object.values(averaged);
  const averageScore = averagedValues.length > 0
    ? round(averagedValues.reduce((sum, score) => sum + score, 0) / averagedValues.length)
    : 0;

  const perStage: Partial<Record<StageId, number>> = {};
  for (const stageId of STAGE_ORDER) {
    const seconds = durations[stageId];
    if (seconds !== undefined) {
      perStage[stageId] = round(seconds);
    }
  }

  return {
    total_stages: total,
    successful_count: successful,
    failed_count: total - successful,
    success_rate: round((successful / total) * 100),
    total_duration: round(totalDurationSeconds),
    avg_duration_per_stage: round(totalDurationSeconds / total),
    per_stage_duration: perStage,
    key_scores: keyScores,
    averaged_key_scores: averaged,
    average_score: averageScore,
    overall_quality_label: overallQualityLabel(successful, averageScore, ordered),
  };
}

export function collectErrors(results: Partial<StageResultsById>): PipelineError[] {
  const errors: PipelineError[] = [];
  for (const result of orderedResults(results)) {
    if (result.status === 'error') {
      errors.push({ stage_id: result.stage_id, error_type: result.error_type, message: result.error });
    }
  }
  return errors;
}
