import * as fs from 'fs/promises';
import * as path from 'path';
import type { PipelineResult } from '../domain/models/pipelineTypes';
import { STAGE_ORDER } from '../domain/models/stageTypes';
import { createLogger } from '../utils/logger';

const logger = createLogger('export');

export type ExportFormat = 'json' | 'txt';

export interface ExportOptions {
  outputDir: string;
  format: ExportFormat;
  now?: Date;
}

const RULE = '='.repeat(80);
const SUB_RULE = '-'.repeat(40);

/** Letters, digits, spaces, hyphens and underscores survive; spaces become underscores. */
export function safeFileName(caseName: string): string {
  const kept = Array.from(caseName).filter(char => /[\p{L}\p{N} _-]/u.test(char)).join('').trimEnd();
  return kept.replace(/ /g, '_') || 'sefirot_analysis';
}

export function fileTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function section(title: string): string[] {
  return ['', RULE, title, RULE];
}

export function formatTextReport(result: PipelineResult): string {
  const metrics = result.pipeline_metrics;
  const lines: string[] = [
    RULE,
    'SEFIROT PIPELINE REPORT',
    RULE,
    `Case: ${result.case_name}`,
    `Started: ${result.started_at}`,
    `Run ID: ${result.run_id}`,
    `Execution: #${result.execution_number}`,
    `Status: ${result.status}`,
    ...section('SCENARIO'),
    result.scenario,
    ...section('STAGE RESULTS'),
  ];

  for (const stageId of STAGE_ORDER) {
    const stage = result.stage_results[stageId];
    lines.push('', `${stageId.toUpperCase()}:`, SUB_RULE);
    if (stage.status === 'error') {
      lines.push(`ERROR (${stage.error_type}): ${stage.error}`);
      continue;
    }
    lines.push(`  quality_label: ${stage.quality_label}`, `  model: ${stage.model_identifier}`);
    for (const [key, value] of Object.entries(stage.derived_metrics)) {
      if (isScalar(value)) {
        lines.push(`  ${key}: ${value}`);
      }
    }
  }

  lines.push(
    ...section('PIPELINE METRICS'),
    `Successful stages: ${metrics.successful_count}/${metrics.total_stages}`,
    `Success rate: ${metrics.success_rate}%`,
    `Total duration: ${metrics.total_duration}s`,
    `Average duration: ${metrics.avg_duration_per_stage}s/stage`,
    `Average score: ${metrics.average_score}`,
    `Pipeline quality: ${metrics.overall_quality_label}`,
    RULE
  );
  return lines.join('\n');
}

/** Writes the run as `<case>_<YYYYMMDD_HHMMSS>.<format>` and returns the file path. */
export async function exportResults(result: PipelineResult, options: ExportOptions): Promise<string> {
  const stamp = fileTimestamp(options.now ?? new Date());
  const filePath = path.join(options.outputDir, `${safeFileName(result.case_name)}_${stamp}.${options.format}`);
  const content = options.format === 'json'
    ? JSON.stringify(result, null, 2)
    : formatTextReport(result);

  await fs.mkdir(options.outputDir, { recursive: true });
  await fs.writeFile(filePath, content, 'utf8');
  logger.info(`Results exported: ${filePath}`);
  return filePath;
}
