#!/usr/bin/env node
import { PipelineOrchestrator } from './application/pipelineOrchestrator';
import { exportResults } from './application/reportExport';
import { perspectiveKeywords, settings } from './config';
import { STAGE_DEFINITIONS, STAGE_ORDER } from './domain/models/stageTypes';
import { createLogger } from './utils/logger';

const logger = createLogger('cli');

function usage(): string {
  const stages = STAGE_ORDER.map(stageId => `  ${STAGE_DEFINITIONS[stageId].position}. ${stageId}`).join('\n');
  return [
    'Usage: sefirot-analyze "<scenario>" [case_name]',
    '',
    'Runs the ten-stage analysis in sequence:',
    stages,
    '',
    'Results are exported as JSON and TXT.',
  ].join('\n');
}

export async function run(argv: string[]): Promise<number> {
  const [scenario, caseName] = argv;
  if (!scenario) {
    console.error(usage());
    return 1;
  }

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const orchestrator = PipelineOrchestrator.fromSettings(settings, perspectiveKeywords);
  const result = await orchestrator.process(scenario, { caseName, signal: controller.signal });

  const outputDir = settings.export.output_dir;
  const jsonFile = await exportResults(result, { outputDir, format: 'json' });
  const txtFile = await exportResults(result, { outputDir, format: 'txt' });

  const metrics = result.pipeline_metrics;
  console.log(`Pipeline ${result.status}: ${metrics.successful_count}/${metrics.total_stages} stages, quality '${metrics.overall_quality_label}'`);
  console.log(`JSON: ${jsonFile}`);
  console.log(`TXT:  ${txtFile}`);
  return result.status === 'completed' ? 0 : 2;
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error(`Pipeline run aborted: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    });
}
