import { createApp } from './app';
import { PipelineOrchestrator, ExecutionCounter } from './application/pipelineOrchestrator';
import { perspectiveKeywords, settings } from './config';
import { GatewayFactory } from './services/gatewayFactory';
import { JobRunner } from './services/jobRunner';
import { createLogger } from './utils/logger';

const logger = createLogger('main');

const gateways = new GatewayFactory(settings.llm);
const orchestrator = PipelineOrchestrator.fromSettings(settings, perspectiveKeywords, {
  gateways,
  counter: new ExecutionCounter(),
});
const jobRunner = new JobRunner(orchestrator, { estimatedTimeSeconds: settings.jobs.estimated_time_seconds });

const app = createApp({
  app: settings.app,
  jobs: settings.jobs,
  jobRunner,
  health: {
    gatewayStatuses: () => gateways.statuses(),
    pipelineMetrics: () => orchestrator.getMetrics(),
  },
});
const { host, port } = settings.app;

app.listen(port, host, () => {
  logger.info(`Server is running on http://${host}:${port}`);
});
