import { Router, Request, Response } from 'express';
import type { OrchestratorMetrics } from '../../application/pipelineOrchestrator';
import { catchAsync } from '../../middleware/errorHandler';
import type { GatewayStatus } from '../../services/llmGateway';
import { createLogger } from '../../utils/logger';

const logger = createLogger('health');

export interface HealthDependencies {
  service: { name: string; version: string };
  gatewayStatuses: () => GatewayStatus[];
  pipelineMetrics: () => OrchestratorMetrics;
}

// An open breaker means a model is failing fast; the service itself still answers.
export function createHealthRouter(deps: HealthDependencies): Router {
  const router = Router();

  router.get('/', catchAsync(async (_req: Request, res: Response): Promise<void> => {
    logger.debug('Health check endpoint was called.');

    const gateways = deps.gatewayStatuses().map(status => ({
      provider: status.provider,
      model: status.model,
      circuit_state: status.circuit.state,
      failures: status.circuit.failures,
    }));
    const degraded = gateways.some(gateway => gateway.circuit_state !== 'CLOSED');

    res.status(200).json({
      success: true,
      data: {
        service: deps.service.name,
        version: deps.service.version,
        status: degraded ? 'degraded' : 'operational',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        node_version: process.version,
        pipeline: deps.pipelineMetrics(),
        gateways,
      },
    });
  }));

  return router;
}
