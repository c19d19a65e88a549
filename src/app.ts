import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { AppSettings, JobSettings } from './config';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import type { JobRunner } from './services/jobRunner';
import { createLogger } from './utils/logger';
import { createAnalysisRouter } from './api/routes/analysisRoutes';
import { createHealthRouter, HealthDependencies } from './api/routes/healthRoutes';

const logger = createLogger('app');

export interface AppDependencies {
  app: AppSettings;
  jobs: JobSettings;
  jobRunner: JobRunner;
  health: Omit<HealthDependencies, 'service'>;
}

function resolveAllowedOrigins(allowedOriginsStr: string): string[] | boolean {
  if (allowedOriginsStr === '*') {
    if (process.env.NODE_ENV === 'production') {
      logger.warn('SECURITY WARNING: CORS is configured to allow all origins (*) in production.');
    }
    return true;
  }
  const origins = allowedOriginsStr.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0);
  if (origins.length === 0) {
    logger.warn('cors_allowed_origins_str was not \'*\' and parsed to an empty list. Defaulting to localhost only.');
    return ['http://localhost:3000', 'https://localhost:3000'];
  }
  return origins;
}

export const createApp = (deps: AppDependencies): Express => {
  const app = express();

  app.use(helmet());

  // Scenarios are bounded by max_scenario_length; the body limit leaves room for JSON escaping.
  app.use(express.json({ limit: '1mb' }));

  // Add request correlation ID
  app.use((req: Request, res: Response, next: NextFunction) => {
    req.correlationId = `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
    res.setHeader('X-Correlation-ID', req.correlationId);
    next();
  });

  const allowedOrigins = resolveAllowedOrigins(deps.app.cors_allowed_origins_str);
  app.use(cors({
    origin: allowedOrigins,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept', 'Origin', 'X-Requested-With'],
    exposedHeaders: ['X-Correlation-ID'],
    maxAge: 86400,
  }));

  logger.info(`CORS middleware configured with origins: ${Array.isArray(allowedOrigins) ? allowedOrigins.join(', ') : 'all origins (*)'}`);

  app.use('/health', createHealthRouter({
    service: { name: deps.app.name, version: deps.app.version },
    ...deps.health,
  }));
  app.use('/api', createAnalysisRouter(deps.jobRunner, deps.jobs));

  // 404 handler for unmatched routes
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  logger.info(`${deps.app.name} v${deps.app.version} application instance created.`);

  return app;
};
