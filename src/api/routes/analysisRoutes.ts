import { Router, Request, Response } from 'express';
import type { JobSettings } from '../../config';
import { ConflictError, NotFoundError, catchAsync } from '../../middleware/errorHandler';
import { createValidationMiddleware } from '../../middleware/validation';
import { executionSeconds, JobRecord, JobRunner, summarizeResult } from '../../services/jobRunner';
import { createLogger } from '../../utils/logger';
import { createAnalyzeRequestSchema, JobIdParamsSchema } from '../schemas';

const logger = createLogger('api');

export function createAnalysisRouter(jobRunner: JobRunner, jobSettings: JobSettings): Router {
  const router = Router();
  const AnalyzeRequestSchema = createAnalyzeRequestSchema(jobSettings);

  const requireJob = (req: Request): JobRecord => {
    const { jobId } = JobIdParamsSchema.parse(req.params);
    const job = jobRunner.get(jobId);
    if (!job) {
      throw new NotFoundError(`Job ${jobId} not found`);
    }
    return job;
  };

  router.post(
    '/analyze',
    createValidationMiddleware({ body: AnalyzeRequestSchema }),
    catchAsync(async (req: Request, res: Response): Promise<void> => {
      const { scenario, case_name } = AnalyzeRequestSchema.parse(req.body);
      const job = jobRunner.submit(scenario, case_name);
      logger.debug(`Accepted analysis request ${job.job_id} (${scenario.length} characters)`);

      res.status(202).json({
        job_id: job.job_id,
        status: job.status,
        message: 'Analysis started. Use job_id to check status.',
        estimated_time_seconds: jobSettings.estimated_time_seconds,
      });
    })
  );

  router.get('/status/:jobId', catchAsync(async (req: Request, res: Response): Promise<void> => {
    const job = requireJob(req);
    res.json(jobRunner.status(job.job_id));
  }));

  router.get('/results/:jobId', catchAsync(async (req: Request, res: Response): Promise<void> => {
    const job = requireJob(req);
    if (job.status !== 'completed' || !job.result) {
      throw new ConflictError(`Analysis not completed. Current status: ${job.status}`, job.error ? { error: job.error } : undefined);
    }

    res.json({
      job_id: job.job_id,
      case_name: job.case_name,
      status: job.status,
      completed_at: job.completed_at?.toISOString() ?? null,
      execution_time_seconds: executionSeconds(job),
      result: job.result,
      summary: summarizeResult(job),
    });
  }));

  router.delete('/jobs/:jobId', catchAsync(async (req: Request, res: Response): Promise<void> => {
    const job = requireJob(req);
    jobRunner.delete(job.job_id);
    res.json({ message: 'Job deleted successfully', job_id: job.job_id });
  }));

  router.get('/jobs', catchAsync(async (_req: Request, res: Response): Promise<void> => {
    const jobs = jobRunner.list();
    res.json({ total: jobs.length, jobs });
  }));

  return router;
}
