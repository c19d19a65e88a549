import { z } from 'zod';
import type { JobSettings } from '../config';

// Carriage returns and trailing whitespace carry no meaning for the analysis.
const normalizeScenario = (value: string): string => value.replace(/\r\n?/g, '\n').trim();

export const createAnalyzeRequestSchema = (jobs: Pick<JobSettings, 'min_scenario_length' | 'max_scenario_length'>) =>
  z.object({
    scenario: z.string({ required_error: 'scenario is required' })
      .transform(normalizeScenario)
      .pipe(
        z.string()
          .min(jobs.min_scenario_length, `Scenario must be at least ${jobs.min_scenario_length} characters`)
          .max(jobs.max_scenario_length, `Scenario must be at most ${jobs.max_scenario_length} characters`)
      ),
    case_name: z.string().trim().min(1).max(120).optional(),
  });

export type AnalyzeRequest = z.infer<ReturnType<typeof createAnalyzeRequestSchema>>;

export const JobIdParamsSchema = z.object({
  jobId: z.string().min(1).max(200),
});

export type JobIdParams = z.infer<typeof JobIdParamsSchema>;
