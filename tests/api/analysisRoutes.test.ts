import { describe, expect, test } from '@jest/globals';
import request from 'supertest';
import { createApp } from '../../src/app';
import type { OrchestratorMetrics } from '../../src/application/pipelineOrchestrator';
import { RuntimeSettingsSchema } from '../../src/config';
import { STAGE_ORDER } from '../../src/domain/models/stageTypes';
import { JobRunner } from '../../src/services/jobRunner';
import type { GatewayStatus } from '../../src/services/llmGateway';
import { SCENARIO } from '../fixtures/stageResponses';
import { ControlledProcessor, emptyResult } from '../mocks/controlledProcessor';

const defaults = RuntimeSettingsSchema.parse({});

const pipelineMetrics = (): OrchestratorMetrics => ({
  total_executions: 0,
  stage_count: STAGE_ORDER.length,
  stage_ids: [...STAGE_ORDER],
});

function closedGateway(model: string): GatewayStatus {
  return {
    provider: 'gemini',
    model,
    circuit: { failures: 0, lastFailureTime: 0, state: 'CLOSED', requestCount: 3, successCount: 3 },
  };
}

function setup(gatewayStatuses: () => GatewayStatus[] = () => []) {
  const processor = new ControlledProcessor(10);
  let next = 0;
  const jobRunner = new JobRunner(processor, { generateJobId: () => `job-${++next}` });
  const app = createApp({
    app: defaults.app,
    jobs: defaults.jobs,
    jobRunner,
    health: { gatewayStatuses, pipelineMetrics },
  });
  return { app, processor, jobRunner };
}

describe('analysis API', () => {
  describe('POST /api/analyze', () => {
    test('accepts a scenario and returns the job id', async () => {
      const { app, processor } = setup();

      const response = await request(app)
        .post('/api/analyze')
        .send({ scenario: `  ${SCENARIO}\r\n`, case_name: ' Parking ' })
        .expect(202);

      expect(response.body).toEqual({
        job_id: 'job-1',
        status: 'pending',
        message: 'Analysis started. Use job_id to check status.',
        estimated_time_seconds: 180,
      });
      await processor.started;
      expect(processor.runs[0].scenario).toBe(SCENARIO);
      expect(processor.runs[0].options.caseName).toBe('Parking');
    });

    test('rejects a scenario below the minimum length', async () => {
      const { app } = setup();

      const response = await request(app)
        .post('/api/analyze')
        .send({ scenario: '   too short   ' })
        .expect(400);

      expect(response.body).toEqual({
        success: false,
        message: 'Validation failed',
        errors: [{ field: 'scenario', message: 'Scenario must be at least 50 characters', code: 'too_small' }],
      });
    });

    test('rejects a missing scenario', async () => {
      const { app } = setup();
      const response = await request(app).post('/api/analyze').send({}).expect(400);
      expect(response.body.errors).toEqual([{ field: 'scenario', message: 'scenario is required', code: 'invalid_type' }]);
    });

    test('rejects a body that is not JSON', async () => {
      const { app } = setup();

      const response = await request(app)
        .post('/api/analyze')
        .set('Content-Type', 'application/json')
        .send('{"scenario": ')
        .expect(400);

      expect(response.body.success).toBe(false);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('job lifecycle', () => {
    test('reports status while running and results once completed', async () => {
      const { app, processor, jobRunner } = setup();
      await request(app).post('/api/analyze').send({ scenario: SCENARIO, case_name: 'Parking' }).expect(202);
      await processor.started;

      const status = await request(app).get('/api/status/job-1').expect(200);
      expect(status.body).toMatchObject({ job_id: 'job-1', status: 'running', progress: 100, current_stage: 'malchut' });

      const early = await request(app).get('/api/results/job-1').expect(409);
      expect(early.body.error).toMatchObject({
        message: 'Analysis not completed. Current status: running',
        code: 'CONFLICT_ERROR',
        statusCode: 409,
      });

      processor.complete(emptyResult('completed', 'Parking'));
      await jobRunner.waitFor('job-1');

      const results = await request(app).get('/api/results/job-1').expect(200);
      expect(results.body).toMatchObject({
        job_id: 'job-1',
        case_name: 'Parking',
        status: 'completed',
        result: { run_id: 'controlled-run', status: 'completed' },
        summary: {
          alignment_percentage: null,
          manifestation_valid: false,
          recommendation: 'UNKNOWN',
          recommendation_confidence: 'unknown',
        },
      });
      expect(typeof results.body.completed_at).toBe('string');
    });

    test('a failed job reports its error with the conflict', async () => {
      const { app, processor, jobRunner } = setup();
      await request(app).post('/api/analyze').send({ scenario: SCENARIO }).expect(202);
      await processor.started;
      processor.fail(new Error('gateway down'));
      await jobRunner.waitFor('job-1');

      const response = await request(app).get('/api/results/job-1').expect(409);
      expect(response.body.error).toMatchObject({
        message: 'Analysis not completed. Current status: failed',
        details: { error: 'gateway down' },
      });
    });

    test('unknown jobs are not found', async () => {
      const { app } = setup();
      const response = await request(app).get('/api/status/missing').expect(404);
      expect(response.body.error).toMatchObject({ message: 'Job missing not found', code: 'NOT_FOUND_ERROR' });
      await request(app).get('/api/results/missing').expect(404);
      await request(app).delete('/api/jobs/missing').expect(404);
    });

    test('deletes a job and lists the rest', async () => {
      const { app } = setup();
      await request(app).post('/api/analyze').send({ scenario: SCENARIO, case_name: 'First' }).expect(202);
      await request(app).post('/api/analyze').send({ scenario: SCENARIO, case_name: 'Second' }).expect(202);

      const deleted = await request(app).delete('/api/jobs/job-1').expect(200);
      expect(deleted.body).toEqual({ message: 'Job deleted successfully', job_id: 'job-1' });
      await request(app).get('/api/status/job-1').expect(404);

      const listed = await request(app).get('/api/jobs').expect(200);
      expect(listed.body.total).toBe(1);
      expect(listed.body.jobs[0]).toMatchObject({ job_id: 'job-2', case_name: 'Second' });
    });
  });

  describe('GET /health', () => {
    test('is operational while every circuit is closed', async () => {
      const { app } = setup(() => [closedGateway('gemini-2.5-flash')]);

      const response = await request(app).get('/health').expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.data).toMatchObject({
        service: 'Sefirot Pipeline',
        status: 'operational',
        pipeline: { stage_count: 10, total_executions: 0 },
        gateways: [{ provider: 'gemini', model: 'gemini-2.5-flash', circuit_state: 'CLOSED', failures: 0 }],
      });
    });

    test('is degraded when a circuit is open', async () => {
      const open: GatewayStatus = {
        ...closedGateway('claude-sonnet'),
        provider: 'claude',
        circuit: { failures: 5, lastFailureTime: 1, state: 'OPEN', requestCount: 5, successCount: 0 },
      };
      const { app } = setup(() => [closedGateway('gemini-2.5-flash'), open]);

      const response = await request(app).get('/health').expect(200);

      expect(response.body.data.status).toBe('degraded');
    });
  });

  test('unknown routes return a structured 404', async () => {
    const { app } = setup();
    const response = await request(app).get('/api/nope').expect(404);
    expect(response.body.error.message).toBe('Route GET /api/nope not found');
    expect(response.headers['x-correlation-id']).toMatch(/^req_/);
  });
});
