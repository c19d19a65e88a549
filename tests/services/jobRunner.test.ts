import { describe, expect, test } from '@jest/globals';
import { PipelineOrchestrator } from '../../src/application/pipelineOrchestrator';
import { executionSeconds, JobRecord, JobRunner, summarizeResult } from '../../src/services/jobRunner';
import { richResponses, SCENARIO } from '../fixtures/stageResponses';
import { ControlledProcessor, emptyResult } from '../mocks/controlledProcessor';
import { json } from '../mocks/scriptedGateway';
import { buildStages, scriptedGateways } from '../mocks/stageFactory';

function clock(start: Date) {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance: (seconds: number) => {
      current += seconds * 1000;
    },
  };
}

const T0 = new Date(2026, 9, 19, 14, 30, 0);

function runner(processor: ControlledProcessor, time = clock(T0)) {
  let next = 0;
  const jobs = new JobRunner(processor, { now: time.now, generateJobId: () => `job-${++next}` });
  return { jobs, time };
}

describe('JobRunner', () => {
  test('a submitted job is pending until the run starts', () => {
    const { jobs } = runner(new ControlledProcessor());

    const job = jobs.submit(SCENARIO, 'Parking');

    expect(job).toMatchObject({ job_id: 'job-1', case_name: 'Parking', status: 'pending', completed_stages: 0 });
    expect(jobs.status('job-1')).toEqual({
      job_id: 'job-1',
      status: 'pending',
      progress: 0,
      current_stage: null,
      elapsed_time_seconds: null,
      estimated_remaining_seconds: null,
    });
  });

  test('names unnamed jobs after their submission time', () => {
    const { jobs } = runner(new ControlledProcessor());
    expect(jobs.submit(SCENARIO).case_name).toBe('Analysis_20261019_143000');
  });

  test('estimates the remaining time from stage progress', async () => {
    const processor = new ControlledProcessor(3);
    const { jobs, time } = runner(processor);

    jobs.submit(SCENARIO, 'Parking');
    await processor.started;
    time.advance(30);

    expect(jobs.status('job-1')).toEqual({
      job_id: 'job-1',
      status: 'running',
      progress: 30,
      current_stage: 'gevurah',
      elapsed_time_seconds: 30,
      estimated_remaining_seconds: 70,
    });
    expect(processor.runs[0].options.caseName).toBe('Parking');
  });

  test('falls back to the configured estimate before any stage completes', async () => {
    const processor = new ControlledProcessor(0);
    const { jobs, time } = runner(processor);

    jobs.submit(SCENARIO);
    await processor.started;
    time.advance(20);

    expect(jobs.status('job-1')).toMatchObject({ progress: 0, current_stage: 'keter', estimated_remaining_seconds: 160 });
    expect(jobs.estimatedTime).toBe(180);
  });

  test('stores the result of a completed run', async () => {
    const processor = new ControlledProcessor(10);
    const { jobs, time } = runner(processor);

    jobs.submit(SCENARIO, 'Parking');
    await processor.started;
    time.advance(42);
    processor.complete(emptyResult('completed', 'Parking'));
    const job = await jobs.waitFor('job-1');

    expect(job?.status).toBe('completed');
    expect(job?.result?.case_name).toBe('Parking');
    expect(jobs.status('job-1')).toMatchObject({
      progress: 100,
      current_stage: null,
      elapsed_time_seconds: 42,
      estimated_remaining_seconds: 0,
    });
  });

  test('marks the job failed when every stage failed', async () => {
    const processor = new ControlledProcessor();
    const { jobs } = runner(processor);

    jobs.submit(SCENARIO);
    await processor.started;
    processor.complete(emptyResult('failed'));
    const job = await jobs.waitFor('job-1');

    expect(job).toMatchObject({ status: 'failed', error: 'Every stage failed' });
    expect(job?.result).toBeDefined();
  });

  test('records the error when the run rejects', async () => {
    const processor = new ControlledProcessor();
    const { jobs } = runner(processor);

    jobs.submit(SCENARIO);
    await processor.started;
    processor.fail(new Error('gateway down'));
    const job = await jobs.waitFor('job-1');

    expect(job).toMatchObject({ status: 'failed', error: 'gateway down' });
    expect(job?.completed_at).toBeInstanceOf(Date);
  });

  test('deleting a running job cancels its run', async () => {
    const processor = new ControlledProcessor(2);
    const { jobs } = runner(processor);

    jobs.submit(SCENARIO);
    await processor.started;

    expect(jobs.delete('job-1')).toBe(true);
    expect(processor.runs[0].options.signal?.aborted).toBe(true);
    expect(jobs.get('job-1')).toBeUndefined();
    expect(await jobs.waitFor('job-1')).toBeUndefined();
    expect(jobs.delete('job-1')).toBe(false);
  });

  test('lists every job with its creation time', () => {
    const { jobs } = runner(new ControlledProcessor());
    jobs.submit(SCENARIO, 'First');
    jobs.submit(SCENARIO, 'Second');

    expect(jobs.list()).toEqual([
      { job_id: 'job-1', case_name: 'First', status: 'pending', created_at: T0.toISOString() },
      { job_id: 'job-2', case_name: 'Second', status: 'pending', created_at: T0.toISOString() },
    ]);
  });

  test('summarizes a finished analysis', async () => {
    const gateways = scriptedGateways({
      keter: json(richResponses.keter),
      chochmah: json(richResponses.chochmah),
      binah: json(richResponses.binah),
      chesed: json(richResponses.chesed),
      gevurah: json(richResponses.gevurah),
      tiferet: json(richResponses.tiferet),
      netzach: json(richResponses.netzach),
      hod: json(richResponses.hod),
      yesod: json(richResponses.yesod),
      malchut: json(richResponses.malchut),
    });
    const jobs = new JobRunner(new PipelineOrchestrator(buildStages(gateways)));

    const { job_id } = jobs.submit(SCENARIO, 'Parking');
    const job = await jobs.waitFor(job_id);
    if (job === undefined) throw new Error('job vanished');

    expect(job.status).toBe('completed');
    expect(jobs.status(job_id)?.progress).toBe(100);
    expect(summarizeResult(job)).toMatchObject({
      alignment_percentage: 95,
      manifestation_valid: true,
      recommendation: 'GO',
      recommendation_confidence: 85,
    });
  });
});

describe('executionSeconds', () => {
  const base: JobRecord = {
    job_id: 'job-x',
    case_name: 'x',
    scenario: 'x',
    status: 'completed',
    completed_stages: 10,
    current_stage: null,
    created_at: T0,
  };

  test('is zero until the job has both started and finished', () => {
    expect(executionSeconds(base)).toBe(0);
  });

  test('rounds to hundredths of a second', () => {
    expect(executionSeconds({ ...base, started_at: new Date(1000), completed_at: new Date(2234) })).toBe(1.23);
  });
});
