import { afterEach, describe, expect, jest, test } from '@jest/globals';
import { run } from '../src/index';

describe('sefirot-analyze', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('prints usage and exits with 1 without a scenario', async () => {
    const stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(run([])).resolves.toBe(1);

    const printed = String(stderr.mock.calls[0][0]);
    expect(printed.split('\n')[0]).toBe('Usage: sefirot-analyze "<scenario>" [case_name]');
    expect(printed).toContain('  10. malchut');
  });
});
