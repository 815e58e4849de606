import { createCollectorPolicy } from '../../../config/collector.config';
import { ICareerStatsProvider } from '../../../integrations/shared/stats-provider.interface';
import { StatsFetchError } from '../../../integrations/shared/stats-fetch-error';
import { fetchCareerRowsWithRetry } from '../../../modules/collector/fetch-with-retry';
import { httpError, networkError } from '../../integrations/axios-fixtures';
import { makeRawRow } from '../../fixtures/career-rows';

jest.mock('../../../config/logger.config', () => ({
  logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

const player = { id: 2, fullName: 'B' };
const policy = createCollectorPolicy();

function createProvider() {
  return {
    providerId: 'test-provider',
    fetchRoster: jest.fn(),
    fetchCareerRows: jest.fn(),
  };
}

describe('fetchCareerRowsWithRetry', () => {
  let provider: ReturnType<typeof createProvider>;
  let sleep: jest.Mock;
  // Midpoint of every jitter range: timeout multiplier 1.0, delay 1.05s
  const random = () => 0.5;

  beforeEach(() => {
    provider = createProvider();
    sleep = jest.fn().mockResolvedValue(undefined);
  });

  const run = () =>
    fetchCareerRowsWithRetry(provider as unknown as ICareerStatsProvider, player, policy, {
      sleep,
      random,
    });

  it('returns the rows on first success', async () => {
    const rows = [makeRawRow(2, '2001-02')];
    provider.fetchCareerRows.mockResolvedValue(rows);

    const outcome = await run();

    expect(outcome).toEqual({ status: 'success', rows, attempts: 1 });
    expect(provider.fetchCareerRows).toHaveBeenCalledWith(2, 20000);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('reports an empty result as empty, not as a failure', async () => {
    provider.fetchCareerRows.mockResolvedValue([]);

    await expect(run()).resolves.toEqual({ status: 'empty', attempts: 1 });
  });

  it('retries timeouts with growing timeouts and waits', async () => {
    const rows = [makeRawRow(2, '2001-02')];
    provider.fetchCareerRows
      .mockRejectedValueOnce(networkError('ECONNABORTED', 'timeout of 20000ms exceeded'))
      .mockRejectedValueOnce(networkError('ECONNRESET', 'socket hang up'))
      .mockResolvedValueOnce(rows);

    const outcome = await run();

    expect(outcome).toEqual({ status: 'success', rows, attempts: 3 });
    expect(provider.fetchCareerRows.mock.calls.map((call: unknown[]) => call[1])).toEqual([
      20000, 40000, 80000,
    ]);
    expect(sleep.mock.calls.map((call: unknown[]) => call[0])).toEqual([2100, 4200]);
  });

  it('gives up after maxRetries retries of a persistent timeout', async () => {
    provider.fetchCareerRows.mockRejectedValue(
      networkError('ECONNABORTED', 'timeout of 20000ms exceeded')
    );

    const outcome = await run();

    expect(provider.fetchCareerRows).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls.map((call: unknown[]) => call[0])).toEqual([2100, 4200, 8400]);
    expect(outcome).toMatchObject({
      status: 'failed',
      kind: 'timeout',
      attempts: 4,
      message:
        'Timeout or connection error after 3 retries: [test-provider] fetchCareerRows: timeout of 20000ms exceeded',
    });
  });

  it('does not retry HTTP errors', async () => {
    provider.fetchCareerRows.mockRejectedValue(httpError(503));

    const outcome = await run();

    expect(provider.fetchCareerRows).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({
      status: 'failed',
      kind: 'http',
      attempts: 1,
      message: 'HTTP error: [test-provider] fetchCareerRows: Request failed with status code 503',
    });
    if (outcome.status === 'failed') {
      expect(outcome.error.statusCode).toBe(503);
    }
  });

  it('ends the player on an unexpected error with its stack as the message', async () => {
    provider.fetchCareerRows.mockRejectedValue(new TypeError('cannot read rowSet'));

    const outcome = await run();

    expect(provider.fetchCareerRows).toHaveBeenCalledTimes(1);
    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') {
      expect(outcome.kind).toBe('unexpected');
      expect(outcome.error).toBeInstanceOf(StatsFetchError);
      expect(outcome.message).toContain('Caused by: TypeError: cannot read rowSet');
    }
  });

  it('honours a smaller retry budget', async () => {
    provider.fetchCareerRows.mockRejectedValue(networkError('ECONNREFUSED', 'connect ECONNREFUSED'));

    const outcome = await fetchCareerRowsWithRetry(
      provider as unknown as ICareerStatsProvider,
      player,
      createCollectorPolicy({ maxRetries: 1 }),
      { sleep, random }
    );

    expect(provider.fetchCareerRows).toHaveBeenCalledTimes(2);
    expect(outcome).toMatchObject({ status: 'failed', kind: 'connection', attempts: 2 });
  });
});
