import { CollectorPolicy } from '../../config/collector.config';
import { logger } from '../../config/logger.config';
import { ICareerStatsProvider } from '../../integrations/shared/stats-provider.interface';
import { FetchErrorKind, RosterPlayer } from '../../integrations/shared/stats-provider.types';
import { StatsFetchError } from '../../integrations/shared/stats-fetch-error';
import { FetchOutcome, PacingDeps } from './collector.model';
import { requestTimeoutMs, retryWaitMs } from './pacing';

function failed(
  kind: FetchErrorKind,
  error: StatsFetchError,
  message: string,
  attempts: number
): FetchOutcome {
  return { status: 'failed', kind, error, message, attempts };
}

/**
 * Fetch one player's career rows, retrying only timeouts and connection
 * failures. Each attempt gets a longer, jittered timeout; each retry waits a
 * jittered, growing delay. HTTP and unexpected errors end the player at once.
 *
 * Never throws: every path ends in a FetchOutcome.
 */
export async function fetchCareerRowsWithRetry(
  provider: ICareerStatsProvider,
  player: RosterPlayer,
  policy: CollectorPolicy,
  deps: Pick<PacingDeps, 'sleep' | 'random'>
): Promise<FetchOutcome> {
  let retries = 0;

  for (;;) {
    const timeoutMs = requestTimeoutMs(policy, retries, deps.random);
    logger.info(`Fetching ${player.fullName} (timeout: ${(timeoutMs / 1000).toFixed(1)}s)`, {
      playerId: player.id,
      attempt: retries + 1,
    });

    try {
      const rows = await provider.fetchCareerRows(player.id, timeoutMs);
      if (rows.length === 0) {
        return { status: 'empty', attempts: retries + 1 };
      }
      return { status: 'success', rows, attempts: retries + 1 };
    } catch (caught) {
      const error = StatsFetchError.fromError(provider.providerId, 'fetchCareerRows', caught);
      const kind = error.kind;

      switch (kind) {
        case 'timeout':
        case 'connection': {
          retries++;
          if (retries > policy.maxRetries) {
            return failed(
              kind,
              error,
              `Timeout or connection error after ${policy.maxRetries} retries: ${error.message}`,
              retries
            );
          }
          const waitMs = retryWaitMs(policy, retries, deps.random);
          logger.warn(`Retry ${retries}/${policy.maxRetries} in ${(waitMs / 1000).toFixed(1)}s`, {
            playerId: player.id,
            kind,
            errorMessage: error.message,
          });
          await deps.sleep(waitMs);
          break;
        }

        case 'http':
          return failed(kind, error, `HTTP error: ${error.message}`, retries + 1);

        case 'unexpected':
          return failed(kind, error, error.stack ?? error.message, retries + 1);

        default: {
          const unhandled: never = kind;
          throw new Error(`Unhandled fetch error kind: ${String(unhandled)}`);
        }
      }
    }
  }
}
