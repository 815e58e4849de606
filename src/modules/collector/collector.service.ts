import { CollectorPolicy } from '../../config/collector.config';
import { logger } from '../../config/logger.config';
import { ICareerStatsProvider } from '../../integrations/shared/stats-provider.interface';
import { RawCareerRow, RosterPlayer } from '../../integrations/shared/stats-provider.types';
import { sleep } from '../../shared/utils/time-utils';
import { CareerStatsRepository } from '../career-stats/career-stats.repository';
import { CollectionSummary, FetchOutcome, PacingDeps } from './collector.model';
import { FailureLedger } from './failure-ledger';
import { fetchCareerRowsWithRetry } from './fetch-with-retry';
import { politeDelayMs } from './pacing';
import { ProgressTracker, formatProgress } from './progress-tracker';

export type CareerStatsStore = Pick<CareerStatsRepository, 'hasStatsForPlayer' | 'savePlayerRows'>;

export interface CareerStatsCollectorDeps {
  provider: ICareerStatsProvider;
  store: CareerStatsStore;
  ledger: FailureLedger;
  policy: CollectorPolicy;
  pacing?: Partial<PacingDeps>;
}

function describeError(error: unknown): string {
  if (error instanceof Error) return error.stack ?? error.message;
  return String(error);
}

/**
 * Walks the roster once, one player at a time: skip what is stored, fetch the
 * rest under the retry policy, persist, then pace before the next request.
 */
export class CareerStatsCollector {
  private readonly provider: ICareerStatsProvider;
  private readonly store: CareerStatsStore;
  private readonly ledger: FailureLedger;
  private readonly policy: CollectorPolicy;
  private readonly pacing: PacingDeps;

  constructor(deps: CareerStatsCollectorDeps) {
    this.provider = deps.provider;
    this.store = deps.store;
    this.ledger = deps.ledger;
    this.policy = deps.policy;
    this.pacing = {
      sleep: deps.pacing?.sleep ?? sleep,
      random: deps.pacing?.random ?? Math.random,
      now: deps.pacing?.now ?? Date.now,
    };
  }

  /**
   * Run one pass over the full roster.
   * Roster and completion-check failures propagate; per-player failures are
   * recorded in the ledger and the loop moves on.
   */
  async collectAll(): Promise<CollectionSummary> {
    const startedAt = this.pacing.now();
    const roster = await this.provider.fetchRoster();
    logger.info(`Loaded roster: ${roster.length} players`, { provider: this.provider.providerId });

    const summary: CollectionSummary = {
      total: roster.length,
      alreadyCollected: 0,
      stored: 0,
      empty: 0,
      failed: 0,
      rowsSaved: 0,
      rowsRejected: 0,
      cooldowns: 0,
      durationMs: 0,
    };
    const progress = new ProgressTracker(roster.length, this.policy);
    let fetched = 0;

    for (const [index, player] of roster.entries()) {
      if (await this.store.hasStatsForPlayer(player.id)) {
        summary.alreadyCollected++;
        logger.debug(`Skipping ${player.fullName} (already collected)`, { playerId: player.id });
        continue;
      }

      const playerStartedAt = this.pacing.now();
      const outcome = await fetchCareerRowsWithRetry(this.provider, player, this.policy, this.pacing);
      await this.handleOutcome(player, outcome, summary);
      fetched++;
      progress.recordPlayer(this.pacing.now() - playerStartedAt);
      logger.info(formatProgress(progress.snapshot(index + 1, fetched)));

      await this.pacing.sleep(politeDelayMs(this.policy, this.pacing.random));

      const isLastPlayer = index === roster.length - 1;
      if (fetched % this.policy.batchSize === 0 && !isLastPlayer) {
        logger.info(
          `Processed ${fetched} players, cooling down for ${this.policy.cooldownSeconds}s`
        );
        await this.pacing.sleep(this.policy.cooldownSeconds * 1000);
        progress.recordCooldown();
        summary.cooldowns++;
      }
    }

    summary.durationMs = this.pacing.now() - startedAt;
    logger.info('Career stats collection finished', { ...summary });
    return summary;
  }

  private async handleOutcome(
    player: RosterPlayer,
    outcome: FetchOutcome,
    summary: CollectionSummary
  ): Promise<void> {
    switch (outcome.status) {
      case 'success':
        await this.persist(player, outcome.rows, summary);
        return;

      case 'empty':
        summary.empty++;
        logger.info(`No stats found for ${player.fullName}`, { playerId: player.id });
        return;

      case 'failed': {
        await this.recordFailure(player, outcome.message, summary);
        switch (outcome.kind) {
          case 'timeout':
          case 'connection':
            logger.error(`Failed ${player.fullName} after ${this.policy.maxRetries} retries`, {
              playerId: player.id,
              kind: outcome.kind,
            });
            return;
          case 'http':
            logger.error(`HTTP error for ${player.fullName}: ${outcome.error.message}`, {
              playerId: player.id,
              statusCode: outcome.error.statusCode,
            });
            return;
          case 'unexpected':
            logger.error(`Unexpected error with ${player.fullName}: ${outcome.error.message}`, {
              playerId: player.id,
            });
            return;
          default: {
            const unhandled: never = outcome.kind;
            throw new Error(`Unhandled fetch error kind: ${String(unhandled)}`);
          }
        }
      }

      default: {
        const unhandled: never = outcome;
        throw new Error(`Unhandled fetch outcome: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private async persist(
    player: RosterPlayer,
    rows: RawCareerRow[],
    summary: CollectionSummary
  ): Promise<void> {
    try {
      const result = await this.store.savePlayerRows(player.id, player.fullName, rows);
      summary.rowsSaved += result.saved;
      summary.rowsRejected += result.rejected;

      if (result.saved > 0) {
        summary.stored++;
      } else {
        // Every row failed validation: nothing usable came back
        summary.empty++;
        logger.warn(`No valid rows for ${player.fullName}`, {
          playerId: player.id,
          rejected: result.rejected,
        });
      }
    } catch (error) {
      await this.recordFailure(player, describeError(error), summary);
      logger.error(`Failed to save ${player.fullName}`, {
        playerId: player.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async recordFailure(
    player: RosterPlayer,
    message: string,
    summary: CollectionSummary
  ): Promise<void> {
    summary.failed++;
    await this.ledger.recordError(player.id, player.fullName, message);
    await this.ledger.recordSkipped(player.id, player.fullName);
  }
}
