import { ICareerStatsProvider } from '../shared/stats-provider.interface';
import { RawCareerRow, RosterPlayer } from '../shared/stats-provider.types';
import { StatsFetchError } from '../shared/stats-fetch-error';
import { NBA_STATS_API_NAME, NbaResultSet, NbaStatsApiClient } from './nba-stats-api-client';
import { cellToInt, cellToText } from '../../utils/parsing.utils';
import { logger } from '../../config/logger.config';

/**
 * stats.nba.com implementation of ICareerStatsProvider
 *
 * Career rows are passed through positionally; roster rows are mapped by
 * header name because the roster endpoint's column order is not stable.
 */
export class NbaStatsProvider implements ICareerStatsProvider {
  readonly providerId = NBA_STATS_API_NAME;

  constructor(
    private readonly client: NbaStatsApiClient,
    private readonly rosterSeason: string
  ) {}

  async fetchRoster(): Promise<RosterPlayer[]> {
    const resultSet = await this.client.fetchCommonAllPlayers(this.rosterSeason);
    return this.mapRoster(resultSet);
  }

  async fetchCareerRows(playerId: number, timeoutMs: number): Promise<RawCareerRow[]> {
    const resultSet = await this.client.fetchPlayerCareerStats(playerId, timeoutMs);
    return resultSet.rowSet;
  }

  private mapRoster(resultSet: NbaResultSet): RosterPlayer[] {
    const idIdx = resultSet.headers.indexOf('PERSON_ID');
    const nameIdx = resultSet.headers.indexOf('DISPLAY_FIRST_LAST');
    if (idIdx === -1 || nameIdx === -1) {
      throw new StatsFetchError(
        'unexpected',
        NBA_STATS_API_NAME,
        'commonallplayers',
        `Roster headers missing PERSON_ID or DISPLAY_FIRST_LAST (got: ${resultSet.headers.join(', ')})`
      );
    }

    const players: RosterPlayer[] = [];
    for (const row of resultSet.rowSet) {
      const id = cellToInt(row[idIdx]);
      const fullName = cellToText(row[nameIdx])?.trim();
      if (id === null || !fullName) {
        logger.warn('Skipping roster row without id or name', { row });
        continue;
      }
      players.push({ id, fullName });
    }
    return players;
  }
}
