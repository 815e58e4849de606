import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { StatsFetchError } from '../shared/stats-fetch-error';

export const NBA_STATS_API_NAME = 'nba-stats';

const cellSchema = z.union([z.string(), z.number(), z.null()]);

const resultSetSchema = z.object({
  name: z.string(),
  headers: z.array(z.string()),
  rowSet: z.array(z.array(cellSchema)),
});

const statsResponseSchema = z.object({
  resultSets: z.array(resultSetSchema),
});

/**
 * One named table of a stats.nba.com response
 */
export type NbaResultSet = z.infer<typeof resultSetSchema>;

/**
 * The stats site drops requests that do not look like they come from its own
 * web frontend.
 */
const BROWSER_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'application/json, text/plain, */*',
  'Accept-Language': 'en-US,en;q=0.9',
  Origin: 'https://www.nba.com',
  Referer: 'https://www.nba.com/',
  'x-nba-stats-origin': 'stats',
  'x-nba-stats-token': 'true',
};

export interface NbaStatsApiClientOptions {
  baseURL: string;
  /** Default timeout for calls that do not pass their own */
  timeoutMs?: number;
  /** Pre-built axios instance (tests) */
  http?: AxiosInstance;
}

export class NbaStatsApiClient {
  private readonly client: AxiosInstance;

  constructor(options: NbaStatsApiClientOptions) {
    this.client =
      options.http ??
      axios.create({
        baseURL: options.baseURL,
        timeout: options.timeoutMs ?? 30000,
        headers: BROWSER_HEADERS,
      });
  }

  /**
   * Fetch a named result set from an endpoint.
   * Every failure, including a payload that does not validate, is rethrown
   * as a classified StatsFetchError.
   */
  async fetchResultSet(
    endpoint: string,
    params: Record<string, string | number>,
    resultSetName: string,
    timeoutMs?: number
  ): Promise<NbaResultSet> {
    try {
      const response = await this.client.get<unknown>(`/${endpoint}`, {
        params,
        ...(timeoutMs !== undefined ? { timeout: Math.round(timeoutMs) } : {}),
      });
      const parsed = statsResponseSchema.parse(response.data);
      const resultSet = parsed.resultSets.find((set) => set.name === resultSetName);
      if (!resultSet) {
        throw new Error(
          `Result set ${resultSetName} missing (got: ${parsed.resultSets.map((s) => s.name).join(', ') || 'none'})`
        );
      }
      return resultSet;
    } catch (error) {
      throw StatsFetchError.fromError(NBA_STATS_API_NAME, endpoint, error);
    }
  }

  /**
   * All players the league has on record.
   * @param season - Season label the endpoint requires (e.g. "2024-25")
   */
  async fetchCommonAllPlayers(season: string): Promise<NbaResultSet> {
    return this.fetchResultSet(
      'commonallplayers',
      { LeagueID: '00', Season: season, IsOnlyCurrentSeason: 0 },
      'CommonAllPlayers'
    );
  }

  /**
   * Season-by-season regular season totals for one player
   */
  async fetchPlayerCareerStats(playerId: number, timeoutMs: number): Promise<NbaResultSet> {
    return this.fetchResultSet(
      'playercareerstats',
      { PlayerID: playerId, PerMode: 'Totals', LeagueID: '00' },
      'SeasonTotalsRegularSeason',
      timeoutMs
    );
  }
}
