import { RawCareerRow, RosterPlayer } from './stats-provider.types';

/**
 * Career stats provider interface
 *
 * Implementations must reject with a StatsFetchError so callers can branch
 * on its kind without knowing the transport.
 */
export interface ICareerStatsProvider {
  /** Provider identifier (e.g., 'nba-stats') */
  readonly providerId: string;

  /**
   * Fetch every known player, current and historical, in upstream order
   */
  fetchRoster(): Promise<RosterPlayer[]>;

  /**
   * Fetch regular-season career rows for one player
   * @param timeoutMs - Per-request timeout
   * @returns Positional rows; empty when the player has no stats
   */
  fetchCareerRows(playerId: number, timeoutMs: number): Promise<RawCareerRow[]>;
}
