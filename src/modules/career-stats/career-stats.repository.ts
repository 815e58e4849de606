import { Pool } from 'pg';
import {
  CareerStatRow,
  PLAYER_STATS_COLUMNS,
  careerStatFromRaw,
  careerStatToValues,
} from './career-stats.model';
import { RawCareerRow } from '../../integrations/shared/stats-provider.types';
import { runInTransaction } from '../../shared/transaction-runner';
import { withDbErrorHandling } from '../../utils/db-error-handler';
import { logger } from '../../config/logger.config';

export interface SaveResult {
  /** Rows upserted (after collapsing duplicate seasons) */
  saved: number;
  /** Rows dropped for failing validation */
  rejected: number;
}

const KEY_COLUMNS: ReadonlySet<string> = new Set(['player_id', 'season_id']);

const UPSERT_ASSIGNMENTS = PLAYER_STATS_COLUMNS.filter((col) => !KEY_COLUMNS.has(col))
  .map((col) => `${col} = EXCLUDED.${col}`)
  .join(',\n          ');

export class CareerStatsRepository {
  constructor(private readonly db: Pool) {}

  /**
   * True when any row exists for the player. Used as the resume gate, so a
   * player with partial data from an interrupted run counts as collected.
   */
  async hasStatsForPlayer(playerId: number): Promise<boolean> {
    return withDbErrorHandling('hasStatsForPlayer', async () => {
      const result = await this.db.query('SELECT 1 FROM player_stats WHERE player_id = $1 LIMIT 1', [
        playerId,
      ]);
      return result.rows.length > 0;
    });
  }

  async countCollectedPlayers(): Promise<number> {
    return withDbErrorHandling('countCollectedPlayers', async () => {
      const result = await this.db.query<{ cnt: string }>(
        'SELECT COUNT(DISTINCT player_id) AS cnt FROM player_stats'
      );
      return result.rows.length > 0 ? parseInt(result.rows[0].cnt, 10) : 0;
    });
  }

  /**
   * Validate, map and upsert one player's career rows in a single transaction.
   * Invalid rows are dropped individually; the rest still commit.
   * When several rows share a season the last one wins, matching what
   * sequential replace-on-conflict writes would leave behind.
   */
  async savePlayerRows(
    playerId: number,
    playerName: string,
    rawRows: readonly RawCareerRow[]
  ): Promise<SaveResult> {
    const bySeason = new Map<string, CareerStatRow>();
    let rejected = 0;

    for (const raw of rawRows) {
      const mapped = careerStatFromRaw(playerId, playerName, raw);
      if (!mapped.ok) {
        rejected++;
        logger.warn(`${mapped.reason} for player ${playerId}`, { playerId, playerName });
        continue;
      }
      bySeason.set(mapped.row.seasonId, mapped.row);
    }

    const rows = [...bySeason.values()];
    if (rows.length === 0) {
      return { saved: 0, rejected };
    }

    await withDbErrorHandling('savePlayerRows', () =>
      runInTransaction(this.db, async (client) => {
        const width = PLAYER_STATS_COLUMNS.length;
        const values: Array<string | number | null> = [];
        const placeholders = rows
          .map((row, idx) => {
            values.push(...careerStatToValues(row));
            const base = idx * width;
            return `(${PLAYER_STATS_COLUMNS.map((_, col) => `$${base + col + 1}`).join(', ')})`;
          })
          .join(', ');

        await client.query(
          `INSERT INTO player_stats (${PLAYER_STATS_COLUMNS.join(', ')})
        VALUES ${placeholders}
        ON CONFLICT (player_id, season_id) DO UPDATE SET
          ${UPSERT_ASSIGNMENTS}`,
          values
        );
      })
    );

    return { saved: rows.length, rejected };
  }
}
