import { RawCareerRow } from '../../integrations/shared/stats-provider.types';
import { cellToInt, cellToNumber, cellToText } from '../../utils/parsing.utils';

/** Columns a raw SeasonTotalsRegularSeason row must carry */
export const CAREER_ROW_WIDTH = 27;

/**
 * Upstream column positions. PLAYER_ID (0) is ignored in favour of the id
 * the row was requested for; PLAYER_AGE (5) is not stored.
 */
const COL = {
  SEASON_ID: 1,
  LEAGUE_ID: 2,
  TEAM_ID: 3,
  TEAM_ABBREVIATION: 4,
  GP: 6,
  GS: 7,
  MIN: 8,
  FGM: 9,
  FGA: 10,
  FG_PCT: 11,
  FG3M: 12,
  FG3A: 13,
  FG3_PCT: 14,
  FTM: 15,
  FTA: 16,
  FT_PCT: 17,
  OREB: 18,
  DREB: 19,
  REB: 20,
  AST: 21,
  STL: 22,
  BLK: 23,
  TOV: 24,
  PF: 25,
  PTS: 26,
} as const;

/**
 * One player-season line, keyed by (playerId, seasonId)
 */
export interface CareerStatRow {
  playerId: number;
  playerName: string;
  seasonId: string;
  teamId: number | null;
  teamAbbreviation: string | null;
  leagueId: string | null;
  gamesPlayed: number | null;
  gamesStarted: number | null;
  /** Text on purpose: older seasons report fractional or formatted minutes */
  minutes: string | null;
  fgm: number | null;
  fga: number | null;
  fgPct: number | null;
  fg3m: number | null;
  fg3a: number | null;
  fg3Pct: number | null;
  ftm: number | null;
  fta: number | null;
  ftPct: number | null;
  oreb: number | null;
  dreb: number | null;
  reb: number | null;
  ast: number | null;
  stl: number | null;
  blk: number | null;
  tov: number | null;
  pf: number | null;
  pts: number | null;
}

/** player_stats column order; upsert values are built in this order */
export const PLAYER_STATS_COLUMNS = [
  'player_id',
  'player_name',
  'season_id',
  'team_id',
  'team_abbreviation',
  'league_id',
  'gp',
  'gs',
  'min',
  'fgm',
  'fga',
  'fg_pct',
  'fg3m',
  'fg3a',
  'fg3_pct',
  'ftm',
  'fta',
  'ft_pct',
  'oreb',
  'dreb',
  'reb',
  'ast',
  'stl',
  'blk',
  'tov',
  'pf',
  'pts',
] as const;

export type CareerStatRowMapping =
  | { ok: true; row: CareerStatRow }
  | { ok: false; reason: string };

/**
 * Map a positional upstream row to a CareerStatRow.
 * Rows of the wrong width, or without a season, are rejected.
 */
export function careerStatFromRaw(
  playerId: number,
  playerName: string,
  raw: RawCareerRow
): CareerStatRowMapping {
  if (raw.length !== CAREER_ROW_WIDTH) {
    return { ok: false, reason: `Unexpected row length ${raw.length}` };
  }

  const seasonId = cellToText(raw[COL.SEASON_ID]);
  if (!seasonId) {
    return { ok: false, reason: 'Missing season id' };
  }

  return {
    ok: true,
    row: {
      playerId,
      playerName,
      seasonId,
      teamId: cellToInt(raw[COL.TEAM_ID]),
      teamAbbreviation: cellToText(raw[COL.TEAM_ABBREVIATION]),
      leagueId: cellToText(raw[COL.LEAGUE_ID]),
      gamesPlayed: cellToInt(raw[COL.GP]),
      gamesStarted: cellToInt(raw[COL.GS]),
      minutes: cellToText(raw[COL.MIN]),
      fgm: cellToInt(raw[COL.FGM]),
      fga: cellToInt(raw[COL.FGA]),
      fgPct: cellToNumber(raw[COL.FG_PCT]),
      fg3m: cellToInt(raw[COL.FG3M]),
      fg3a: cellToInt(raw[COL.FG3A]),
      fg3Pct: cellToNumber(raw[COL.FG3_PCT]),
      ftm: cellToInt(raw[COL.FTM]),
      fta: cellToInt(raw[COL.FTA]),
      ftPct: cellToNumber(raw[COL.FT_PCT]),
      oreb: cellToInt(raw[COL.OREB]),
      dreb: cellToInt(raw[COL.DREB]),
      reb: cellToInt(raw[COL.REB]),
      ast: cellToInt(raw[COL.AST]),
      stl: cellToInt(raw[COL.STL]),
      blk: cellToInt(raw[COL.BLK]),
      tov: cellToInt(raw[COL.TOV]),
      pf: cellToInt(raw[COL.PF]),
      pts: cellToInt(raw[COL.PTS]),
    },
  };
}

/**
 * Values in PLAYER_STATS_COLUMNS order
 */
export function careerStatToValues(row: CareerStatRow): Array<string | number | null> {
  return [
    row.playerId,
    row.playerName,
    row.seasonId,
    row.teamId,
    row.teamAbbreviation,
    row.leagueId,
    row.gamesPlayed,
    row.gamesStarted,
    row.minutes,
    row.fgm,
    row.fga,
    row.fgPct,
    row.fg3m,
    row.fg3a,
    row.fg3Pct,
    row.ftm,
    row.fta,
    row.ftPct,
    row.oreb,
    row.dreb,
    row.reb,
    row.ast,
    row.stl,
    row.blk,
    row.tov,
    row.pf,
    row.pts,
  ];
}
