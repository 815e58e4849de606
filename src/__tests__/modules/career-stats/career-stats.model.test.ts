import {
  CAREER_ROW_WIDTH,
  PLAYER_STATS_COLUMNS,
  careerStatFromRaw,
  careerStatToValues,
} from '../../../modules/career-stats/career-stats.model';
import { cellToInt, cellToNumber, cellToText } from '../../../utils/parsing.utils';
import { makeRawRow } from '../../fixtures/career-rows';

describe('careerStatFromRaw', () => {
  it('maps every positional column to its named field', () => {
    const result = careerStatFromRaw(7, 'Test Player', makeRawRow(999, '2015-16'));

    expect(result).toEqual({
      ok: true,
      row: {
        playerId: 7,
        playerName: 'Test Player',
        seasonId: '2015-16',
        teamId: 1610612700,
        teamAbbreviation: 'TST',
        leagueId: '00',
        gamesPlayed: 70,
        gamesStarted: 60,
        minutes: '2100',
        fgm: 400,
        fga: 850,
        fgPct: 0.471,
        fg3m: 50,
        fg3a: 140,
        fg3Pct: 0.357,
        ftm: 180,
        fta: 220,
        ftPct: 0.818,
        oreb: 60,
        dreb: 250,
        reb: 310,
        ast: 280,
        stl: 90,
        blk: 25,
        tov: 150,
        pf: 170,
        pts: 1030,
      },
    });
  });

  it('rejects rows narrower or wider than 27 columns', () => {
    const row = makeRawRow(7, '2015-16');

    expect(careerStatFromRaw(7, 'P', row.slice(0, 26))).toEqual({
      ok: false,
      reason: 'Unexpected row length 26',
    });
    expect(careerStatFromRaw(7, 'P', [...row, 0])).toEqual({
      ok: false,
      reason: 'Unexpected row length 28',
    });
  });

  it('rejects a row without a season id', () => {
    const row = [...makeRawRow(7, '2015-16')];
    row[1] = null;

    expect(careerStatFromRaw(7, 'P', row)).toEqual({ ok: false, reason: 'Missing season id' });
  });

  it('keeps missing stats of early seasons as null and minutes as text', () => {
    const row = [...makeRawRow(7, '1960-61', { min: 35.5 })];
    row[7] = null; // GS
    row[18] = null; // OREB

    const result = careerStatFromRaw(7, 'P', row);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.row.gamesStarted).toBeNull();
      expect(result.row.oreb).toBeNull();
      expect(result.row.minutes).toBe('35.5');
    }
  });

  it('produces values in column order', () => {
    const result = careerStatFromRaw(7, 'P', makeRawRow(7, '2015-16'));
    if (!result.ok) throw new Error('expected a mapped row');

    const values = careerStatToValues(result.row);

    expect(values).toHaveLength(PLAYER_STATS_COLUMNS.length);
    expect(PLAYER_STATS_COLUMNS).toHaveLength(CAREER_ROW_WIDTH);
    expect(values.slice(0, 3)).toEqual([7, 'P', '2015-16']);
    expect(values[PLAYER_STATS_COLUMNS.indexOf('pts')]).toBe(1030);
  });
});

describe('cell parsing', () => {
  it('coerces numbers and numeric strings', () => {
    expect(cellToNumber(0.5)).toBe(0.5);
    expect(cellToNumber(' 12 ')).toBe(12);
    expect(cellToNumber('')).toBeNull();
    expect(cellToNumber('N/A')).toBeNull();
    expect(cellToNumber(null)).toBeNull();
    expect(cellToNumber(undefined)).toBeNull();
  });

  it('rounds integers', () => {
    expect(cellToInt(82.0)).toBe(82);
    expect(cellToInt('81.9999')).toBe(82);
  });

  it('keeps text as is', () => {
    expect(cellToText('TOT')).toBe('TOT');
    expect(cellToText(2345)).toBe('2345');
    expect(cellToText(null)).toBeNull();
  });
});
