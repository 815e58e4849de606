/**
 * Parsing helpers for upstream table cells.
 *
 * The stats API mixes numbers, numeric strings and nulls in the same column
 * depending on the era, so every column is coerced on the way in.
 */

import { RawCell } from '../integrations/shared/stats-provider.types';

/**
 * Coerce a cell to a finite number.
 *
 * @example
 * cellToNumber(12)      // 12
 * cellToNumber('0.455') // 0.455
 * cellToNumber(null)    // null
 * cellToNumber('N/A')   // null
 */
export function cellToNumber(cell: RawCell | undefined): number | null {
  if (cell === null || cell === undefined) return null;
  if (typeof cell === 'number') return Number.isFinite(cell) ? cell : null;

  const trimmed = cell.trim();
  if (trimmed === '') return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Coerce a cell to an integer, rounding away float noise (e.g. 82.0).
 */
export function cellToInt(cell: RawCell | undefined): number | null {
  const value = cellToNumber(cell);
  return value === null ? null : Math.round(value);
}

/**
 * Coerce a cell to text. Numbers keep their JS string form, so minutes like
 * 2345 or 35.5 survive unchanged.
 */
export function cellToText(cell: RawCell | undefined): string | null {
  if (cell === null || cell === undefined) return null;
  return typeof cell === 'number' ? String(cell) : cell;
}
