/**
 * Provider-agnostic DTOs for career stats ingestion.
 * The collector only ever sees these shapes, never a provider's payload.
 */

/** Roster entry: one player known to the upstream source */
export interface RosterPlayer {
  id: number;
  fullName: string;
}

/** A single cell of an upstream tabular result */
export type RawCell = string | number | null;

/**
 * One season line exactly as the upstream lists it, positional.
 * Width is checked by the persistence layer, not here.
 */
export type RawCareerRow = readonly RawCell[];

/**
 * Closed set of fetch failure classes.
 * - timeout / connection: transient, worth retrying
 * - http: upstream answered with a non-2xx status
 * - unexpected: anything else (malformed payload, programming error)
 */
export type FetchErrorKind = 'timeout' | 'connection' | 'http' | 'unexpected';

