import { FetchErrorKind, RawCareerRow } from '../../integrations/shared/stats-provider.types';
import { StatsFetchError } from '../../integrations/shared/stats-fetch-error';
import { SleepFn } from '../../shared/utils/time-utils';

/**
 * Terminal state of fetching one player's career rows
 */
export type FetchOutcome =
  | { status: 'success'; rows: RawCareerRow[]; attempts: number }
  | { status: 'empty'; attempts: number }
  | {
      status: 'failed';
      kind: FetchErrorKind;
      error: StatsFetchError;
      /** Line written to the error log */
      message: string;
      attempts: number;
    };

/** Uniform random source in [0, 1) */
export type RandomFn = () => number;

/** Millisecond clock */
export type NowFn = () => number;

/**
 * Side-effect seams of the loop. Production uses real timers and Math.random.
 */
export interface PacingDeps {
  sleep: SleepFn;
  random: RandomFn;
  now: NowFn;
}

export interface CollectionSummary {
  /** Players on the roster */
  total: number;
  /** Skipped because rows were already stored */
  alreadyCollected: number;
  /** Fetched with rows and written */
  stored: number;
  /** Fetched successfully with no stats */
  empty: number;
  /** Recorded in the skipped log */
  failed: number;
  rowsSaved: number;
  rowsRejected: number;
  cooldowns: number;
  durationMs: number;
}
