import type { Env } from './env.config';

export interface RandomRange {
  readonly min: number;
  readonly max: number;
}

/**
 * Pacing and retry policy for one collection run.
 * Built once at startup and never mutated.
 */
export interface CollectorPolicy {
  /** Retries after the first attempt for timeout/connection failures */
  readonly maxRetries: number;
  readonly initialTimeoutMs: number;
  readonly backoffFactor: number;
  /** Multiplier applied to each request timeout */
  readonly timeoutJitter: RandomRange;
  /** Seconds; scaled by backoff for retry waits, used as-is between players */
  readonly delayJitterSeconds: RandomRange;
  /** Fetched players between cooldowns */
  readonly batchSize: number;
  readonly cooldownSeconds: number;
}

export const DEFAULT_COLLECTOR_POLICY: CollectorPolicy = Object.freeze({
  maxRetries: 3,
  initialTimeoutMs: 20000,
  backoffFactor: 2,
  timeoutJitter: Object.freeze({ min: 0.9, max: 1.1 }),
  delayJitterSeconds: Object.freeze({ min: 0.6, max: 1.5 }),
  batchSize: 500,
  cooldownSeconds: 60,
});

export function createCollectorPolicy(overrides: Partial<CollectorPolicy> = {}): CollectorPolicy {
  return Object.freeze({ ...DEFAULT_COLLECTOR_POLICY, ...overrides });
}

export function collectorPolicyFromEnv(
  source: Pick<
    Env,
    | 'COLLECTOR_MAX_RETRIES'
    | 'COLLECTOR_INITIAL_TIMEOUT_MS'
    | 'COLLECTOR_BACKOFF_FACTOR'
    | 'COLLECTOR_BATCH_SIZE'
    | 'COLLECTOR_COOLDOWN_SECONDS'
  >
): CollectorPolicy {
  return createCollectorPolicy({
    maxRetries: source.COLLECTOR_MAX_RETRIES,
    initialTimeoutMs: source.COLLECTOR_INITIAL_TIMEOUT_MS,
    backoffFactor: source.COLLECTOR_BACKOFF_FACTOR,
    batchSize: source.COLLECTOR_BATCH_SIZE,
    cooldownSeconds: source.COLLECTOR_COOLDOWN_SECONDS,
  });
}
