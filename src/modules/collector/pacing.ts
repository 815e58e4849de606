import { CollectorPolicy, RandomRange } from '../../config/collector.config';
import { RandomFn } from './collector.model';

export function randomBetween(range: RandomRange, random: RandomFn): number {
  return range.min + (range.max - range.min) * random();
}

/**
 * Timeout for a request attempt (0-based):
 * initialTimeout × backoff^attempt × U(timeoutJitter)
 */
export function requestTimeoutMs(policy: CollectorPolicy, attempt: number, random: RandomFn): number {
  return (
    policy.initialTimeoutMs *
    Math.pow(policy.backoffFactor, attempt) *
    randomBetween(policy.timeoutJitter, random)
  );
}

/**
 * Wait before retry number `retry` (1-based): U(delayJitter) × backoff^retry seconds
 */
export function retryWaitMs(policy: CollectorPolicy, retry: number, random: RandomFn): number {
  return randomBetween(policy.delayJitterSeconds, random) * Math.pow(policy.backoffFactor, retry) * 1000;
}

/** Pause between players */
export function politeDelayMs(policy: CollectorPolicy, random: RandomFn): number {
  return randomBetween(policy.delayJitterSeconds, random) * 1000;
}
