import { createCollectorPolicy } from '../../../config/collector.config';
import {
  politeDelayMs,
  randomBetween,
  requestTimeoutMs,
  retryWaitMs,
} from '../../../modules/collector/pacing';

describe('pacing', () => {
  const policy = createCollectorPolicy();

  it('maps the random source onto the range', () => {
    expect(randomBetween({ min: 2, max: 4 }, () => 0)).toBe(2);
    expect(randomBetween({ min: 2, max: 4 }, () => 0.5)).toBe(3);
  });

  it('grows the request timeout by the backoff factor per attempt', () => {
    expect(requestTimeoutMs(policy, 0, () => 0.5)).toBe(20000);
    expect(requestTimeoutMs(policy, 3, () => 0.5)).toBe(160000);
  });

  it('keeps the timeout within the jitter band', () => {
    expect(requestTimeoutMs(policy, 0, () => 0)).toBe(18000);
    expect(requestTimeoutMs(policy, 1, () => 0)).toBe(36000);
  });

  it('scales the retry wait by backoff^retry', () => {
    expect(retryWaitMs(policy, 1, () => 0)).toBe(1200);
    expect(retryWaitMs(policy, 3, () => 0)).toBe(4800);
    expect(retryWaitMs(policy, 2, () => 0.5)).toBe(4200);
  });

  it('uses the unscaled delay range between players', () => {
    expect(politeDelayMs(policy, () => 0)).toBe(600);
    expect(politeDelayMs(policy, () => 0.5)).toBe(1050);
  });
});
