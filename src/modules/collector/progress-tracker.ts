import { CollectorPolicy } from '../../config/collector.config';
import { formatMinutesSeconds } from '../../shared/utils/time-utils';

export interface ProgressSnapshot {
  completed: number;
  total: number;
  percent: number;
  etaSeconds: number;
}

/**
 * Running average of per-player time plus the cooldowns still ahead.
 * All state lives here and is fed explicitly by the loop.
 */
export class ProgressTracker {
  private elapsedMs = 0;
  private timedPlayers = 0;
  private cooldownsTaken = 0;

  constructor(
    private readonly total: number,
    private readonly policy: Pick<CollectorPolicy, 'batchSize' | 'cooldownSeconds'>
  ) {}

  recordPlayer(durationMs: number): void {
    this.elapsedMs += durationMs;
    this.timedPlayers++;
  }

  recordCooldown(): void {
    this.cooldownsTaken++;
  }

  get averageMs(): number {
    return this.timedPlayers > 0 ? this.elapsedMs / this.timedPlayers : 0;
  }

  /**
   * Cooldowns the run will still take if every remaining player is fetched.
   * One falls after each full batch except when the batch ends the run.
   */
  cooldownsOwed(fetched: number, remaining: number): number {
    const expectedFetches = fetched + remaining;
    if (expectedFetches === 0) return 0;
    const expectedCooldowns = Math.floor((expectedFetches - 1) / this.policy.batchSize);
    return Math.max(0, expectedCooldowns - this.cooldownsTaken);
  }

  /**
   * @param position - 1-based roster position just finished
   * @param fetched - Players fetched so far this run
   */
  snapshot(position: number, fetched: number): ProgressSnapshot {
    const remaining = Math.max(0, this.total - position);
    const etaSeconds =
      (this.averageMs / 1000) * remaining +
      this.cooldownsOwed(fetched, remaining) * this.policy.cooldownSeconds;

    return {
      completed: position,
      total: this.total,
      percent: this.total > 0 ? (position / this.total) * 100 : 100,
      etaSeconds,
    };
  }
}

export function formatProgress(snapshot: ProgressSnapshot): string {
  return (
    `${snapshot.completed}/${snapshot.total} players completed ` +
    `(${snapshot.percent.toFixed(2)}%) | ETA: ${formatMinutesSeconds(snapshot.etaSeconds)}`
  );
}
