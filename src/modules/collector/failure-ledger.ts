import fs from 'fs';

/**
 * Append-only audit trail of failed players. Never read back by the collector.
 */
export interface FailureLedger {
  recordError(subjectId: number | string, subjectName: string, message: string): Promise<void>;
  recordSkipped(playerId: number, playerName: string): Promise<void>;
}

export interface FailureLedgerPaths {
  errorLogPath: string;
  skippedLogPath: string;
}

/** Quote a CSV field only when it needs it */
function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Writes the error log (`[timestamp] id - name: message`) and the skipped
 * log (`id,name`) as plain text files.
 */
export class FileFailureLedger implements FailureLedger {
  constructor(
    private readonly paths: FailureLedgerPaths,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async recordError(subjectId: number | string, subjectName: string, message: string): Promise<void> {
    const line = `[${this.clock().toISOString()}] ${subjectId} - ${subjectName}: ${message}\n`;
    await fs.promises.appendFile(this.paths.errorLogPath, line, 'utf8');
  }

  async recordSkipped(playerId: number, playerName: string): Promise<void> {
    await fs.promises.appendFile(
      this.paths.skippedLogPath,
      `${playerId},${csvField(playerName)}\n`,
      'utf8'
    );
  }
}
