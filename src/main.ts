import { logger } from './config/logger.config';
import { container, KEYS } from './container';
import { dataPaths, ensureDataDirectory, prepareDatabase } from './bootstrap';
import { closePool, pool } from './db/pool';
import { formatMinutesSeconds } from './shared/utils/time-utils';
import { SetupException } from './utils/exceptions';

async function main(): Promise<void> {
  logger.info('Starting NBA career stats collection...');

  await ensureDataDirectory(dataPaths.dataDir);
  await prepareDatabase(pool);

  const collector = container.resolve(KEYS.COLLECTOR);
  const summary = await collector.collectAll();

  const repo = container.resolve(KEYS.CAREER_STATS_REPO);
  const playersInDb = await repo.countCollectedPlayers();

  logger.info(
    `Finished collecting NBA data: ${summary.stored} stored, ${summary.empty} empty, ` +
      `${summary.failed} skipped, ${summary.alreadyCollected} already collected ` +
      `in ${formatMinutesSeconds(summary.durationMs / 1000)}`,
    { playersInDb }
  );
}

async function recordFatalError(error: unknown): Promise<void> {
  const ledger = container.resolve(KEYS.FAILURE_LEDGER);
  const message = error instanceof Error ? (error.stack ?? error.message) : String(error);
  try {
    await ledger.recordError('MAIN', 'SCRIPT_STARTUP', message);
  } catch (ledgerError) {
    logger.error('Could not write to the error log', {
      error: ledgerError instanceof Error ? ledgerError.message : String(ledgerError),
    });
  }
}

let isShuttingDown = false;
const shutdown = async (exitCode: number) => {
  if (isShuttingDown) return;
  isShuttingDown = true;
  try {
    await closePool();
  } catch (error) {
    logger.error('Failed to close database pool', { error: String(error) });
  }
  process.exit(exitCode);
};

process.on('SIGINT', () => {
  logger.info('Interrupted, shutting down...');
  void shutdown(130);
});
process.on('SIGTERM', () => {
  logger.info('Terminated, shutting down...');
  void shutdown(143);
});

main()
  .then(() => shutdown(0))
  .catch(async (error: unknown) => {
    if (error instanceof SetupException) {
      logger.error(`Setup failed: ${error.message}`);
    } else {
      await recordFatalError(error);
      logger.error(`Fatal error, see the error log (${dataPaths.errorLogPath}) for details`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    await shutdown(1);
  });
