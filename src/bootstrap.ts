// Ensure env is loaded before accessing process.env
import { env } from './config/env.config';

import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { container, KEYS } from './container';
import { pool, checkDatabaseHealth } from './db/pool';
import { runMigrations } from './db/migrate';
import { logger } from './config/logger.config';
import { collectorPolicyFromEnv } from './config/collector.config';
import { CareerStatsProviderFactory } from './integrations/provider-factory';
import { CareerStatsRepository } from './modules/career-stats/career-stats.repository';
import { FileFailureLedger } from './modules/collector/failure-ledger';
import { CareerStatsCollector } from './modules/collector/collector.service';
import { SetupException } from './utils/exceptions';

export const dataPaths = {
  dataDir: env.DATA_DIR,
  errorLogPath: path.join(env.DATA_DIR, env.ERROR_LOG_FILE),
  skippedLogPath: path.join(env.DATA_DIR, env.SKIPPED_LOG_FILE),
};

// Database
container.register(KEYS.POOL, () => pool);

// Repositories
container.register(
  KEYS.CAREER_STATS_REPO,
  () => new CareerStatsRepository(container.resolve(KEYS.POOL))
);

// External providers
container.register(KEYS.STATS_PROVIDER, () =>
  CareerStatsProviderFactory.createProvider('nba-stats', {
    baseURL: env.NBA_STATS_BASE_URL,
    rosterSeason: env.ROSTER_SEASON,
  })
);

// Collector
container.register(
  KEYS.FAILURE_LEDGER,
  () =>
    new FileFailureLedger({
      errorLogPath: dataPaths.errorLogPath,
      skippedLogPath: dataPaths.skippedLogPath,
    })
);

container.register(
  KEYS.COLLECTOR,
  () =>
    new CareerStatsCollector({
      provider: container.resolve(KEYS.STATS_PROVIDER),
      store: container.resolve(KEYS.CAREER_STATS_REPO),
      ledger: container.resolve(KEYS.FAILURE_LEDGER),
      policy: collectorPolicyFromEnv(env),
    })
);

/**
 * Create the data directory if it is missing.
 * @throws SetupException when it cannot be created
 */
export async function ensureDataDirectory(dataDir: string): Promise<void> {
  try {
    if (!fs.existsSync(dataDir)) {
      logger.info(`Data folder '${dataDir}' missing, creating it`);
    }
    await fs.promises.mkdir(dataDir, { recursive: true });
    logger.info('Data folder check passed', { dataDir });
  } catch (error) {
    throw SetupException.fromError(`Failed to create data folder '${dataDir}'`, error);
  }
}

/**
 * Verify the connection and bring the schema up to date.
 * @throws SetupException when the database is unreachable or a migration fails
 */
export async function prepareDatabase(db: Pool): Promise<void> {
  if (!(await checkDatabaseHealth(db))) {
    throw new SetupException('Could not connect to database');
  }
  logger.info('Database connection established');

  try {
    await runMigrations(db);
  } catch (error) {
    throw SetupException.fromError('Failed to apply migrations', error);
  }
}
