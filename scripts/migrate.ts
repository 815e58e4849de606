/**
 * Apply pending SQL migrations from migrations/
 * Usage: npm run db:migrate
 */
import { pool, closePool } from '../src/db/pool';
import { runMigrations } from '../src/db/migrate';
import { logger } from '../src/config/logger.config';

async function main() {
  try {
    const applied = await runMigrations(pool);
    logger.info(applied.length > 0 ? `Applied: ${applied.join(', ')}` : 'Schema already up to date');
  } catch (error) {
    logger.error('Migration process failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

main().catch((error) => {
  console.error('❌ Migration script crashed:', error);
  process.exit(1);
});
