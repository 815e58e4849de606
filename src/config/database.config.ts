import { PoolConfig } from 'pg';
import { env } from './env.config';
import { logger } from './logger.config';

export function getDatabaseConfig(): PoolConfig {
  const config: PoolConfig = {
    connectionString: env.DATABASE_URL,
    application_name: 'nba-career-collector',
    // The collector is a single sequential loop; a couple of connections is plenty
    max: env.DB_POOL_SIZE,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000, // 5s to acquire connection from pool
    statement_timeout: 30000,
  };

  if (env.NODE_ENV === 'production') {
    const rejectUnauthorized = process.env.DATABASE_SSL_REJECT_UNAUTHORIZED === 'true';
    config.ssl = { rejectUnauthorized };

    if (!rejectUnauthorized) {
      logger.warn(
        '[SECURITY] Database SSL certificate validation is disabled. ' +
          'Set DATABASE_SSL_REJECT_UNAUTHORIZED=true to enable it.'
      );
    }
  }

  return config;
}
