import { z } from 'zod';
import dotenv from 'dotenv';
import { ValidationException } from '../utils/exceptions';

// Load environment variables
dotenv.config();

const intFromString = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => Number(val))
    .pipe(z.number().int().positive());

export const envSchema = z.object({
  // Database
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DB_POOL_SIZE: intFromString('2'),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Data directory and append-only logs (file names are relative to DATA_DIR)
  DATA_DIR: z.string().min(1).default('./data'),
  ERROR_LOG_FILE: z.string().min(1).default('error_log.txt'),
  SKIPPED_LOG_FILE: z.string().min(1).default('skipped_players.txt'),

  // Upstream stats API
  NBA_STATS_BASE_URL: z.string().url().default('https://stats.nba.com/stats'),
  ROSTER_SEASON: z
    .string()
    .regex(/^\d{4}-\d{2}$/, 'ROSTER_SEASON must look like 2024-25')
    .default('2024-25'),

  // Collector pacing
  COLLECTOR_MAX_RETRIES: z
    .string()
    .default('3')
    .transform((val) => Number(val))
    .pipe(z.number().int().nonnegative()),
  COLLECTOR_INITIAL_TIMEOUT_MS: intFromString('20000'),
  COLLECTOR_BACKOFF_FACTOR: z
    .string()
    .default('2')
    .transform((val) => Number(val))
    .pipe(z.number().min(1)),
  COLLECTOR_BATCH_SIZE: intFromString('500'),
  COLLECTOR_COOLDOWN_SECONDS: z
    .string()
    .default('60')
    .transform((val) => Number(val))
    .pipe(z.number().nonnegative()),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((issue) => {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      });
      throw new ValidationException('Invalid environment configuration');
    }
    throw error;
  }
}

// Export validated environment variables
export const env = parseEnv(process.env);
