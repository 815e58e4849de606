import { logger } from '../config/logger.config';
import { AppException, DatabaseException } from './exceptions';

/**
 * Wraps a database operation and converts raw database errors to DatabaseException.
 * Logs the original error before rethrowing.
 *
 * @param operation - Description of the operation for logging
 * @param fn - The async function to execute
 * @throws DatabaseException if the operation fails
 */
export async function withDbErrorHandling<T>(
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    // Already classified further down; pass through untouched
    if (error instanceof AppException) {
      throw error;
    }

    logger.error(`Database error during ${operation}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    throw DatabaseException.fromError(error, operation);
  }
}
