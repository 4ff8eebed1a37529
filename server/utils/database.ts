/**
 * Database utility functions for the reference store
 *
 * Query execution with standardized error handling, slow-query tracking and a
 * connectivity check used before a comparison run starts.
 */

import { sql } from 'drizzle-orm';
import type { Database } from '../../db';
import { DatabaseError, ErrorContext, toError } from './errors';
import { logger } from './logger';
import { trackPerformance } from './performance';

// Database calls are expected to be quicker than browser probes
const QUERY_THRESHOLD_MS = 200;

/**
 * Execute a query with standardized error handling and performance tracking
 */
export async function executeQuery<T>(
  queryName: string,
  queryFn: () => Promise<T>,
  context: ErrorContext = {}
): Promise<T> {
  try {
    const trackedQueryFn = trackPerformance(`DB:${queryName}`, queryFn, QUERY_THRESHOLD_MS);
    return await trackedQueryFn();
  } catch (error) {
    logger.error(`Database query '${queryName}' failed`, {
      module: 'database',
      context,
      error: toError(error)
    });

    throw DatabaseError.fromPgError(error, {
      queryName,
      ...context
    });
  }
}

/**
 * Check that the database answers a trivial query
 */
export async function checkDatabaseHealth(db: Database): Promise<boolean> {
  try {
    await executeQuery('healthCheck', () => db.execute(sql`SELECT 1`));
    return true;
  } catch (error) {
    logger.warning('Database health check failed', {
      module: 'database',
      error: toError(error)
    });
    return false;
  }
}
