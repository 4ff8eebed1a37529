/**
 * Performance tracking for slow browser probes and database queries
 */

import { logger } from './logger';
import { toError } from './errors';

// Default warning threshold for a tracked operation
const THRESHOLD_WARNING_MS = 500;

function describeArg(arg: unknown): string {
  if (typeof arg === 'object' && arg !== null) {
    const json = JSON.stringify(arg) ?? '';
    return json.length > 200 ? `${json.substring(0, 200)}...` : json;
  }
  return String(arg);
}

/**
 * Create a performance monitoring wrapper for any async function
 */
export function trackPerformance<A extends unknown[], R>(
  name: string,
  fn: (...args: A) => Promise<R>,
  thresholdMs: number = THRESHOLD_WARNING_MS
): (...args: A) => Promise<R> {
  return async (...args: A): Promise<R> => {
    const startTime = Date.now();
    try {
      const result = await fn(...args);
      const duration = Date.now() - startTime;

      if (duration > thresholdMs) {
        logger.warning(`Slow operation: ${name} took ${duration}ms`, {
          module: 'performance',
          context: {
            operation: name,
            duration,
            args: args.map(describeArg)
          }
        });
      }

      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      logger.error(`Failed operation: ${name} failed after ${duration}ms`, {
        module: 'performance',
        context: { operation: name, duration },
        error: toError(error)
      });
      throw error;
    }
  };
}
