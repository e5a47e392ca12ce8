/**
 * Database health checker
 *
 * Round-trips `SELECT 1` through the pool. Without the database no short URL
 * can be created or resolved.
 */

import { sql, type Kysely } from 'kysely';

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

const DEFAULT_TIMEOUT_MS = 3000;

export interface DbHealthCheckerOptions {
  /** Name reported in the readiness response */
  name: string;
  /** Defaults to 3000 */
  timeoutMs?: number;
}

/**
 * Settles with `promise`, or rejects with `message` once `timeoutMs` elapses.
 */
const withTimeout = async <T>(promise: Promise<T>, timeoutMs: number, message: string) => {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new Error(message));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Creates a health checker for a Kysely database client.
 *
 * @example
 * const checker = makeDbHealthChecker(db, { name: 'database' });
 * await checker(); // { name: 'database', status: 'healthy', latencyMs: 2 }
 */
export const makeDbHealthChecker = <DB>(
  db: Kysely<DB>,
  options: DbHealthCheckerOptions
): HealthChecker => {
  const { name, timeoutMs = DEFAULT_TIMEOUT_MS } = options;
  const timeoutMessage = `Database health check timed out after ${String(timeoutMs)}ms`;

  return async (): Promise<HealthCheckResult> => {
    const startedAt = Date.now();
    const result = (status: HealthCheckResult['status'], message?: string): HealthCheckResult => ({
      name,
      status,
      ...(message !== undefined && { message }),
      latencyMs: Date.now() - startedAt,
    });

    try {
      await withTimeout(sql`SELECT 1`.execute(db), timeoutMs, timeoutMessage);
      return result('healthy');
    } catch (error) {
      return result(
        'unhealthy',
        error instanceof Error ? error.message : 'Unknown database error'
      );
    }
  };
};
