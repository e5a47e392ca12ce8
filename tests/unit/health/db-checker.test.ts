/**
 * Unit tests for database health checker
 */

import { describe, it, expect } from 'vitest';

import { makeDbHealthChecker } from '@/modules/health/shell/checkers/db-checker.js';

import { makeFakeKyselyDb } from '../../fixtures/fakes.js';
import { setupTestDatabase } from '../../infra/test-db.js';

describe('makeDbHealthChecker', () => {
  it('is healthy when SELECT 1 succeeds', async () => {
    const db = await setupTestDatabase();
    const checker = makeDbHealthChecker(db, { name: 'database' });

    const result = await checker();
    await db.destroy();

    expect(result.name).toBe('database');
    expect(result.status).toBe('healthy');
    expect(result.message).toBeUndefined();
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it('is unhealthy with the driver message when the query fails', async () => {
    const db = makeFakeKyselyDb({ failWithError: new Error('Connection refused') });
    const checker = makeDbHealthChecker(db, { name: 'database' });

    const result = await checker();

    expect(result).toMatchObject({
      name: 'database',
      status: 'unhealthy',
      message: 'Connection refused',
    });
  });

  it('is unhealthy once the connection pool is closed', async () => {
    const db = await setupTestDatabase();
    await db.destroy();
    const checker = makeDbHealthChecker(db, { name: 'database' });

    const result = await checker();

    expect(result.status).toBe('unhealthy');
  });

  it('times out a hanging query', async () => {
    const db = makeFakeKyselyDb({ delayMs: 2000 });
    const checker = makeDbHealthChecker(db, { name: 'database', timeoutMs: 50 });

    const result = await checker();

    expect(result.status).toBe('unhealthy');
    expect(result.message).toBe('Database health check timed out after 50ms');
    expect(result.latencyMs).toBeLessThan(1000);
  });

  it('succeeds when the query finishes within the timeout', async () => {
    const db = makeFakeKyselyDb({ delayMs: 10 });
    const checker = makeDbHealthChecker(db, { name: 'database', timeoutMs: 500 });

    const result = await checker();

    expect(result.status).toBe('healthy');
  });
});
