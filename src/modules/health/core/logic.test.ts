import { describe, it, expect } from 'vitest';

import { determineOverallStatus, evaluateReadiness, mapCheckResults } from './logic.js';
import { type HealthCheckResult } from './types.js';

describe('Health Core Logic', () => {
  describe('mapCheckResults', () => {
    it('returns values for fulfilled promises', () => {
      const input: PromiseSettledResult<HealthCheckResult>[] = [
        { status: 'fulfilled', value: { name: 'database', status: 'healthy' } },
        { status: 'fulfilled', value: { name: 'store', status: 'unhealthy' } },
      ];
      const result = mapCheckResults(input);
      expect(result).toEqual([
        { name: 'database', status: 'healthy' },
        { name: 'store', status: 'unhealthy' },
      ]);
    });

    it('maps rejected promises to unhealthy results', () => {
      const input: PromiseSettledResult<HealthCheckResult>[] = [
        { status: 'rejected', reason: new Error('Connection timed out') },
      ];
      const result = mapCheckResults(input);
      expect(result).toEqual([
        {
          name: 'unknown',
          status: 'unhealthy',
          message: 'Connection timed out',
        },
      ]);
    });

    it('uses a generic message for non-Error rejections', () => {
      const result = mapCheckResults([{ status: 'rejected', reason: 'boom' }]);
      expect(result[0]?.message).toBe('Check failed');
    });
  });

  describe('determineOverallStatus', () => {
    it('returns ok when every check is healthy', () => {
      expect(determineOverallStatus([{ name: 'database', status: 'healthy' }])).toBe('ok');
    });

    it('returns unhealthy when a single check fails', () => {
      expect(
        determineOverallStatus([
          { name: 'database', status: 'healthy' },
          { name: 'replica', status: 'unhealthy' },
        ])
      ).toBe('unhealthy');
    });

    it('returns ok with no checks', () => {
      expect(determineOverallStatus([])).toBe('ok');
    });
  });

  describe('evaluateReadiness', () => {
    const timestamp = '2023-01-01T00:00:00Z';
    const uptime = 100;

    it('returns ok when all checks are healthy', () => {
      const checks: HealthCheckResult[] = [{ name: 'database', status: 'healthy' }];

      const result = evaluateReadiness(checks, uptime, timestamp);

      expect(result).toEqual({ status: 'ok', timestamp, uptime, checks });
    });

    it('returns unhealthy when any check is unhealthy', () => {
      const checks: HealthCheckResult[] = [
        { name: 'database', status: 'healthy' },
        { name: 'store', status: 'unhealthy' },
      ];

      const result = evaluateReadiness(checks, uptime, timestamp);

      expect(result.status).toBe('unhealthy');
    });

    it('includes version if provided', () => {
      const result = evaluateReadiness([], uptime, timestamp, '1.0.0');
      expect(result.version).toBe('1.0.0');
    });
  });
});
