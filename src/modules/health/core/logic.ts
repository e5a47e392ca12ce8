import type { HealthCheckResult, ReadinessResponse, ReadinessStatus } from './types.js';

/**
 * Maps settled promises from health checkers to standardized HealthCheckResults.
 * A checker that rejects is reported as unhealthy.
 */
export const mapCheckResults = (
  results: PromiseSettledResult<HealthCheckResult>[]
): HealthCheckResult[] => {
  return results.map((result) => {
    if (result.status === 'fulfilled') {
      return result.value;
    }
    return {
      name: 'unknown',
      status: 'unhealthy',
      message: result.reason instanceof Error ? result.reason.message : 'Check failed',
    };
  });
};

/**
 * Every check guards the store, so one unhealthy check makes the service unready.
 */
export const determineOverallStatus = (checks: HealthCheckResult[]): ReadinessStatus => {
  return checks.some((c) => c.status === 'unhealthy') ? 'unhealthy' : 'ok';
};

/**
 * Aggregates individual check results into a readiness report.
 */
export const evaluateReadiness = (
  checks: HealthCheckResult[],
  uptime: number,
  timestamp: string,
  version?: string
): ReadinessResponse => {
  return {
    status: determineOverallStatus(checks),
    timestamp,
    uptime,
    checks,
    ...(version !== undefined && { version }),
  };
};
