import { evaluateReadiness, mapCheckResults } from '../logic.js';

import type { HealthChecker } from '../ports.js';
import type { ReadinessResponse } from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  /** Epoch milliseconds at which the service started */
  startedAt: number;
  now: Date;
}

/**
 * Runs every checker in parallel and aggregates the results.
 * Uptime is reported in whole seconds.
 */
export const getReadiness = async (
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> => {
  const settled = await Promise.allSettled(deps.checkers.map((check) => check()));
  const uptimeSeconds = Math.max(0, Math.floor((input.now.getTime() - input.startedAt) / 1000));

  return evaluateReadiness(
    mapCheckResults(settled),
    uptimeSeconds,
    input.now.toISOString(),
    deps.version
  );
};
