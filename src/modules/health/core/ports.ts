import type { HealthCheckResult } from './types.js';

/**
 * Probes one dependency.
 * May reject; a rejection is reported as an unhealthy check.
 */
export type HealthChecker = () => Promise<HealthCheckResult>;

/** Source of the current time */
export type Clock = () => Date;
