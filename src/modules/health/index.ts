/**
 * Health module exports
 */

// Routes
export {
  makeHealthRoutes,
  LIVENESS_PATHS,
  type MakeHealthRoutesDeps,
} from './shell/rest/routes.js';

// Health checker factories
export { makeDbHealthChecker, type DbHealthCheckerOptions } from './shell/checkers/db-checker.js';

// Use cases and logic
export {
  getReadiness,
  type GetReadinessDeps,
  type GetReadinessInput,
} from './core/usecases/get-readiness.js';
export { evaluateReadiness, mapCheckResults, determineOverallStatus } from './core/logic.js';

// Types
export type { HealthChecker, Clock } from './core/ports.js';
export type {
  HealthCheckResult,
  LivenessResponse,
  ReadinessResponse,
  ReadinessStatus,
} from './core/types.js';
