/**
 * Health module exports
 */

// Routes
export { makeHealthRoutes } from './shell/rest/routes.js';

// Health checker factories
export {
  makeSalesDataHealthChecker,
  type SalesDataHealthCheckerOptions,
} from './shell/checkers/index.js';

// Types
export type { HealthChecker } from './core/ports.js';
export type { HealthCheckResult, LivenessResponse, ReadinessResponse } from './core/types.js';
