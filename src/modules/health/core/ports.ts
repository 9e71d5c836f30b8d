import type { HealthCheckResult } from './types.js';

/**
 * Probes one thing the service needs before it can answer sales queries.
 * A rejected promise counts as a critical failure.
 */
export type HealthChecker = () => Promise<HealthCheckResult>;
