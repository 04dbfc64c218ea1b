import type { HealthCheckResult } from './types.js';

/**
 * A readiness check. It may reject; the readiness use case turns that
 * into an unhealthy result.
 */
export type HealthChecker = () => Promise<HealthCheckResult>;
