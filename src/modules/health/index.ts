/**
 * Health module exports
 */

// Routes
export { makeHealthRoutes } from './shell/rest/routes.js';

// Health checker factories
export { makeCredentialChecker, type CredentialCheckerOptions } from './shell/checkers/index.js';

// Use cases
export { DEFAULT_CHECK_TIMEOUT_MS, getReadiness } from './core/usecases/get-readiness.js';

// Types
export type { HealthChecker } from './core/ports.js';
export type { HealthCheckResult, LivenessResponse, ReadinessResponse } from './core/types.js';
