/**
 * Credential health checker
 *
 * Reports whether an upstream API token is configured. Nothing is sent
 * upstream: a missing token only fails the tools that need it, so the
 * check is non-critical.
 */

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

export interface CredentialCheckerOptions {
  /** Name to identify this API in health check results */
  name: string;
  token: string | undefined;
  /** Environment variable that supplies the token */
  envVar: string;
}

export const makeCredentialChecker = (options: CredentialCheckerOptions): HealthChecker => {
  const { name, token, envVar } = options;

  return () => {
    const result: HealthCheckResult =
      token !== undefined && token !== ''
        ? { name, status: 'healthy', critical: false }
        : { name, status: 'unhealthy', message: `${envVar} is not set`, critical: false };
    return Promise.resolve(result);
  };
};
