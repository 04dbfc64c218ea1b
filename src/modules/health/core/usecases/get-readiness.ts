import type { HealthChecker } from '../ports.js';
import type { HealthCheckResult, ReadinessResponse } from '../types.js';

/** Default upper bound for a single check */
export const DEFAULT_CHECK_TIMEOUT_MS = 2000;

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
  /** A check that takes longer is reported unhealthy */
  checkTimeoutMs?: number | undefined;
  /** Clock, injectable for tests */
  now?: (() => number) | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

const withTimeout = (check: Promise<HealthCheckResult>, timeoutMs: number) =>
  new Promise<HealthCheckResult>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`Check timed out after ${String(timeoutMs)} ms`));
    }, timeoutMs);
    check.then(
      (result) => {
        clearTimeout(timer);
        resolve(result);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error instanceof Error ? error : new Error('Check failed'));
      }
    );
  });

/**
 * Runs one checker. A rejected or timed-out check becomes a critical
 * failure named after its position.
 */
const runCheck = async (
  checker: HealthChecker,
  index: number,
  timeoutMs: number,
  now: () => number
): Promise<HealthCheckResult> => {
  const startedAt = now();
  try {
    const result = await withTimeout(checker(), timeoutMs);
    return result.latencyMs === undefined ? { ...result, latencyMs: now() - startedAt } : result;
  } catch (error) {
    return {
      name: `check-${String(index)}`,
      status: 'unhealthy',
      message: error instanceof Error ? error.message : 'Check failed',
      latencyMs: now() - startedAt,
      critical: true,
    };
  }
};

/**
 * - Any critical unhealthy → "unhealthy" (503)
 * - Any non-critical unhealthy → "degraded" (200)
 * - All healthy → "ok" (200)
 */
const determineOverallStatus = (checks: HealthCheckResult[]): ReadinessResponse['status'] => {
  const unhealthy = checks.filter((check) => check.status === 'unhealthy');
  if (unhealthy.some((check) => check.critical !== false)) {
    return 'unhealthy';
  }
  return unhealthy.length > 0 ? 'degraded' : 'ok';
};

/**
 * Runs every checker in parallel and aggregates the results.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const { checkers, version } = deps;
  const timeoutMs = deps.checkTimeoutMs ?? DEFAULT_CHECK_TIMEOUT_MS;
  const now = deps.now ?? Date.now;

  const checks = await Promise.all(
    checkers.map((checker, index) => runCheck(checker, index, timeoutMs, now))
  );

  return {
    status: determineOverallStatus(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(version !== undefined && { version }),
  };
}
